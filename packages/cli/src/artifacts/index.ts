import { existsSync } from 'node:fs';
import { chmod, mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { Environment } from '../environment/types';
import type { SecretBundle } from '../secrets/SecretBundle';
import {
	buildControllerConfig,
	type ControllerConfig,
	serializeControllerConfig,
} from './controller-config';
import {
	buildDockerfile,
	type DockerfileOptions,
	type InstallStrategy,
	serializeDockerfile,
} from './dockerfile';
import { serializeNginxConfig } from './nginx/directives';
import { buildProxyConfig } from './nginx/proxy-config';
import { ARCHIVE_ROOT, type ArtifactLayout, getArtifactLayout } from './paths';
import { generateTlsMaterial, type TlsMaterial, type TlsOptions } from './tls';

export { PROXY_RELOAD_COMMAND, type ControllerConfig } from './controller-config';
export type { DockerInstruction, InstallStrategy } from './dockerfile';
export { ARCHIVE_ROOT, type ArtifactLayout } from './paths';
export type { TlsMaterial } from './tls';

/**
 * Everything generated for one deployment run.
 */
export interface ArtifactSet {
	environment: Environment;
	layout: ArtifactLayout;
	tls: TlsMaterial;
	controllerConfig: ControllerConfig;
	documents: {
		controllerConfig: string;
		proxyConfig: string;
		endpointsConfig: string;
		dockerfile: string;
	};
}

export interface GenerateArtifactsOptions {
	tls?: TlsOptions;
	dockerfile?: DockerfileOptions;
}

export interface ArtifactFile {
	/** Path relative to the archive, starting with {@link ARCHIVE_ROOT} */
	path: string;
	content: string;
	mode: number;
}

/**
 * Generates the artifact set. Everything but the TLS pair is a pure
 * function of the environment and the secrets.
 *
 * @throws ArtifactGenerationError when any artifact cannot be produced
 */
export function generateArtifacts(
	environment: Environment,
	secrets: SecretBundle,
	options: GenerateArtifactsOptions = {},
): ArtifactSet {
	const layout = getArtifactLayout(environment);
	const controllerConfig = buildControllerConfig(environment, secrets);

	const documents = {
		controllerConfig: serializeControllerConfig(controllerConfig),
		proxyConfig: serializeNginxConfig(
			buildProxyConfig(environment, secrets.hostAddress),
		),
		endpointsConfig: '',
		dockerfile: serializeDockerfile(
			buildDockerfile(environment, layout, options.dockerfile),
		),
	};

	const tls = generateTlsMaterial(secrets.hostAddress, options.tls);

	return { environment, layout, tls, controllerConfig, documents };
}

/**
 * The generated files as they appear in the archive.
 */
export function renderArtifactFiles(artifacts: ArtifactSet): ArtifactFile[] {
	const { layout, documents, tls } = artifacts;
	const file = (path: string, content: string, mode = 0o644): ArtifactFile => ({
		path: `${ARCHIVE_ROOT}/${path}`,
		content,
		mode,
	});

	return [
		file(layout.privateKey, tls.privateKey, 0o600),
		file(layout.certificate, tls.certificate),
		file(layout.controllerConfig, documents.controllerConfig),
		file(layout.proxyConfig, documents.proxyConfig),
		file(layout.endpointsConfig, documents.endpointsConfig),
		file(layout.dockerfile, documents.dockerfile),
	];
}

/**
 * Writes artifact files below `root`, replacing existing ones.
 */
export async function writeArtifactFiles(
	files: ArtifactFile[],
	root: string,
): Promise<string[]> {
	const written: string[] = [];

	for (const artifact of files) {
		const target = join(root, artifact.path);
		await mkdir(dirname(target), { recursive: true });
		await writeFile(target, artifact.content, { encoding: 'utf-8', mode: artifact.mode });
		await chmod(target, artifact.mode);
		written.push(target);
	}

	return written;
}

/**
 * `npm ci` when the source carries a lockfile, `npm install` otherwise.
 */
export function detectInstallStrategy(sourceDir: string): InstallStrategy {
	return existsSync(join(sourceDir, 'package-lock.json')) ? 'ci' : 'install';
}
