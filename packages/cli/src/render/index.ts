import { relative, resolve } from 'node:path';
import type { Logger } from '@swarm-deploy/logger';
import {
	detectInstallStrategy,
	generateArtifacts,
	renderArtifactFiles,
	writeArtifactFiles,
} from '../artifacts';
import { resolveEnvironment } from '../environment/resolver';
import { loadSecretBundle } from '../secrets/bundle';
import type { SecretProvider } from '../secrets/types';

const logger = console;

export interface RenderOptions {
	environment?: string;
	/** Directory the `swarm/` tree is written below */
	outDir: string;
	/** Source the Dockerfile install step is chosen for */
	sourceDir?: string;
	configDir?: string;
}

export interface RenderDependencies {
	secretProvider: SecretProvider;
	logger: Logger;
}

/**
 * Write the generated artifact layout locally without touching any host.
 * Returns the written paths.
 */
export async function renderCommand(
	options: RenderOptions,
	dependencies: RenderDependencies,
): Promise<string[]> {
	const environment = await resolveEnvironment(options.environment, {
		configDir: options.configDir,
		logger: dependencies.logger,
	});
	const secrets = await loadSecretBundle(
		dependencies.secretProvider,
		environment.name,
		dependencies.logger,
	);

	try {
		const outDir = resolve(options.outDir);
		const artifacts = generateArtifacts(environment, secrets, {
			dockerfile: {
				install: detectInstallStrategy(resolve(options.sourceDir ?? process.cwd())),
			},
		});
		const written = await writeArtifactFiles(renderArtifactFiles(artifacts), outDir);

		logger.log(`\n📄 Rendered ${environment.name} artifacts to ${outDir}`);
		for (const path of written) {
			logger.log(`   ✓ ${relative(outDir, path)}`);
		}
		logger.log('\n⚠️  swarm/swarm.key and the controller config contain secrets');

		return written;
	} finally {
		secrets.scrub();
	}
}
