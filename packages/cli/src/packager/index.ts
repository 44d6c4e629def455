import { createHash } from 'node:crypto';
import { copyFile, mkdir, mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, isAbsolute, join, relative, resolve } from 'node:path';
import { errorMessage, PackagingError, wrapError } from '@swarm-deploy/errors';
import type { Logger } from '@swarm-deploy/logger';
import fg from 'fast-glob';
import { create } from 'tar';
import {
	ARCHIVE_ROOT,
	type ArtifactSet,
	renderArtifactFiles,
	writeArtifactFiles,
} from '../artifacts';

/** Source paths the image build cannot do without. */
export const DEFAULT_REQUIRED_PATHS = ['package.json'];

export const DEFAULT_IGNORE = [
	'**/node_modules/**',
	'**/.git/**',
	'**/dist/**',
	'.swarm/**',
];

/** Every archive entry carries this mtime so equal inputs give equal archives. */
const FIXED_MTIME = new Date('2000-01-01T00:00:00.000Z');

export interface PackageOptions {
	artifacts: ArtifactSet;
	/** Static application source */
	sourceDir: string;
	/** Directory the archive is written to */
	outputDir: string;
	requiredPaths?: string[];
	ignore?: string[];
	logger: Logger;
}

export interface DeploymentArchive {
	path: string;
	fileName: string;
	/** Bytes */
	size: number;
	sha256: string;
	/** Sorted archive entries */
	entries: string[];
}

export function getArchiveFileName(artifacts: ArtifactSet): string {
	const { appId, name } = artifacts.environment;
	return `${appId}-${name}.tar.gz`;
}

async function assertSource(sourceDir: string, requiredPaths: string[]) {
	const info = await stat(sourceDir).catch(() => null);
	if (!info?.isDirectory()) {
		throw new PackagingError(`Source directory not found: ${sourceDir}`, {
			path: sourceDir,
		});
	}

	for (const requiredPath of requiredPaths) {
		const exists = await stat(join(sourceDir, requiredPath)).then(
			() => true,
			() => false,
		);
		if (!exists) {
			throw new PackagingError(
				`Required source path missing: ${requiredPath}`,
				{ path: join(sourceDir, requiredPath) },
			);
		}
	}
}

/**
 * Globs for `outputDir` when it lies inside `sourceDir`. When both are the
 * same directory only the archive of this environment is skipped.
 */
function outputIgnore(
	sourceDir: string,
	outputDir: string,
	fileName: string,
): string[] {
	const inside = relative(resolve(sourceDir), resolve(outputDir));
	if (inside === '') {
		return [fileName];
	}
	if (inside.startsWith('..') || isAbsolute(inside)) {
		return [];
	}
	return [`${inside.split('\\').join('/')}/**`];
}

async function sha256(path: string): Promise<string> {
	return createHash('sha256')
		.update(await readFile(path))
		.digest('hex');
}

/**
 * Stages the application source under {@link ARCHIVE_ROOT}, overlays the
 * generated artifacts and writes `{appId}-{env}.tar.gz`. Entries are sorted
 * and carry portable headers and a fixed mtime. The staging directory is
 * removed whatever the outcome.
 *
 * @throws PackagingError when the source is incomplete or the archive cannot be written
 */
export async function packageDeployment(
	options: PackageOptions,
): Promise<DeploymentArchive> {
	const { artifacts, sourceDir, outputDir, logger } = options;

	await assertSource(sourceDir, options.requiredPaths ?? DEFAULT_REQUIRED_PATHS);

	const fileName = getArchiveFileName(artifacts);
	const staging = await mkdtemp(join(tmpdir(), 'swarm-deploy-staging-'));

	try {
		const sources = await fg('**/*', {
			cwd: sourceDir,
			dot: true,
			onlyFiles: true,
			followSymbolicLinks: false,
			ignore: [
				...DEFAULT_IGNORE,
				...outputIgnore(sourceDir, outputDir, fileName),
				...(options.ignore ?? []),
			],
		});

		for (const file of sources) {
			const target = join(staging, ARCHIVE_ROOT, file);
			await mkdir(dirname(target), { recursive: true });
			await copyFile(join(sourceDir, file), target);
		}

		const files = renderArtifactFiles(artifacts);
		await writeArtifactFiles(files, staging);

		const entries = [
			...new Set([
				...sources.map((file) => `${ARCHIVE_ROOT}/${file}`),
				...files.map((file) => file.path),
			]),
		].sort();

		const path = join(outputDir, fileName);

		await mkdir(outputDir, { recursive: true });
		await create(
			{ gzip: true, file: path, cwd: staging, portable: true, mtime: FIXED_MTIME },
			entries,
		);

		const archive: DeploymentArchive = {
			path,
			fileName,
			size: (await stat(path)).size,
			sha256: await sha256(path),
			entries,
		};

		logger.info(
			{
				archive: archive.path,
				size: archive.size,
				sha256: archive.sha256,
				entries: entries.length,
			},
			'Deployment archive written',
		);

		return archive;
	} catch (error) {
		throw wrapError(
			error,
			(cause) =>
				new PackagingError(`Packaging failed: ${errorMessage(cause)}`, {
					path: outputDir,
					cause,
				}),
		);
	} finally {
		await rm(staging, { recursive: true, force: true });
	}
}
