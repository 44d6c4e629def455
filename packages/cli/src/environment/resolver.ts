import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
	ConfigInvalidError,
	ConfigNotFoundError,
	errorMessage,
} from '@swarm-deploy/errors';
import type { Logger } from '@swarm-deploy/logger';
import { EnvironmentParametersSchema } from './schema';
import {
	DEFAULT_ENVIRONMENT,
	ENVIRONMENT_NAMES,
	type Environment,
	type EnvironmentName,
} from './types';

/** Parameter files shipped with this package. */
export const DEFAULT_CONFIG_DIR = fileURLToPath(
	new URL('../../config/environments', import.meta.url),
);

export interface ResolveEnvironmentOptions {
	/** Directory holding `{name}.json` parameter files */
	configDir?: string;
	logger: Logger;
}

export function isEnvironmentName(value: string): value is EnvironmentName {
	return ENVIRONMENT_NAMES.some((name) => name === value);
}

/**
 * Maps a requested environment name onto a known one. Unknown or absent
 * names fall back to {@link DEFAULT_ENVIRONMENT} with a warning.
 */
export function normalizeEnvironmentName(
	requested: string | undefined,
	logger: Logger,
): EnvironmentName {
	const candidate = requested?.trim().toLowerCase() ?? '';

	if (isEnvironmentName(candidate)) {
		return candidate;
	}

	if (requested === undefined || candidate === '') {
		logger.info(
			{ environment: DEFAULT_ENVIRONMENT },
			'No environment requested, using default',
		);
	} else {
		logger.warn(
			{
				requested,
				environment: DEFAULT_ENVIRONMENT,
				valid: ENVIRONMENT_NAMES,
			},
			'Unknown environment requested, falling back to default',
		);
	}

	return DEFAULT_ENVIRONMENT;
}

export function getEnvironmentConfigPath(
	name: EnvironmentName,
	configDir = DEFAULT_CONFIG_DIR,
): string {
	return join(configDir, `${name}.json`);
}

async function readParameterFile(
	name: EnvironmentName,
	path: string,
): Promise<unknown> {
	let content: string;
	try {
		content = await readFile(path, 'utf-8');
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			throw new ConfigNotFoundError(name, path);
		}
		throw new ConfigInvalidError(name, [errorMessage(error)], error);
	}

	try {
		return JSON.parse(content);
	} catch (error) {
		throw new ConfigInvalidError(
			name,
			[`not valid JSON: ${errorMessage(error)}`],
			error,
		);
	}
}

/**
 * Resolves the parameters of the requested environment.
 *
 * @throws ConfigNotFoundError when the parameter file does not exist
 * @throws ConfigInvalidError when it does not describe a usable environment
 *
 * @example
 * ```typescript
 * const environment = await resolveEnvironment('staging', { logger });
 * environment.name; // 'dev'
 * ```
 */
export async function resolveEnvironment(
	requested: string | undefined,
	options: ResolveEnvironmentOptions,
): Promise<Environment> {
	const name = normalizeEnvironmentName(requested, options.logger);
	const path = getEnvironmentConfigPath(name, options.configDir);
	const raw = await readParameterFile(name, path);

	const result = EnvironmentParametersSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigInvalidError(
			name,
			result.error.issues.map(
				(issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
			),
		);
	}

	const { controller, proxy, ...rest } = result.data;

	options.logger.debug({ environment: name, path }, 'Environment resolved');

	return Object.freeze({
		name,
		...rest,
		controller: Object.freeze({ ...controller }),
		proxy: Object.freeze({ ...proxy }),
	});
}

/**
 * Known environments that have a parameter file in `configDir`.
 */
export async function listEnvironments(
	configDir = DEFAULT_CONFIG_DIR,
): Promise<EnvironmentName[]> {
	const files = await readdir(configDir);
	return ENVIRONMENT_NAMES.filter((name) => files.includes(`${name}.json`));
}
