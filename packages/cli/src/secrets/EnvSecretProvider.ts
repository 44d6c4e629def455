import { SecretMissingError } from '@swarm-deploy/errors';
import type { SecretKind, SecretProvider } from './types';

const VARIABLE_SUFFIXES: Record<SecretKind, string> = {
	apiKey: 'API_KEY',
	hostAddress: 'HOST_ADDRESS',
	hostCredential: 'HOST_CREDENTIAL',
};

/**
 * Name of the environment variable holding a secret.
 *
 * @example
 * ```typescript
 * getSecretVariableName('dev', 'apiKey'); // 'SWARM_DEV_API_KEY'
 * ```
 */
export function getSecretVariableName(
	environment: string,
	kind: SecretKind,
	prefix = 'SWARM',
): string {
	const env = environment.toUpperCase().replace(/[^A-Z0-9]/g, '_');
	return `${prefix}_${env}_${VARIABLE_SUFFIXES[kind]}`;
}

/**
 * Reads secrets from environment variables, the way CI injects them.
 */
export class EnvSecretProvider implements SecretProvider {
	readonly source = 'environment variables';

	constructor(
		private readonly env: NodeJS.ProcessEnv = process.env,
		private readonly prefix = 'SWARM',
	) {}

	async getSecret(environment: string, kind: SecretKind): Promise<string> {
		const name = getSecretVariableName(environment, kind, this.prefix);
		const value = this.env[name];

		if (value === undefined || value.trim() === '') {
			throw new SecretMissingError(environment, kind, name);
		}

		return value;
	}
}
