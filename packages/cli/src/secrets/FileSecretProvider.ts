import { SecretMissingError } from '@swarm-deploy/errors';
import {
	getSecretsPath,
	readEnvironmentSecrets,
	type SecretStoreOptions,
} from './storage';
import type { SecretKind, SecretProvider } from './types';

/**
 * Reads secrets from the encrypted store written by `secrets:set`.
 * The file is decrypted on every lookup; nothing is cached.
 */
export class FileSecretProvider implements SecretProvider {
	constructor(private readonly options: SecretStoreOptions = {}) {}

	get source(): string {
		return getSecretsPath('{environment}', this.options.cwd);
	}

	async getSecret(environment: string, kind: SecretKind): Promise<string> {
		const secrets = await readEnvironmentSecrets(environment, this.options);
		const value = secrets?.values[kind];

		if (value === undefined || value.trim() === '') {
			throw new SecretMissingError(
				environment,
				kind,
				getSecretsPath(environment, this.options.cwd),
			);
		}

		return value;
	}
}
