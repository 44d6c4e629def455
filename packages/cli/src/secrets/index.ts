import { EnvSecretProvider } from './EnvSecretProvider';
import { FileSecretProvider } from './FileSecretProvider';
import {
	getSecretsPath,
	maskSecret,
	readEnvironmentSecrets,
	type SecretStoreOptions,
	setSecret,
} from './storage';
import { isSecretKind, SECRET_KINDS, type SecretProvider } from './types';

export { loadSecretBundle } from './bundle';
export { EnvSecretProvider, getSecretVariableName } from './EnvSecretProvider';
export { FileSecretProvider } from './FileSecretProvider';
export { SecretBundle } from './SecretBundle';
export type { SecretStoreOptions } from './storage';
export {
	type EnvironmentSecrets,
	isSecretKind,
	SECRET_KINDS,
	type SecretKind,
	type SecretProvider,
} from './types';

const logger = console;

export type SecretSource = 'env' | 'file';

export function isSecretSource(value: string): value is SecretSource {
	return value === 'env' || value === 'file';
}

export interface CreateSecretProviderOptions extends SecretStoreOptions {
	env?: NodeJS.ProcessEnv;
}

/**
 * Create a secret provider for the given source.
 */
export function createSecretProvider(
	source: SecretSource,
	options: CreateSecretProviderOptions = {},
): SecretProvider {
	switch (source) {
		case 'env':
			return new EnvSecretProvider(options.env);
		case 'file':
			return new FileSecretProvider(options);
	}
}

export interface SecretsShowOptions extends SecretStoreOptions {
	reveal?: boolean;
}

/**
 * Store one secret in the encrypted file store.
 */
export async function secretsSetCommand(
	environment: string,
	kind: string,
	value: string,
	options: SecretStoreOptions = {},
): Promise<void> {
	if (!isSecretKind(kind)) {
		throw new Error(
			`Unknown secret "${kind}". Expected one of: ${SECRET_KINDS.join(', ')}`,
		);
	}
	if (value.trim() === '') {
		throw new Error(`Secret "${kind}" cannot be empty`);
	}

	await setSecret(environment, kind, value, options);

	logger.log(`\n✓ Secret "${kind}" set for environment "${environment}"`);
	logger.log(`  Location: ${getSecretsPath(environment, options.cwd)}`);
}

/**
 * Print the stored secrets of an environment, masked unless `reveal` is set.
 */
export async function secretsShowCommand(
	environment: string,
	options: SecretsShowOptions = {},
): Promise<void> {
	const secrets = await readEnvironmentSecrets(environment, options);

	if (!secrets) {
		throw new Error(
			`No secrets found for environment "${environment}". Run "swarm-deploy secrets:set ${environment} <kind> <value>" first.`,
		);
	}

	logger.log(`\nSecrets for environment "${environment}":`);
	logger.log(`  Created: ${secrets.createdAt}`);
	logger.log(`  Updated: ${secrets.updatedAt}\n`);

	for (const kind of SECRET_KINDS) {
		const value = secrets.values[kind];
		const display =
			value === undefined ? '(not set)' : options.reveal ? value : maskSecret(value);
		logger.log(`  ${kind}: ${display}`);
	}

	if (!options.reveal) {
		logger.log('\nUse --reveal to show actual values');
	}
}
