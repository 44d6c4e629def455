import {
	DeployError,
	DeployErrorCode,
	errorMessage,
	wrapError,
} from '@swarm-deploy/errors';
import type { Logger } from '@swarm-deploy/logger';
import { SecretBundle } from './SecretBundle';
import { SECRET_KINDS, type SecretKind, type SecretProvider } from './types';

/**
 * Looks up every secret of an environment. Values are trimmed, so a secret
 * read from a file with a trailing newline is the same everywhere it is used.
 *
 * @throws SecretMissingError for the first absent secret
 */
export async function loadSecretBundle(
	provider: SecretProvider,
	environment: string,
	logger: Logger,
): Promise<SecretBundle> {
	const values: Partial<Record<SecretKind, string>> = {};

	for (const kind of SECRET_KINDS) {
		try {
			values[kind] = (await provider.getSecret(environment, kind)).trim();
		} catch (error) {
			throw wrapError(
				error,
				(cause) =>
					new DeployError(
						DeployErrorCode.SecretMissing,
						`Could not read secret "${kind}" for environment "${environment}": ${errorMessage(cause)}`,
						{ stage: 'secrets', details: { source: provider.source }, cause },
					),
			);
		}
	}

	logger.debug(
		{ environment, source: provider.source, kinds: SECRET_KINDS },
		'Secrets loaded',
	);

	const { apiKey = '', hostAddress = '', hostCredential = '' } = values;
	return new SecretBundle(environment, { apiKey, hostAddress, hostCredential });
}
