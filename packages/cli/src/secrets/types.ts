/** Secrets every deployment needs, per environment. */
export const SECRET_KINDS = ['apiKey', 'hostAddress', 'hostCredential'] as const;

export type SecretKind = (typeof SECRET_KINDS)[number];

export function isSecretKind(value: string): value is SecretKind {
	return SECRET_KINDS.some((kind) => kind === value);
}

/**
 * Opaque lookup of deployment secrets.
 */
export interface SecretProvider {
	/** Where secrets are looked up, for error messages */
	readonly source: string;
	/**
	 * @throws SecretMissingError when the secret is absent or blank
	 */
	getSecret(environment: string, kind: SecretKind): Promise<string>;
}

/** Decrypted contents of one environment's secrets file */
export interface EnvironmentSecrets {
	environment: string;
	/** ISO timestamp when secrets were created */
	createdAt: string;
	/** ISO timestamp when secrets were last updated */
	updatedAt: string;
	values: Partial<Record<SecretKind, string>>;
}
