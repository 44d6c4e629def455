import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { z } from 'zod/v4';
import { getKeystoreDir, getOrCreateKey, readKey } from './keystore';
import type { EnvironmentSecrets, SecretKind } from './types';

/** Default secrets directory relative to project root */
const SECRETS_DIR = '.swarm/secrets';

/** AES-256-GCM configuration */
const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12; // 96 bits for GCM
const AUTH_TAG_LENGTH = 16; // 128 bits

/** Encrypted secrets file structure */
const EncryptedSecretsFileSchema = z.object({
	/** Version for future format changes */
	version: z.literal(1),
	/** Base64 encoded encrypted data (ciphertext + auth tag) */
	encrypted: z.string().min(1),
	/** Hex encoded IV */
	iv: z.string().regex(/^[0-9a-f]+$/),
});

type EncryptedSecretsFile = z.infer<typeof EncryptedSecretsFileSchema>;

const EnvironmentSecretsSchema = z.object({
	environment: z.string(),
	createdAt: z.string(),
	updatedAt: z.string(),
	values: z.object({
		apiKey: z.string().optional(),
		hostAddress: z.string().optional(),
		hostCredential: z.string().optional(),
	}),
});

export interface SecretStoreOptions {
	/** Project root holding `.swarm/secrets` */
	cwd?: string;
	/** Directory holding the keys; defaults to ~/.swarm-deploy/{project} */
	keystoreDir?: string;
}

function resolveStore(options: SecretStoreOptions) {
	const cwd = options.cwd ?? process.cwd();
	return {
		cwd,
		keystoreDir: options.keystoreDir ?? getKeystoreDir(basename(cwd)),
	};
}

/**
 * Get the secrets directory path.
 */
export function getSecretsDir(cwd = process.cwd()): string {
	return join(cwd, SECRETS_DIR);
}

/**
 * Get the secrets file path for an environment.
 */
export function getSecretsPath(environment: string, cwd = process.cwd()): string {
	return join(getSecretsDir(cwd), `${environment}.json`);
}

/**
 * Check if secrets exist for an environment.
 */
export function secretsExist(environment: string, cwd = process.cwd()): boolean {
	return existsSync(getSecretsPath(environment, cwd));
}

/**
 * Initialize an empty secrets object for an environment.
 */
export function initEnvironmentSecrets(environment: string): EnvironmentSecrets {
	const now = new Date().toISOString();
	return {
		environment,
		createdAt: now,
		updatedAt: now,
		values: {},
	};
}

function encryptSecretsData(
	secrets: EnvironmentSecrets,
	keyHex: string,
): EncryptedSecretsFile {
	const key = Buffer.from(keyHex, 'hex');
	const iv = randomBytes(IV_LENGTH);

	const cipher = createCipheriv(ALGORITHM, key, iv);
	const ciphertext = Buffer.concat([
		cipher.update(JSON.stringify(secrets), 'utf-8'),
		cipher.final(),
	]);

	// Ciphertext followed by the auth tag
	const combined = Buffer.concat([ciphertext, cipher.getAuthTag()]);

	return {
		version: 1,
		encrypted: combined.toString('base64'),
		iv: iv.toString('hex'),
	};
}

function decryptSecretsData(
	data: EncryptedSecretsFile,
	keyHex: string,
): EnvironmentSecrets {
	const key = Buffer.from(keyHex, 'hex');
	const combined = Buffer.from(data.encrypted, 'base64');

	const ciphertext = combined.subarray(0, -AUTH_TAG_LENGTH);
	const authTag = combined.subarray(-AUTH_TAG_LENGTH);

	const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(data.iv, 'hex'));
	decipher.setAuthTag(authTag);

	const plaintext = Buffer.concat([
		decipher.update(ciphertext),
		decipher.final(),
	]);

	return EnvironmentSecretsSchema.parse(JSON.parse(plaintext.toString('utf-8')));
}

/**
 * Read secrets for an environment.
 * Requires the decryption key at ~/.swarm-deploy/{project}/{environment}.key
 *
 * @returns EnvironmentSecrets or null if not found
 */
export async function readEnvironmentSecrets(
	environment: string,
	options: SecretStoreOptions = {},
): Promise<EnvironmentSecrets | null> {
	const { cwd, keystoreDir } = resolveStore(options);
	const path = getSecretsPath(environment, cwd);

	if (!existsSync(path)) {
		return null;
	}

	const content = await readFile(path, 'utf-8');
	const data = EncryptedSecretsFileSchema.parse(JSON.parse(content));
	const key = await readKey(environment, keystoreDir);

	if (!key) {
		throw new Error(
			`Decryption key not found for environment "${environment}". ` +
				`Expected key at: ${join(keystoreDir, `${environment}.key`)}`,
		);
	}

	return decryptSecretsData(data, key);
}

/**
 * Write secrets for an environment, creating its key when needed.
 */
export async function writeEnvironmentSecrets(
	secrets: EnvironmentSecrets,
	options: SecretStoreOptions = {},
): Promise<void> {
	const { cwd, keystoreDir } = resolveStore(options);

	await mkdir(getSecretsDir(cwd), { recursive: true });

	const key = await getOrCreateKey(secrets.environment, keystoreDir);
	const encrypted = encryptSecretsData(secrets, key);

	await writeFile(
		getSecretsPath(secrets.environment, cwd),
		JSON.stringify(encrypted, null, 2),
		{ encoding: 'utf-8', mode: 0o600 },
	);
}

/**
 * Set one secret, creating the environment's secrets file if absent.
 */
export async function setSecret(
	environment: string,
	kind: SecretKind,
	value: string,
	options: SecretStoreOptions = {},
): Promise<EnvironmentSecrets> {
	const secrets =
		(await readEnvironmentSecrets(environment, options)) ??
		initEnvironmentSecrets(environment);

	const updated: EnvironmentSecrets = {
		...secrets,
		updatedAt: new Date().toISOString(),
		values: {
			...secrets.values,
			[kind]: value,
		},
	};

	await writeEnvironmentSecrets(updated, options);
	return updated;
}

/**
 * Mask a secret for display (show first 4 and last 2 chars).
 */
export function maskSecret(value: string): string {
	if (value.length <= 8) {
		return '********';
	}
	return `${value.slice(0, 4)}${'*'.repeat(value.length - 6)}${value.slice(-2)}`;
}
