import { randomBytes } from 'node:crypto';
import { existsSync } from 'node:fs';
import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, join } from 'node:path';

/** Key length for AES-256 encryption */
const KEY_LENGTH = 32; // 256 bits

/**
 * Get the keystore directory for a project.
 * Keys are stored at ~/.swarm-deploy/{project-name}/
 *
 * @param projectName - Name of the project (defaults to current directory name)
 */
export function getKeystoreDir(projectName?: string): string {
	const name = projectName ?? basename(process.cwd());
	return join(homedir(), '.swarm-deploy', name);
}

/**
 * Get the path to an environment's encryption key.
 */
export function getKeyPath(environment: string, keystoreDir: string): string {
	return join(keystoreDir, `${environment}.key`);
}

/**
 * Generate a new encryption key, readable by the owner only.
 *
 * @returns The generated key as a hex string
 */
export async function generateKey(
	environment: string,
	keystoreDir: string,
): Promise<string> {
	const keyPath = getKeyPath(environment, keystoreDir);

	await mkdir(keystoreDir, { recursive: true, mode: 0o700 });

	const key = randomBytes(KEY_LENGTH).toString('hex');

	await writeFile(keyPath, key, { mode: 0o600, encoding: 'utf-8' });
	// The file may have existed with wider permissions
	await chmod(keyPath, 0o600);

	return key;
}

/**
 * Read an encryption key.
 *
 * @returns The key as a hex string, or null if not found
 */
export async function readKey(
	environment: string,
	keystoreDir: string,
): Promise<string | null> {
	const keyPath = getKeyPath(environment, keystoreDir);

	if (!existsSync(keyPath)) {
		return null;
	}

	const key = await readFile(keyPath, 'utf-8');
	return key.trim();
}

/**
 * Get or create a key. An existing key is returned unchanged.
 */
export async function getOrCreateKey(
	environment: string,
	keystoreDir: string,
): Promise<string> {
	const existingKey = await readKey(environment, keystoreDir);

	if (existingKey) {
		return existingKey;
	}

	return generateKey(environment, keystoreDir);
}
