import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { it } from 'vitest';

export interface DirectoryFixtures {
	dir: string;
}

/**
 * `it` with a fresh temporary directory per test, removed afterwards.
 */
export const itWithDir = it.extend<DirectoryFixtures>({
	// biome-ignore lint/correctness/noEmptyPattern: fixture signature requires the destructuring
	dir: async ({}, use) => {
		const directoryName = crypto.randomUUID().replace(/-/g, '').toUpperCase();
		const dir = path.join(os.tmpdir(), `swarm-deploy-${directoryName}`);
		await fs.mkdir(dir, { recursive: true });
		await use(dir);
		await fs.rm(dir, { recursive: true, force: true });
	},
});

/**
 * Writes a tree of files below `root`. Keys are relative paths.
 *
 * @example
 * ```typescript
 * await writeTree(dir, { 'package.json': '{}', 'lib/index.js': 'export {}' });
 * ```
 */
export async function writeTree(
	root: string,
	files: Record<string, string>,
): Promise<void> {
	for (const [relativePath, content] of Object.entries(files)) {
		const target = path.join(root, relativePath);
		await fs.mkdir(path.dirname(target), { recursive: true });
		await fs.writeFile(target, content, 'utf-8');
	}
}
