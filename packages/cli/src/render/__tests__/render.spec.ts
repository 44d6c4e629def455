import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { SecretMissingError } from '@swarm-deploy/errors';
import { createMockLogger } from '@swarm-deploy/testkit/logger';
import { itWithDir, writeTree } from '@swarm-deploy/testkit/os';
import { afterEach, beforeEach, describe, expect, vi } from 'vitest';
import { EnvSecretProvider } from '../../secrets/EnvSecretProvider';
import { renderCommand } from '../index';

vi.mock('../../artifacts/tls', async (importOriginal) => {
	const original = await importOriginal<typeof import('../../artifacts/tls')>();
	return {
		...original,
		generateTlsMaterial: (commonName: string) => ({
			certificate: 'test-certificate\n',
			privateKey: 'test-private-key\n',
			commonName,
			notBefore: new Date('2026-01-01T00:00:00.000Z'),
			notAfter: new Date('2036-01-01T00:00:00.000Z'),
		}),
	};
});

const secretProvider = new EnvSecretProvider({
	SWARM_PROD_API_KEY: 'k2',
	SWARM_PROD_HOST_ADDRESS: 'prod.example.com',
	SWARM_PROD_HOST_CREDENTIAL: 'pw',
});

describe('renderCommand', () => {
	beforeEach(() => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	itWithDir('should write the artifact layout for the environment', async ({ dir }) => {
		await writeTree(join(dir, 'app'), {
			'package.json': '{}',
			'package-lock.json': '{}',
		});

		const written = await renderCommand(
			{ environment: 'prod', outDir: join(dir, 'out'), sourceDir: join(dir, 'app') },
			{ secretProvider, logger: createMockLogger() },
		);

		expect(written).toEqual(
			[
				'swarm.key',
				'swarm.pem',
				'config/local-prod.json',
				'proxy/conf/nginx.conf',
				'proxy/conf/endpoints.conf',
				'Dockerfile',
			].map((path) => join(dir, 'out', 'swarm', path)),
		);
		expect(await readFile(join(dir, 'out/swarm/swarm.key'), 'utf-8')).toBe(
			'test-private-key\n',
		);
		expect((await stat(join(dir, 'out/swarm/swarm.key'))).mode & 0o777).toBe(0o600);

		const dockerfile = await readFile(join(dir, 'out/swarm/Dockerfile'), 'utf-8');
		expect(dockerfile).toContain('\nRUN npm ci --omit=dev\n');
		expect(dockerfile).toContain('\nEXPOSE 443\n');

		const nginx = await readFile(join(dir, 'out/swarm/proxy/conf/nginx.conf'), 'utf-8');
		expect(nginx).toContain('server_name prod.example.com;');
	});

	itWithDir('should fail when a secret is missing', async ({ dir }) => {
		await expect(
			renderCommand(
				{ environment: 'dev', outDir: dir },
				{ secretProvider, logger: createMockLogger() },
			),
		).rejects.toThrow(SecretMissingError);
	});
});
