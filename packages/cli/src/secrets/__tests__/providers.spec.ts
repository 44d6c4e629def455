import { join } from 'node:path';
import {
	DeployError,
	DeployErrorCode,
	SecretMissingError,
} from '@swarm-deploy/errors';
import { createMockLogger } from '@swarm-deploy/testkit/logger';
import { itWithDir } from '@swarm-deploy/testkit/os';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadSecretBundle } from '../bundle';
import { EnvSecretProvider, getSecretVariableName } from '../EnvSecretProvider';
import { FileSecretProvider } from '../FileSecretProvider';
import {
	createSecretProvider,
	secretsSetCommand,
	secretsShowCommand,
} from '../index';
import { setSecret } from '../storage';
import type { SecretProvider } from '../types';

const devEnv = {
	SWARM_DEV_API_KEY: 'k1',
	SWARM_DEV_HOST_ADDRESS: 'dev.example.com',
	SWARM_DEV_HOST_CREDENTIAL: 'pw',
};

describe('getSecretVariableName', () => {
	it('should build SWARM_{ENV}_{KIND} names', () => {
		expect(getSecretVariableName('dev', 'apiKey')).toBe('SWARM_DEV_API_KEY');
		expect(getSecretVariableName('prod', 'hostAddress')).toBe(
			'SWARM_PROD_HOST_ADDRESS',
		);
		expect(getSecretVariableName('dev', 'hostCredential', 'CI')).toBe(
			'CI_DEV_HOST_CREDENTIAL',
		);
	});
});

describe('EnvSecretProvider', () => {
	it('should read secrets from the given environment', async () => {
		const provider = new EnvSecretProvider(devEnv);

		await expect(provider.getSecret('dev', 'apiKey')).resolves.toBe('k1');
		await expect(provider.getSecret('dev', 'hostAddress')).resolves.toBe(
			'dev.example.com',
		);
	});

	it('should throw SecretMissingError for absent secrets', async () => {
		const provider = new EnvSecretProvider(devEnv);

		const error = await provider.getSecret('prod', 'apiKey').catch((e: unknown) => e);

		expect(error).toBeInstanceOf(SecretMissingError);
		expect(error).toHaveProperty(
			'message',
			'Secret "apiKey" is not set for environment "prod" (looked up SWARM_PROD_API_KEY)',
		);
	});

	it('should treat blank values as missing', async () => {
		const provider = new EnvSecretProvider({ SWARM_DEV_API_KEY: '   ' });

		await expect(provider.getSecret('dev', 'apiKey')).rejects.toThrow(
			SecretMissingError,
		);
	});
});

describe('FileSecretProvider', () => {
	itWithDir('should read secrets from the encrypted store', async ({ dir }) => {
		const options = { cwd: dir, keystoreDir: join(dir, 'keys') };
		await setSecret('dev', 'hostAddress', 'dev.example.com', options);

		const provider = new FileSecretProvider(options);

		await expect(provider.getSecret('dev', 'hostAddress')).resolves.toBe(
			'dev.example.com',
		);
		await expect(provider.getSecret('dev', 'apiKey')).rejects.toThrow(
			SecretMissingError,
		);
	});

	itWithDir('should report missing stores as missing secrets', async ({ dir }) => {
		const provider = new FileSecretProvider({
			cwd: dir,
			keystoreDir: join(dir, 'keys'),
		});

		await expect(provider.getSecret('prod', 'apiKey')).rejects.toThrow(
			`Secret "apiKey" is not set for environment "prod" (looked up ${join(dir, '.swarm/secrets/prod.json')})`,
		);
	});
});

describe('createSecretProvider', () => {
	it('should create providers by source', () => {
		expect(createSecretProvider('env', { env: devEnv })).toBeInstanceOf(
			EnvSecretProvider,
		);
		expect(createSecretProvider('file')).toBeInstanceOf(FileSecretProvider);
	});
});

describe('loadSecretBundle', () => {
	it('should load every secret of the environment', async () => {
		const bundle = await loadSecretBundle(
			new EnvSecretProvider(devEnv),
			'dev',
			createMockLogger(),
		);

		expect(bundle.apiKey).toBe('k1');
		expect(bundle.hostAddress).toBe('dev.example.com');
		expect(bundle.hostCredential).toBe('pw');
	});

	it('should trim surrounding whitespace from every secret', async () => {
		const bundle = await loadSecretBundle(
			new EnvSecretProvider({
				SWARM_DEV_API_KEY: 'k1\n',
				SWARM_DEV_HOST_ADDRESS: ' dev.example.com\n',
				SWARM_DEV_HOST_CREDENTIAL: 'pw\r\n',
			}),
			'dev',
			createMockLogger(),
		);

		expect(bundle.apiKey).toBe('k1');
		expect(bundle.hostAddress).toBe('dev.example.com');
		expect(bundle.hostCredential).toBe('pw');
	});

	it('should rethrow SecretMissingError unchanged', async () => {
		const { SWARM_DEV_HOST_CREDENTIAL: _, ...partial } = devEnv;

		await expect(
			loadSecretBundle(new EnvSecretProvider(partial), 'dev', createMockLogger()),
		).rejects.toMatchObject({
			code: DeployErrorCode.SecretMissing,
			kind: 'hostCredential',
		});
	});

	it('should wrap provider failures', async () => {
		const provider: SecretProvider = {
			source: 'vault',
			getSecret: vi.fn().mockRejectedValue(new Error('sealed')),
		};

		const error = await loadSecretBundle(provider, 'dev', createMockLogger()).catch(
			(e: unknown) => e,
		);

		expect(error).toBeInstanceOf(DeployError);
		expect(error).toMatchObject({
			code: DeployErrorCode.SecretMissing,
			stage: 'secrets',
			message: 'Could not read secret "apiKey" for environment "dev": sealed',
		});
	});
});

describe('secrets commands', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	itWithDir('should set and show masked secrets', async ({ dir }) => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		const options = { cwd: dir, keystoreDir: join(dir, 'keys') };

		await secretsSetCommand('dev', 'apiKey', 'abcdefghij', options);
		await secretsShowCommand('dev', options);

		const lines = log.mock.calls.map(([line]) => line);
		expect(lines).toContain('  apiKey: abcd****ij');
		expect(lines).toContain('  hostAddress: (not set)');
		expect(lines).toContain('\nUse --reveal to show actual values');
	});

	itWithDir('should reveal secrets on request', async ({ dir }) => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		const options = { cwd: dir, keystoreDir: join(dir, 'keys') };

		await secretsSetCommand('dev', 'apiKey', 'abcdefghij', options);
		await secretsShowCommand('dev', { ...options, reveal: true });

		expect(log.mock.calls.map(([line]) => line)).toContain('  apiKey: abcdefghij');
	});

	it('should reject unknown kinds', async () => {
		await expect(secretsSetCommand('dev', 'token', 'x')).rejects.toThrow(
			'Unknown secret "token". Expected one of: apiKey, hostAddress, hostCredential',
		);
	});

	itWithDir('should fail to show a missing store', async ({ dir }) => {
		await expect(
			secretsShowCommand('prod', { cwd: dir, keystoreDir: join(dir, 'keys') }),
		).rejects.toThrow('No secrets found for environment "prod"');
	});
});
