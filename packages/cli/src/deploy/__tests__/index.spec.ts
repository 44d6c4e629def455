import { join } from 'node:path';
import { RemoteCommandError } from '@swarm-deploy/errors';
import { LogLevel } from '@swarm-deploy/logger';
import { createMockLogger } from '@swarm-deploy/testkit/logger';
import { itWithDir, writeTree } from '@swarm-deploy/testkit/os';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { RecordingRemoteChannel } from '../../__tests__/test-helpers';
import type { OrchestratorSettings } from '../../config';
import { type DeploymentReport, deployCommand, formatReport } from '../index';

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

const settings: OrchestratorSettings = {
	logLevel: LogLevel.Info,
	logPretty: false,
	logger: 'pino',
	remote: { user: 'deploy', port: 22, workDir: 'swarm-deploy' },
	timeouts: { command: 120_000, build: 600_000, connect: 30_000 },
};

describe('formatReport', () => {
	it('should show the failing stage and the remote output', () => {
		const report: DeploymentReport = {
			status: 'failed',
			environment: 'dev',
			requestedEnvironment: 'dev',
			containerName: 'swarm-controller-dev',
			steps: [
				{ step: 'resolve', status: 'succeeded', duration: 3 },
				{ step: 'remote', status: 'failed', duration: 30 },
			],
			stages: [
				{ stage: 'CONNECTED', status: 'succeeded', fatal: true, duration: 10, commands: [] },
				{ stage: 'BUILT', status: 'failed', fatal: true, duration: 20, commands: [] },
			],
			failedStage: 'BUILT',
			error: new RemoteCommandError({
				stage: 'BUILT',
				command: 'docker build -t a b',
				exitCode: 1,
				stdout: 'Step 1/2\n',
				stderr: 'npm ERR! E404\n',
			}),
			duration: 1234,
		};

		expect(formatReport(report)).toEqual([
			'   ✓ resolve (3ms)',
			'   ✗ remote (30ms)',
			'     ✓ CONNECTED (10ms)',
			'     ✗ BUILT (20ms)',
			'\n❌ Deployment failed at BUILT: Remote command failed at BUILT (exit code 1): docker build -t a b',
			'   Remote output:',
			'   | Step 1/2',
			'   | npm ERR! E404',
		]);
	});

	it('should show the fallback environment, warnings and the kept archive', () => {
		const report: DeploymentReport = {
			status: 'succeeded',
			environment: 'dev',
			requestedEnvironment: 'staging',
			containerName: 'swarm-controller-dev',
			steps: [{ step: 'remote', status: 'succeeded', duration: 5 }],
			stages: [
				{ stage: 'PRUNED', status: 'failed', fatal: false, duration: 1, commands: [] },
			],
			archive: {
				path: '/tmp/out/a.tar.gz',
				fileName: 'a.tar.gz',
				size: 10,
				sha256: 'abc',
				entries: [],
			},
			duration: 61_500,
		};

		expect(formatReport(report, true)).toEqual([
			'   Environment: dev',
			'   ✓ remote (5ms)',
			'     ⚠ PRUNED (1ms)',
			'   Archive: /tmp/out/a.tar.gz',
			'   SHA-256: abc',
			'\n✅ Deployed swarm-controller-dev in 62s',
		]);
	});
});

describe('deployCommand', () => {
	afterEach(() => {
		vi.unstubAllEnvs();
		vi.restoreAllMocks();
	});

	itWithDir('should read secrets from the process environment', async ({ dir }) => {
		vi.stubEnv('SWARM_DEV_API_KEY', 'k1');
		vi.stubEnv('SWARM_DEV_HOST_ADDRESS', 'dev.example.com');
		vi.stubEnv('SWARM_DEV_HOST_CREDENTIAL', 'pw');
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		await writeTree(dir, { 'package.json': '{}' });
		const channel = new RecordingRemoteChannel();

		const report = await deployCommand(
			{ environment: 'dev', sourceDir: dir },
			{ settings, logger: createMockLogger(), createChannel: () => channel },
		);

		expect(report.status).toBe('succeeded');
		expect(channel.commands).toHaveLength(10);
		expect(log).toHaveBeenCalledWith('   Secrets: environment variables');
		expect(log).toHaveBeenCalledWith(
			expect.stringMatching(/^\n✅ Deployed swarm-controller-dev in \d+s$/),
		);
	});

	itWithDir('should print failures to stderr', async ({ dir }) => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		const error = vi.spyOn(console, 'error').mockImplementation(() => {});

		const report = await deployCommand(
			{ environment: 'prod', sourceDir: join(dir, 'app') },
			{
				settings,
				logger: createMockLogger(),
				createChannel: () => new RecordingRemoteChannel(),
			},
		);

		expect(report.status).toBe('failed');
		expect(error).toHaveBeenCalledWith(
			'\n❌ Deployment failed at secrets: Secret "apiKey" is not set for environment "prod" (looked up SWARM_PROD_API_KEY)',
		);
	});
});
