import { execFile } from 'node:child_process';
import { CheckoutError } from '@swarm-deploy/errors';
import { createMockLogger } from '@swarm-deploy/testkit/logger';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
	checkout,
	getAuthorizationHeader,
	getCredentialVariableName,
} from '../checkout';

vi.mock('node:child_process', () => ({
	execFile: vi.fn(),
}));

type GitCallback = (error: Error | null, stdout: string, stderr: string) => void;

/** Makes the mocked execFile answer every call through `respond`. */
function mockGit(respond: (args: string[]) => { error?: Error; stderr?: string }) {
	vi.mocked(execFile).mockImplementation(((
		_file: string,
		args: string[],
		_options: unknown,
		callback: GitCallback,
	) => {
		const { error = null, stderr = '' } = respond(args);
		callback(error, '', stderr);
	}) as unknown as typeof execFile);
}

function gitEnv(): Record<string, unknown> {
	const options: unknown = vi.mocked(execFile).mock.calls[0]?.[2];
	if (typeof options !== 'object' || options === null || !('env' in options)) {
		return {};
	}
	const { env } = options;
	return typeof env === 'object' && env !== null ? { ...env } : {};
}

function gitArgs(): string[] {
	const call = vi.mocked(execFile).mock.calls[0];
	const args: unknown = call?.[1];
	return Array.isArray(args) ? args.map(String) : [];
}

describe('getCredentialVariableName', () => {
	it('should map ids to SWARM_GIT_TOKEN_ variables', () => {
		expect(getCredentialVariableName('ci-bot')).toBe('SWARM_GIT_TOKEN_CI_BOT');
		expect(getCredentialVariableName('deploy')).toBe('SWARM_GIT_TOKEN_DEPLOY');
	});
});

describe('getAuthorizationHeader', () => {
	it('should encode the token as basic credentials', () => {
		expect(getAuthorizationHeader('test-token')).toBe(
			`Authorization: Basic ${Buffer.from('x-access-token:test-token').toString('base64')}`,
		);
	});
});

describe('checkout', () => {
	beforeEach(() => {
		vi.mocked(execFile).mockReset();
	});

	it('should shallow-clone the branch', async () => {
		mockGit(() => ({}));

		const result = await checkout({
			repositoryUrl: 'https://git.example.com/swarm/controller.git',
			branch: 'dev',
			destination: '/tmp/source',
			logger: createMockLogger(),
		});

		expect(result).toBe('/tmp/source');
		expect(vi.mocked(execFile).mock.calls[0]?.[0]).toBe('git');
		expect(gitArgs()).toEqual([
			'clone',
			'--depth',
			'1',
			'--single-branch',
			'--branch',
			'dev',
			'https://git.example.com/swarm/controller.git',
			'/tmp/source',
		]);
	});

	it('should pass the credential as a header through the environment', async () => {
		mockGit(() => ({}));

		await checkout({
			repositoryUrl: 'https://git.example.com/swarm/controller.git',
			branch: 'prod',
			destination: '/tmp/source',
			credentialId: 'ci-bot',
			env: { SWARM_GIT_TOKEN_CI_BOT: 'test-token' },
			logger: createMockLogger(),
		});

		const args = gitArgs();
		expect(args[0]).toBe('clone');
		expect(args).toContain('https://git.example.com/swarm/controller.git');
		expect(args.some((arg) => arg.includes('Authorization'))).toBe(false);
		expect(gitEnv()).toEqual({
			GIT_TERMINAL_PROMPT: '0',
			GIT_CONFIG_COUNT: '1',
			GIT_CONFIG_KEY_0: 'http.extraHeader',
			GIT_CONFIG_VALUE_0: getAuthorizationHeader('test-token'),
		});
	});

	it('should fail for an unknown credential', async () => {
		mockGit(() => ({}));

		await expect(
			checkout({
				repositoryUrl: 'https://git.example.com/swarm/controller.git',
				branch: 'dev',
				destination: '/tmp/source',
				credentialId: 'ci-bot',
				env: {},
				logger: createMockLogger(),
			}),
		).rejects.toThrow(
			'Git credential "ci-bot" is not set (expected SWARM_GIT_TOKEN_CI_BOT)',
		);
		expect(execFile).not.toHaveBeenCalled();
	});

	it('should wrap git failures with its output', async () => {
		mockGit(() => ({
			error: new Error('Command failed: git clone'),
			stderr: "fatal: Remote branch dev not found in upstream origin\n",
		}));

		const error = await checkout({
			repositoryUrl: 'https://git.example.com/swarm/controller.git',
			branch: 'dev',
			destination: '/tmp/source',
			logger: createMockLogger(),
		}).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(CheckoutError);
		expect(error).toMatchObject({
			stage: 'checkout',
			message:
				'Could not check out dev from https://git.example.com/swarm/controller.git: fatal: Remote branch dev not found in upstream origin',
		});
	});
});
