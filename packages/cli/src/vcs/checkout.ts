import { execFile } from 'node:child_process';
import { CheckoutError } from '@swarm-deploy/errors';
import type { Logger } from '@swarm-deploy/logger';

export interface CheckoutOptions {
	repositoryUrl: string;
	branch: string;
	/** Directory the repository is cloned into; must not exist yet */
	destination: string;
	/** Looked up as SWARM_GIT_TOKEN_{ID} */
	credentialId?: string;
	env?: NodeJS.ProcessEnv;
	/** Milliseconds */
	timeout?: number;
	logger: Logger;
}

interface GitResult {
	stdout: string;
	stderr: string;
}

/**
 * @example
 * ```typescript
 * getCredentialVariableName('ci-bot'); // 'SWARM_GIT_TOKEN_CI_BOT'
 * ```
 */
export function getCredentialVariableName(credentialId: string): string {
	return `SWARM_GIT_TOKEN_${credentialId.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

/**
 * `http.extraHeader` value authenticating with a token, so the token never
 * appears in the repository URL or in git's output.
 */
export function getAuthorizationHeader(token: string): string {
	const basic = Buffer.from(`x-access-token:${token}`).toString('base64');
	return `Authorization: Basic ${basic}`;
}

function runGit(
	args: string[],
	options: { env?: NodeJS.ProcessEnv; timeout: number },
): Promise<GitResult> {
	return new Promise((resolve, reject) => {
		execFile(
			'git',
			args,
			{ env: options.env, timeout: options.timeout, maxBuffer: 10 * 1024 * 1024 },
			(error, stdout, stderr) => {
				if (error) {
					reject(Object.assign(error, { stderr: String(stderr) }));
					return;
				}
				resolve({ stdout: String(stdout), stderr: String(stderr) });
			},
		);
	});
}

/**
 * Shallow clone of `branch` into `destination`.
 *
 * @returns The checked-out source directory
 * @throws CheckoutError when the credential is unknown or git fails
 */
export async function checkout(options: CheckoutOptions): Promise<string> {
	const {
		repositoryUrl,
		branch,
		destination,
		credentialId,
		env = process.env,
		timeout = 120_000,
		logger,
	} = options;

	const gitEnv: NodeJS.ProcessEnv = { ...env, GIT_TERMINAL_PROMPT: '0' };

	if (credentialId) {
		const variable = getCredentialVariableName(credentialId);
		const token = env[variable];
		if (!token) {
			throw new CheckoutError(
				`Git credential "${credentialId}" is not set (expected ${variable})`,
				{ repositoryUrl, branch },
			);
		}
		// passed through the environment, never on the command line
		delete gitEnv[variable];
		Object.assign(gitEnv, {
			GIT_CONFIG_COUNT: '1',
			GIT_CONFIG_KEY_0: 'http.extraHeader',
			GIT_CONFIG_VALUE_0: getAuthorizationHeader(token),
		});
	}

	const args = [
		'clone',
		'--depth',
		'1',
		'--single-branch',
		'--branch',
		branch,
		repositoryUrl,
		destination,
	];

	logger.info({ repositoryUrl, branch, destination }, 'Checking out source');

	try {
		await runGit(args, { env: gitEnv, timeout });
	} catch (error) {
		const stderr =
			error instanceof Error && 'stderr' in error ? String(error.stderr).trim() : '';
		throw new CheckoutError(
			`Could not check out ${branch} from ${repositoryUrl}${stderr ? `: ${stderr}` : ''}`,
			{ repositoryUrl, branch, cause: error },
		);
	}

	return destination;
}
