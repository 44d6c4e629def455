import { posix } from 'node:path';
import { ARCHIVE_ROOT, CONTAINER_APP_DIR } from '../artifacts/paths';
import type { Environment } from '../environment/types';
import type { DeploymentArchive } from '../packager';

/** Docker's answer when the named container does not exist. */
export const NO_SUCH_CONTAINER = /No such container/i;

export type TimeoutClass = 'command' | 'build';

/**
 * One shell command run on the target host.
 */
export interface RemoteOperation {
	command: string;
	/**
	 * Output meaning "the target is already absent". A failing command
	 * whose output matches counts as success.
	 */
	absentWhen?: RegExp;
	timeout: TimeoutClass;
}

/**
 * Names and paths of one deployment on the target host.
 */
export interface DeploymentPlan {
	environment: Environment;
	containerName: string;
	imageName: string;
	/** Remote working directory, relative to the user's home */
	workDir: string;
	localArchivePath: string;
	remoteArchivePath: string;
}

export function createDeploymentPlan(
	environment: Environment,
	archive: Pick<DeploymentArchive, 'path' | 'fileName'>,
	workDir: string,
): DeploymentPlan {
	const name = `${environment.appId}-${environment.name}`;
	return {
		environment,
		containerName: name,
		imageName: name,
		workDir,
		localArchivePath: archive.path,
		remoteArchivePath: posix.join(workDir, archive.fileName),
	};
}

const SAFE_ARGUMENT = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quotes a value for a POSIX shell. Values made of safe characters are
 * left as they are.
 */
export function shellQuote(value: string): string {
	if (SAFE_ARGUMENT.test(value)) {
		return value;
	}
	return `'${value.replace(/'/g, `'\\''`)}'`;
}

const command = (...parts: string[]) => parts.join(' ');

export function prepareWorkDir(plan: DeploymentPlan): RemoteOperation {
	const dir = shellQuote(plan.workDir);
	return { command: `rm -rf ${dir} && mkdir -p ${dir}`, timeout: 'command' };
}

export function extractArchive(plan: DeploymentPlan): RemoteOperation {
	return {
		command: command(
			'tar',
			'-xzf',
			shellQuote(plan.remoteArchivePath),
			'-C',
			shellQuote(plan.workDir),
		),
		timeout: 'command',
	};
}

export function buildImage(plan: DeploymentPlan): RemoteOperation {
	return {
		command: command(
			'docker',
			'build',
			'-t',
			shellQuote(plan.imageName),
			shellQuote(posix.join(plan.workDir, ARCHIVE_ROOT)),
		),
		timeout: 'build',
	};
}

export function cleanupWorkDir(plan: DeploymentPlan): RemoteOperation {
	return {
		command: command(
			'rm',
			'-rf',
			shellQuote(posix.join(plan.workDir, ARCHIVE_ROOT)),
			shellQuote(plan.remoteArchivePath),
		),
		timeout: 'command',
	};
}

export function stopContainer(plan: DeploymentPlan): RemoteOperation {
	return {
		command: command('docker', 'stop', shellQuote(plan.containerName)),
		absentWhen: NO_SUCH_CONTAINER,
		timeout: 'command',
	};
}

export function removeContainer(plan: DeploymentPlan): RemoteOperation {
	return {
		command: command('docker', 'rm', '-f', shellQuote(plan.containerName)),
		absentWhen: NO_SUCH_CONTAINER,
		timeout: 'command',
	};
}

export function runContainer(plan: DeploymentPlan): RemoteOperation {
	const { port } = plan.environment.proxy;
	return {
		command: command(
			'docker',
			'run',
			'-d',
			'--name',
			shellQuote(plan.containerName),
			'-p',
			`${port}:${port}`,
			'-e',
			shellQuote(`NODE_ENV=${plan.environment.name}`),
			'--restart',
			'unless-stopped',
			shellQuote(plan.imageName),
		),
		timeout: 'command',
	};
}

export function pruneImages(): RemoteOperation {
	return { command: 'docker image prune -f', timeout: 'command' };
}

export function listContainer(plan: DeploymentPlan): RemoteOperation {
	return {
		command: command(
			'docker',
			'ps',
			'--filter',
			shellQuote(`name=^/${plan.containerName}$`),
		),
		timeout: 'command',
	};
}

export function inspectContainer(plan: DeploymentPlan): RemoteOperation {
	return {
		command: command(
			'docker',
			'exec',
			shellQuote(plan.containerName),
			'ls',
			'-la',
			CONTAINER_APP_DIR,
		),
		timeout: 'command',
	};
}
