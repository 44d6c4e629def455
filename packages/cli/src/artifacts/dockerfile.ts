import { ArtifactGenerationError } from '@swarm-deploy/errors';
import type { Environment } from '../environment/types';
import type { ArtifactLayout } from './paths';
import {
	CONTAINER_APP_DIR,
	CONTAINER_CERT_DIR,
	CONTAINER_ENDPOINTS_CONF,
	CONTAINER_NGINX_CONF,
} from './paths';

export type DockerInstruction =
	| { kind: 'FROM'; image: string }
	| { kind: 'RUN'; commands: string[] }
	| { kind: 'WORKDIR'; path: string }
	| { kind: 'COPY'; sources: string[]; destination: string }
	| { kind: 'EXPOSE'; port: number }
	| { kind: 'CMD'; argv: string[] };

/** How dependencies are installed: `npm ci` needs a lockfile in the source. */
export type InstallStrategy = 'ci' | 'install';

export interface DockerfileOptions {
	baseImage?: string;
	nodeMajor?: number;
	install?: InstallStrategy;
}

export const DOCKERFILE_DEFAULTS = {
	baseImage: 'nginx:1.27',
	nodeMajor: 20,
	install: 'ci',
} as const satisfies Required<DockerfileOptions>;

function requireValue(instruction: DockerInstruction, value: string): string {
	if (value.trim() === '') {
		throw new ArtifactGenerationError(
			`Dockerfile ${instruction.kind} instruction has an empty value`,
			{ artifact: 'Dockerfile' },
		);
	}
	return value;
}

function serializeInstruction(instruction: DockerInstruction): string {
	switch (instruction.kind) {
		case 'FROM':
			return `FROM ${requireValue(instruction, instruction.image)}`;
		case 'RUN':
			return `RUN ${instruction.commands
				.map((command) => requireValue(instruction, command))
				.join(' && \\\n    ')}`;
		case 'WORKDIR':
			return `WORKDIR ${requireValue(instruction, instruction.path)}`;
		case 'COPY':
			return `COPY ${[...instruction.sources, instruction.destination]
				.map((path) => requireValue(instruction, path))
				.join(' ')}`;
		case 'EXPOSE':
			if (!Number.isInteger(instruction.port) || instruction.port < 1) {
				throw new ArtifactGenerationError(
					`Dockerfile EXPOSE has an invalid port ${instruction.port}`,
					{ artifact: 'Dockerfile' },
				);
			}
			return `EXPOSE ${instruction.port}`;
		case 'CMD':
			return `CMD ${JSON.stringify(
				instruction.argv.map((arg) => requireValue(instruction, arg)),
			)}`;
	}
}

export function serializeDockerfile(instructions: DockerInstruction[]): string {
	if (instructions[0]?.kind !== 'FROM') {
		throw new ArtifactGenerationError('Dockerfile must start with FROM', {
			artifact: 'Dockerfile',
		});
	}
	return `${instructions.map(serializeInstruction).join('\n')}\n`;
}

/**
 * Image for the controller and its proxy: nginx as the base, Node.js on
 * top, the generated proxy configuration and TLS pair in place of the
 * defaults, and one command starting both processes.
 */
export function buildDockerfile(
	environment: Environment,
	layout: ArtifactLayout,
	options: DockerfileOptions = {},
): DockerInstruction[] {
	const baseImage = options.baseImage ?? DOCKERFILE_DEFAULTS.baseImage;
	const nodeMajor = options.nodeMajor ?? DOCKERFILE_DEFAULTS.nodeMajor;
	const install = options.install ?? DOCKERFILE_DEFAULTS.install;

	return [
		{ kind: 'FROM', image: baseImage },
		{
			kind: 'RUN',
			commands: [
				'apt-get update',
				'apt-get install -y --no-install-recommends ca-certificates curl gnupg',
				`curl -fsSL https://deb.nodesource.com/setup_${nodeMajor}.x | bash -`,
				'apt-get install -y --no-install-recommends nodejs',
				'rm -rf /var/lib/apt/lists/*',
			],
		},
		{ kind: 'WORKDIR', path: CONTAINER_APP_DIR },
		{ kind: 'COPY', sources: ['package*.json'], destination: './' },
		{
			kind: 'RUN',
			commands: [install === 'ci' ? 'npm ci --omit=dev' : 'npm install --omit=dev'],
		},
		{ kind: 'COPY', sources: ['.'], destination: '.' },
		{ kind: 'COPY', sources: [layout.proxyConfig], destination: CONTAINER_NGINX_CONF },
		{
			kind: 'COPY',
			sources: [layout.endpointsConfig],
			destination: CONTAINER_ENDPOINTS_CONF,
		},
		{
			kind: 'COPY',
			sources: [layout.certificate, layout.privateKey],
			destination: `${CONTAINER_CERT_DIR}/`,
		},
		{ kind: 'EXPOSE', port: environment.proxy.port },
		{ kind: 'CMD', argv: ['/bin/sh', '-c', 'nginx && exec npm start'] },
	];
}
