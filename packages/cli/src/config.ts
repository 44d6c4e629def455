import { DeployError, DeployErrorCode } from '@swarm-deploy/errors';
import { LogLevel } from '@swarm-deploy/logger';
import { z } from 'zod/v4';

const booleanFlag = z
	.enum(['true', 'false', '1', '0'])
	.transform((value) => value === 'true' || value === '1');

const timeout = (fallback: number) =>
	z.coerce.number().int().positive().default(fallback);

/**
 * Orchestrator settings read from the process environment.
 * Unset variables take the defaults below; CLI flags override them.
 */
export const SettingsSchema = z.object({
	SWARM_LOG_LEVEL: z.enum(LogLevel).default(LogLevel.Info),
	SWARM_LOG_PRETTY: booleanFlag.optional(),
	SWARM_LOGGER: z.enum(['pino', 'console']).default('pino'),
	SWARM_CONFIG_DIR: z.string().min(1).optional(),
	SWARM_REMOTE_USER: z.string().min(1).default('deploy'),
	SWARM_REMOTE_PORT: z.coerce.number().int().min(1).max(65535).default(22),
	SWARM_REMOTE_WORKDIR: z.string().min(1).default('swarm-deploy'),
	SWARM_COMMAND_TIMEOUT_MS: timeout(120_000),
	SWARM_BUILD_TIMEOUT_MS: timeout(600_000),
	SWARM_CONNECT_TIMEOUT_MS: timeout(30_000),
});

export type LoggerKind = 'pino' | 'console';

export interface OrchestratorSettings {
	logLevel: LogLevel;
	/** Pretty output; defaults to whether stdout is a terminal */
	logPretty: boolean;
	logger: LoggerKind;
	configDir?: string;
	remote: {
		user: string;
		port: number;
		/** Working directory on the target host, relative to the user's home */
		workDir: string;
	};
	timeouts: {
		command: number;
		build: number;
		connect: number;
	};
}

/**
 * Parses orchestrator settings from environment variables.
 *
 * @throws DeployError with code CONFIG_INVALID listing every invalid variable
 */
export function loadSettings(
	env: NodeJS.ProcessEnv = process.env,
): OrchestratorSettings {
	const result = SettingsSchema.safeParse(env);

	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.join('.')}: ${issue.message}`,
		);
		throw new DeployError(
			DeployErrorCode.ConfigInvalid,
			`Invalid orchestrator settings: ${issues.join('; ')}`,
			{ stage: 'settings', details: { issues } },
		);
	}

	const settings = result.data;

	return {
		logLevel: settings.SWARM_LOG_LEVEL,
		logPretty: settings.SWARM_LOG_PRETTY ?? Boolean(process.stdout.isTTY),
		logger: settings.SWARM_LOGGER,
		configDir: settings.SWARM_CONFIG_DIR,
		remote: {
			user: settings.SWARM_REMOTE_USER,
			port: settings.SWARM_REMOTE_PORT,
			workDir: settings.SWARM_REMOTE_WORKDIR,
		},
		timeouts: {
			command: settings.SWARM_COMMAND_TIMEOUT_MS,
			build: settings.SWARM_BUILD_TIMEOUT_MS,
			connect: settings.SWARM_CONNECT_TIMEOUT_MS,
		},
	};
}
