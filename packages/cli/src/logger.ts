import type { Logger } from '@swarm-deploy/logger';
import { createLogger as createConsoleLogger } from '@swarm-deploy/logger/console';
import { createLogger as createPinoLogger } from '@swarm-deploy/logger/pino';
import type { OrchestratorSettings } from './config';

/**
 * Logger for one CLI invocation. Secret fields are always redacted.
 */
export function createCliLogger(
	settings: Pick<OrchestratorSettings, 'logger' | 'logLevel' | 'logPretty'>,
): Logger {
	const options = {
		level: settings.logLevel,
		pretty: settings.logPretty,
		redact: true,
		base: { app: 'swarm-deploy' },
	};

	return settings.logger === 'console'
		? createConsoleLogger(options)
		: createPinoLogger(options);
}
