/**
 * Pino logger with built-in redaction of deployment secrets.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@swarm-deploy/logger/pino';
 *
 * const logger = createLogger({ redact: true });
 * logger.info({ apiKey: 'k1', env: 'dev' }, 'Secrets loaded');
 * // { apiKey: '[Redacted]', env: 'dev' } Secrets loaded
 * ```
 *
 * @module
 */
import { pino } from 'pino';
import { DEFAULT_REDACT_PATHS } from './redact-paths';
import type { CreateLoggerOptions, LogFn, Logger, RedactOptions } from './types';

export { DEFAULT_REDACT_PATHS } from './redact-paths';

type PinoInstance = ReturnType<typeof pino>;

type PinoRedactConfig =
	| string[]
	| {
			paths: string[];
			censor?: string;
			remove?: boolean;
	  };

/**
 * Resolves redaction configuration from options.
 * Returns undefined if redaction is disabled, or a pino-compatible redact config.
 */
export function resolveRedactConfig(
	redact: boolean | RedactOptions | undefined,
): PinoRedactConfig | undefined {
	if (redact === undefined || redact === false) {
		return undefined;
	}

	if (redact === true) {
		return DEFAULT_REDACT_PATHS;
	}

	if (Array.isArray(redact)) {
		return [...DEFAULT_REDACT_PATHS, ...redact];
	}

	const { resolution = 'merge', paths, censor, remove } = redact;

	const resolvedPaths =
		resolution === 'override' ? paths : [...DEFAULT_REDACT_PATHS, ...paths];

	// pino rejects unknown keys, so `resolution` is not passed through
	const config: PinoRedactConfig = { paths: resolvedPaths };
	if (censor !== undefined) config.censor = censor;
	if (remove !== undefined) config.remove = remove;

	return config;
}

type Level = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'trace';

/**
 * Adapts a pino instance to the shared {@link Logger} interface.
 */
export class PinoLogger implements Logger {
	constructor(readonly instance: PinoInstance) {}

	private createLogFn(level: Level): LogFn {
		return (objOrMsg: object | string, msg?: string): void => {
			const log = this.instance[level].bind(this.instance);
			if (typeof objOrMsg === 'string') {
				log(objOrMsg);
			} else if (msg === undefined) {
				log(objOrMsg);
			} else {
				log(objOrMsg, msg);
			}
		};
	}

	debug: LogFn = this.createLogFn('debug');
	info: LogFn = this.createLogFn('info');
	warn: LogFn = this.createLogFn('warn');
	error: LogFn = this.createLogFn('error');
	fatal: LogFn = this.createLogFn('fatal');
	trace: LogFn = this.createLogFn('trace');

	child(bindings: Record<string, unknown>): Logger {
		return new PinoLogger(this.instance.child(bindings));
	}
}

/**
 * Creates a pino-backed logger with optional redaction support.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: LogLevel.Debug, pretty: true, redact: true });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
	const pretty = options.pretty && process.env.NODE_ENV !== 'production';
	const baseOptions = pretty
		? {
				transport: {
					target: 'pino-pretty',
					options: { colorize: true },
				},
			}
		: {};

	const redact = resolveRedactConfig(options.redact);

	return new PinoLogger(
		pino({
			...baseOptions,
			...(options.level && { level: options.level }),
			...(redact && { redact }),
			...(options.base && { base: options.base }),
			formatters: {
				level: (label) => {
					return { level: label.toUpperCase() };
				},
			},
		}),
	);
}
