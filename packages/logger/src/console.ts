import {
	type CreateLoggerOptions,
	type LogFn,
	type Logger,
	LogLevel,
} from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
	[LogLevel.Trace]: 10,
	[LogLevel.Debug]: 20,
	[LogLevel.Info]: 30,
	[LogLevel.Warn]: 40,
	[LogLevel.Error]: 50,
	[LogLevel.Fatal]: 60,
	[LogLevel.Silent]: Number.POSITIVE_INFINITY,
};

type ConsoleMethod = (...args: unknown[]) => void;

/**
 * Console-based logger. Entries below the configured level are dropped; every
 * entry carries the inherited context plus a `ts` timestamp.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger({ env: 'dev' });
 * logger.child({ stage: 'BUILT' }).info({ duration: 4210 }, 'Stage succeeded');
 * // { env: 'dev', stage: 'BUILT', duration: 4210, ts: 1234567890 } Stage succeeded
 * ```
 */
export class ConsoleLogger implements Logger {
	constructor(
		readonly data: Record<string, unknown> = {},
		readonly level: LogLevel = LogLevel.Info,
	) {}

	private createLogFn(level: LogLevel, logMethod: ConsoleMethod): LogFn {
		return (objOrMsg: object | string, msg?: string): void => {
			if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
				return;
			}

			const ts = Date.now();

			if (typeof objOrMsg === 'string') {
				logMethod({ ...this.data, ts }, objOrMsg);
				return;
			}

			const mergedData = { ...this.data, ...objOrMsg, ts };
			if (msg) {
				logMethod(mergedData, msg);
			} else {
				logMethod(mergedData);
			}
		};
	}

	debug: LogFn = this.createLogFn(LogLevel.Debug, console.debug.bind(console));
	info: LogFn = this.createLogFn(LogLevel.Info, console.info.bind(console));
	warn: LogFn = this.createLogFn(LogLevel.Warn, console.warn.bind(console));
	error: LogFn = this.createLogFn(LogLevel.Error, console.error.bind(console));
	/** Uses console.error */
	fatal: LogFn = this.createLogFn(LogLevel.Fatal, console.error.bind(console));
	trace: LogFn = this.createLogFn(LogLevel.Trace, console.trace.bind(console));

	child(bindings: Record<string, unknown>): Logger {
		return new ConsoleLogger({ ...this.data, ...bindings }, this.level);
	}
}

/**
 * Creates a console logger with the same options as the pino `createLogger`.
 * `pretty` and `redact` have no effect here.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
	return new ConsoleLogger(options.base ?? {}, options.level ?? LogLevel.Info);
}
