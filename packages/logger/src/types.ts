/**
 * Logging function type that supports both structured and simple logging.
 *
 * @example
 * ```typescript
 * logger.info({ stage: 'BUILT', duration: 4210 }, 'Stage succeeded');
 * logger.info('Deployment started');
 * ```
 */
export type LogFn = {
	/** Structured logging with a context object and optional message */
	<T extends object>(obj: T, msg?: string): void;
	/** Simple string logging */
	(msg: string): void;
};

/**
 * Logger interface shared by every package. Implementations: the pino logger
 * in `./pino`, the console logger in `./console`, and the mock in the testkit.
 */
export interface Logger {
	/** Debug level logging - verbose information for debugging */
	debug: LogFn;
	/** Info level logging - general informational messages */
	info: LogFn;
	/** Warning level logging - recoverable problems */
	warn: LogFn;
	/** Error level logging */
	error: LogFn;
	/** Fatal level logging - the run is about to abort */
	fatal: LogFn;
	/** Trace level logging - most detailed information */
	trace: LogFn;
	/**
	 * Creates a child logger whose entries carry the given bindings.
	 */
	child(bindings: Record<string, unknown>): Logger;
}

export enum LogLevel {
	Trace = 'trace',
	Debug = 'debug',
	Info = 'info',
	Warn = 'warn',
	Error = 'error',
	Fatal = 'fatal',
	Silent = 'silent',
}

/**
 * Redaction settings. `paths` are pino redact paths; `resolution` decides
 * whether they are merged with {@link DEFAULT_REDACT_PATHS} or replace them.
 */
export type RedactOptions =
	| string[]
	| {
			paths: string[];
			censor?: string;
			remove?: boolean;
			resolution?: 'merge' | 'override';
	  };

export type CreateLoggerOptions = {
	pretty?: boolean;
	level?: LogLevel;
	redact?: boolean | RedactOptions;
	/** Bindings added to every entry */
	base?: Record<string, unknown>;
};
