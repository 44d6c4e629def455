export {
	type CreateLoggerOptions,
	type LogFn,
	type Logger,
	LogLevel,
	type RedactOptions,
} from './types';
export { DEFAULT_REDACT_PATHS } from './redact-paths';
