/**
 * Default sensitive field paths for redaction.
 *
 * Used when `redact: true` is set, and merged with custom paths unless
 * `resolution: 'override'` is specified.
 */
export const DEFAULT_REDACT_PATHS: string[] = [
	// Authentication
	'password',
	'passwd',
	'secret',
	'token',
	'apiKey',
	'api_key',
	'authorization',
	'credential',
	'credentials',
	'privateKey',

	// Deployment secrets
	'hostCredential',
	'secrets',

	// Nested
	'*.password',
	'*.secret',
	'*.token',
	'*.apiKey',
	'*.api_key',
	'*.authorization',
	'*.credential',
	'*.hostCredential',
	'*.privateKey',
];
