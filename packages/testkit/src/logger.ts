import type { Logger } from '@swarm-deploy/logger';
import { vi } from 'vitest';

/**
 * Creates a mock Logger for testing. Child loggers return the same mock, so
 * assertions see every entry.
 */
export function createMockLogger(): Logger {
	const logger: Logger = {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		fatal: vi.fn(),
		trace: vi.fn(),
		child: vi.fn(() => logger),
	};
	return logger;
}
