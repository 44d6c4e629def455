import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, createLogger } from '../console';
import { LogLevel } from '../types';

describe('ConsoleLogger', () => {
	beforeEach(() => {
		vi.spyOn(console, 'debug').mockImplementation(() => {});
		vi.spyOn(console, 'info').mockImplementation(() => {});
		vi.spyOn(console, 'warn').mockImplementation(() => {});
		vi.spyOn(console, 'error').mockImplementation(() => {});
		vi.spyOn(Date, 'now').mockReturnValue(1234567890);
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('should create logger with no initial context', () => {
		const logger = new ConsoleLogger();

		expect(logger.data).toEqual({});
		expect(logger.level).toBe(LogLevel.Info);
	});

	it('should merge context into structured entries', () => {
		const logger = new ConsoleLogger({ env: 'dev' });

		logger.info({ stage: 'BUILT' }, 'Stage succeeded');

		expect(console.info).toHaveBeenCalledWith(
			{ env: 'dev', stage: 'BUILT', ts: 1234567890 },
			'Stage succeeded',
		);
	});

	it('should log plain messages with context', () => {
		const logger = new ConsoleLogger({ env: 'prod' });

		logger.warn('Falling back');

		expect(console.warn).toHaveBeenCalledWith(
			{ env: 'prod', ts: 1234567890 },
			'Falling back',
		);
	});

	it('should omit the message argument when none is given', () => {
		const logger = new ConsoleLogger();

		logger.error({ code: 1 });

		expect(console.error).toHaveBeenCalledWith({ code: 1, ts: 1234567890 });
	});

	it('should route fatal to console.error', () => {
		const logger = new ConsoleLogger();

		logger.fatal('Aborting');

		expect(console.error).toHaveBeenCalledWith({ ts: 1234567890 }, 'Aborting');
	});

	it('should drop entries below the configured level', () => {
		const logger = new ConsoleLogger({}, LogLevel.Warn);

		logger.debug('hidden');
		logger.info('hidden');
		logger.warn('shown');

		expect(console.debug).not.toHaveBeenCalled();
		expect(console.info).not.toHaveBeenCalled();
		expect(console.warn).toHaveBeenCalledTimes(1);
	});

	it('should drop everything when silent', () => {
		const logger = new ConsoleLogger({}, LogLevel.Silent);

		logger.fatal('nothing');

		expect(console.error).not.toHaveBeenCalled();
	});

	it('should create child loggers that inherit context and level', () => {
		const parent = new ConsoleLogger({ env: 'dev' }, LogLevel.Debug);
		const child = parent.child({ component: 'driver' });

		child.debug({ stage: 'CONNECTED' }, 'Entering stage');

		expect(console.debug).toHaveBeenCalledWith(
			{ env: 'dev', component: 'driver', stage: 'CONNECTED', ts: 1234567890 },
			'Entering stage',
		);
		expect(parent.data).toEqual({ env: 'dev' });
	});
});

describe('createLogger', () => {
	it('should apply base bindings and level', () => {
		const logger = createLogger({ base: { run: 'r1' }, level: LogLevel.Error });

		if (!(logger instanceof ConsoleLogger)) {
			throw new Error('expected a ConsoleLogger');
		}
		expect(logger.data).toEqual({ run: 'r1' });
		expect(logger.level).toBe(LogLevel.Error);
	});
});
