import { describe, it, expect } from 'vitest';
import { configFromEnv, parseLogEnv } from '../env.js';
import { EnvConfigError } from '../logger/errors.js';

describe('configFromEnv', () => {
	it('defaults to JSON on stderr at info', () => {
		const config = configFromEnv({});
		expect(config.level).toBe('info');
		expect(config.sinks).toEqual([{ console: 'json' }]);
		expect(config.toIgnore).toEqual([]);
		expect(config.stackTrace).toBe(false);
		expect(config.buffer).toEqual({});
	});

	it('reads every LOG_ variable', () => {
		const config = configFromEnv({
			LOG_LEVEL: 'debug',
			LOG_FORMAT: 'console-nocolor',
			LOG_TIME_FORMAT: 'unixms',
			LOG_STACK_TRACE: '1',
			LOG_IGNORE: 'healthcheck, metrics,,ping',
			LOG_NO_BUFFER: 'true',
			LOG_BUFFER_SIZE: '50',
			LOG_BUFFER_FLUSH_INTERVAL_MS: '25',
		});

		expect(config.level).toBe('debug');
		expect(config.sinks).toEqual([{ console: 'plain' }]);
		expect(config.timeFormat).toBe('unixms');
		expect(config.stackTrace).toBe(true);
		expect(config.toIgnore).toEqual(['healthcheck', 'metrics', 'ping']);
		expect(config.buffer).toEqual({ disabled: true, size: 50, flushInterval: 25 });
	});

	it('picks the colored console', () => {
		expect(configFromEnv({ LOG_FORMAT: 'console' }).sinks).toEqual([{ console: 'pretty' }]);
	});

	it('treats empty variables as unset', () => {
		const config = configFromEnv({ LOG_LEVEL: '', LOG_STACK_TRACE: '' });
		expect(config.level).toBe('info');
		expect(config.stackTrace).toBe(false);
	});

	it('keeps flags off for false values', () => {
		expect(configFromEnv({ LOG_STACK_TRACE: 'false', LOG_NO_BUFFER: '0' }).stackTrace).toBe(false);
	});
});

describe('parseLogEnv', () => {
	it('throws EnvConfigError listing the bad variables', () => {
		let caught: unknown;
		try {
			parseLogEnv({ LOG_LEVEL: 'loud', LOG_BUFFER_SIZE: 'many' });
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(EnvConfigError);
		if (caught instanceof EnvConfigError) {
			expect(caught.code).toBe('INVALID_ENV');
			expect(caught.issues).toHaveLength(2);
			expect(caught.issues[0]).toMatch(/^LOG_LEVEL: /);
			expect(caught.issues[1]).toMatch(/^LOG_BUFFER_SIZE: /);
		}
	});

	it('rejects a flag that is not a boolean', () => {
		expect(() => parseLogEnv({ LOG_STACK_TRACE: 'yes' })).toThrow(EnvConfigError);
	});
});
