import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { type LoggerConfig, newConfig } from './logger/config.js';
import { EnvConfigError } from './logger/errors.js';
import { LEVELS, LEVEL_INFO } from './logger/levels.js';

// Unset and empty variables are the same thing
const optional = <T extends z.ZodTypeAny>(schema: T) =>
	z.preprocess(value => (value === '' ? undefined : value), schema.optional());

const flag = z
	.enum(['true', 'false', '1', '0'])
	.transform(value => value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
	LOG_LEVEL: optional(z.enum(LEVELS)),
	LOG_FORMAT: optional(z.enum(['json', 'console', 'console-nocolor'])),
	LOG_TIME_FORMAT: optional(z.string()),
	LOG_STACK_TRACE: optional(flag),
	LOG_IGNORE: optional(z.string()),
	LOG_NO_BUFFER: optional(flag),
	LOG_BUFFER_SIZE: optional(positiveInt),
	LOG_BUFFER_FLUSH_INTERVAL_MS: optional(positiveInt),
});

export type LogEnv = z.infer<typeof envSchema>;

/**
 * process.env with a .env file from the working directory underneath it.
 * Variables already set in the process win.
 */
export function loadProcessEnv(): NodeJS.ProcessEnv {
	loadDotenv({ override: false });
	return process.env;
}

export function parseLogEnv(env: NodeJS.ProcessEnv): LogEnv {
	const result = envSchema.safeParse(env);
	if (!result.success) {
		const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
		throw new EnvConfigError(`Invalid logger environment: ${issues.join('; ')}`, issues);
	}
	return result.data;
}

/**
 * Logger config from LOG_* variables, writing to stderr.
 *
 * LOG_FORMAT picks the output: `json` (default), `console` or
 * `console-nocolor`. LOG_IGNORE is a comma-separated list.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = loadProcessEnv()): LoggerConfig {
	const parsed = parseLogEnv(env);

	let config = newConfig().withLevel(parsed.LOG_LEVEL ?? LEVEL_INFO);
	switch (parsed.LOG_FORMAT ?? 'json') {
		case 'console':
			config = config.withConsole();
			break;
		case 'console-nocolor':
			config = config.withConsoleNoColor();
			break;
		default:
			config = config.withConsoleJSON();
	}

	if (parsed.LOG_TIME_FORMAT) {
		config = config.withTimeFormat(parsed.LOG_TIME_FORMAT);
	}
	if (parsed.LOG_STACK_TRACE) {
		config = config.withStackTrace();
	}
	if (parsed.LOG_IGNORE) {
		const toIgnore = parsed.LOG_IGNORE.split(',')
			.map(item => item.trim())
			.filter(item => item.length > 0);
		config = config.withToIgnore(...toIgnore);
	}
	if (parsed.LOG_NO_BUFFER) {
		config = config.withNoBuffer();
	}
	if (parsed.LOG_BUFFER_SIZE !== undefined) {
		config = config.withBufferSize(parsed.LOG_BUFFER_SIZE);
	}
	if (parsed.LOG_BUFFER_FLUSH_INTERVAL_MS !== undefined) {
		config = config.withBufferFlushInterval(parsed.LOG_BUFFER_FLUSH_INTERVAL_MS);
	}
	return config;
}
