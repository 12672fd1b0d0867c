/**
 * Builds the winston logger behind a Logger from its configuration
 */

import winston from 'winston';
import { type LoggerConfig, type LogSink, isConsoleSink, resolveBufferOptions } from './config.js';
import { consoleLine, recordFormat } from './format.js';
import { BACKEND_LEVELS, LEVEL_DISABLED, LEVEL_FATAL, LEVEL_TRACE, type Level } from './levels.js';

const ALL_LEVELS = Object.keys(BACKEND_LEVELS);

function createTransport(sink: LogSink, config: LoggerConfig): winston.transport {
	if (isConsoleSink(sink)) {
		return new winston.transports.Console({
			format: sink.console === 'json' ? undefined : consoleLine(sink.console === 'pretty'),
			stderrLevels: ALL_LEVELS, // everything goes to stderr
		});
	}

	let stream = sink;
	if (config.bufferedWriter && !config.buffer.disabled) {
		stream = config.bufferedWriter(sink, resolveBufferOptions(config.buffer));
	}
	return new winston.transports.Stream({ stream });
}

/**
 * Without sinks, or at the disabled level, the backend is silent and
 * records are discarded. Otherwise winston passes every level: the Logger
 * filters, and derived loggers may lower their threshold below the config's.
 */
export function createBackend(config: LoggerConfig, level: Level): winston.Logger {
	const transports =
		level === LEVEL_DISABLED ? [] : config.sinks.map(sink => createTransport(sink, config));

	return winston.createLogger({
		levels: BACKEND_LEVELS,
		level: level === LEVEL_DISABLED ? LEVEL_FATAL : LEVEL_TRACE,
		format: recordFormat(config.timeFormat, config.hook),
		transports,
		silent: transports.length === 0,
		exitOnError: false,
	});
}

/**
 * Backend of loggers that never write.
 */
export function createSilentBackend(): winston.Logger {
	return winston.createLogger({
		levels: BACKEND_LEVELS,
		silent: true,
	});
}
