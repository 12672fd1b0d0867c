/**
 * Structured logging on winston with flat (key, value) fields
 */

export { Logger, type LoggerState } from './logger.js';
export {
	LoggerConfig,
	newConfig,
	isConsoleSink,
	resolveBufferOptions,
	DEFAULT_BUFFER_SIZE,
	DEFAULT_BUFFER_FLUSH_INTERVAL,
	type BufferOptions,
	type BufferedWriterFactory,
	type ConsoleSink,
	type ConsoleStyle,
	type LogSink,
	type LoggerConfigFields,
	type OverflowAlert,
	type ResolvedBufferOptions,
} from './config.js';
export { type ErrorCounter, SimpleErrorCounter } from './error-counter.js';
export { LoggerError, InvalidLevelError, LoggerPanic, EnvConfigError } from './errors.js';
export {
	LEVEL_TRACE,
	LEVEL_DEBUG,
	LEVEL_INFO,
	LEVEL_WARN,
	LEVEL_ERROR,
	LEVEL_FATAL,
	LEVEL_DISABLED,
	LEVELS,
	BACKEND_LEVELS,
	PRINT_LEVEL,
	TIME_FORMAT_RFC3339,
	TIME_FORMAT_RFC3339_MS,
	TIME_FORMAT_DATETIME,
	TIME_FORMAT_UNIX,
	TIME_FORMAT_UNIX_MS,
	TIME_FORMAT_UNIX_MICRO,
	isLevel,
	parseLevel,
	type Level,
	type RecordLevel,
} from './levels.js';
export { classify, extractError, toFieldRecord, type ClassifiedArgs } from './classifier.js';
export { type StackFrame, type LoggerStackCarrier } from './stack.js';
export { safeJsonStringify } from './utils/serializer.js';

export * as log from './global.js';
