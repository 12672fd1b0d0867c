/**
 * LoggerConfig - immutable configuration consumed by Logger construction.
 *
 * Every `with*` method returns a new config and leaves the receiver as it
 * was, so a config handed to one logger can't be altered through another
 * reference.
 *
 * @example
 * ```typescript
 * const config = newConfig(process.stdout)
 *   .withLevel(LEVEL_DEBUG)
 *   .withToIgnore('healthcheck')
 *   .withSimpleErrorCounter();
 * const logger = new Logger(config, 'service', 'billing');
 * ```
 */

import type winston from 'winston';
import { type ErrorCounter, SimpleErrorCounter } from './error-counter.js';
import { LEVEL_INFO, TIME_FORMAT_RFC3339 } from './levels.js';

// ===== Sinks =====

export type ConsoleStyle = 'pretty' | 'plain' | 'json';

/** Output to stderr through a winston Console transport. */
export interface ConsoleSink {
	readonly console: ConsoleStyle;
}

export type LogSink = NodeJS.WritableStream | ConsoleSink;

export function isConsoleSink(sink: LogSink): sink is ConsoleSink {
	return 'console' in sink;
}

// ===== Buffering =====

export const DEFAULT_BUFFER_SIZE = 1000;
export const DEFAULT_BUFFER_FLUSH_INTERVAL = 10; // milliseconds

export type OverflowAlert = (dropped: number) => void;

export interface BufferOptions {
	/** Records held before new ones are dropped */
	size?: number;
	/** Milliseconds between flushes */
	flushInterval?: number;
	/** Wait for records instead of polling */
	useWaiter?: boolean;
	onOverflow?: OverflowAlert;
	disabled?: boolean;
}

export type ResolvedBufferOptions = Required<Omit<BufferOptions, 'disabled'>>;

/**
 * Buffering strategy wrapped around every stream sink. The logger only
 * passes the configured options through.
 */
export type BufferedWriterFactory = (
	sink: NodeJS.WritableStream,
	options: ResolvedBufferOptions
) => NodeJS.WritableStream;

const defaultOverflowAlert: OverflowAlert = dropped => {
	process.stderr.write(`WRN: logger dropped ${dropped} messages\n`);
};

export function resolveBufferOptions(options: BufferOptions): ResolvedBufferOptions {
	const useWaiter = options.useWaiter ?? false;
	return {
		size: options.size || DEFAULT_BUFFER_SIZE,
		flushInterval: useWaiter ? 0 : options.flushInterval || DEFAULT_BUFFER_FLUSH_INTERVAL,
		useWaiter,
		onOverflow: options.onOverflow ?? defaultOverflowAlert,
	};
}

// ===== Config =====

export interface LoggerConfigFields {
	sinks: readonly LogSink[];
	/** Level name, validated when the logger is built */
	level: string;
	timeFormat: string;
	hook: winston.Logform.Format | undefined;
	toIgnore: readonly string[];
	errorCounter: ErrorCounter | undefined;
	stackTrace: boolean;
	buffer: Readonly<BufferOptions>;
	bufferedWriter: BufferedWriterFactory | undefined;
}

export class LoggerConfig implements LoggerConfigFields {
	readonly sinks: readonly LogSink[];
	readonly level: string;
	readonly timeFormat: string;
	readonly hook: winston.Logform.Format | undefined;
	readonly toIgnore: readonly string[];
	readonly errorCounter: ErrorCounter | undefined;
	readonly stackTrace: boolean;
	readonly buffer: Readonly<BufferOptions>;
	readonly bufferedWriter: BufferedWriterFactory | undefined;

	constructor(fields: Partial<LoggerConfigFields> = {}) {
		this.sinks = [...(fields.sinks ?? [])];
		this.level = fields.level ?? LEVEL_INFO;
		this.timeFormat = fields.timeFormat ?? TIME_FORMAT_RFC3339;
		this.hook = fields.hook;
		this.toIgnore = [...(fields.toIgnore ?? [])];
		this.errorCounter = fields.errorCounter;
		this.stackTrace = fields.stackTrace ?? false;
		this.buffer = { ...fields.buffer };
		this.bufferedWriter = fields.bufferedWriter;
	}

	private toFields(): LoggerConfigFields {
		return {
			sinks: this.sinks,
			level: this.level,
			timeFormat: this.timeFormat,
			hook: this.hook,
			toIgnore: this.toIgnore,
			errorCounter: this.errorCounter,
			stackTrace: this.stackTrace,
			buffer: this.buffer,
			bufferedWriter: this.bufferedWriter,
		};
	}

	private copy(patch: Partial<LoggerConfigFields>): LoggerConfig {
		return new LoggerConfig({ ...this.toFields(), ...patch });
	}

	private copyBuffer(patch: BufferOptions): LoggerConfig {
		return this.copy({ buffer: { ...this.buffer, ...patch } });
	}

	/** Minimum level: trace, debug, info, warn, error, fatal or disabled. */
	withLevel(level: string): LoggerConfig {
		return this.copy({ level });
	}

	/** winston format applied to every record before serialization. */
	withHook(hook: winston.Logform.Format): LoggerConfig {
		return this.copy({ hook });
	}

	withSink(sink: LogSink): LoggerConfig {
		return this.copy({ sinks: [...this.sinks, sink] });
	}

	/**
	 * Pretty colored output to stderr. Noticeably slower than JSON.
	 */
	withConsole(): LoggerConfig {
		return this.withSink({ console: 'pretty' });
	}

	withConsoleNoColor(): LoggerConfig {
		return this.withSink({ console: 'plain' });
	}

	withConsoleJSON(): LoggerConfig {
		return this.withSink({ console: 'json' });
	}

	/** Records whose message contains any of these substrings are dropped. */
	withToIgnore(...toIgnore: string[]): LoggerConfig {
		return this.copy({ toIgnore });
	}

	/**
	 * A fecha pattern such as TIME_FORMAT_RFC3339 (default), or one of the
	 * epoch formats TIME_FORMAT_UNIX, TIME_FORMAT_UNIX_MS, TIME_FORMAT_UNIX_MICRO.
	 */
	withTimeFormat(timeFormat: string): LoggerConfig {
		return this.copy({ timeFormat });
	}

	withBufferSize(size: number): LoggerConfig {
		return this.copyBuffer({ size });
	}

	withBufferFlushInterval(flushInterval: number): LoggerConfig {
		return this.copyBuffer({ flushInterval });
	}

	withBufferAlert(onOverflow: OverflowAlert): LoggerConfig {
		return this.copyBuffer({ onOverflow });
	}

	withNoBuffer(): LoggerConfig {
		return this.copyBuffer({ disabled: true });
	}

	withBufferWaiter(): LoggerConfig {
		return this.copyBuffer({ useWaiter: true });
	}

	withBufferedWriter(bufferedWriter: BufferedWriterFactory): LoggerConfig {
		return this.copy({ bufferedWriter });
	}

	/** Attach structured stacks to logged errors. */
	withStackTrace(): LoggerConfig {
		return this.copy({ stackTrace: true });
	}

	withErrorCounter(errorCounter: ErrorCounter): LoggerConfig {
		return this.copy({ errorCounter });
	}

	withSimpleErrorCounter(): LoggerConfig {
		return this.copy({ errorCounter: new SimpleErrorCounter() });
	}
}

/**
 * Config writing to the given sinks. Without sinks, output is discarded.
 */
export function newConfig(...sinks: LogSink[]): LoggerConfig {
	return new LoggerConfig({ sinks });
}
