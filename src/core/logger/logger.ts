import type winston from 'winston';
import { inspect } from 'util';
import { createBackend, createSilentBackend } from './backend.js';
import { classify, extractError, toFieldRecord } from './classifier.js';
import { LoggerConfig, newConfig } from './config.js';
import { type ErrorCounter, SimpleErrorCounter } from './error-counter.js';
import { LoggerPanic } from './errors.js';
import {
	LEVEL_DEBUG,
	LEVEL_DISABLED,
	LEVEL_ERROR,
	LEVEL_FATAL,
	LEVEL_INFO,
	LEVEL_TRACE,
	LEVEL_WARN,
	PRINT_LEVEL,
	isLevel,
	isLevelEnabled,
	parseLevel,
	type Level,
	type RecordLevel,
} from './levels.js';
import {
	type StackAnchor,
	callerOf,
	captureFrames,
	captureStackText,
	hasLoggerStack,
	parseStack,
} from './stack.js';

// ===== 1. State =====

/**
 * Everything a Logger holds. Replaced as a whole by {@link Logger.update}.
 */
export interface LoggerState {
	/** Owned by the logger */
	readonly backend: winston.Logger;
	readonly level: Level;
	/** Shared, never owned */
	readonly errorCounter: ErrorCounter | undefined;
	readonly toIgnore: readonly string[];
	readonly stackTrace: boolean;
	readonly inited: boolean;
}

interface Dispatch {
	level: RecordLevel;
	/** Public method the call entered through */
	anchor: StackAnchor;
	message: string;
	fields: readonly unknown[];
	/** Set by the dedicated error entry points; fields are then not scanned */
	dedicated?: { error: Error | null | undefined };
	/** Look for an error among the fields (default true) */
	scanFields?: boolean;
	/** Add the `caller` field */
	caller?: boolean;
}

type DispatchExtras = Pick<Dispatch, 'dedicated' | 'caller'>;

function buildState(config: LoggerConfig, fields: readonly unknown[]): LoggerState {
	const level = parseLevel(config.level || LEVEL_INFO);
	const backend = createBackend(config, level);

	return {
		backend: fields.length > 0 ? backend.child(toFieldRecord(fields)) : backend,
		level,
		errorCounter: config.errorCounter,
		toIgnore: [...config.toIgnore],
		stackTrace: config.stackTrace,
		inited: true,
	};
}

function isIgnored(message: string, toIgnore: readonly string[]): boolean {
	return toIgnore.some(ignored => message.includes(ignored));
}

function sprint(values: readonly unknown[]): string {
	return values.map(value => (typeof value === 'string' ? value : inspect(value))).join(' ');
}

// ===== 2. Logger =====

/**
 * Structured logger writing through winston.
 *
 * Fields are passed as flat (key, value) pairs and are merged into the record
 * as top-level keys:
 *
 * ```typescript
 * const logger = new Logger(newConfig(process.stderr), 'service', 'billing');
 * logger.info('invoice sent', 'invoice', 42);
 * logger.infof('retry %d of %d', 1, 3, 'invoice', 42);
 * logger.err(new Error('timeout'), 'cannot send invoice');
 * ```
 *
 * Output:
 *
 * ```
 * {"level":"info","time":"2024-05-02T10:00:00+00:00","message":"invoice sent","service":"billing","invoice":42}
 * {"level":"info","time":"2024-05-02T10:00:00+00:00","message":"retry 1 of 3","service":"billing","invoice":42}
 * {"level":"error","time":"2024-05-02T10:00:00+00:00","message":"cannot send invoice","service":"billing","error":"timeout"}
 * ```
 *
 * Reading methods are safe to call from anywhere; only {@link Logger.update}
 * writes, and it must not race with other calls on the same instance.
 */
export class Logger {
	private state: LoggerState;

	/**
	 * Build a logger from a config, binding `fields` to every record.
	 * An unknown level throws InvalidLevelError.
	 */
	constructor(config: LoggerConfig | LoggerState = new LoggerConfig(), ...fields: unknown[]) {
		this.state = config instanceof LoggerConfig ? buildState(config, fields) : config;
	}

	/** Logger that discards everything and reports itself as not inited. */
	static nop(): Logger {
		return new Logger({
			backend: createSilentBackend(),
			level: LEVEL_DISABLED,
			errorCounter: undefined,
			toIgnore: [],
			stackTrace: false,
			inited: false,
		});
	}

	/**
	 * Adopt an existing winston logger. It has to be created with
	 * BACKEND_LEVELS; its own format and transports are kept.
	 */
	static fromWinston(backend: winston.Logger): Logger {
		return new Logger({
			backend,
			level: isLevel(backend.level) ? backend.level : LEVEL_TRACE,
			errorCounter: undefined,
			toIgnore: [],
			stackTrace: false,
			inited: true,
		});
	}

	/** JSON to stderr. */
	static consoleJSON(...fields: unknown[]): Logger {
		return new Logger(newConfig().withConsoleJSON(), ...fields);
	}

	// ===== Runtime Configuration Management =====

	/**
	 * Rebuild from a new config and swap all state at once.
	 * Not safe while other code logs through this instance.
	 */
	update(config: LoggerConfig, ...fields: unknown[]): void {
		this.state = buildState(config, fields);
	}

	notInited(): boolean {
		return !this.state.inited;
	}

	getLevel(): Level {
		return this.state.level;
	}

	raw(): winston.Logger {
		return this.state.backend;
	}

	getErrorCounter(): ErrorCounter | undefined {
		return this.state.errorCounter;
	}

	// ===== Derived loggers =====

	private derive(patch: Partial<LoggerState>): Logger {
		return new Logger({ ...this.state, ...patch });
	}

	/** Logger adding these (key, value) pairs to every record. */
	withFields(...fields: unknown[]): Logger {
		if (fields.length === 0) {
			return this.derive({});
		}
		return this.derive({ backend: this.state.backend.child(toFieldRecord(fields)) });
	}

	with(...fields: unknown[]): Logger {
		return this.withFields(...fields);
	}

	/**
	 * Logger with its own minimum level. An empty name keeps the current one,
	 * an unknown name throws InvalidLevelError. A logger whose config was
	 * disabled has no sinks and stays silent at any level.
	 */
	withLevel(level: string): Logger {
		if (level === '') {
			return this.derive({});
		}
		return this.derive({ level: parseLevel(level) });
	}

	withStack(stackTrace: boolean): Logger {
		return this.derive({ stackTrace });
	}

	withErrorCounter(errorCounter: ErrorCounter): Logger {
		return this.derive({ errorCounter });
	}

	withSimpleErrorCounter(): Logger {
		return this.derive({ errorCounter: new SimpleErrorCounter() });
	}

	withToIgnore(...toIgnore: string[]): Logger {
		return this.derive({ toIgnore });
	}

	// ===== Core Logging Methods =====

	/** Trace record with a `caller` field. */
	trace(message: string, ...fields: unknown[]): void {
		this.traceAt(this.trace, message, fields);
	}

	tracef(template: string, ...args: unknown[]): void {
		this.tracefAt(this.tracef, template, args);
	}

	/** @internal trace on behalf of a forwarding function */
	traceAt(anchor: StackAnchor, message: string, fields: readonly unknown[]): void {
		this.dispatch({ level: LEVEL_TRACE, anchor, message, fields, caller: true });
	}

	/** @internal */
	tracefAt(anchor: StackAnchor, template: string, args: readonly unknown[]): void {
		this.dispatchf(LEVEL_TRACE, anchor, template, args, { caller: true });
	}

	debug(message: string, ...fields: unknown[]): void {
		this.dispatch({ level: LEVEL_DEBUG, anchor: this.debug, message, fields });
	}

	debugf(template: string, ...args: unknown[]): void {
		this.dispatchf(LEVEL_DEBUG, this.debugf, template, args);
	}

	info(message: string, ...fields: unknown[]): void {
		this.dispatch({ level: LEVEL_INFO, anchor: this.info, message, fields });
	}

	infof(template: string, ...args: unknown[]): void {
		this.dispatchf(LEVEL_INFO, this.infof, template, args);
	}

	warn(message: string, ...fields: unknown[]): void {
		this.dispatch({ level: LEVEL_WARN, anchor: this.warn, message, fields });
	}

	warnf(template: string, ...args: unknown[]): void {
		this.dispatchf(LEVEL_WARN, this.warnf, template, args);
	}

	error(message: string, ...fields: unknown[]): void {
		this.dispatch({ level: LEVEL_ERROR, anchor: this.error, message, fields });
	}

	errorf(template: string, ...args: unknown[]): void {
		this.dispatchf(LEVEL_ERROR, this.errorf, template, args);
	}

	/**
	 * Log `error` at error level. A null error is written as `"error":null`
	 * and not counted.
	 */
	err(error: Error | null | undefined, message: string, ...fields: unknown[]): void {
		this.dispatch({ level: LEVEL_ERROR, anchor: this.err, message, fields, dedicated: { error } });
	}

	errf(error: Error | null | undefined, template: string, ...args: unknown[]): void {
		this.dispatchf(LEVEL_ERROR, this.errf, template, args, { dedicated: { error } });
	}

	/**
	 * Log the stack of `error` as the message and count it once. Errors among
	 * `fields` are written as plain fields.
	 */
	errStack(error: Error, ...fields: unknown[]): void {
		const message =
			error.stack ?? `${error.name}: ${error.message}\n${captureStackText(this.errStack)}`;
		if (!this.isEnabled(LEVEL_ERROR) || isIgnored(message, this.state.toIgnore)) {
			return;
		}
		this.countError(error);
		this.dispatch({
			level: LEVEL_ERROR,
			anchor: this.errStack,
			message,
			fields,
			scanFields: false,
		});
	}

	/** Log at fatal level, then exit the process with code 1. */
	fatal(...values: unknown[]): never {
		this.failHard(this.fatal, sprint(values), []);
		return process.exit(1);
	}

	fatalf(template: string, ...args: unknown[]): never {
		const { message, fieldArgs } = classify(template, args);
		this.failHard(this.fatalf, message, fieldArgs);
		return process.exit(1);
	}

	/** Log at fatal level, then throw LoggerPanic. */
	panic(...values: unknown[]): never {
		const message = sprint(values);
		this.failHard(this.panic, message, []);
		throw new LoggerPanic(message);
	}

	panicf(template: string, ...args: unknown[]): never {
		const { message, fieldArgs } = classify(template, args);
		this.failHard(this.panicf, message, fieldArgs);
		throw new LoggerPanic(message);
	}

	// ===== Unleveled records =====

	/** Values joined with spaces; non-strings are inspected. */
	print(...values: unknown[]): void {
		if (values.length === 0) {
			return;
		}
		this.dispatch({ level: PRINT_LEVEL, anchor: this.print, message: sprint(values), fields: [] });
	}

	log(...values: unknown[]): void {
		this.print(...values);
	}

	printf(template: string, ...args: unknown[]): void {
		this.dispatchf(PRINT_LEVEL, this.printf, template, args);
	}

	printStack(...fields: unknown[]): void {
		this.dispatch({
			level: PRINT_LEVEL,
			anchor: this.printStack,
			message: captureStackText(this.printStack),
			fields,
		});
	}

	/** Raw text as an unleveled record, minus one trailing newline. */
	write(data: string | Uint8Array): void {
		const text = typeof data === 'string' ? data : Buffer.from(data).toString('utf8');
		this.dispatch({
			level: PRINT_LEVEL,
			anchor: this.write,
			message: text.endsWith('\n') ? text.slice(0, -1) : text,
			fields: [],
		});
	}

	// ===== Dispatch =====

	private isEnabled(level: RecordLevel): boolean {
		return isLevelEnabled(level, this.state.level);
	}

	private countError(error: Error): void {
		this.state.errorCounter?.inc(error);
	}

	private failHard(anchor: StackAnchor, message: string, fields: readonly unknown[]): void {
		if (isIgnored(message, this.state.toIgnore)) {
			return;
		}
		this.countError(new Error(message));
		this.dispatch({ level: LEVEL_FATAL, anchor, message, fields });
	}

	private dispatchf(
		level: RecordLevel,
		anchor: StackAnchor,
		template: string,
		args: readonly unknown[],
		extras: DispatchExtras = {}
	): void {
		if (!this.isEnabled(level)) {
			return;
		}
		const { message, fieldArgs } = classify(template, args);
		this.dispatch({ ...extras, level, anchor, message, fields: fieldArgs });
	}

	private dispatch(request: Dispatch): void {
		const { backend, toIgnore } = this.state;
		if (!this.isEnabled(request.level) || isIgnored(request.message, toIgnore)) {
			return;
		}

		let fields = request.fields;
		let error: Error | null | undefined;
		if (request.dedicated) {
			error = request.dedicated.error ?? null;
		} else if (request.scanFields !== false) {
			({ error, fields } = extractError(request.fields));
		}

		const entry: winston.LogEntry = { level: request.level, message: request.message };
		Object.assign(entry, toFieldRecord(fields));
		if (error !== undefined) {
			this.attachError(entry, error, request.anchor);
		}
		if (request.caller) {
			const caller = callerOf(request.anchor);
			if (caller) {
				entry.caller = caller;
			}
		}
		entry.level = request.level;
		entry.message = request.message;

		backend.log(entry);
	}

	private attachError(entry: winston.LogEntry, error: Error | null, anchor: StackAnchor): void {
		if (error === null) {
			entry.error = null;
			return;
		}

		if (this.state.stackTrace) {
			if (hasLoggerStack(error)) {
				Object.assign(entry, toFieldRecord(error.stackForLogger()));
			} else {
				const frames = parseStack(error.stack);
				entry.stack = frames.length > 0 ? frames : captureFrames(anchor);
			}
		}

		this.countError(error);
		entry.error = error.message;
	}
}
