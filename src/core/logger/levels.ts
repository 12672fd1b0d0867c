/**
 * Level names, their ordering and the time formats understood by the logger
 */

import { InvalidLevelError } from './errors.js';

// ===== Levels =====

export const LEVEL_TRACE = 'trace';
export const LEVEL_DEBUG = 'debug';
export const LEVEL_INFO = 'info';
export const LEVEL_WARN = 'warn';
export const LEVEL_ERROR = 'error';
export const LEVEL_FATAL = 'fatal';
export const LEVEL_DISABLED = 'disabled';

/** All supported levels, lowest priority first. */
export const LEVELS = [
	LEVEL_TRACE,
	LEVEL_DEBUG,
	LEVEL_INFO,
	LEVEL_WARN,
	LEVEL_ERROR,
	LEVEL_FATAL,
	LEVEL_DISABLED,
] as const;

export type Level = (typeof LEVELS)[number];

/**
 * Pseudo-level of records written without a level (print, write, console mirroring).
 * These pass every threshold except `disabled`.
 */
export const PRINT_LEVEL = 'print';

/** Level a single record can be emitted at. */
export type RecordLevel = Exclude<Level, typeof LEVEL_DISABLED> | typeof PRINT_LEVEL;

const SEVERITY: Record<Level, number> = {
	trace: 0,
	debug: 1,
	info: 2,
	warn: 3,
	error: 4,
	fatal: 5,
	disabled: 6,
};

/**
 * winston priorities (lower is more important). `disabled` has no entry:
 * it is expressed by a silent backend.
 */
export const BACKEND_LEVELS: Record<RecordLevel, number> = {
	print: 0,
	fatal: 1,
	error: 2,
	warn: 3,
	info: 4,
	debug: 5,
	trace: 6,
};

export function isLevel(value: unknown): value is Level {
	return typeof value === 'string' && LEVELS.some(level => level === value);
}

/**
 * Parse a level name. An unknown name is a programming error and throws.
 */
export function parseLevel(name: string): Level {
	if (!isLevel(name)) {
		throw new InvalidLevelError(name);
	}
	return name;
}

export function isLevelEnabled(record: RecordLevel, threshold: Level): boolean {
	if (threshold === LEVEL_DISABLED) {
		return false;
	}
	if (record === PRINT_LEVEL) {
		return true;
	}
	return SEVERITY[record] >= SEVERITY[threshold];
}

// ===== Time formats =====

// fecha patterns, see winston.format.timestamp
export const TIME_FORMAT_RFC3339 = 'YYYY-MM-DDTHH:mm:ssZ';
export const TIME_FORMAT_RFC3339_MS = 'YYYY-MM-DDTHH:mm:ss.SSSZ';
export const TIME_FORMAT_DATETIME = 'YYYY-MM-DD HH:mm:ss';

// Numeric epoch values, smaller and faster than formatted timestamps
export const TIME_FORMAT_UNIX = 'unix';
export const TIME_FORMAT_UNIX_MS = 'unixms';
export const TIME_FORMAT_UNIX_MICRO = 'unixmicro';

const EPOCH_CLOCKS: Record<string, () => number> = {
	[TIME_FORMAT_UNIX]: () => Math.floor(Date.now() / 1000),
	[TIME_FORMAT_UNIX_MS]: () => Date.now(),
	[TIME_FORMAT_UNIX_MICRO]: () => Date.now() * 1000,
};

export function isEpochTimeFormat(format: string): boolean {
	return format in EPOCH_CLOCKS;
}

/**
 * Value for the `format` option of winston.format.timestamp.
 */
export function timestampFormat(format: string): string | (() => string) {
	const clock = EPOCH_CLOCKS[format];
	if (!clock) {
		return format;
	}
	return () => String(clock());
}
