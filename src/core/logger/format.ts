/**
 * winston formats producing the serialized record
 */

import winston from 'winston';
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { MESSAGE } from 'triple-beam';
import { safeJsonStringify } from './utils/serializer.js';
import { PRINT_LEVEL, TIME_FORMAT_DATETIME, isEpochTimeFormat, timestampFormat } from './levels.js';

const RESERVED_KEYS = new Set(['level', 'time', 'message']);

// Written by winston.format.timestamp, never a caller field
const TIMESTAMP_KEY = 'timestamp';

/** Holds a caller field named `timestamp` while winston uses the key. */
export const CALLER_TIMESTAMP = Symbol('fieldlog.timestamp');

function isRecordKey(key: string): boolean {
	return !RESERVED_KEYS.has(key) && key !== TIMESTAMP_KEY;
}

/** Caller fields in record order, with a `timestamp` field put back. */
function callerFields(info: winston.Logform.TransformableInfo): [string, unknown][] {
	const fields = Object.entries(info).filter(([key]) => isRecordKey(key));
	if (CALLER_TIMESTAMP in info) {
		fields.push([TIMESTAMP_KEY, info[CALLER_TIMESTAMP]]);
	}
	return fields;
}

/**
 * Move a caller field named `timestamp` out of winston's way. Runs before
 * any timestamp format.
 */
export const keepTimestampField = winston.format(info => {
	if (TIMESTAMP_KEY in info) {
		info[CALLER_TIMESTAMP] = info[TIMESTAMP_KEY];
		delete info[TIMESTAMP_KEY];
	}
	return info;
});

// ===== JSON records =====

export interface JsonRecordOptions {
	/** The timestamp holds an epoch number rendered as a string */
	numericTime?: boolean;
}

/**
 * Lay the record out as `level`, `time`, `message`, then fields, and store its
 * JSON under MESSAGE. Unleveled records carry no `level` key.
 */
export const jsonRecord = winston.format((info, opts: JsonRecordOptions = {}) => {
	const record: Record<string, unknown> = {};
	if (info.level !== PRINT_LEVEL) {
		record.level = info.level;
	}
	record.time = opts.numericTime ? Number(info.timestamp) : info.timestamp;
	record.message = info.message;

	for (const [key, value] of callerFields(info)) {
		record[key] = value;
	}

	info[MESSAGE] = safeJsonStringify(record);
	return info;
});

/**
 * Logger-level format: optional hook, caller `timestamp` set aside,
 * timestamp, JSON layout.
 */
export function recordFormat(
	timeFormat: string,
	hook?: winston.Logform.Format
): winston.Logform.Format {
	const steps: winston.Logform.Format[] = [];
	if (hook) {
		steps.push(hook);
	}
	steps.push(
		keepTimestampField(),
		winston.format.timestamp({ format: timestampFormat(timeFormat) }),
		jsonRecord({ numericTime: isEpochTimeFormat(timeFormat) })
	);
	return winston.format.combine(...steps);
}

// ===== Console =====

const LEVEL_TAGS: Record<string, string> = {
	trace: 'TRC',
	debug: 'DBG',
	info: 'INF',
	warn: 'WRN',
	error: 'ERR',
	fatal: 'FTL',
};

function levelColor(palette: ChalkInstance, level: string): (text: string) => string {
	switch (level) {
		case 'trace':
			return palette.magenta;
		case 'debug':
			return palette.yellow;
		case 'info':
			return palette.green;
		case 'warn':
			return palette.red;
		case 'error':
		case 'fatal':
			return palette.red.bold;
		default:
			return palette.white;
	}
}

function renderValue(value: unknown): string {
	return typeof value === 'string' ? value : safeJsonStringify(value);
}

/**
 * Human-readable line: `2024-01-02 15:04:05 INF message key=value`.
 * Needs the JSON layout to have run first, it ignores the JSON itself.
 */
export function consoleLine(color: boolean): winston.Logform.Format {
	const palette = color ? chalk : new Chalk({ level: 0 });

	return winston.format.combine(
		winston.format.timestamp({ format: TIME_FORMAT_DATETIME }),
		winston.format.printf(info => {
			const parts = [palette.dim(String(info.timestamp))];

			const tag = LEVEL_TAGS[info.level];
			if (tag) {
				parts.push(levelColor(palette, info.level)(tag));
			}

			parts.push(String(info.message));

			for (const [key, value] of callerFields(info)) {
				const rendered = renderValue(value);
				parts.push(
					`${palette.cyan(`${key}=`)}${key === 'error' ? palette.red(rendered) : rendered}`
				);
			}

			return parts.join(' ');
		})
	);
}
