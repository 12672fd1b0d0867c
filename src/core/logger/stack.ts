/**
 * Stack helpers: structured frames for logged errors and the caller of a
 * logging method.
 */

import path from 'path';
import { fileURLToPath } from 'url';

export interface StackFrame {
	func: string;
	source: string;
	line: string;
}

/**
 * A function used as the boundary of a captured stack: frames above it
 * (itself included) are dropped.
 */
export type StackAnchor = (...args: never[]) => unknown;

/**
 * Errors may carry their own stack representation as (key, value) pairs,
 * which takes precedence over the parsed stack.
 */
export interface LoggerStackCarrier {
	stackForLogger(): unknown[];
}

// "    at fn (/path/file.ts:10:5)" or "    at /path/file.ts:10:5"
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

export function hasLoggerStack(error: Error): error is Error & LoggerStackCarrier {
	return 'stackForLogger' in error && typeof error.stackForLogger === 'function';
}

function toPath(location: string): string {
	return location.startsWith('file://') ? fileURLToPath(location) : location;
}

/**
 * Parse the frames of a V8 stack string. Lines that are not frames
 * (the header, native frames) are skipped.
 */
export function parseStack(stack: string | undefined): StackFrame[] {
	if (!stack) {
		return [];
	}

	const frames: StackFrame[] = [];
	for (const line of stack.split('\n')) {
		const match = FRAME_PATTERN.exec(line);
		if (!match) {
			continue;
		}
		const [, func, location, lineNumber] = match;
		frames.push({
			func: func ?? 'unknown',
			source: path.basename(toPath(location ?? '')),
			line: lineNumber ?? '',
		});
	}
	return frames;
}

/**
 * Raw stack text starting at the caller of `anchor`, without the header line.
 */
export function captureStackText(anchor: StackAnchor): string {
	const holder: { stack?: string } = {};
	Error.captureStackTrace(holder, anchor);
	const lines = (holder.stack ?? '').split('\n');
	return lines.slice(1).join('\n');
}

export function captureFrames(anchor: StackAnchor): StackFrame[] {
	return parseStack(captureStackText(anchor));
}

/**
 * `file:line` of the code that called `anchor`, if it is on the stack.
 */
export function callerOf(anchor: StackAnchor): string | undefined {
	for (const line of captureStackText(anchor).split('\n')) {
		const match = FRAME_PATTERN.exec(line);
		if (match) {
			const [, , location, lineNumber] = match;
			return `${toPath(location ?? '')}:${lineNumber ?? ''}`;
		}
	}
	return undefined;
}
