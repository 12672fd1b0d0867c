import { describe, it, expect } from 'vitest';
import { callerOf, hasLoggerStack, parseStack } from '../stack.js';

describe('parseStack', () => {
	it('reads function, file name and line of each frame', () => {
		const stack = [
			'Error: failed',
			'    at doWork (/srv/app/worker.js:10:5)',
			'    at file:///srv/app/main.mjs:3:1',
			'    at new Promise (<anonymous>)',
		].join('\n');

		expect(parseStack(stack)).toEqual([
			{ func: 'doWork', source: 'worker.js', line: '10' },
			{ func: 'unknown', source: 'main.mjs', line: '3' },
		]);
	});

	it('returns no frames without a stack', () => {
		expect(parseStack(undefined)).toEqual([]);
		expect(parseStack('Error: only a header')).toEqual([]);
	});
});

describe('hasLoggerStack', () => {
	it('detects errors that carry their own stack fields', () => {
		const carrier = Object.assign(new Error('x'), { stackForLogger: () => ['at', 'here'] });
		expect(hasLoggerStack(carrier)).toBe(true);
		expect(hasLoggerStack(new Error('y'))).toBe(false);
	});
});

describe('callerOf', () => {
	it('points at the code calling the anchor', () => {
		function locate(): string | undefined {
			return callerOf(locate);
		}
		expect(locate()).toMatch(/stack\.test\.ts:\d+$/);
	});
});
