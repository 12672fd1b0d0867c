import { describe, it, expect } from 'vitest';
import { MESSAGE } from 'triple-beam';
import type winston from 'winston';
import { consoleLine, jsonRecord } from '../format.js';

function render(format: winston.Logform.Format, info: winston.Logform.TransformableInfo): unknown {
	const result = format.transform(info, format.options);
	if (typeof result === 'boolean') {
		throw new Error('record was filtered');
	}
	return result[MESSAGE];
}

describe('jsonRecord', () => {
	it('orders level, time and message before fields', () => {
		const output = render(jsonRecord(), {
			region: 'eu',
			level: 'warn',
			message: 'slow query',
			timestamp: '2024-05-02T10:00:00+00:00',
			ms: 812,
		});
		expect(output).toBe(
			'{"level":"warn","time":"2024-05-02T10:00:00+00:00","message":"slow query","region":"eu","ms":812}'
		);
	});

	it('leaves the level out of unleveled records', () => {
		const output = render(jsonRecord(), { level: 'print', message: 'plain', timestamp: 'now' });
		expect(output).toBe('{"time":"now","message":"plain"}');
	});

	it('writes epoch timestamps as numbers', () => {
		const output = render(jsonRecord({ numericTime: true }), {
			level: 'info',
			message: 'epoch',
			timestamp: '1714644000',
		});
		expect(output).toBe('{"level":"info","time":1714644000,"message":"epoch"}');
	});
});

describe('consoleLine', () => {
	it('renders a plain line with a level tag and fields', () => {
		const output = render(consoleLine(false), {
			level: 'warn',
			message: 'disk almost full',
			used: 0.93,
			mount: '/var',
			error: 'quota',
		});
		expect(output).toMatch(
			/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} WRN disk almost full used=0\.93 mount=\/var error=quota$/
		);
	});

	it('renders objects as JSON and omits the tag of unleveled records', () => {
		const output = render(consoleLine(false), {
			level: 'print',
			message: 'state',
			flags: { a: 1 },
		});
		expect(output).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} state flags=\{"a":1\}$/);
	});
});
