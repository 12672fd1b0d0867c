import { describe, it, expect } from 'vitest';
import { safeJsonStringify } from '../utils/serializer.js';

describe('safeJsonStringify', () => {
	it('replaces circular references', () => {
		const parent: Record<string, unknown> = { id: 1 };
		parent.self = parent;
		expect(safeJsonStringify(parent)).toBe('{"id":1,"self":"[Circular Reference]"}');
	});

	it('writes an object shared by two keys both times', () => {
		const user = { id: 1 };
		expect(safeJsonStringify({ from: user, to: user, list: [user, user] })).toBe(
			'{"from":{"id":1},"to":{"id":1},"list":[{"id":1},{"id":1}]}'
		);
	});

	it('replaces a cycle running through an error', () => {
		const owner: Record<string, unknown> = { name: 'job' };
		const error = Object.assign(new Error('failed'), { owner });
		owner.error = error;

		const parsed: unknown = JSON.parse(safeJsonStringify(owner));
		expect(parsed).toMatchObject({
			name: 'job',
			error: { name: 'Error', message: 'failed', owner: '[Circular Reference]' },
		});
	});

	it('writes values JSON cannot hold', () => {
		expect(safeJsonStringify({ big: 10n, fn: function named() {}, missing: undefined })).toBe(
			'{"big":"10","fn":"[Function: named]","missing":null}'
		);
	});

	it('writes errors with their name and message', () => {
		const error = new Error('boom');
		const parsed: unknown = JSON.parse(safeJsonStringify({ error }));
		expect(parsed).toMatchObject({ error: { name: 'Error', message: 'boom' } });
	});

	it('uses the JSON form of dates', () => {
		expect(safeJsonStringify({ at: new Date(Date.UTC(2024, 0, 2)) })).toBe(
			'{"at":"2024-01-02T00:00:00.000Z"}'
		);
	});
});
