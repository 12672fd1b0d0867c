import { describe, it, expect } from 'vitest';
import { SimpleErrorCounter } from '../error-counter.js';

describe('SimpleErrorCounter', () => {
	it('counts every error it is given', () => {
		const counter = new SimpleErrorCounter();
		expect(counter.count).toBe(0);

		counter.inc(new Error('a'));
		counter.inc(new Error('a'));

		expect(counter.count).toBe(2);
	});
});
