import { describe, it, expect } from 'vitest';
import { Writable } from 'stream';
import {
	DEFAULT_BUFFER_FLUSH_INTERVAL,
	DEFAULT_BUFFER_SIZE,
	LoggerConfig,
	isConsoleSink,
	newConfig,
	resolveBufferOptions,
} from '../config.js';
import { SimpleErrorCounter } from '../error-counter.js';
import { LEVEL_INFO, TIME_FORMAT_RFC3339, TIME_FORMAT_UNIX } from '../levels.js';
import { MemorySink } from './memory-sink.js';

describe('LoggerConfig', () => {
	it('starts at info with RFC 3339 timestamps and no sinks', () => {
		const config = new LoggerConfig();
		expect(config.level).toBe(LEVEL_INFO);
		expect(config.timeFormat).toBe(TIME_FORMAT_RFC3339);
		expect(config.sinks).toEqual([]);
		expect(config.toIgnore).toEqual([]);
		expect(config.stackTrace).toBe(false);
		expect(config.errorCounter).toBeUndefined();
	});

	it('returns a new config from every builder and leaves the receiver alone', () => {
		const base = newConfig();
		const derived = base.withLevel('debug').withToIgnore('ping').withStackTrace();

		expect(derived).not.toBe(base);
		expect(derived.level).toBe('debug');
		expect(derived.toIgnore).toEqual(['ping']);
		expect(derived.stackTrace).toBe(true);
		expect(base.level).toBe(LEVEL_INFO);
		expect(base.toIgnore).toEqual([]);
		expect(base.stackTrace).toBe(false);
	});

	it('appends sinks in order', () => {
		const first = new MemorySink();
		const second = new MemorySink();
		const config = newConfig(first).withSink(second).withConsoleJSON();
		expect(config.sinks).toEqual([first, second, { console: 'json' }]);
	});

	it('adds console sinks in each style', () => {
		expect(newConfig().withConsole().sinks).toEqual([{ console: 'pretty' }]);
		expect(newConfig().withConsoleNoColor().sinks).toEqual([{ console: 'plain' }]);
	});

	it('replaces the ignore list instead of extending it', () => {
		const config = newConfig().withToIgnore('a', 'b').withToIgnore('c');
		expect(config.toIgnore).toEqual(['c']);
	});

	it('merges buffer settings', () => {
		const config = newConfig().withBufferSize(10).withBufferFlushInterval(50).withNoBuffer();
		expect(config.buffer).toEqual({ size: 10, flushInterval: 50, disabled: true });
	});

	it('keeps the counter it was given', () => {
		const counter = new SimpleErrorCounter();
		expect(newConfig().withErrorCounter(counter).errorCounter).toBe(counter);
		expect(newConfig().withSimpleErrorCounter().errorCounter).toBeInstanceOf(SimpleErrorCounter);
	});

	it('stores the time format as given', () => {
		expect(newConfig().withTimeFormat(TIME_FORMAT_UNIX).timeFormat).toBe('unix');
	});
});

describe('isConsoleSink', () => {
	it('tells console sinks from streams', () => {
		expect(isConsoleSink({ console: 'plain' })).toBe(true);
		expect(isConsoleSink(new Writable())).toBe(false);
	});
});

describe('resolveBufferOptions', () => {
	it('fills in defaults', () => {
		const resolved = resolveBufferOptions({});
		expect(resolved.size).toBe(DEFAULT_BUFFER_SIZE);
		expect(resolved.flushInterval).toBe(DEFAULT_BUFFER_FLUSH_INTERVAL);
		expect(resolved.useWaiter).toBe(false);
		expect(typeof resolved.onOverflow).toBe('function');
	});

	it('turns the flush interval off in waiter mode', () => {
		const resolved = resolveBufferOptions({ flushInterval: 100, useWaiter: true });
		expect(resolved.flushInterval).toBe(0);
		expect(resolved.useWaiter).toBe(true);
	});

	it('keeps explicit values', () => {
		const onOverflow = (_dropped: number) => {};
		expect(resolveBufferOptions({ size: 5, flushInterval: 30, onOverflow })).toEqual({
			size: 5,
			flushInterval: 30,
			useWaiter: false,
			onOverflow,
		});
	});
});
