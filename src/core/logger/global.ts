/**
 * Process-wide logger.
 *
 * Until `init` runs, records go to stderr as JSON at info level. After `init`
 * the console methods are mirrored into the active logger as unleveled records.
 *
 * ```typescript
 * import { log, newConfig } from 'fieldlog';
 *
 * log.init(newConfig().withConsole().withLevel('debug'), 'service', 'billing');
 * log.info('started', 'port', 8080);
 * console.log('also structured now');
 * ```
 */

import type winston from 'winston';
import { format } from 'util';
import type { LoggerConfig } from './config.js';
import type { ErrorCounter } from './error-counter.js';
import { Logger } from './logger.js';

let active: Logger = Logger.consoleJSON();
let initialized = false;

// ===== Registry =====

/** Replace the active logger and mirror the console into it. */
export function init(config: LoggerConfig, ...fields: unknown[]): void {
	active = new Logger(config, ...fields);
	initialized = true;
	setLoggerForConsole(active);
}

/**
 * Rebuild the active logger in place. Loggers derived from it earlier keep
 * their own state.
 */
export function update(config: LoggerConfig, ...fields: unknown[]): void {
	active.update(config, ...fields);
	initialized = true;
	setLoggerForConsole(active);
}

/** Restore the console and go back to the stderr JSON logger. */
export function reset(): void {
	restoreConsole();
	active = Logger.consoleJSON();
	initialized = false;
}

export function getLogger(): Logger {
	return active;
}

export function isInitialized(): boolean {
	return initialized;
}

// ===== Console mirroring =====

type ConsoleMethod = 'log' | 'info' | 'warn' | 'error' | 'debug';
type ConsoleFn = (...data: unknown[]) => void;

const CONSOLE_METHODS: readonly ConsoleMethod[] = ['log', 'info', 'warn', 'error', 'debug'];

const originalConsole = new Map<ConsoleMethod, ConsoleFn>();
let mirroring = false;

/**
 * Route console.log, info, warn, error and debug to `logger`. Each call is
 * written as one unleveled record with `fields` bound.
 */
export function setLoggerForConsole(logger: Logger, ...fields: unknown[]): void {
	const target = fields.length > 0 ? logger.withFields(...fields) : logger;

	for (const method of CONSOLE_METHODS) {
		if (!originalConsole.has(method)) {
			originalConsole.set(method, console[method]);
		}
		const original = originalConsole.get(method) ?? console[method];

		console[method] = (...data: unknown[]) => {
			// a sink writing back through the console
			if (mirroring) {
				original.apply(console, data);
				return;
			}
			mirroring = true;
			try {
				target.write(format(...data));
			} finally {
				mirroring = false;
			}
		};
	}
}

export function restoreConsole(): void {
	for (const [method, original] of originalConsole) {
		console[method] = original;
	}
	originalConsole.clear();
}

// ===== Forwarders =====

export function withFields(...fields: unknown[]): Logger {
	return active.withFields(...fields);
}

export { withFields as with };

export function withLevel(level: string): Logger {
	return active.withLevel(level);
}

export function withErrorCounter(errorCounter: ErrorCounter): Logger {
	return active.withErrorCounter(errorCounter);
}

export function withSimpleErrorCounter(): Logger {
	return active.withSimpleErrorCounter();
}

export function trace(message: string, ...fields: unknown[]): void {
	active.traceAt(trace, message, fields);
}

export function tracef(template: string, ...args: unknown[]): void {
	active.tracefAt(tracef, template, args);
}

export function debug(message: string, ...fields: unknown[]): void {
	active.debug(message, ...fields);
}

export function debugf(template: string, ...args: unknown[]): void {
	active.debugf(template, ...args);
}

export function info(message: string, ...fields: unknown[]): void {
	active.info(message, ...fields);
}

export function infof(template: string, ...args: unknown[]): void {
	active.infof(template, ...args);
}

export function warn(message: string, ...fields: unknown[]): void {
	active.warn(message, ...fields);
}

export function warnf(template: string, ...args: unknown[]): void {
	active.warnf(template, ...args);
}

export function error(message: string, ...fields: unknown[]): void {
	active.error(message, ...fields);
}

export function errorf(template: string, ...args: unknown[]): void {
	active.errorf(template, ...args);
}

export function err(error: Error | null | undefined, message: string, ...fields: unknown[]): void {
	active.err(error, message, ...fields);
}

export function errf(error: Error | null | undefined, template: string, ...args: unknown[]): void {
	active.errf(error, template, ...args);
}

export function errStack(error: Error, ...fields: unknown[]): void {
	active.errStack(error, ...fields);
}

export function fatal(...values: unknown[]): never {
	return active.fatal(...values);
}

export function fatalf(template: string, ...args: unknown[]): never {
	return active.fatalf(template, ...args);
}

export function panic(...values: unknown[]): never {
	return active.panic(...values);
}

export function panicf(template: string, ...args: unknown[]): never {
	return active.panicf(template, ...args);
}

export function print(...values: unknown[]): void {
	active.print(...values);
}

export function printf(template: string, ...args: unknown[]): void {
	active.printf(template, ...args);
}

export function write(data: string | Uint8Array): void {
	active.write(data);
}

export function raw(): winston.Logger {
	return active.raw();
}

export function getErrorCounter(): ErrorCounter | undefined {
	return active.getErrorCounter();
}
