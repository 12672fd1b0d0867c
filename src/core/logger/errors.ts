/**
 * Errors raised by the logger itself. Logging calls never throw these except
 * for construction with a bad level and the panic entry points.
 */

export class LoggerError extends Error {
	constructor(
		message: string,
		public readonly code: string
	) {
		super(message);
		this.name = 'LoggerError';
	}
}

export class InvalidLevelError extends LoggerError {
	constructor(public readonly level: string) {
		super(`cannot parse level=${level}`, 'INVALID_LEVEL');
		this.name = 'InvalidLevelError';
	}
}

/**
 * Thrown by the panic entry points after the record is written.
 * Catching it prevents the crash.
 */
export class LoggerPanic extends LoggerError {
	constructor(message: string) {
		super(message, 'PANIC');
		this.name = 'LoggerPanic';
	}
}

export class EnvConfigError extends LoggerError {
	constructor(
		message: string,
		public readonly issues: readonly string[]
	) {
		super(message, 'INVALID_ENV');
		this.name = 'EnvConfigError';
	}
}
