/**
 * ErrorCounter counts logged errors. One counter can be shared by many
 * loggers; a logger never resets it.
 */
export interface ErrorCounter {
	inc(error: Error): void;
}

/**
 * Counter with a monotonically increasing total.
 */
export class SimpleErrorCounter implements ErrorCounter {
	private total = 0;

	inc(_error: Error): void {
		this.total++;
	}

	get count(): number {
		return this.total;
	}
}
