import { Writable } from 'stream';

/**
 * Writable that keeps everything written to it.
 */
export class MemorySink extends Writable {
	private chunks: string[] = [];

	override _write(
		chunk: Buffer | string,
		_encoding: BufferEncoding,
		callback: (error?: Error | null) => void
	): void {
		this.chunks.push(chunk.toString());
		callback();
	}

	text(): string {
		return this.chunks.join('');
	}

	lines(): string[] {
		return this.text()
			.split('\n')
			.filter(line => line.length > 0);
	}

	records(): Record<string, unknown>[] {
		return this.lines().map(line => JSON.parse(line));
	}

	clear(): void {
		this.chunks = [];
	}
}

/** Let winston's pipe deliver pending records. */
export function settle(ms = 20): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}
