/**
 * JSON serialization utilities for log records
 */

/**
 * Safely serialize a value to JSON, handling circular references and values
 * JSON.stringify rejects. Never throws.
 */
export function safeJsonStringify(value: unknown, space?: string | number): string {
	try {
		return JSON.stringify(value, createCircularReplacer(), space);
	} catch (error) {
		return `"[Serialization Error: ${error instanceof Error ? error.message : 'Unknown error'}]"`;
	}
}

/**
 * Create a replacer that replaces references back to an enclosing object.
 * The same object reached twice through different keys is written both times.
 */
function createCircularReplacer() {
	// Objects on the path from the root to the value being serialized
	const ancestors: unknown[] = [];

	return function (this: unknown, _key: string, value: unknown): unknown {
		if (typeof value === 'function') {
			return `[Function: ${value.name || 'anonymous'}]`;
		}

		if (typeof value === 'bigint' || typeof value === 'symbol') {
			return value.toString();
		}

		if (value === undefined) {
			return null;
		}

		if (typeof value !== 'object' || value === null) {
			return value;
		}

		// `this` holds `value`; subtrees of earlier siblings are finished
		while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {
			ancestors.pop();
		}
		if (ancestors.includes(value)) {
			return '[Circular Reference]';
		}

		// Dates reach the replacer already converted by toJSON

		if (value instanceof RegExp) {
			return value.toString();
		}

		if (value instanceof Error) {
			const replacement = {
				name: value.name,
				message: value.message,
				stack: value.stack,
				...value,
			};
			ancestors.push(value, replacement);
			return replacement;
		}

		ancestors.push(value);
		return value;
	};
}
