/**
 * Argument classification for variadic logging calls.
 *
 * A call such as `infof('value %d', 42, 'k', 'v')` mixes format arguments and
 * (key, value) field pairs in one list. The split is decided by counting `%`
 * markers in the template: that many leading arguments are substituted, the
 * rest are fields. Field lists may also embed an error value, which is pulled
 * out so it can be attached as the record's dedicated error.
 */

import { format } from 'util';

export interface ClassifiedArgs {
	/** Final message: the template, or the template rendered with formatArgs */
	message: string;
	formatArgs: unknown[];
	fieldArgs: unknown[];
}

export interface ExtractedError {
	error: Error | undefined;
	fields: unknown[];
}

export function isError(value: unknown): value is Error {
	return value instanceof Error;
}

/**
 * Number of `%` characters in the template. `%%` counts twice.
 */
export function countPlaceholders(template: string): number {
	let count = 0;
	for (const char of template) {
		if (char === '%') {
			count++;
		}
	}
	return count;
}

/**
 * Render a template with util.format. A value that fails to render leaves
 * the template as is.
 */
export function renderMessage(template: string, formatArgs: readonly unknown[]): string {
	if (formatArgs.length === 0) {
		return template;
	}
	try {
		return format(template, ...formatArgs);
	} catch {
		return template;
	}
}

export function classify(template: string, args: readonly unknown[]): ClassifiedArgs {
	const placeholders = countPlaceholders(template);

	let formatArgs: unknown[];
	let fieldArgs: unknown[];
	if (placeholders === 0) {
		formatArgs = [];
		fieldArgs = [...args];
	} else if (placeholders <= args.length) {
		formatArgs = args.slice(0, placeholders);
		fieldArgs = args.slice(placeholders);
	} else {
		formatArgs = [...args];
		fieldArgs = [];
	}

	return {
		message: renderMessage(template, formatArgs),
		formatArgs,
		fieldArgs,
	};
}

/**
 * Remove the first error from a flat field list. An error in value position
 * takes its key with it; an error in key position is removed alone.
 * Later errors are left in place.
 */
export function extractError(fields: readonly unknown[]): ExtractedError {
	const index = fields.findIndex(isError);
	if (index === -1) {
		return { error: undefined, fields: [...fields] };
	}

	const error = fields[index];
	const start = index % 2 === 1 ? index - 1 : index;
	return {
		error: isError(error) ? error : undefined,
		fields: [...fields.slice(0, start), ...fields.slice(index + 1)],
	};
}

/**
 * Turn a flat (key, value) list into record fields. Keys are stringified,
 * an unpaired trailing key gets a null value, and errors are rendered as
 * their message.
 */
export function toFieldRecord(fields: readonly unknown[]): Record<string, unknown> {
	const record: Record<string, unknown> = {};
	for (let i = 0; i < fields.length; i += 2) {
		const key = String(fields[i]);
		const value = i + 1 < fields.length ? fields[i + 1] : null;
		record[key] = isError(value) ? value.message : value;
	}
	return record;
}
