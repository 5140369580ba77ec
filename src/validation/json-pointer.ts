/**
 * RFC 6901 JSON Pointer resolution.
 *
 * `''` addresses the whole document, `/a/b` walks object keys, and numeric
 * tokens index into arrays. `~1` decodes to `/` and `~0` to `~`, in that order.
 */

export function parsePointer(pointer: string): string[] | null {
	if (pointer === '') return [];
	if (!pointer.startsWith('/')) return null;
	return pointer
		.slice(1)
		.split('/')
		.map(token => token.replace(/~1/g, '/').replace(/~0/g, '~'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns `undefined` when any token misses; never throws. */
export function resolvePointer(document: unknown, pointer: string): unknown {
	const tokens = parsePointer(pointer);
	if (tokens === null) return undefined;

	let current: unknown = document;
	for (const token of tokens) {
		if (Array.isArray(current)) {
			if (!/^(0|[1-9]\d*)$/.test(token)) return undefined;
			const index = Number(token);
			if (index >= current.length) return undefined;
			current = current[index];
		} else if (isRecord(current)) {
			if (!Object.hasOwn(current, token)) return undefined;
			current = current[token];
		} else {
			return undefined;
		}
	}
	return current;
}

/** Resolves a map of name -> pointer; misses become `null`. */
export function extractFields(document: unknown, pointers: Record<string, string>): Record<string, unknown> {
	const fields: Record<string, unknown> = {};
	for (const [name, pointer] of Object.entries(pointers)) {
		const value = resolvePointer(document, pointer);
		fields[name] = value === undefined ? null : value;
	}
	return fields;
}
