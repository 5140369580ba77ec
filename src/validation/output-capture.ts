import type { IGateOutput } from './types.js';

export const MAX_OUTPUT_LINES = 50;
export const MAX_OUTPUT_BYTES = 5120;

/**
 * Trims one stream to MAX_OUTPUT_LINES lines, then to MAX_OUTPUT_BYTES bytes of UTF-8.
 * A multi-byte character straddling the byte limit is dropped whole.
 */
export function truncateStream(text: string): { text: string; truncated: boolean } {
	if (!text) return { text: '', truncated: false };

	let truncated = false;
	let lines = text.replace(/\r?\n$/, '').split(/\r?\n/);
	if (lines.length > MAX_OUTPUT_LINES) {
		lines = lines.slice(0, MAX_OUTPUT_LINES);
		truncated = true;
	}

	let trimmed = lines.join('\n').trim();
	const encoded = Buffer.from(trimmed, 'utf-8');
	if (encoded.length > MAX_OUTPUT_BYTES) {
		let end = MAX_OUTPUT_BYTES;
		while (end > 0 && (encoded[end] & 0xc0) === 0x80) end--;
		trimmed = encoded.subarray(0, end).toString('utf-8').trimEnd();
		truncated = true;
	}

	return { text: trimmed, truncated };
}

export function captureOutput(stdout: string, stderr: string): IGateOutput {
	const out = truncateStream(stdout);
	const err = truncateStream(stderr);
	return {
		stdout: out.text,
		stderr: err.text,
		truncated: out.truncated || err.truncated,
	};
}
