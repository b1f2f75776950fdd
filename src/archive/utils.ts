export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/**
 * Size of a string once UTF-8 encoded. Header fields are sized in bytes.
 */
export function byteLength(value: string): number {
	return encoder.encode(value).length;
}

/**
 * Writes a string to the view, truncating if necessary.
 * Assumes the view is zero-filled, so any remaining space is null-padded.
 */
export function writeString(
	view: Uint8Array,
	offset: number,
	size: number,
	value?: string,
) {
	if (value) {
		encoder.encodeInto(value, view.subarray(offset, offset + size));
	}
}

/**
 * Writes a number as a zero-padded octal string.
 */
export function writeOctal(
	view: Uint8Array,
	offset: number,
	size: number,
	value?: number,
) {
	if (value === undefined) return;

	// The final byte is left as 0 (NUL terminator), assuming a zero-filled view.
	const octalString = value.toString(8).padStart(size - 1, "0");
	encoder.encodeInto(octalString, view.subarray(offset, offset + size - 1));
}

/**
 * Writes a left-aligned, space-padded ASCII field as used by `ar` headers.
 * Assumes the view was filled with spaces beforehand.
 */
export function writePadded(
	view: Uint8Array,
	offset: number,
	size: number,
	value: string,
) {
	encoder.encodeInto(value, view.subarray(offset, offset + size));
}

/**
 * Reads a NUL-terminated string from the view.
 */
export function readString(
	view: Uint8Array,
	offset: number,
	size: number,
): string {
	const end = view.indexOf(0, offset);
	const sliceEnd = end === -1 || end > offset + size ? offset + size : end;
	return decoder.decode(view.subarray(offset, sliceEnd));
}

/**
 * Reads a space-padded ASCII field, trimming the padding.
 */
export function readPadded(
	view: Uint8Array,
	offset: number,
	size: number,
): string {
	return decoder.decode(view.subarray(offset, offset + size)).trimEnd();
}

/**
 * Reads an octal number from the view.
 */
export function readOctal(
	view: Uint8Array,
	offset: number,
	size: number,
): number {
	let value = 0;
	const end = offset + size;

	for (let i = offset; i < end; i++) {
		const charCode = view[i];
		if (charCode === 0) break; // Stop at NUL terminator
		if (charCode === 32) continue; // Ignore whitespace
		value = value * 8 + (charCode - 48); // 48 is ASCII '0'
	}

	return value;
}

/**
 * Concatenates byte chunks into a single pre-allocated buffer.
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
	let totalLength = 0;
	for (const chunk of chunks) totalLength += chunk.length;

	const result = new Uint8Array(totalLength);
	let offset = 0;

	for (const chunk of chunks) {
		result.set(chunk, offset);
		offset += chunk.length;
	}

	return result;
}
