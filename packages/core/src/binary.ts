import { RuntimeDataError } from "./errors";

/** Size in bytes of a u32 word */
export const WORD_SIZE = 4;

/**
 * Create a DataView over exactly the bytes of a Uint8Array window
 *
 * The view shares the window's ArrayBuffer; nothing is copied.
 *
 * @param bytes - Window to view
 * @returns DataView spanning the same bytes
 */
export function viewOf(bytes: Uint8Array): DataView {
	return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Read a little-endian u32 at a byte offset
 *
 * @param view - The view to read from
 * @param offset - Byte offset in the view
 * @returns The decoded unsigned value
 * @throws RuntimeDataError (RANGE_OUT_OF_BOUNDS) if the word does not fit
 *
 * @example
 * const view = viewOf(new Uint8Array([0x78, 0x56, 0x34, 0x12]));
 * readU32(view, 0); // 0x12345678
 */
export function readU32(view: DataView, offset: number): number {
	if (offset < 0 || offset + WORD_SIZE > view.byteLength) {
		throw new RuntimeDataError(
			"RANGE_OUT_OF_BOUNDS",
			`Offset ${offset} out of bounds for buffer of length ${view.byteLength}`,
		);
	}
	return view.getUint32(offset, true);
}

/**
 * Read the `word`-th u32 of a fixed-size record
 *
 * @param view - View over a table of records
 * @param recordSize - Size of one record in bytes
 * @param index - Record index
 * @param word - Word offset of the field inside the record
 */
export function readRecordWord(
	view: DataView,
	recordSize: number,
	index: number,
	word: number,
): number {
	return readU32(view, index * recordSize + word * WORD_SIZE);
}

/**
 * Take a zero-copy window of `size` bytes starting at `offset`
 *
 * @param bytes - Source bytes
 * @param offset - First byte of the window
 * @param size - Length of the window in bytes
 * @throws RuntimeDataError (RANGE_OUT_OF_BOUNDS) if the window leaves `bytes`
 */
export function windowOf(
	bytes: Uint8Array,
	offset: number,
	size: number,
): Uint8Array {
	if (offset + size > bytes.length) {
		throw new RuntimeDataError(
			"RANGE_OUT_OF_BOUNDS",
			`Range [${offset}, ${offset + size}) exceeds buffer of length ${bytes.length}`,
		);
	}
	return bytes.subarray(offset, offset + size);
}
