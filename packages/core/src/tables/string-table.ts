import { assertIndex, RuntimeDataError } from "../errors";
import { TABLE_TYPE } from "../format";

const utf8 = new TextDecoder("utf-8");

/**
 * Reader over the string table: a run of NUL-terminated byte strings,
 * addressed by the byte offset of their first character.
 */
export class StringTable {
	/**
	 * @param bytes - Window of the blob holding the table
	 * @throws RuntimeDataError (MALFORMED_TABLE) if a non-empty table does not end in NUL
	 */
	constructor(private readonly bytes: Uint8Array) {
		if (bytes.length > 0 && bytes[bytes.length - 1] !== 0) {
			throw new RuntimeDataError(
				"MALFORMED_TABLE",
				"String table does not end with a NUL terminator",
				TABLE_TYPE.STRING,
			);
		}
	}

	/** Size of the table in bytes */
	get size(): number {
		return this.bytes.length;
	}

	/** Whether `offset` addresses a byte inside the table */
	contains(offset: number): boolean {
		return Number.isInteger(offset) && offset >= 0 && offset < this.bytes.length;
	}

	/**
	 * Bytes of the string at `offset`, excluding the terminator.
	 * The result is a view into the blob, not a copy.
	 */
	getBytes(offset: number): Uint8Array {
		assertIndex(offset, this.bytes.length, "String table offset");
		const end = this.bytes.indexOf(0, offset);
		return this.bytes.subarray(offset, end);
	}

	/**
	 * Decode the string at `offset`
	 *
	 * @example
	 * // table bytes: "main\0helper\0"
	 * strings.get(5); // "helper"
	 */
	get(offset: number): string {
		return utf8.decode(this.getBytes(offset));
	}
}
