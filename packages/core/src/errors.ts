/**
 * Error codes for runtime data decoding and access failures
 */
export type RuntimeDataErrorCode =
	| "MALFORMED_HEADER"
	| "UNSUPPORTED_TABLE_TYPE"
	| "DUPLICATE_TABLE"
	| "RANGE_OUT_OF_BOUNDS"
	| "RECORD_SIZE_MISMATCH"
	| "MALFORMED_TABLE"
	| "UNINITIALIZED_ACCESS"
	| "INDEX_OUT_OF_RANGE";

/**
 * A non-fatal finding reported while decoding (e.g. a skipped table)
 */
export interface RuntimeDataIssue {
	/** Error code for programmatic handling */
	code: RuntimeDataErrorCode;
	/** Human-readable description */
	message: string;
	/** Raw table type of the descriptor involved, if any */
	tableType?: number | undefined;
}

/**
 * Error raised by the decoder and the table readers.
 *
 * Decode-time structural errors are returned inside a failed
 * {@link DecodeResult}; accessor misuse (an index past the end of a table)
 * is thrown directly.
 */
export class RuntimeDataError extends Error {
	readonly code: RuntimeDataErrorCode;
	readonly tableType: number | undefined;

	constructor(code: RuntimeDataErrorCode, message: string, tableType?: number) {
		super(message);
		this.name = "RuntimeDataError";
		this.code = code;
		this.tableType = tableType;
	}

	/** Plain issue record, for reporting */
	toIssue(): RuntimeDataIssue {
		return { code: this.code, message: this.message, tableType: this.tableType };
	}
}

/**
 * Throw INDEX_OUT_OF_RANGE unless `index` addresses one of `count` items
 *
 * @param index - Caller-supplied index
 * @param count - Number of addressable items
 * @param what - Name of the collection, used in the message
 */
export function assertIndex(index: number, count: number, what: string): void {
	if (!Number.isInteger(index) || index < 0 || index >= count) {
		throw new RuntimeDataError(
			"INDEX_OUT_OF_RANGE",
			`${what} index ${index} out of range (count ${count})`,
		);
	}
}
