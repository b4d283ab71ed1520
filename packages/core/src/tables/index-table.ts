import { readU32, viewOf, WORD_SIZE } from "../binary";
import { assertIndex, RuntimeDataError } from "../errors";
import { TABLE_TYPE } from "../format";

/**
 * One row of the index table: `count` u32 values following the count word.
 *
 * A row does not own its values; it reads them from the index table window
 * on demand.
 */
export class IndexRow implements Iterable<number> {
	constructor(
		private readonly view: DataView,
		/** Element offset of the row's count word */
		readonly rowRef: number,
		/** Number of values in the row */
		readonly count: number,
	) {}

	/** The `i`-th value of the row */
	at(i: number): number {
		assertIndex(i, this.count, "Index row element");
		return readU32(this.view, (this.rowRef + 1 + i) * WORD_SIZE);
	}

	*[Symbol.iterator](): Iterator<number> {
		for (let i = 0; i < this.count; i++) {
			yield this.at(i);
		}
	}

	toArray(): number[] {
		return [...this];
	}
}

/**
 * Row whose values are indices into the resource table
 */
export class ResourceIndexList {
	readonly kind = "resource-indices";

	constructor(readonly row: IndexRow) {}

	get count(): number {
		return this.row.count;
	}

	/** Resource table index stored at position `i` */
	resourceIndexAt(i: number): number {
		return this.row.at(i);
	}
}

/**
 * Row whose values are byte offsets into the string table
 */
export class StringRefList {
	readonly kind = "string-refs";

	constructor(readonly row: IndexRow) {}

	get count(): number {
		return this.row.count;
	}

	/** String table offset stored at position `i` */
	stringOffsetAt(i: number): number {
		return this.row.at(i);
	}
}

/**
 * Reader over the index table: a flat u32 array holding variable-length
 * rows laid out as `[count, v0 .. v(count-1)]`.
 *
 * Rows are addressed by the element offset of their count word, not by a
 * row number, so one row may start inside another and share its tail.
 */
export class IndexTable {
	private readonly view: DataView;

	/**
	 * @param bytes - Window of the blob holding the table
	 * @throws RuntimeDataError (RECORD_SIZE_MISMATCH) if the size is not a whole number of words
	 */
	constructor(bytes: Uint8Array) {
		if (bytes.length % WORD_SIZE !== 0) {
			throw new RuntimeDataError(
				"RECORD_SIZE_MISMATCH",
				`Index table size ${bytes.length} is not a multiple of ${WORD_SIZE}`,
				TABLE_TYPE.INDEX,
			);
		}
		this.view = viewOf(bytes);
	}

	/** Number of u32 elements in the table */
	get length(): number {
		return this.view.byteLength / WORD_SIZE;
	}

	/**
	 * Resolve a row reference
	 *
	 * @param rowRef - Element offset of the row's count word
	 * @returns The row
	 * @throws RuntimeDataError (RANGE_OUT_OF_BOUNDS) if `rowRef` is outside the table
	 * @throws RuntimeDataError (MALFORMED_TABLE) if the row's values run past the end
	 *
	 * @example
	 * // elements: [3, 5, 2, 9]
	 * indices.rowAt(0).toArray(); // [5, 2, 9]
	 */
	rowAt(rowRef: number): IndexRow {
		if (!Number.isInteger(rowRef) || rowRef < 0 || rowRef >= this.length) {
			throw new RuntimeDataError(
				"RANGE_OUT_OF_BOUNDS",
				`Row reference ${rowRef} outside index table of ${this.length} elements`,
				TABLE_TYPE.INDEX,
			);
		}
		const count = readU32(this.view, rowRef * WORD_SIZE);
		if (rowRef + 1 + count > this.length) {
			throw new RuntimeDataError(
				"MALFORMED_TABLE",
				`Row at ${rowRef} holds ${count} values but the index table has ${this.length} elements`,
				TABLE_TYPE.INDEX,
			);
		}
		return new IndexRow(this.view, rowRef, count);
	}

	/** Resolve a row whose values are resource table indices */
	resourceIndexList(rowRef: number): ResourceIndexList {
		return new ResourceIndexList(this.rowAt(rowRef));
	}

	/** Resolve a row whose values are string table offsets */
	stringRefList(rowRef: number): StringRefList {
		return new StringRefList(this.rowAt(rowRef));
	}
}
