import { readRecordWord, viewOf } from "../binary";
import type { ResolutionContext } from "../context";
import { assertIndex, RuntimeDataError } from "../errors";
import type { FunctionField } from "../format";
import {
	ABSENT_ROW,
	FUNCTION_FIELD,
	FUNCTION_RECORD_SIZE,
	TABLE_TYPE,
} from "../format";
import { FunctionView } from "../views/function-view";

/**
 * Reader over the function table: an array of fixed-size function records.
 */
export class FunctionTable {
	private readonly view: DataView;
	private readonly total: number;

	/**
	 * @param bytes - Window of the blob holding the records
	 * @param context - Context handed to every view this table creates
	 * @throws RuntimeDataError (RECORD_SIZE_MISMATCH) if the size is not a whole number of records
	 */
	constructor(
		bytes: Uint8Array,
		private readonly context: ResolutionContext,
	) {
		if (bytes.length % FUNCTION_RECORD_SIZE !== 0) {
			throw new RuntimeDataError(
				"RECORD_SIZE_MISMATCH",
				`Function table size ${bytes.length} is not a multiple of ${FUNCTION_RECORD_SIZE}`,
				TABLE_TYPE.FUNCTION,
			);
		}
		this.view = viewOf(bytes);
		this.total = bytes.length / FUNCTION_RECORD_SIZE;
	}

	/** Number of function records */
	count(): number {
		return this.total;
	}

	/** View of the record at index `i` */
	get(i: number): FunctionView {
		assertIndex(i, this.total, "Function");
		return new FunctionView(this.context, i);
	}

	*[Symbol.iterator](): Iterator<FunctionView> {
		for (let i = 0; i < this.total; i++) {
			yield this.get(i);
		}
	}

	/** Raw u32 field of record `i` */
	field(i: number, field: FunctionField): number {
		assertIndex(i, this.total, "Function");
		return readRecordWord(this.view, FUNCTION_RECORD_SIZE, i, field);
	}

	/** Row reference of the function's resource list, or null when it has none */
	resourcesRow(i: number): number | null {
		return presentRow(this.field(i, FUNCTION_FIELD.RESOURCES));
	}

	/** Row reference of the function's dependency list, or null when it has none */
	dependenciesRow(i: number): number | null {
		return presentRow(this.field(i, FUNCTION_FIELD.DEPENDENCIES));
	}
}

function presentRow(rowRef: number): number | null {
	return rowRef === ABSENT_ROW ? null : rowRef;
}
