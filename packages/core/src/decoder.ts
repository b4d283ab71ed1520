/**
 * Container decoder for runtime data blobs.
 *
 * Layout: `tableCount: u32` followed by `tableCount` descriptors of
 * `{ tableType: u32, size: u32, offset: u32 }`. Offsets are relative to the
 * first byte of the blob. The decoded readers are windows over the caller's
 * buffer, so the buffer must outlive them and must not be modified.
 */

import { readU32, viewOf, WORD_SIZE, windowOf } from "./binary";
import type { TableWindows } from "./context";
import { ResolutionContext } from "./context";
import type { RuntimeDataIssue } from "./errors";
import { RuntimeDataError } from "./errors";
import {
	isKnownTableType,
	TABLE_DESCRIPTOR_SIZE,
	TABLE_TYPE,
	tableTypeName,
} from "./format";
import type { RuntimeDataLogger } from "./logger";
import { consoleLogger } from "./logger";
import type { FunctionTable } from "./tables/function-table";
import type { IndexTable } from "./tables/index-table";
import type { ResourceTable } from "./tables/resource-table";
import type { StringTable } from "./tables/string-table";
import { validateCrossReferences } from "./validation";

/**
 * One entry of the container header
 */
export interface TableDescriptor {
	/** Raw table type tag (see TABLE_TYPE) */
	tableType: number;
	/** Size of the table in bytes */
	byteSize: number;
	/** Offset of the table from the start of the blob */
	byteOffset: number;
}

/**
 * Successfully decoded runtime data
 */
export interface RuntimeData {
	/** Descriptors as read from the header, including skipped ones */
	readonly descriptors: readonly TableDescriptor[];
	readonly context: ResolutionContext;
	readonly strings: StringTable;
	readonly indices: IndexTable;
	readonly resources: ResourceTable;
	readonly functions: FunctionTable;
}

/**
 * Options for decoding
 */
export interface DecodeOptions {
	/** Sink for warnings about skipped tables @default consoleLogger */
	logger?: RuntimeDataLogger | undefined;
}

/**
 * Outcome of {@link decodeRuntimeData}. A failed decode carries no tables.
 */
export type DecodeResult =
	| {
			ok: true;
			data: RuntimeData;
			/** Non-fatal findings, such as skipped unknown tables */
			warnings: RuntimeDataIssue[];
	  }
	| {
			ok: false;
			error: RuntimeDataError;
	  };

/**
 * Read the table count and descriptors from the start of a blob
 *
 * @param blob - Runtime data blob
 * @returns The descriptors in header order
 * @throws RuntimeDataError (MALFORMED_HEADER) if the header does not fit in the blob
 */
export function readTableDescriptors(blob: Uint8Array): TableDescriptor[] {
	if (blob.length < WORD_SIZE) {
		throw new RuntimeDataError(
			"MALFORMED_HEADER",
			`Blob of ${blob.length} bytes is too small for a table count`,
		);
	}
	const view = viewOf(blob);
	const tableCount = readU32(view, 0);
	const headerSize = WORD_SIZE + tableCount * TABLE_DESCRIPTOR_SIZE;
	if (headerSize > blob.length) {
		throw new RuntimeDataError(
			"MALFORMED_HEADER",
			`Header declares ${tableCount} tables but the blob has only ${blob.length} bytes`,
		);
	}

	const descriptors: TableDescriptor[] = [];
	for (let i = 0; i < tableCount; i++) {
		const base = WORD_SIZE + i * TABLE_DESCRIPTOR_SIZE;
		descriptors.push({
			tableType: readU32(view, base),
			byteSize: readU32(view, base + 4),
			byteOffset: readU32(view, base + 8),
		});
	}
	return descriptors;
}

function collectWindows(
	blob: Uint8Array,
	descriptors: readonly TableDescriptor[],
	logger: RuntimeDataLogger,
	warnings: RuntimeDataIssue[],
): TableWindows {
	const seen = new Set<number>();
	const empty = blob.subarray(0, 0);
	const windows: TableWindows = {
		strings: empty,
		indices: empty,
		resources: empty,
		functions: empty,
	};

	for (const descriptor of descriptors) {
		const { tableType, byteSize, byteOffset } = descriptor;
		const name = tableTypeName(tableType);

		if (byteOffset + byteSize > blob.length) {
			throw new RuntimeDataError(
				"RANGE_OUT_OF_BOUNDS",
				`${name} table [${byteOffset}, ${byteOffset + byteSize}) exceeds blob of ${blob.length} bytes`,
				tableType,
			);
		}

		if (!isKnownTableType(tableType)) {
			const issue: RuntimeDataIssue = {
				code: "UNSUPPORTED_TABLE_TYPE",
				message: `Skipping table with unsupported type ${tableType}`,
				tableType,
			};
			warnings.push(issue);
			logger.warn(issue.message);
			continue;
		}

		if (tableType === TABLE_TYPE.INVALID) {
			throw new RuntimeDataError(
				"MALFORMED_HEADER",
				"Header contains a descriptor of type Invalid",
				tableType,
			);
		}

		if (seen.has(tableType)) {
			throw new RuntimeDataError(
				"DUPLICATE_TABLE",
				`Duplicate ${name} table in header`,
				tableType,
			);
		}
		seen.add(tableType);

		const bytes = windowOf(blob, byteOffset, byteSize);
		switch (tableType) {
			case TABLE_TYPE.STRING:
				windows.strings = bytes;
				break;
			case TABLE_TYPE.FUNCTION:
				windows.functions = bytes;
				break;
			case TABLE_TYPE.RESOURCE:
				windows.resources = bytes;
				break;
			case TABLE_TYPE.INDEX:
				windows.indices = bytes;
				break;
			default: {
				const _exhaustive: never = tableType;
				throw new Error(`Unknown table type: ${_exhaustive}`);
			}
		}
	}

	return windows;
}

/**
 * Decode a runtime data blob into zero-copy table readers
 *
 * Every structural problem (bad header, duplicate or out-of-range tables,
 * record size mismatches, malformed tables, dangling cross-references)
 * fails the whole decode. Tables of unknown type are skipped and reported
 * in `warnings`.
 *
 * @param blob - Runtime data blob; must stay unmodified while the result is in use
 * @param options - Decoding options
 * @returns Decoded tables, or the error that stopped decoding
 *
 * @example
 * const result = decodeRuntimeData(bytes);
 * if (!result.ok) throw result.error;
 * for (const fn of result.data.functions) console.log(fn.name());
 */
export function decodeRuntimeData(
	blob: Uint8Array,
	options: DecodeOptions = {},
): DecodeResult {
	const { logger = consoleLogger } = options;
	const warnings: RuntimeDataIssue[] = [];

	try {
		const descriptors = Object.freeze(readTableDescriptors(blob));
		const windows = collectWindows(blob, descriptors, logger, warnings);
		const context = new ResolutionContext(windows);
		validateCrossReferences(context);

		logger.debug?.(
			`Decoded ${context.functions.count()} functions and ${context.resources.count()} resources`,
		);

		const data: RuntimeData = Object.freeze({
			descriptors,
			context,
			strings: context.strings,
			indices: context.indices,
			resources: context.resources,
			functions: context.functions,
		});
		return { ok: true, data, warnings };
	} catch (error) {
		if (error instanceof RuntimeDataError) {
			return { ok: false, error };
		}
		throw error;
	}
}

/**
 * Decode a runtime data blob, throwing on failure
 *
 * @throws RuntimeDataError describing the first structural problem found
 */
export function decodeRuntimeDataOrThrow(
	blob: Uint8Array,
	options: DecodeOptions = {},
): RuntimeData {
	const result = decodeRuntimeData(blob, options);
	if (!result.ok) {
		throw result.error;
	}
	return result.data;
}
