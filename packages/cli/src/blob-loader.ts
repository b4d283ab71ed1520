/**
 * Blob loader for the rdat-inspect CLI.
 *
 * Reads a runtime data blob from disk and decodes it.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type {
	RuntimeData,
	RuntimeDataIssue,
	RuntimeDataLogger,
} from "@rdat-explorer/core";
import { decodeRuntimeData } from "@rdat-explorer/core";

export interface LoadedBlob {
	/** Absolute blob path */
	blobPath: string;
	/** Blob bytes; the decoded tables are windows over these */
	bytes: Uint8Array;
	data: RuntimeData;
	/** Non-fatal decode findings */
	warnings: RuntimeDataIssue[];
	/** File size in bytes */
	fileSizeBytes: number;
}

/**
 * Load and decode a runtime data blob.
 *
 * @param blobPath - Absolute or relative path to the blob
 * @param logger - Decoder logger
 * @returns Decoded blob
 * @throws Error if the file cannot be read or does not decode; the decode
 *   error is attached as `cause`
 */
export async function loadBlob(
	blobPath: string,
	logger: RuntimeDataLogger,
): Promise<LoadedBlob> {
	const absolutePath = path.isAbsolute(blobPath)
		? blobPath
		: path.resolve(process.cwd(), blobPath);

	const buffer = await fs.readFile(absolutePath);
	const bytes = new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);

	const result = decodeRuntimeData(bytes, { logger });
	if (!result.ok) {
		throw new Error(
			`Failed to decode ${absolutePath}: ${result.error.message}`,
			{ cause: result.error },
		);
	}

	return {
		blobPath: absolutePath,
		bytes,
		data: result.data,
		warnings: result.warnings,
		fileSizeBytes: bytes.byteLength,
	};
}
