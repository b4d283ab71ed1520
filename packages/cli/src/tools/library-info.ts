/**
 * info command handler for the rdat-inspect CLI.
 *
 * Returns metadata about a runtime data blob: the table layout from its
 * header and the function and per-class resource counts.
 */

import * as path from "node:path";
import { tableTypeName } from "@rdat-explorer/core";
import type { LoadedBlob } from "../blob-loader.js";
import { loadBlob } from "../blob-loader.js";
import type { CliConfig } from "../config.js";
import { toYaml } from "../formatters/yaml-formatter.js";
import { createCliLogger } from "../logger.js";

/**
 * Format blob metadata as a YAML document.
 */
export function formatLibraryInfo(loaded: LoadedBlob): string {
	const { data, warnings } = loaded;
	const { resources } = data;

	const metadata: Record<string, unknown> = {
		file: path.basename(loaded.blobPath),
		size_bytes: loaded.fileSizeBytes,
		tables: data.descriptors.map((d) => ({
			type: tableTypeName(d.tableType),
			size: d.byteSize,
			offset: d.byteOffset,
		})),
		functions: data.functions.count(),
		resources: {
			total: resources.count(),
			cbuffers: resources.getNumCBuffers(),
			samplers: resources.getNumSamplers(),
			srvs: resources.getNumSRVs(),
			uavs: resources.getNumUAVs(),
		},
		warnings: warnings.map((w) => w.message),
	};

	return toYaml(metadata);
}

/**
 * Handle the info command.
 *
 * @param blobPath - Path to the blob
 * @param config - CLI configuration
 * @returns YAML document with blob metadata
 */
export async function handleLibraryInfo(
	blobPath: string,
	config: CliConfig,
): Promise<string> {
	const loaded = await loadBlob(blobPath, createCliLogger(config.logLevel));
	return formatLibraryInfo(loaded);
}
