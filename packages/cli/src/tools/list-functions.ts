/**
 * functions command handler for the rdat-inspect CLI.
 *
 * Lists every function record with its resolved resource and dependency
 * lists.
 */

import * as path from "node:path";
import type { FunctionView } from "@rdat-explorer/core";
import { describeFeatureFlags, formatFeatureFlags } from "@rdat-explorer/core";
import type { LoadedBlob } from "../blob-loader.js";
import { loadBlob } from "../blob-loader.js";
import type { CliConfig, OutputFormat } from "../config.js";
import { buildMarkdownTable } from "../formatters/markdown.js";
import { toYaml, toYamlFrontmatter } from "../formatters/yaml-formatter.js";
import { createCliLogger } from "../logger.js";

function describeFunction(fn: FunctionView): Record<string, unknown> {
	return {
		name: fn.unmangledName(),
		mangled_name: fn.name(),
		kind: fn.shaderKindName(),
		resources: [...fn.resources()].map((r) => r.name()),
		dependencies: [...fn.dependencies()],
		feature_flags: fn.featureFlag(),
		payload_size: fn.payloadSizeInBytes(),
		attribute_size: fn.attributeSizeInBytes(),
		shader_stage_flag: fn.shaderStageFlag(),
		min_shader_target: fn.minShaderTarget(),
	};
}

function formatFlagsCell(flags: bigint): string {
	const names = describeFeatureFlags(flags);
	return names.length > 0 ? names.join(", ") : formatFeatureFlags(flags);
}

/**
 * Format the function list.
 *
 * @param loaded - Decoded blob
 * @param format - yaml: one document; markdown: frontmatter + table
 */
export function formatFunctionList(
	loaded: LoadedBlob,
	format: OutputFormat,
): string {
	const functions = [...loaded.data.functions];
	const file = path.basename(loaded.blobPath);

	if (format === "yaml") {
		return toYaml({ file, functions: functions.map(describeFunction) });
	}

	const frontmatter = toYamlFrontmatter({
		file,
		function_count: functions.length,
	});

	if (functions.length === 0) {
		return `${frontmatter}\n(No functions)`;
	}

	const headers = ["Name", "Kind", "Resources", "Dependencies", "Feature Flags"];
	const rows = functions.map((fn) => [
		fn.unmangledName(),
		fn.shaderKindName(),
		[...fn.resources()].map((r) => r.name()).join(", "),
		[...fn.dependencies()].join(", "),
		formatFlagsCell(fn.featureFlag()),
	]);

	return `${frontmatter}\n${buildMarkdownTable(headers, rows)}`;
}

/**
 * Handle the functions command.
 *
 * @param blobPath - Path to the blob
 * @param config - CLI configuration
 * @returns Formatted output string
 */
export async function handleListFunctions(
	blobPath: string,
	config: CliConfig,
): Promise<string> {
	const loaded = await loadBlob(blobPath, createCliLogger(config.logLevel));
	return formatFunctionList(loaded, config.format);
}
