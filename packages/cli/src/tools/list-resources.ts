/**
 * resources command handler for the rdat-inspect CLI.
 *
 * Lists resource records in table order (CBuffer, Sampler, SRV, UAV),
 * optionally restricted to one class.
 */

import * as path from "node:path";
import type { ResourceClass, ResourceView } from "@rdat-explorer/core";
import { RESOURCE_CLASS } from "@rdat-explorer/core";
import type { LoadedBlob } from "../blob-loader.js";
import { loadBlob } from "../blob-loader.js";
import type { CliConfig, OutputFormat, ResourceClassFilter } from "../config.js";
import { buildMarkdownTable } from "../formatters/markdown.js";
import { toYaml, toYamlFrontmatter } from "../formatters/yaml-formatter.js";
import { createCliLogger } from "../logger.js";

const FILTER_CLASSES: Record<ResourceClassFilter, ResourceClass> = {
	cbuffer: RESOURCE_CLASS.CBUFFER,
	sampler: RESOURCE_CLASS.SAMPLER,
	srv: RESOURCE_CLASS.SRV,
	uav: RESOURCE_CLASS.UAV,
};

/**
 * Render a register range: `3`, `3..5` or `3..unbounded`.
 */
export function formatBindRange(resource: ResourceView): string {
	const lower = resource.lowerBound();
	if (resource.bindCount() === null) return `${lower}..unbounded`;
	const upper = resource.upperBound();
	return upper === lower ? String(lower) : `${lower}..${upper}`;
}

function selectResources(
	loaded: LoadedBlob,
	classFilter: ResourceClassFilter | undefined,
): ResourceView[] {
	const { resources } = loaded.data;
	if (classFilter === undefined) return [...resources];
	const cls = FILTER_CLASSES[classFilter];
	const selected: ResourceView[] = [];
	for (let i = 0; i < resources.countOf(cls); i++) {
		selected.push(resources.getByClass(cls, i));
	}
	return selected;
}

/**
 * Format the resource list.
 *
 * @param loaded - Decoded blob
 * @param format - yaml: one document; markdown: frontmatter + table
 * @param classFilter - Only list resources of this class
 */
export function formatResourceList(
	loaded: LoadedBlob,
	format: OutputFormat,
	classFilter?: ResourceClassFilter,
): string {
	const resources = selectResources(loaded, classFilter);
	const file = path.basename(loaded.blobPath);

	if (format === "yaml") {
		return toYaml({
			file,
			resources: resources.map((r) => ({
				name: r.name(),
				class: r.className(),
				kind: r.kindName(),
				id: r.id(),
				space: r.space(),
				lower_bound: r.lowerBound(),
				upper_bound: r.bindCount() === null ? "unbounded" : r.upperBound(),
				flags: r.flags(),
			})),
		});
	}

	const frontmatter = toYamlFrontmatter({
		file,
		class: classFilter ?? "all",
		resource_count: resources.length,
	});

	if (resources.length === 0) {
		return `${frontmatter}\n(No resources)`;
	}

	const headers = ["Name", "Class", "Kind", "Space", "Bind", "ID"];
	const rows = resources.map((r) => [
		r.name(),
		r.className(),
		r.kindName(),
		String(r.space()),
		formatBindRange(r),
		String(r.id()),
	]);

	return `${frontmatter}\n${buildMarkdownTable(headers, rows, { alignRight: [3, 5] })}`;
}

/**
 * Handle the resources command.
 *
 * @param blobPath - Path to the blob
 * @param config - CLI configuration
 * @returns Formatted output string
 */
export async function handleListResources(
	blobPath: string,
	config: CliConfig,
): Promise<string> {
	const loaded = await loadBlob(blobPath, createCliLogger(config.logLevel));
	return formatResourceList(loaded, config.format, config.classFilter);
}
