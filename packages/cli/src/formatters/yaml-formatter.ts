/**
 * YAML formatter for the rdat-inspect CLI.
 *
 * Renders metadata objects as YAML documents or YAML frontmatter blocks.
 * Uses js-yaml for serialization; 64-bit feature masks are written as
 * fixed-width hex strings.
 */

import { formatFeatureFlags } from "@rdat-explorer/core";
import yaml from "js-yaml";

function replaceBigInt(_key: string, value: unknown): unknown {
	return typeof value === "bigint" ? formatFeatureFlags(value) : value;
}

/**
 * Serialize a metadata object as a YAML document.
 *
 * @param data - Object to serialize
 * @returns YAML string
 */
export function toYaml(data: Record<string, unknown>): string {
	return yaml.dump(data, {
		indent: 2,
		lineWidth: 120,
		noRefs: true,
		sortKeys: false,
		replacer: replaceBigInt,
	});
}

/**
 * Wrap a metadata object in YAML frontmatter delimiters.
 *
 * @param data - Object to serialize as frontmatter
 * @returns YAML frontmatter block (---\n...\n---\n)
 */
export function toYamlFrontmatter(data: Record<string, unknown>): string {
	return `---\n${toYaml(data)}---\n`;
}
