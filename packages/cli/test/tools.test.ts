import {
	decodeRuntimeData,
	RESOURCE_CLASS,
	RESOURCE_KIND,
	SHADER_KIND,
	silentLogger,
	TABLE_TYPE,
} from "@rdat-explorer/core";
import yaml from "js-yaml";
import { describe, expect, it } from "vitest";
import type { LoadedBlob } from "../src/blob-loader.js";
import { formatLibraryInfo } from "../src/tools/library-info.js";
import { formatFunctionList } from "../src/tools/list-functions.js";
import { formatResourceList } from "../src/tools/list-resources.js";
import {
	assembleBlob,
	buildBlob,
	StringTableBuilder,
} from "../../core/test/fixtures/blob-builder.js";

const LIBRARY_BLOB = buildBlob({
	resources: [
		{
			resourceClass: RESOURCE_CLASS.CBUFFER,
			name: "Globals",
			kind: RESOURCE_KIND.CBUFFER,
		},
		{
			resourceClass: RESOURCE_CLASS.SAMPLER,
			name: "Linear",
			kind: RESOURCE_KIND.SAMPLER,
		},
		{
			resourceClass: RESOURCE_CLASS.SRV,
			name: "Scene",
			kind: RESOURCE_KIND.RT_ACCELERATION_STRUCTURE,
			space: 2,
			lowerBound: 3,
		},
		{
			resourceClass: RESOURCE_CLASS.SRV,
			name: "Textures",
			kind: RESOURCE_KIND.TEXTURE_2D,
			id: 1,
			lowerBound: 0,
			upperBound: 0xffffffff,
		},
		{
			resourceClass: RESOURCE_CLASS.UAV,
			name: "Output",
			kind: RESOURCE_KIND.TEXTURE_2D,
			lowerBound: 1,
			upperBound: 2,
		},
	],
	functions: [
		{
			name: "\u0001?Miss@@YAXUPayload@@@Z",
			unmangledName: "Miss",
			shaderKind: SHADER_KIND.MISS,
			resources: [0, 2],
			dependencies: ["Shade"],
			payloadSizeInBytes: 20,
			featureInfo1: 0x4000,
		},
		{
			name: "Shade",
			shaderKind: SHADER_KIND.LIBRARY,
		},
	],
});

function loadedFrom(blob: Uint8Array): LoadedBlob {
	const result = decodeRuntimeData(blob, { logger: silentLogger });
	if (!result.ok) throw result.error;
	return {
		blobPath: "/blobs/library.rdat",
		bytes: blob,
		data: result.data,
		warnings: result.warnings,
		fileSizeBytes: blob.length,
	};
}

/** Split frontmatter output into its parsed YAML and the table's cell rows */
function parseListing(output: string): {
	front: unknown;
	rows: string[][];
} {
	const [, front = "", body = ""] = output.split("---\n");
	const rows = body
		.trim()
		.split("\n")
		.map((line) =>
			line
				.slice(1, -1)
				.split(" | ")
				.map((cell) => cell.trim()),
		);
	return { front: yaml.load(front), rows };
}

describe("formatLibraryInfo", () => {
	it("should summarize tables and counts", () => {
		const info = yaml.load(formatLibraryInfo(loadedFrom(LIBRARY_BLOB)));
		expect(info).toMatchObject({
			file: "library.rdat",
			size_bytes: LIBRARY_BLOB.length,
			functions: 2,
			resources: { total: 5, cbuffers: 1, samplers: 1, srvs: 2, uavs: 1 },
			warnings: [],
		});
		expect(info).toHaveProperty("tables.0", {
			type: "String",
			size: expect.any(Number),
			offset: 52,
		});
		expect(info).toHaveProperty("tables.3.type", "Index");
	});

	it("should list skipped tables as warnings", () => {
		const strings = new StringTableBuilder();
		strings.intern("x");
		const loaded = loadedFrom(
			assembleBlob([
				{ tableType: 9, bytes: new Uint8Array(4) },
				{ tableType: TABLE_TYPE.STRING, bytes: strings.bytes() },
			]),
		);
		const info = yaml.load(formatLibraryInfo(loaded));
		expect(info).toHaveProperty("tables.0.type", "Unknown(9)");
		expect(info).toHaveProperty("warnings", [
			"Skipping table with unsupported type 9",
		]);
		expect(loaded.warnings.map((w) => w.code)).toEqual([
			"UNSUPPORTED_TABLE_TYPE",
		]);
	});
});

describe("formatFunctionList", () => {
	it("should render one markdown row per function", () => {
		const { front, rows } = parseListing(
			formatFunctionList(loadedFrom(LIBRARY_BLOB), "markdown"),
		);
		expect(front).toEqual({ file: "library.rdat", function_count: 2 });
		expect(rows[0]).toEqual([
			"Name",
			"Kind",
			"Resources",
			"Dependencies",
			"Feature Flags",
		]);
		expect(rows[2]).toEqual([
			"Miss",
			"Miss",
			"Globals, Scene",
			"Shade",
			"WaveOps",
		]);
		expect(rows[3]).toEqual(["Shade", "Library", "", "", "0x0000000000000000"]);
	});

	it("should render a YAML document", () => {
		const doc = yaml.load(formatFunctionList(loadedFrom(LIBRARY_BLOB), "yaml"));
		expect(doc).toHaveProperty("functions.0", {
			name: "Miss",
			mangled_name: "\u0001?Miss@@YAXUPayload@@@Z",
			kind: "Miss",
			resources: ["Globals", "Scene"],
			dependencies: ["Shade"],
			feature_flags: "0x0000000000004000",
			payload_size: 20,
			attribute_size: 0,
			shader_stage_flag: 0,
			min_shader_target: 0,
		});
	});

	it("should note an empty function table", () => {
		const output = formatFunctionList(loadedFrom(buildBlob({})), "markdown");
		expect(output.endsWith("\n(No functions)")).toBe(true);
	});
});

describe("formatResourceList", () => {
	it("should list resources in table order with bind ranges", () => {
		const { front, rows } = parseListing(
			formatResourceList(loadedFrom(LIBRARY_BLOB), "markdown"),
		);
		expect(front).toEqual({
			file: "library.rdat",
			class: "all",
			resource_count: 5,
		});
		expect(rows.slice(2)).toEqual([
			["Globals", "CBuffer", "CBuffer", "0", "0", "0"],
			["Linear", "Sampler", "Sampler", "0", "0", "0"],
			["Scene", "SRV", "RTAccelerationStructure", "2", "3", "0"],
			["Textures", "SRV", "Texture2D", "0", "0..unbounded", "1"],
			["Output", "UAV", "Texture2D", "0", "1..2", "0"],
		]);
	});

	it("should filter by class", () => {
		const { front, rows } = parseListing(
			formatResourceList(loadedFrom(LIBRARY_BLOB), "markdown", "srv"),
		);
		expect(front).toEqual({
			file: "library.rdat",
			class: "srv",
			resource_count: 2,
		});
		expect(rows.slice(2).map((row) => row[0])).toEqual(["Scene", "Textures"]);
	});

	it("should report unbounded ranges in YAML", () => {
		const doc = yaml.load(
			formatResourceList(loadedFrom(LIBRARY_BLOB), "yaml", "srv"),
		);
		expect(doc).toHaveProperty("resources.1.upper_bound", "unbounded");
		expect(doc).toHaveProperty("resources.0.upper_bound", 3);
	});
});
