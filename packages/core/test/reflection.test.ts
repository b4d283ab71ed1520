import { describe, expect, it } from "vitest";
import { RuntimeDataError } from "../src/errors";
import { RESOURCE_CLASS, RESOURCE_KIND, SHADER_KIND } from "../src/format";
import { silentLogger } from "../src/logger";
import { RuntimeDataReflection } from "../src/reflection";
import { buildBlob } from "./fixtures/blob-builder";

const LIBRARY_BLOB = buildBlob({
	resources: [
		{
			resourceClass: RESOURCE_CLASS.CBUFFER,
			name: "Globals",
			kind: RESOURCE_KIND.CBUFFER,
		},
		{
			resourceClass: RESOURCE_CLASS.SRV,
			name: "Scene",
			kind: RESOURCE_KIND.RT_ACCELERATION_STRUCTURE,
			space: 2,
			lowerBound: 3,
			upperBound: 3,
		},
	],
	functions: [
		{
			name: "\u0001?Miss@@YAXUPayload@@@Z",
			unmangledName: "Miss",
			shaderKind: SHADER_KIND.MISS,
			resources: [0, 1],
			dependencies: ["Shade"],
			payloadSizeInBytes: 20,
			featureInfo1: 0x4000,
		},
		{
			name: "Shade",
			shaderKind: SHADER_KIND.LIBRARY,
			resources: [1],
		},
	],
});

describe("RuntimeDataReflection", () => {
	it("should refuse access before initialization", () => {
		const reflection = new RuntimeDataReflection({ logger: silentLogger });
		expect(reflection.initialized).toBe(false);
		try {
			reflection.getLibraryReflection();
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(RuntimeDataError);
			if (error instanceof RuntimeDataError) {
				expect(error.code).toBe("UNINITIALIZED_ACCESS");
			}
		}
	});

	it("should materialize functions and resources", () => {
		const reflection = new RuntimeDataReflection({ logger: silentLogger });
		expect(reflection.initFromRdat(LIBRARY_BLOB).ok).toBe(true);
		const library = reflection.getLibraryReflection();

		expect(library.resources).toEqual([
			{
				resourceClass: RESOURCE_CLASS.CBUFFER,
				kind: RESOURCE_KIND.CBUFFER,
				id: 0,
				space: 0,
				lowerBound: 0,
				upperBound: 0,
				name: "Globals",
				flags: 0,
			},
			{
				resourceClass: RESOURCE_CLASS.SRV,
				kind: RESOURCE_KIND.RT_ACCELERATION_STRUCTURE,
				id: 0,
				space: 2,
				lowerBound: 3,
				upperBound: 3,
				name: "Scene",
				flags: 0,
			},
		]);

		const [miss, shade] = library.functions;
		expect(miss?.name).toBe("\u0001?Miss@@YAXUPayload@@@Z");
		expect(miss?.unmangledName).toBe("Miss");
		expect(miss?.shaderKind).toBe(SHADER_KIND.MISS);
		expect(miss?.payloadSizeInBytes).toBe(20);
		expect(miss?.featureFlags).toBe(0x4000n);
		expect(miss?.dependencies).toEqual(["Shade"]);
		expect(miss?.resources.map((r) => r.name)).toEqual(["Globals", "Scene"]);
		expect(shade?.dependencies).toEqual([]);
	});

	it("should share resource objects between functions", () => {
		const reflection = new RuntimeDataReflection({ logger: silentLogger });
		reflection.initFromRdat(LIBRARY_BLOB);
		const library = reflection.getLibraryReflection();
		const scene = library.resources[1];
		expect(library.functions[0]?.resources[1]).toBe(scene);
		expect(library.functions[1]?.resources[0]).toBe(scene);
	});

	it("should stay usable after the blob is overwritten", () => {
		const blob = LIBRARY_BLOB.slice();
		const reflection = new RuntimeDataReflection({ logger: silentLogger });
		reflection.initFromRdat(blob);
		blob.fill(0);
		expect(reflection.getLibraryReflection().resources[0]?.name).toBe("Globals");
	});

	it("should drop an earlier library when a later decode fails", () => {
		const reflection = new RuntimeDataReflection({ logger: silentLogger });
		reflection.initFromRdat(LIBRARY_BLOB);
		const result = reflection.initFromRdat(new Uint8Array([1]));
		expect(result.ok).toBe(false);
		expect(reflection.initialized).toBe(false);
		expect(() => reflection.getLibraryReflection()).toThrow(
			"Library reflection requested before runtime data was decoded",
		);
	});
});
