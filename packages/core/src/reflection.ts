/**
 * Owned library reflection built from decoded runtime data.
 *
 * Unlike the views, the descriptors produced here are plain objects that no
 * longer reference the blob, so they can be kept after the buffer is
 * released or handed to code that knows nothing about the table encoding.
 */

import type { DecodeOptions, DecodeResult, RuntimeData } from "./decoder";
import { decodeRuntimeData } from "./decoder";
import { RuntimeDataError } from "./errors";
import type { ResourceClass } from "./format";
import type { StringTable } from "./tables/string-table";
import type { FunctionView } from "./views/function-view";
import type { ResourceView } from "./views/resource-view";

/**
 * Owned copy of a resource record
 */
export interface ResourceDesc {
	resourceClass: ResourceClass;
	kind: number;
	/** Id of the resource within its class */
	id: number;
	space: number;
	lowerBound: number;
	upperBound: number;
	name: string;
	flags: number;
}

/**
 * Owned copy of a function record with its lists resolved
 */
export interface FunctionDesc {
	name: string;
	unmangledName: string;
	/** Entries are shared with {@link LibraryDesc.resources} */
	resources: readonly ResourceDesc[];
	/** Names of the functions this function depends on */
	dependencies: readonly string[];
	shaderKind: number;
	/** Payload size for hit/miss shaders, parameter size for callable shaders */
	payloadSizeInBytes: number;
	attributeSizeInBytes: number;
	featureInfo1: number;
	featureInfo2: number;
	/** 64-bit combination of featureInfo1 (low) and featureInfo2 (high) */
	featureFlags: bigint;
	shaderStageFlag: number;
	minShaderTarget: number;
}

/**
 * Everything a runtime data blob describes
 */
export interface LibraryDesc {
	functions: readonly FunctionDesc[];
	resources: readonly ResourceDesc[];
}

/** Decodes each string table offset once and hands back the same string */
class StringInterner {
	private readonly cache = new Map<number, string>();

	constructor(private readonly strings: StringTable) {}

	get(offset: number): string {
		let value = this.cache.get(offset);
		if (value === undefined) {
			value = this.strings.get(offset);
			this.cache.set(offset, value);
		}
		return value;
	}
}

function toResourceDesc(
	view: ResourceView,
	interner: StringInterner,
): ResourceDesc {
	return {
		resourceClass: view.resourceClass(),
		kind: view.kind(),
		id: view.id(),
		space: view.space(),
		lowerBound: view.lowerBound(),
		upperBound: view.upperBound(),
		name: interner.get(view.nameOffset()),
		flags: view.flags(),
	};
}

function toFunctionDesc(
	view: FunctionView,
	resources: readonly ResourceDesc[],
	interner: StringInterner,
): FunctionDesc {
	const resourceList = view.resourceList();
	const functionResources: ResourceDesc[] = [];
	if (resourceList !== null) {
		for (const index of resourceList.row) {
			const resource = resources[index];
			if (resource === undefined) {
				throw new RuntimeDataError(
					"RANGE_OUT_OF_BOUNDS",
					`Function ${view.index} references resource ${index} of ${resources.length}`,
				);
			}
			functionResources.push(resource);
		}
	}

	const dependencyList = view.dependencyList();
	const dependencies =
		dependencyList === null
			? []
			: dependencyList.row.toArray().map((offset) => interner.get(offset));

	return {
		name: view.name(),
		unmangledName: view.unmangledName(),
		resources: functionResources,
		dependencies,
		shaderKind: view.shaderKind(),
		payloadSizeInBytes: view.payloadSizeInBytes(),
		attributeSizeInBytes: view.attributeSizeInBytes(),
		featureInfo1: view.featureInfo1(),
		featureInfo2: view.featureInfo2(),
		featureFlags: view.featureFlag(),
		shaderStageFlag: view.shaderStageFlag(),
		minShaderTarget: view.minShaderTarget(),
	};
}

/**
 * Materialize decoded runtime data into owned descriptors
 *
 * @param data - Successfully decoded runtime data
 * @returns Library descriptor; function resources point at entries of `resources`
 */
export function buildLibraryDesc(data: RuntimeData): LibraryDesc {
	const interner = new StringInterner(data.strings);
	const resources = [...data.resources].map((view) =>
		toResourceDesc(view, interner),
	);
	const functions = [...data.functions].map((view) =>
		toFunctionDesc(view, resources, interner),
	);
	return { functions, resources };
}

/**
 * Stateful reflection over one runtime data blob.
 *
 * @example
 * const reflection = new RuntimeDataReflection();
 * if (reflection.initFromRdat(bytes).ok) {
 *   const library = reflection.getLibraryReflection();
 * }
 */
export class RuntimeDataReflection {
	private library: LibraryDesc | null = null;

	constructor(private readonly options: DecodeOptions = {}) {}

	/**
	 * Decode `blob` and build the library descriptor. A failed decode leaves
	 * the reflection uninitialized, discarding any earlier library.
	 */
	initFromRdat(blob: Uint8Array): DecodeResult {
		this.library = null;
		const result = decodeRuntimeData(blob, this.options);
		if (result.ok) {
			this.library = buildLibraryDesc(result.data);
		}
		return result;
	}

	get initialized(): boolean {
		return this.library !== null;
	}

	/**
	 * @throws RuntimeDataError (UNINITIALIZED_ACCESS) before a successful initFromRdat
	 */
	getLibraryReflection(): LibraryDesc {
		if (this.library === null) {
			throw new RuntimeDataError(
				"UNINITIALIZED_ACCESS",
				"Library reflection requested before runtime data was decoded",
			);
		}
		return this.library;
	}
}
