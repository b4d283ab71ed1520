import type { ResolutionContext } from "../context";
import { assertIndex, RuntimeDataError } from "../errors";
import { combineFeatureFlags } from "../feature-flags";
import type { FunctionField } from "../format";
import { FUNCTION_FIELD, shaderKindName } from "../format";
import type { ResourceIndexList, StringRefList } from "../tables/index-table";
import type { ResourceView } from "./resource-view";

/**
 * Lightweight handle on one function record.
 *
 * Scalar fields are read straight from the record. The resource and
 * dependency lists are rows of the index table: resource rows hold resource
 * table indices, dependency rows hold string table offsets.
 *
 * @example
 * const fn = functions.get(0);
 * for (const res of fn.resources()) console.log(res.name());
 * fn.dependency(0); // "helper"
 */
export class FunctionView {
	constructor(
		private readonly context: ResolutionContext,
		/** Index of the record in the function table */
		readonly index: number,
	) {}

	private field(field: FunctionField): number {
		return this.context.functions.field(this.index, field);
	}

	name(): string {
		return this.context.strings.get(this.field(FUNCTION_FIELD.NAME));
	}

	unmangledName(): string {
		return this.context.strings.get(this.field(FUNCTION_FIELD.UNMANGLED_NAME));
	}

	shaderKind(): number {
		return this.field(FUNCTION_FIELD.SHADER_KIND);
	}

	shaderKindName(): string {
		return shaderKindName(this.shaderKind());
	}

	/** The function's resource row, or null when it references no resources */
	resourceList(): ResourceIndexList | null {
		const rowRef = this.context.functions.resourcesRow(this.index);
		return rowRef === null ? null : this.context.indices.resourceIndexList(rowRef);
	}

	resourceCount(): number {
		return this.resourceList()?.count ?? 0;
	}

	/** The `i`-th resource the function references */
	resource(i: number): ResourceView {
		const list = this.resourceList();
		if (list === null) {
			throw new RuntimeDataError(
				"INDEX_OUT_OF_RANGE",
				`Function ${this.index} references no resources`,
			);
		}
		assertIndex(i, list.count, "Function resource");
		return this.context.resources.get(list.resourceIndexAt(i));
	}

	*resources(): Generator<ResourceView> {
		const count = this.resourceCount();
		for (let i = 0; i < count; i++) {
			yield this.resource(i);
		}
	}

	/** The function's dependency row, or null when it has no dependencies */
	dependencyList(): StringRefList | null {
		const rowRef = this.context.functions.dependenciesRow(this.index);
		return rowRef === null ? null : this.context.indices.stringRefList(rowRef);
	}

	dependencyCount(): number {
		return this.dependencyList()?.count ?? 0;
	}

	/** String table offset of the `i`-th dependency name */
	dependencyOffset(i: number): number {
		const list = this.dependencyList();
		if (list === null) {
			throw new RuntimeDataError(
				"INDEX_OUT_OF_RANGE",
				`Function ${this.index} has no dependencies`,
			);
		}
		assertIndex(i, list.count, "Function dependency");
		return list.stringOffsetAt(i);
	}

	/** Name of the `i`-th function this function depends on */
	dependency(i: number): string {
		return this.context.strings.get(this.dependencyOffset(i));
	}

	*dependencies(): Generator<string> {
		const count = this.dependencyCount();
		for (let i = 0; i < count; i++) {
			yield this.dependency(i);
		}
	}

	/** The 64-bit feature mask */
	featureFlag(): bigint {
		return combineFeatureFlags(this.featureInfo1(), this.featureInfo2());
	}

	/** Low 32 bits of the feature mask */
	featureInfo1(): number {
		return this.field(FUNCTION_FIELD.FEATURE_INFO_1);
	}

	/** High 32 bits of the feature mask */
	featureInfo2(): number {
		return this.field(FUNCTION_FIELD.FEATURE_INFO_2);
	}

	/** Payload size of hit, miss and closest-hit shaders */
	payloadSizeInBytes(): number {
		return this.field(FUNCTION_FIELD.PAYLOAD_SIZE);
	}

	/**
	 * Parameter size of callable shaders. Stored in the same field as the
	 * payload size; the shader kind says which meaning applies.
	 */
	parameterSizeInBytes(): number {
		return this.field(FUNCTION_FIELD.PAYLOAD_SIZE);
	}

	/** Attribute size of closest-hit and any-hit shaders */
	attributeSizeInBytes(): number {
		return this.field(FUNCTION_FIELD.ATTRIBUTE_SIZE);
	}

	shaderStageFlag(): number {
		return this.field(FUNCTION_FIELD.SHADER_STAGE_FLAG);
	}

	minShaderTarget(): number {
		return this.field(FUNCTION_FIELD.MIN_SHADER_TARGET);
	}
}
