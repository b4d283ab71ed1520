import type { ResolutionContext } from "./context";
import { RuntimeDataError } from "./errors";
import { FUNCTION_FIELD, TABLE_TYPE } from "./format";

function checkStringOffset(
	context: ResolutionContext,
	offset: number,
	what: string,
): void {
	if (!context.strings.contains(offset)) {
		throw new RuntimeDataError(
			"RANGE_OUT_OF_BOUNDS",
			`${what} string offset ${offset} outside string table of ${context.strings.size} bytes`,
			TABLE_TYPE.STRING,
		);
	}
}

/**
 * Check every cross-table reference held by the resource and function records
 *
 * After this passes, every view the context hands out resolves without
 * touching bytes outside its target table.
 *
 * @param context - Freshly built context
 * @throws RuntimeDataError (RANGE_OUT_OF_BOUNDS) if a record references past the end of a table
 * @throws RuntimeDataError (MALFORMED_TABLE) if a referenced index row overruns the index table
 */
export function validateCrossReferences(context: ResolutionContext): void {
	for (const resource of context.resources) {
		checkStringOffset(
			context,
			resource.nameOffset(),
			`Resource ${resource.index} name`,
		);
	}

	const resourceCount = context.resources.count();
	for (let i = 0; i < context.functions.count(); i++) {
		const fn = context.functions.get(i);
		const label = `Function ${i}`;

		checkStringOffset(
			context,
			context.functions.field(i, FUNCTION_FIELD.NAME),
			`${label} name`,
		);
		checkStringOffset(
			context,
			context.functions.field(i, FUNCTION_FIELD.UNMANGLED_NAME),
			`${label} unmangled name`,
		);

		const resources = fn.resourceList();
		if (resources !== null) {
			for (const index of resources.row) {
				if (index >= resourceCount) {
					throw new RuntimeDataError(
						"RANGE_OUT_OF_BOUNDS",
						`${label} references resource ${index} but the resource table has ${resourceCount} records`,
						TABLE_TYPE.RESOURCE,
					);
				}
			}
		}

		const dependencies = fn.dependencyList();
		if (dependencies !== null) {
			for (const offset of dependencies.row) {
				checkStringOffset(context, offset, `${label} dependency`);
			}
		}
	}
}
