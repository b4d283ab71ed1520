import { FunctionTable } from "./tables/function-table";
import { IndexTable } from "./tables/index-table";
import { ResourceTable } from "./tables/resource-table";
import { StringTable } from "./tables/string-table";

/**
 * Byte windows of the four tables, each a sub-range of the same blob
 */
export interface TableWindows {
	strings: Uint8Array;
	indices: Uint8Array;
	resources: Uint8Array;
	functions: Uint8Array;
}

/**
 * The bundle of table readers every view resolves cross-references through.
 *
 * Views hold one reference to this object rather than one per table. The
 * context and its tables are frozen once built.
 */
export class ResolutionContext {
	readonly strings: StringTable;
	readonly indices: IndexTable;
	readonly resources: ResourceTable;
	readonly functions: FunctionTable;

	constructor(windows: TableWindows) {
		this.strings = new StringTable(windows.strings);
		Object.freeze(this.strings);
		this.indices = new IndexTable(windows.indices);
		Object.freeze(this.indices);
		this.resources = new ResourceTable(windows.resources, this);
		Object.freeze(this.resources);
		this.functions = new FunctionTable(windows.functions, this);
		Object.freeze(this.functions);
		Object.freeze(this);
	}
}
