import type { ResolutionContext } from "../context";
import { RuntimeDataError } from "../errors";
import type { ResourceClass, ResourceField } from "../format";
import {
	isResourceClass,
	RESOURCE_CLASS_NAMES,
	RESOURCE_FIELD,
	resourceKindName,
	TABLE_TYPE,
} from "../format";

/** Upper bound value marking an unbounded resource array */
export const UNBOUNDED = 0xffffffff;

/**
 * Lightweight handle on one resource record.
 *
 * Fields are read from the blob on each call; the name is resolved through
 * the context's string table.
 */
export class ResourceView {
	constructor(
		private readonly context: ResolutionContext,
		/** Index of the record in the resource table */
		readonly index: number,
	) {}

	private field(field: ResourceField): number {
		return this.context.resources.field(this.index, field);
	}

	resourceClass(): ResourceClass {
		const cls = this.field(RESOURCE_FIELD.CLASS);
		if (!isResourceClass(cls)) {
			throw new RuntimeDataError(
				"MALFORMED_TABLE",
				`Resource ${this.index} has unknown class ${cls}`,
				TABLE_TYPE.RESOURCE,
			);
		}
		return cls;
	}

	className(): string {
		return RESOURCE_CLASS_NAMES[this.resourceClass()];
	}

	kind(): number {
		return this.field(RESOURCE_FIELD.KIND);
	}

	kindName(): string {
		return resourceKindName(this.kind());
	}

	/** Id of the resource within its class */
	id(): number {
		return this.field(RESOURCE_FIELD.ID);
	}

	space(): number {
		return this.field(RESOURCE_FIELD.SPACE);
	}

	lowerBound(): number {
		return this.field(RESOURCE_FIELD.LOWER_BOUND);
	}

	upperBound(): number {
		return this.field(RESOURCE_FIELD.UPPER_BOUND);
	}

	/**
	 * Number of bind slots the resource occupies, or null for an unbounded array
	 */
	bindCount(): number | null {
		const upper = this.upperBound();
		if (upper === UNBOUNDED) return null;
		return upper - this.lowerBound() + 1;
	}

	flags(): number {
		return this.field(RESOURCE_FIELD.FLAGS);
	}

	/** Byte offset of the name in the string table */
	nameOffset(): number {
		return this.field(RESOURCE_FIELD.NAME);
	}

	name(): string {
		return this.context.strings.get(this.nameOffset());
	}

	/** Name bytes without the terminator, as a view into the blob */
	nameBytes(): Uint8Array {
		return this.context.strings.getBytes(this.nameOffset());
	}
}
