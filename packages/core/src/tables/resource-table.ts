import { readRecordWord, viewOf } from "../binary";
import type { ResolutionContext } from "../context";
import { assertIndex, RuntimeDataError } from "../errors";
import type { ResourceClass, ResourceField } from "../format";
import {
	isResourceClass,
	RESOURCE_CLASS,
	RESOURCE_CLASS_NAMES,
	RESOURCE_CLASS_ORDER,
	RESOURCE_FIELD,
	RESOURCE_RECORD_SIZE,
	TABLE_TYPE,
} from "../format";
import { ResourceView } from "../views/resource-view";

type ClassCounts = Record<ResourceClass, number>;

function emptyCounts(): ClassCounts {
	return {
		[RESOURCE_CLASS.SRV]: 0,
		[RESOURCE_CLASS.UAV]: 0,
		[RESOURCE_CLASS.CBUFFER]: 0,
		[RESOURCE_CLASS.SAMPLER]: 0,
	};
}

/**
 * Reader over the resource table: fixed-size resource records grouped by
 * class in the order CBuffer, Sampler, SRV, UAV.
 *
 * Construction scans the records once to tally the per-class counts; an
 * unknown class or a record outside its class group fails the scan.
 *
 * @example
 * const srv = resources.getSRV(0);
 * srv.name(); // "albedo"
 */
export class ResourceTable {
	private readonly view: DataView;
	private readonly total: number;
	private readonly counts: ClassCounts;
	private readonly bases: ClassCounts;

	/**
	 * @param bytes - Window of the blob holding the records
	 * @param context - Context handed to every view this table creates
	 * @throws RuntimeDataError (RECORD_SIZE_MISMATCH) if the size is not a whole number of records
	 * @throws RuntimeDataError (MALFORMED_TABLE) on an unknown class or a grouping violation
	 */
	constructor(
		bytes: Uint8Array,
		private readonly context: ResolutionContext,
	) {
		if (bytes.length % RESOURCE_RECORD_SIZE !== 0) {
			throw new RuntimeDataError(
				"RECORD_SIZE_MISMATCH",
				`Resource table size ${bytes.length} is not a multiple of ${RESOURCE_RECORD_SIZE}`,
				TABLE_TYPE.RESOURCE,
			);
		}
		this.view = viewOf(bytes);
		this.total = bytes.length / RESOURCE_RECORD_SIZE;

		const counts = emptyCounts();
		let lastRank = 0;
		for (let i = 0; i < this.total; i++) {
			const cls = readRecordWord(
				this.view,
				RESOURCE_RECORD_SIZE,
				i,
				RESOURCE_FIELD.CLASS,
			);
			if (!isResourceClass(cls)) {
				throw new RuntimeDataError(
					"MALFORMED_TABLE",
					`Resource ${i} has unknown class ${cls}`,
					TABLE_TYPE.RESOURCE,
				);
			}
			const rank = RESOURCE_CLASS_ORDER.indexOf(cls);
			if (rank < lastRank) {
				throw new RuntimeDataError(
					"MALFORMED_TABLE",
					`Resource ${i} (${RESOURCE_CLASS_NAMES[cls]}) is out of class group order`,
					TABLE_TYPE.RESOURCE,
				);
			}
			lastRank = rank;
			counts[cls]++;
		}
		this.counts = counts;

		const bases = emptyCounts();
		let base = 0;
		for (const cls of RESOURCE_CLASS_ORDER) {
			bases[cls] = base;
			base += counts[cls];
		}
		this.bases = bases;
	}

	/** Total number of resource records */
	count(): number {
		return this.total;
	}

	/** Number of records of one class */
	countOf(cls: ResourceClass): number {
		return this.counts[cls];
	}

	/** View of the record at table index `i` */
	get(i: number): ResourceView {
		assertIndex(i, this.total, "Resource");
		return new ResourceView(this.context, i);
	}

	/**
	 * View of the `i`-th record of a class
	 *
	 * @param cls - Resource class
	 * @param i - Index within the class group
	 */
	getByClass(cls: ResourceClass, i: number): ResourceView {
		assertIndex(i, this.counts[cls], `${RESOURCE_CLASS_NAMES[cls]} resource`);
		return this.get(this.bases[cls] + i);
	}

	getNumCBuffers(): number {
		return this.countOf(RESOURCE_CLASS.CBUFFER);
	}

	getCBuffer(i: number): ResourceView {
		return this.getByClass(RESOURCE_CLASS.CBUFFER, i);
	}

	getNumSamplers(): number {
		return this.countOf(RESOURCE_CLASS.SAMPLER);
	}

	getSampler(i: number): ResourceView {
		return this.getByClass(RESOURCE_CLASS.SAMPLER, i);
	}

	getNumSRVs(): number {
		return this.countOf(RESOURCE_CLASS.SRV);
	}

	getSRV(i: number): ResourceView {
		return this.getByClass(RESOURCE_CLASS.SRV, i);
	}

	getNumUAVs(): number {
		return this.countOf(RESOURCE_CLASS.UAV);
	}

	getUAV(i: number): ResourceView {
		return this.getByClass(RESOURCE_CLASS.UAV, i);
	}

	*[Symbol.iterator](): Iterator<ResourceView> {
		for (let i = 0; i < this.total; i++) {
			yield this.get(i);
		}
	}

	/** Raw u32 field of record `i` */
	field(i: number, field: ResourceField): number {
		assertIndex(i, this.total, "Resource");
		return readRecordWord(this.view, RESOURCE_RECORD_SIZE, i, field);
	}
}
