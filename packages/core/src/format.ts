/**
 * Wire-level constants of the runtime data (RDAT) container.
 *
 * Every integer in the container is a little-endian u32. The header is a
 * table count followed by that many 12-byte table descriptors; each table
 * lives in its own byte range of the same blob.
 */

/**
 * Table type tags stored in a table descriptor.
 */
export const TABLE_TYPE = {
	INVALID: 0,
	STRING: 1,
	FUNCTION: 2,
	RESOURCE: 3,
	INDEX: 4,
} as const;

/** Known table type values */
export type TableType = (typeof TABLE_TYPE)[keyof typeof TABLE_TYPE];

/**
 * Resource class values, as encoded in a resource record.
 *
 * Note that the numeric order is not the order in which the resource table
 * groups its records (see {@link RESOURCE_CLASS_ORDER}).
 */
export const RESOURCE_CLASS = {
	SRV: 0,
	UAV: 1,
	CBUFFER: 2,
	SAMPLER: 3,
} as const;

/** Resource class values */
export type ResourceClass = (typeof RESOURCE_CLASS)[keyof typeof RESOURCE_CLASS];

/** Order in which resource records are grouped inside the resource table */
export const RESOURCE_CLASS_ORDER: readonly ResourceClass[] = [
	RESOURCE_CLASS.CBUFFER,
	RESOURCE_CLASS.SAMPLER,
	RESOURCE_CLASS.SRV,
	RESOURCE_CLASS.UAV,
];

/** Display names for resource classes */
export const RESOURCE_CLASS_NAMES: Record<ResourceClass, string> = {
	[RESOURCE_CLASS.SRV]: "SRV",
	[RESOURCE_CLASS.UAV]: "UAV",
	[RESOURCE_CLASS.CBUFFER]: "CBuffer",
	[RESOURCE_CLASS.SAMPLER]: "Sampler",
};

/**
 * Resource kind values (dimension / buffer flavour of a resource).
 */
export const RESOURCE_KIND = {
	INVALID: 0,
	TEXTURE_1D: 1,
	TEXTURE_2D: 2,
	TEXTURE_2D_MS: 3,
	TEXTURE_3D: 4,
	TEXTURE_CUBE: 5,
	TEXTURE_1D_ARRAY: 6,
	TEXTURE_2D_ARRAY: 7,
	TEXTURE_2D_MS_ARRAY: 8,
	TEXTURE_CUBE_ARRAY: 9,
	TYPED_BUFFER: 10,
	RAW_BUFFER: 11,
	STRUCTURED_BUFFER: 12,
	CBUFFER: 13,
	SAMPLER: 14,
	TBUFFER: 15,
	RT_ACCELERATION_STRUCTURE: 16,
} as const;

const RESOURCE_KIND_NAMES: readonly string[] = [
	"Invalid",
	"Texture1D",
	"Texture2D",
	"Texture2DMS",
	"Texture3D",
	"TextureCube",
	"Texture1DArray",
	"Texture2DArray",
	"Texture2DMSArray",
	"TextureCubeArray",
	"TypedBuffer",
	"RawBuffer",
	"StructuredBuffer",
	"CBuffer",
	"Sampler",
	"TBuffer",
	"RTAccelerationStructure",
];

/**
 * Shader kind values stored in a function record.
 */
export const SHADER_KIND = {
	PIXEL: 0,
	VERTEX: 1,
	GEOMETRY: 2,
	HULL: 3,
	DOMAIN: 4,
	COMPUTE: 5,
	LIBRARY: 6,
	RAY_GENERATION: 7,
	INTERSECTION: 8,
	ANY_HIT: 9,
	CLOSEST_HIT: 10,
	MISS: 11,
	CALLABLE: 12,
	INVALID: 13,
} as const;

const SHADER_KIND_NAMES: readonly string[] = [
	"Pixel",
	"Vertex",
	"Geometry",
	"Hull",
	"Domain",
	"Compute",
	"Library",
	"RayGeneration",
	"Intersection",
	"AnyHit",
	"ClosestHit",
	"Miss",
	"Callable",
	"Invalid",
];

/** Size in bytes of one table descriptor (tableType, size, offset) */
export const TABLE_DESCRIPTOR_SIZE = 12;

/** Size in bytes of one resource record (8 x u32) */
export const RESOURCE_RECORD_SIZE = 32;

/** Size in bytes of one function record (11 x u32) */
export const FUNCTION_RECORD_SIZE = 44;

/** Row reference value meaning "no row" in a function record */
export const ABSENT_ROW = 0xffffffff;

/**
 * Word offsets of the fields inside a resource record
 */
export const RESOURCE_FIELD = {
	CLASS: 0,
	KIND: 1,
	ID: 2,
	SPACE: 3,
	LOWER_BOUND: 4,
	UPPER_BOUND: 5,
	NAME: 6,
	FLAGS: 7,
} as const;

export type ResourceField = (typeof RESOURCE_FIELD)[keyof typeof RESOURCE_FIELD];

/**
 * Word offsets of the fields inside a function record
 */
export const FUNCTION_FIELD = {
	NAME: 0,
	UNMANGLED_NAME: 1,
	RESOURCES: 2,
	DEPENDENCIES: 3,
	SHADER_KIND: 4,
	PAYLOAD_SIZE: 5,
	ATTRIBUTE_SIZE: 6,
	FEATURE_INFO_1: 7,
	FEATURE_INFO_2: 8,
	SHADER_STAGE_FLAG: 9,
	MIN_SHADER_TARGET: 10,
} as const;

export type FunctionField = (typeof FUNCTION_FIELD)[keyof typeof FUNCTION_FIELD];

/**
 * Check whether a raw descriptor tag is one of the known table types
 *
 * @param value - Raw u32 read from a descriptor
 * @returns True when the value names a known table type
 */
export function isKnownTableType(value: number): value is TableType {
	return value >= TABLE_TYPE.INVALID && value <= TABLE_TYPE.INDEX;
}

/**
 * Check whether a raw u32 is a resource class the resource table can hold
 */
export function isResourceClass(value: number): value is ResourceClass {
	return value >= RESOURCE_CLASS.SRV && value <= RESOURCE_CLASS.SAMPLER;
}

/**
 * Human-readable name of a table type, for error messages
 */
export function tableTypeName(type: number): string {
	switch (type) {
		case TABLE_TYPE.INVALID:
			return "Invalid";
		case TABLE_TYPE.STRING:
			return "String";
		case TABLE_TYPE.FUNCTION:
			return "Function";
		case TABLE_TYPE.RESOURCE:
			return "Resource";
		case TABLE_TYPE.INDEX:
			return "Index";
		default:
			return `Unknown(${type})`;
	}
}

/**
 * Display name of a resource kind
 *
 * @example
 * resourceKindName(RESOURCE_KIND.TEXTURE_2D); // "Texture2D"
 */
export function resourceKindName(kind: number): string {
	return RESOURCE_KIND_NAMES[kind] ?? `Unknown(${kind})`;
}

/**
 * Display name of a shader kind
 *
 * @example
 * shaderKindName(SHADER_KIND.CLOSEST_HIT); // "ClosestHit"
 */
export function shaderKindName(kind: number): string {
	return SHADER_KIND_NAMES[kind] ?? `Unknown(${kind})`;
}
