/**
 * Names of the optional-feature bits of a function's 64-bit feature mask.
 *
 * Bits are listed low to high; a bit with no entry here is reported by
 * {@link describeFeatureFlags} as `Bit<n>`.
 */
export const FEATURE_FLAG_NAMES: ReadonlyArray<readonly [bigint, string]> = [
	[0x1n, "Doubles"],
	[0x2n, "ComputeShadersPlusRawAndStructuredBuffersViaShader4X"],
	[0x4n, "UAVsAtEveryStage"],
	[0x8n, "64UAVs"],
	[0x10n, "MinimumPrecision"],
	[0x20n, "11_1_DoubleExtensions"],
	[0x40n, "11_1_ShaderExtensions"],
	[0x80n, "LEVEL9ComparisonFiltering"],
	[0x100n, "TiledResources"],
	[0x200n, "StencilRef"],
	[0x400n, "InnerCoverage"],
	[0x800n, "TypedUAVLoadAdditionalFormats"],
	[0x1000n, "ROVs"],
	[0x2000n, "ViewportAndRTArrayIndexFromAnyShaderFeedingRasterizer"],
	[0x4000n, "WaveOps"],
	[0x8000n, "Int64Ops"],
	[0x10000n, "ViewID"],
	[0x20000n, "Barycentrics"],
	[0x40000n, "NativeLowPrecision"],
];

/**
 * Combine the two stored 32-bit halves into the 64-bit feature mask
 *
 * @param low - Low 32 bits
 * @param high - High 32 bits
 *
 * @example
 * combineFeatureFlags(0xffffffff, 0x1); // 0x1ffffffffn
 */
export function combineFeatureFlags(low: number, high: number): bigint {
	return (BigInt(high >>> 0) << 32n) | BigInt(low >>> 0);
}

/**
 * List the names of the bits set in a feature mask
 *
 * @example
 * describeFeatureFlags(0x4001n); // ["Doubles", "WaveOps"]
 */
export function describeFeatureFlags(flags: bigint): string[] {
	const names: string[] = [];
	let known = 0n;
	for (const [bit, name] of FEATURE_FLAG_NAMES) {
		known |= bit;
		if ((flags & bit) !== 0n) names.push(name);
	}
	let rest = flags & ~known;
	for (let bit = 0; rest !== 0n; bit++) {
		const mask = 1n << BigInt(bit);
		if ((rest & mask) !== 0n) {
			names.push(`Bit${bit}`);
			rest &= ~mask;
		}
	}
	return names;
}

/**
 * Format a feature mask as a zero-padded hex literal
 *
 * @example
 * formatFeatureFlags(0x4001n); // "0x0000000000004001"
 */
export function formatFeatureFlags(flags: bigint): string {
	return `0x${flags.toString(16).padStart(16, "0")}`;
}
