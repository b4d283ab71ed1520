import { describe, expect, it } from "vitest";
import { readRecordWord, readU32, viewOf, windowOf } from "../src/binary";
import { RuntimeDataError } from "../src/errors";

describe("Binary helpers", () => {
	describe("readU32", () => {
		it("should decode little-endian words", () => {
			const view = viewOf(
				new Uint8Array([0x78, 0x56, 0x34, 0x12, 0xff, 0xff, 0xff, 0xff]),
			);
			expect(readU32(view, 0)).toBe(0x12345678);
			expect(readU32(view, 4)).toBe(4294967295);
		});

		it("should read unaligned offsets", () => {
			const view = viewOf(new Uint8Array([0x00, 0x01, 0x00, 0x00, 0x00]));
			expect(readU32(view, 1)).toBe(1);
		});

		it("should throw RANGE_OUT_OF_BOUNDS past the end", () => {
			const view = viewOf(new Uint8Array(6));
			expect(() => readU32(view, 3)).toThrow(RuntimeDataError);
			expect(() => readU32(view, 3)).toThrow(
				"Offset 3 out of bounds for buffer of length 6",
			);
		});

		it("should throw for negative offsets", () => {
			const view = viewOf(new Uint8Array(8));
			expect(() => readU32(view, -1)).toThrow(RuntimeDataError);
		});
	});

	describe("viewOf", () => {
		it("should view a subarray without copying", () => {
			const buffer = new Uint8Array([9, 9, 1, 0, 0, 0]);
			const window = buffer.subarray(2);
			const view = viewOf(window);
			expect(view.byteLength).toBe(4);
			expect(readU32(view, 0)).toBe(1);
			buffer[2] = 7;
			expect(readU32(view, 0)).toBe(7);
		});
	});

	describe("readRecordWord", () => {
		it("should address fields by record index and word offset", () => {
			const words = new Uint8Array(16);
			const dv = new DataView(words.buffer);
			dv.setUint32(12, 42, true);
			// Record size 8: record 1, word 1 is byte 12
			expect(readRecordWord(viewOf(words), 8, 1, 1)).toBe(42);
		});
	});

	describe("windowOf", () => {
		it("should share the source buffer", () => {
			const bytes = new Uint8Array([1, 2, 3, 4]);
			const window = windowOf(bytes, 1, 2);
			expect([...window]).toEqual([2, 3]);
			expect(window.buffer).toBe(bytes.buffer);
		});

		it("should reject windows past the end", () => {
			try {
				windowOf(new Uint8Array(4), 2, 3);
				expect.unreachable();
			} catch (error) {
				expect(error).toBeInstanceOf(RuntimeDataError);
				if (error instanceof RuntimeDataError) {
					expect(error.code).toBe("RANGE_OUT_OF_BOUNDS");
					expect(error.message).toBe(
						"Range [2, 5) exceeds buffer of length 4",
					);
				}
			}
		});
	});
});
