import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { RuntimeDataError, silentLogger } from "@rdat-explorer/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadBlob } from "../src/blob-loader.js";
import { buildBlob } from "../../core/test/fixtures/blob-builder.js";

describe("loadBlob", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), "rdat-inspect-"));
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	async function writeBlob(name: string, bytes: Uint8Array): Promise<string> {
		const file = path.join(dir, name);
		await fs.writeFile(file, bytes);
		return file;
	}

	it("should decode a blob from disk", async () => {
		const blob = buildBlob({ functions: [{ name: "main" }, { name: "helper" }] });
		const file = await writeBlob("library.rdat", blob);

		const loaded = await loadBlob(file, silentLogger);
		expect(loaded.blobPath).toBe(file);
		expect(loaded.fileSizeBytes).toBe(blob.length);
		expect(loaded.data.functions.count()).toBe(2);
		expect(loaded.data.functions.get(1).name()).toBe("helper");
	});

	it("should read the file again on every load", async () => {
		const file = await writeBlob("library.rdat", buildBlob({}));
		const first = await loadBlob(file, silentLogger);
		expect(first.data.functions.count()).toBe(0);

		await writeBlob("library.rdat", buildBlob({ functions: [{ name: "main" }] }));
		const second = await loadBlob(file, silentLogger);
		expect(second).not.toBe(first);
		expect(second.data.functions.count()).toBe(1);
	});

	it("should report decode failures with the decode error as cause", async () => {
		const file = await writeBlob("broken.rdat", new Uint8Array([1, 0]));

		const error = await loadBlob(file, silentLogger).catch((err: unknown) => err);
		expect(error).toBeInstanceOf(Error);
		if (error instanceof Error) {
			expect(error.message).toBe(
				`Failed to decode ${file}: Blob of 2 bytes is too small for a table count`,
			);
			expect(error.cause).toBeInstanceOf(RuntimeDataError);
		}
	});

	it("should reject a missing file", async () => {
		await expect(
			loadBlob(path.join(dir, "missing.rdat"), silentLogger),
		).rejects.toThrow("ENOENT");
	});
});
