import type { CliConfig } from "./config.js";
import { handleLibraryInfo } from "./tools/library-info.js";
import { handleListFunctions } from "./tools/list-functions.js";
import { handleListResources } from "./tools/list-resources.js";

/**
 * Dispatch a resolved configuration to its command handler.
 *
 * @returns The text to print on stdout
 */
export async function runCommand(config: CliConfig): Promise<string> {
	switch (config.command) {
		case "info":
			return handleLibraryInfo(config.blobPath, config);
		case "functions":
			return handleListFunctions(config.blobPath, config);
		case "resources":
			return handleListResources(config.blobPath, config);
		default: {
			const _exhaustive: never = config.command;
			throw new Error(`Unknown command: ${_exhaustive}`);
		}
	}
}
