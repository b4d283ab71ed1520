#!/usr/bin/env node
/**
 * rdat-inspect
 *
 * Prints the contents of a runtime data blob as YAML or markdown.
 *
 * Usage:
 *   rdat-inspect <info|functions|resources> <blob-path> [--format yaml|markdown]
 *
 * Environment variables:
 *   RDAT_FORMAT     Default output format
 *   RDAT_LOG_LEVEL  Decoder log level (silent, warn, debug)
 */

import type { CliConfig } from "./config.js";
import { loadConfig, USAGE } from "./config.js";
import { runCommand } from "./run.js";

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

async function main(): Promise<void> {
	let config: CliConfig;
	try {
		config = loadConfig();
	} catch (err) {
		process.stderr.write(`${errorMessage(err)}\n\n${USAGE}\n`);
		process.exitCode = 2;
		return;
	}

	try {
		const output = await runCommand(config);
		process.stdout.write(output.endsWith("\n") ? output : `${output}\n`);
	} catch (err) {
		process.stderr.write(`Error: ${errorMessage(err)}\n`);
		process.exitCode = 1;
	}
}

main().catch((err: unknown) => {
	process.stderr.write(`Fatal error: ${errorMessage(err)}\n`);
	process.exit(1);
});
