/**
 * Decoder logger for the rdat-inspect CLI.
 *
 * Writes to stderr so command output on stdout stays parseable.
 */

import type { RuntimeDataLogger } from "@rdat-explorer/core";
import type { LogLevel } from "./config.js";

/**
 * Create a decoder logger honouring the configured level.
 *
 * @param level - Lowest level written
 * @param write - Output sink (default: process.stderr)
 */
export function createCliLogger(
	level: LogLevel,
	write: (line: string) => void = (line) => {
		process.stderr.write(line);
	},
): RuntimeDataLogger {
	switch (level) {
		case "silent":
			return { warn() {} };
		case "warn":
			return {
				warn(message) {
					write(`[rdat-inspect] warning: ${message}\n`);
				},
			};
		case "debug":
			return {
				warn(message) {
					write(`[rdat-inspect] warning: ${message}\n`);
				},
				debug(message) {
					write(`[rdat-inspect] debug: ${message}\n`);
				},
			};
		default: {
			const _exhaustive: never = level;
			throw new Error(`Unknown log level: ${_exhaustive}`);
		}
	}
}
