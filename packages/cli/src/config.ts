/**
 * Configuration for the rdat-inspect CLI.
 *
 * Reads configuration from:
 * 1. CLI arguments (<command> <blob-path>, --format, --class, --log-level)
 * 2. Environment variables (RDAT_FORMAT, RDAT_LOG_LEVEL)
 * 3. Defaults
 */

import * as path from "node:path";
import { z } from "zod";

export const CommandSchema = z.enum(["info", "functions", "resources"]);
export const OutputFormatSchema = z.enum(["markdown", "yaml"]);
export const LogLevelSchema = z.enum(["silent", "warn", "debug"]);
export const ResourceClassFilterSchema = z.enum([
	"cbuffer",
	"sampler",
	"srv",
	"uav",
]);

export type Command = z.infer<typeof CommandSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ResourceClassFilter = z.infer<typeof ResourceClassFilterSchema>;

export interface CliConfig {
	command: Command;
	/** Absolute path of the blob file */
	blobPath: string;
	format: OutputFormat;
	logLevel: LogLevel;
	/** Only list resources of this class (resources command) */
	classFilter: ResourceClassFilter | undefined;
}

export const USAGE = [
	"Usage: rdat-inspect <info|functions|resources> <blob-path> [options]",
	"",
	"Options:",
	"  --format <markdown|yaml>           Output format (env RDAT_FORMAT)",
	"  --class <cbuffer|sampler|srv|uav>  Filter the resources listing",
	"  --log-level <silent|warn|debug>    Decoder log level (env RDAT_LOG_LEVEL)",
].join("\n");

interface RawArgs {
	positionals: string[];
	format: string | undefined;
	classFilter: string | undefined;
	logLevel: string | undefined;
}

const OPTION_KEYS = {
	"--format": "format",
	"--class": "classFilter",
	"--log-level": "logLevel",
} as const;

function isOptionFlag(arg: string): arg is keyof typeof OPTION_KEYS {
	return Object.hasOwn(OPTION_KEYS, arg);
}

/**
 * Split process arguments into positionals and known options.
 *
 * @param argv - Process arguments (first two entries are node and the script)
 * @returns Raw, unvalidated values
 * @throws Error on an unknown option or an option without a value
 */
function parseCliArgs(argv: string[]): RawArgs {
	const raw: RawArgs = {
		positionals: [],
		format: undefined,
		classFilter: undefined,
		logLevel: undefined,
	};

	for (let i = 2; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === undefined) continue;

		const eq = arg.indexOf("=");
		const flag = eq === -1 ? arg : arg.slice(0, eq);
		if (isOptionFlag(flag)) {
			let value: string | undefined;
			if (eq !== -1) {
				value = arg.slice(eq + 1);
			} else {
				value = argv[i + 1];
				i++;
			}
			if (value === undefined) {
				throw new Error(`Missing value for ${flag}`);
			}
			raw[OPTION_KEYS[flag]] = value;
		} else if (arg.startsWith("--")) {
			throw new Error(`Unknown option: ${arg}`);
		} else {
			raw.positionals.push(arg);
		}
	}

	return raw;
}

function parseWith<T>(schema: z.ZodType<T>, value: string, what: string): T {
	const result = schema.safeParse(value);
	if (!result.success) {
		throw new Error(`Invalid ${what}: "${value}"`);
	}
	return result.data;
}

/**
 * Load CLI configuration from all sources.
 *
 * Priority: CLI args > env vars > defaults
 *
 * @param argv - Process arguments (default: process.argv)
 * @param env - Environment (default: process.env)
 * @param cwd - Directory relative blob paths resolve against
 * @returns Resolved configuration
 * @throws Error when the command or blob path is missing or a value is invalid
 */
export function loadConfig(
	argv: string[] = process.argv,
	env: NodeJS.ProcessEnv = process.env,
	cwd: string = process.cwd(),
): CliConfig {
	const raw = parseCliArgs(argv);
	const [commandArg, blobArg, ...extra] = raw.positionals;

	if (commandArg === undefined || blobArg === undefined) {
		throw new Error("Expected a command and a blob path");
	}
	if (extra.length > 0) {
		throw new Error(`Unexpected argument: ${extra[0]}`);
	}

	const command = parseWith(CommandSchema, commandArg, "command");
	if (raw.classFilter !== undefined && command !== "resources") {
		throw new Error("--class only applies to the resources command");
	}
	const format = parseWith(
		OutputFormatSchema,
		raw.format ?? env["RDAT_FORMAT"] ?? "markdown",
		"format",
	);
	const logLevel = parseWith(
		LogLevelSchema,
		raw.logLevel ?? env["RDAT_LOG_LEVEL"] ?? "warn",
		"log level",
	);
	const classFilter =
		raw.classFilter === undefined
			? undefined
			: parseWith(ResourceClassFilterSchema, raw.classFilter, "resource class");

	return {
		command,
		blobPath: path.isAbsolute(blobArg) ? blobArg : path.resolve(cwd, blobArg),
		format,
		logLevel,
		classFilter,
	};
}
