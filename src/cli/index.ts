/**
 * Command-line front end.
 *
 * ```
 * roster-shift [--file <path>] [--strategy join|sequential|conversation]
 *              [--timeout <ms>] [--invalid-input fail|zero] [--config <json>]
 *              [--log-dir <dir>] [--log-level debug|info|warning|error]
 * ```
 *
 * Flags are parsed in two formats (`--flag value`, `--flag=value`), merged
 * over the optional config file and validated before anything is read.
 * {@link runCli} resolves to the process exit code: 0 on success, 1 on any
 * failure, with the error message on stderr.
 */

import { getLogger } from "@logtape/logtape";
import { type RunConfig, resolveRunConfig } from "../config/index.js";
import { ConfigurationError } from "../errors/pipeline-errors.js";
import { toError } from "../errors/structured-error.js";
import { ConsoleNotifier, ConsolePrompt } from "../io/console.js";
import { FileSink, FileSource } from "../io/file.js";
import type { RosterIO } from "../io/types.js";
import { createRosterLogger } from "../logging/factory.js";
import { runPipeline } from "../pipeline/run.js";
import { validateInteger } from "../validation/numbers.js";

const logger = getLogger(["roster-shift", "cli"]);

export const USAGE = `Usage: roster-shift [options]

Adds a number read from the terminal to the age of every record in a CSV file.

Options:
  --file <path>              Record file (default: resources/protagonists.csv)
  --strategy <name>          join, sequential or conversation (default: join)
  --timeout <ms>             Give up waiting for the file and the answer after <ms>
  --invalid-input <policy>   fail, or zero to use 0 for a bad answer (default: fail)
  --config <path>            JSON file with defaults for the options above
  --log-dir <dir>            Directory for the JSONL log (default: ~/.roster-shift/logs)
  --log-level <level>        debug, info, warning or error (default: info)
  --help                     Show this message
`;

export type FlagValue = string | boolean | (string | boolean)[];

/**
 * Parse command-line arguments into structured format.
 *
 * Handles three flag formats:
 * - `--key value` (spaced syntax)
 * - `--key=value` (equals syntax)
 * - `--key` (boolean flag)
 *
 * Names in `booleanFlags` never take the next token as their value.
 *
 * Duplicate flags are stored as arrays:
 * - `--file a.csv --file b.csv` → flags.file = ["a.csv", "b.csv"]
 * - `--file a.csv` → flags.file = "a.csv"
 *
 * @example
 * parseArgs(["--strategy", "sequential", "--timeout=500"])
 * // → { positional: [], flags: { strategy: "sequential", timeout: "500" } }
 *
 * @example
 * parseArgs(["extra", "--help", "more"], ["help"])
 * // → { positional: ["extra", "more"], flags: { help: true } }
 */
export function parseArgs(
	argv: readonly string[],
	booleanFlags: readonly string[] = [],
): {
	positional: string[];
	flags: Record<string, FlagValue>;
} {
	const positional: string[] = [];
	const flags: Record<string, FlagValue> = {};

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];
		if (!arg) continue;
		if (arg.startsWith("--")) {
			const separator = arg.indexOf("=");
			const key = arg.slice(2, separator === -1 ? undefined : separator);
			const value = separator === -1 ? undefined : arg.slice(separator + 1);
			if (!key) continue;
			const next = argv[i + 1];

			const setValue = (newValue: string | boolean) => {
				const existing = flags[key];
				if (existing === undefined) {
					flags[key] = newValue;
				} else if (Array.isArray(existing)) {
					existing.push(newValue);
				} else {
					flags[key] = [existing, newValue];
				}
			};

			if (value !== undefined) {
				setValue(value);
			} else if (
				next !== undefined &&
				!next.startsWith("--") &&
				!booleanFlags.includes(key)
			) {
				setValue(next);
				i++;
			} else {
				setValue(true);
			}
		} else {
			positional.push(arg);
		}
	}

	return { positional, flags };
}

/**
 * Normalize a flag value to a single value (string or boolean).
 * If array (from duplicate flags), the last occurrence wins.
 *
 * @example
 * normalizeFlagValue("test") // → "test"
 * normalizeFlagValue(["first", "second"]) // → "second"
 * normalizeFlagValue(undefined) // → undefined
 */
export function normalizeFlagValue(
	value: FlagValue | undefined,
): string | boolean | undefined {
	if (Array.isArray(value)) {
		return value[value.length - 1];
	}
	return value;
}

/** Flags that never take a value. */
const BOOLEAN_FLAGS = ["help"] as const;

/** Flags that map onto a {@link RunConfig} key. */
const CONFIG_FLAGS = {
	file: "filePath",
	strategy: "strategy",
	timeout: "timeoutMs",
	"invalid-input": "invalidInput",
	"log-dir": "logDir",
	"log-level": "logLevel",
} as const satisfies Record<string, keyof RunConfig>;

type ConfigFlag = keyof typeof CONFIG_FLAGS;

function isConfigFlag(name: string): name is ConfigFlag {
	return Object.keys(CONFIG_FLAGS).some((flag) => flag === name);
}

export interface CliRequest {
	help: boolean;
	configPath?: string;
	/** Values for {@link resolveRunConfig}, keyed by config name. */
	overrides: Record<string, unknown>;
}

/**
 * Turn the argument list into a config request.
 *
 * Values are only checked for shape here (a value is present, `--timeout` is
 * an integer); the config schema validates the rest.
 *
 * @throws {ConfigurationError} On unknown options, positional arguments,
 *   missing values and a non-integer timeout
 */
export function readCliRequest(argv: readonly string[]): CliRequest {
	const { positional, flags } = parseArgs(argv, BOOLEAN_FLAGS);
	const [unexpected] = positional;
	if (unexpected !== undefined) {
		throw new ConfigurationError(`Unexpected argument ${unexpected}`, {
			argument: unexpected,
		});
	}

	const request: CliRequest = { help: false, overrides: {} };
	for (const [flag, raw] of Object.entries(flags)) {
		if (flag === "help") {
			request.help = true;
			continue;
		}
		if (flag === "config") {
			request.configPath = requireValue(flag, raw);
			continue;
		}
		if (!isConfigFlag(flag)) {
			throw new ConfigurationError(`Unknown option --${flag}`, { flag });
		}
		const value = requireValue(flag, raw);
		request.overrides[CONFIG_FLAGS[flag]] =
			flag === "timeout" ? parseTimeout(value) : value;
	}
	return request;
}

function requireValue(flag: string, raw: FlagValue): string {
	const value = normalizeFlagValue(raw);
	if (typeof value !== "string") {
		throw new ConfigurationError(`Option --${flag} needs a value`, { flag });
	}
	return value;
}

function parseTimeout(value: string): number {
	const result = validateInteger(value, { name: "--timeout" });
	if (!result.valid) {
		throw new ConfigurationError(result.error, { flag: "timeout", value });
	}
	return result.value;
}

/** Streams the CLI talks through. */
export interface CliStreams {
	stdin: NodeJS.ReadableStream;
	stdout: NodeJS.WritableStream;
	stderr: NodeJS.WritableStream;
}

/**
 * Wire the file source and sink, the console prompt and the console
 * notifier for one run.
 */
export function createFileRosterIO(
	config: RunConfig,
	streams: Pick<CliStreams, "stdin" | "stdout">,
): RosterIO {
	return {
		source: new FileSource(config.filePath),
		adjustment: new ConsolePrompt({
			input: streams.stdin,
			output: streams.stdout,
			prompt: config.prompt,
			invalidInput: config.invalidInput,
		}),
		sink: new FileSink(config.filePath),
		notifier: new ConsoleNotifier(streams.stdout),
	};
}

/**
 * Run the command line once.
 *
 * @returns Process exit code
 */
export async function runCli(
	argv: readonly string[],
	streams: CliStreams = {
		stdin: process.stdin,
		stdout: process.stdout,
		stderr: process.stderr,
	},
): Promise<number> {
	try {
		const request = readCliRequest(argv);
		if (request.help) {
			streams.stdout.write(USAGE);
			return 0;
		}

		const config = await resolveRunConfig(
			request.overrides,
			request.configPath,
		);
		const { initLogger, createCorrelationId } = createRosterLogger({
			logDir: config.logDir,
			lowestLevel: config.logLevel,
		});
		await initLogger();

		const runId = createCorrelationId();
		logger.debug("Run {runId} configured", { runId, config });
		await runPipeline(createFileRosterIO(config, streams), {
			strategy: config.strategy,
			timeoutMs: config.timeoutMs,
			runId,
		});
		return 0;
	} catch (error) {
		streams.stderr.write(`Error: ${toError(error).message}\n`);
		return 1;
	}
}
