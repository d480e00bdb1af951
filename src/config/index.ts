/**
 * Run configuration.
 *
 * A run is configured from three layers, later ones winning:
 *
 * 1. Schema defaults
 * 2. An optional JSON config file
 * 3. Command-line flags
 *
 * The merged object is validated once with {@link RunConfigSchema}. Any
 * problem, including a config file that is not JSON, raises
 * {@link ConfigurationError}.
 *
 * @example
 * ```typescript
 * const config = await resolveRunConfig({ strategy: "sequential" }, "roster.json");
 * await runPipeline(io, { strategy: config.strategy, timeoutMs: config.timeoutMs });
 * ```
 *
 * @module config
 */

import { z } from "zod";
import { ConfigurationError } from "../errors/pipeline-errors.js";
import { toError } from "../errors/structured-error.js";
import { readTextFile } from "../fs/index.js";
import { DEFAULT_PROMPT, INVALID_INPUT_POLICIES } from "../io/console.js";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "../logging/config.js";
import { STRATEGIES } from "../pipeline/stages.js";

/** Record file used when neither the config file nor a flag names one. */
export const DEFAULT_FILE_PATH = "resources/protagonists.csv";

export const RunConfigSchema = z
	.object({
		filePath: z.string().min(1).default(DEFAULT_FILE_PATH),
		prompt: z.string().default(DEFAULT_PROMPT),
		strategy: z.enum(STRATEGIES).default("join"),
		timeoutMs: z.number().int().positive().optional(),
		invalidInput: z.enum(INVALID_INPUT_POLICIES).default("fail"),
		logLevel: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL),
		logDir: z.string().min(1).optional(),
	})
	.strict();

export type RunConfig = z.infer<typeof RunConfigSchema>;

/** One validation problem, with the dotted path of the offending key. */
export interface ConfigIssue {
	path: string;
	message: string;
}

const ConfigFileSchema = z.record(z.unknown());

/**
 * Validate a raw configuration object and fill in defaults.
 *
 * @param source - Where the values came from, for the error message
 * @throws {ConfigurationError} Listing every offending path
 */
export function parseRunConfig(
	raw: unknown,
	source = "configuration",
): RunConfig {
	const result = RunConfigSchema.safeParse(raw);
	if (result.success) {
		return result.data;
	}

	const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
		path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
		message: issue.message,
	}));
	throw new ConfigurationError(
		`Invalid ${source}: ${issues
			.map((issue) => `${issue.path}: ${issue.message}`)
			.join("; ")}`,
		{ source, issues },
	);
}

/**
 * Read a JSON config file into a plain object.
 *
 * Values are not validated here; see {@link parseRunConfig}.
 *
 * @throws {IoError} If the file cannot be read
 * @throws {ConfigurationError} If it is not a JSON object
 */
export async function loadConfigFile(
	filePath: string,
): Promise<Record<string, unknown>> {
	const text = await readTextFile(filePath);

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		throw new ConfigurationError(
			`Config file ${filePath} is not valid JSON`,
			{ path: filePath },
			toError(error),
		);
	}

	const result = ConfigFileSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigurationError(
			`Config file ${filePath} must contain a JSON object`,
			{ path: filePath },
		);
	}
	return result.data;
}

/**
 * Merge the config file (if any) under `overrides` and validate the result.
 *
 * Keys of `overrides` whose value is `undefined` do not hide the file's value.
 */
export async function resolveRunConfig(
	overrides: Readonly<Record<string, unknown>> = {},
	configPath?: string,
): Promise<RunConfig> {
	const fromFile = configPath ? await loadConfigFile(configPath) : {};
	const merged = { ...fromFile, ...definedEntries(overrides) };
	return parseRunConfig(
		merged,
		configPath ? `configuration (${configPath})` : "configuration",
	);
}

function definedEntries(
	values: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
	return Object.fromEntries(
		Object.entries(values).filter(([, value]) => value !== undefined),
	);
}
