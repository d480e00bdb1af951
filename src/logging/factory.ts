/**
 * Roster Logger Factory.
 *
 * Creates configured LogTape loggers with:
 * - JSONL file output with rotation
 * - Hierarchical categories for subsystem filtering
 * - A single log file per application (<logDir>/roster-shift.jsonl)
 *
 * Library modules never configure LogTape themselves; they call `getLogger`
 * and stay silent until an entry point runs {@link RosterLogger.initLogger}.
 */

import { existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { getRotatingFileSink } from "@logtape/file";
import {
	configure,
	getLogger,
	jsonLinesFormatter,
	type Logger,
} from "@logtape/logtape";
import {
	DEFAULT_LOG_DIR,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	LOG_CATEGORY,
	type LogLevel,
} from "./config.js";
import { createCorrelationId } from "./correlation.js";

/**
 * Subsystems that log under the root category.
 */
export const SUBSYSTEMS = [
	"async-value",
	"join",
	"io",
	"pipeline",
	"conversation",
	"cli",
] as const;

export type Subsystem = (typeof SUBSYSTEMS)[number];

/**
 * Options for creating the roster logger.
 */
export interface RosterLoggerOptions {
	/**
	 * Log directory. Defaults to ~/.roster-shift/logs/
	 */
	logDir?: string;

	/**
	 * Log file name (without extension). Defaults to "roster-shift".
	 * Results in: <logDir>/<logFileName>.jsonl
	 */
	logFileName?: string;

	/**
	 * Maximum log file size before rotation. Defaults to 1 MiB.
	 */
	maxSize?: number;

	/**
	 * Number of rotated files to keep. Defaults to 5.
	 */
	maxFiles?: number;

	/**
	 * Lowest log level to capture. Defaults to "info".
	 */
	lowestLevel?: LogLevel;
}

/**
 * Result of creating the roster logger.
 */
export interface RosterLogger {
	/**
	 * Initialize the logging system. Must be called before logging.
	 * Safe to call multiple times - only initializes once.
	 */
	initLogger: () => Promise<void>;

	/**
	 * Generate a correlation ID for run tracing.
	 */
	createCorrelationId: typeof createCorrelationId;

	/**
	 * Root logger for the application category.
	 */
	rootLogger: Logger;

	/**
	 * Get a subsystem logger by name.
	 *
	 * @returns Logger for the ["roster-shift", subsystem] category
	 */
	getSubsystemLogger: (subsystem: Subsystem) => Logger;

	/** Log directory path */
	logDir: string;

	/** Log file path */
	logFile: string;
}

/**
 * Create the configured application logger.
 *
 * @example
 * ```typescript
 * const { initLogger, getSubsystemLogger } = createRosterLogger({
 *   logDir: "/tmp/roster-logs",
 *   lowestLevel: "debug",
 * });
 *
 * // Initialize at the entry point (CLI main)
 * await initLogger();
 *
 * getSubsystemLogger("cli").info("Starting run");
 * ```
 */
export function createRosterLogger(
	options: RosterLoggerOptions = {},
): RosterLogger {
	const {
		logDir = DEFAULT_LOG_DIR,
		logFileName = LOG_CATEGORY,
		maxSize = DEFAULT_MAX_SIZE,
		maxFiles = DEFAULT_MAX_FILES,
		lowestLevel = DEFAULT_LOG_LEVEL,
	} = options;

	const logFile = join(logDir, `${logFileName}${DEFAULT_LOG_EXTENSION}`);

	let isInitialized = false;

	/**
	 * Initialize the logging system.
	 * Safe to call multiple times - only initializes once.
	 * Also safe to call when logtape is already configured (e.g., by test setup).
	 */
	async function initLogger(): Promise<void> {
		if (isInitialized) return;

		if (!existsSync(logDir)) {
			mkdirSync(logDir, { recursive: true });
		}

		const sinkName = `file_${logFileName}`;

		try {
			await configure({
				sinks: {
					[sinkName]: getRotatingFileSink(logFile, {
						formatter: jsonLinesFormatter,
						maxSize,
						maxFiles,
					}),
				},
				loggers: [
					{
						category: [LOG_CATEGORY],
						sinks: [sinkName],
						lowestLevel,
					},
					{
						category: ["logtape", "meta"],
						sinks: [sinkName],
						lowestLevel: "error",
					},
				],
			});
		} catch (error: unknown) {
			// Already configured by whoever embeds the library (or a test):
			// keep their configuration.
			if (
				error instanceof Error &&
				error.message.includes("Already configured")
			) {
				isInitialized = true;
				return;
			}
			throw error;
		}

		getLogger([LOG_CATEGORY]).info("Logging initialized", {
			logDir,
			logFile,
			maxSize,
			maxFiles,
			lowestLevel,
		});

		isInitialized = true;
	}

	function getSubsystemLogger(subsystem: Subsystem): Logger {
		return getLogger([LOG_CATEGORY, subsystem]);
	}

	return {
		initLogger,
		createCorrelationId,
		rootLogger: getLogger([LOG_CATEGORY]),
		getSubsystemLogger,
		logDir,
		logFile,
	};
}
