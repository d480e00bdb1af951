/**
 * Logging for roster-shift.
 *
 * Provides a factory for a LogTape configuration with:
 * - JSONL file output for machine-parseable logs
 * - Automatic file rotation (1MB default, 5 files)
 * - Hierarchical categories for subsystem filtering
 * - Correlation IDs for run tracing
 *
 * @example
 * ```typescript
 * import { createRosterLogger } from "roster-shift/logging";
 *
 * const { initLogger, rootLogger, getSubsystemLogger } = createRosterLogger();
 *
 * // Initialize at the entry point
 * await initLogger();
 *
 * rootLogger.info("Started");
 * getSubsystemLogger("pipeline").debug("State changed", { state: "joined" });
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_LOG_DIR,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	LOG_CATEGORY,
	LOG_LEVELS,
	type LogLevel,
} from "./config.js";
export { createCorrelationId } from "./correlation.js";
export {
	createRosterLogger,
	type RosterLogger,
	type RosterLoggerOptions,
	SUBSYSTEMS,
	type Subsystem,
} from "./factory.js";
