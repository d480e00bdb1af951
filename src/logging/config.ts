/**
 * Logging configuration defaults.
 *
 * These values can be overridden when creating the roster logger.
 */

import { homedir } from "node:os";
import { join } from "node:path";

/** Root logger category; every subsystem logs under it. */
export const LOG_CATEGORY = "roster-shift";

/** Default directory for the JSONL log files */
export const DEFAULT_LOG_DIR = join(homedir(), ".roster-shift", "logs");

/** Maximum log file size before rotation (1 MiB) */
export const DEFAULT_MAX_SIZE: number = 0x400 * 0x400;

/** Number of rotated files to keep */
export const DEFAULT_MAX_FILES = 5;

/** Default log file extension */
export const DEFAULT_LOG_EXTENSION = ".jsonl";

/**
 * Logging level conventions.
 *
 * Note: LogTape uses "warning" not "warn" for consistency with its API.
 *
 * - DEBUG: Join arrivals, state changes, worker replies
 * - INFO: Run start and completion, record counts, timing
 * - WARNING: Degraded operation (an invalid answer replaced by zero)
 * - ERROR: Run failures, throwing completion callbacks
 */
export const LOG_LEVELS = ["debug", "info", "warning", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Default lowest log level to capture */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
