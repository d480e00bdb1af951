/**
 * Correlation ID utilities for run tracing.
 *
 * Correlation IDs link related log entries across operations,
 * making it easy to follow a single run through the system.
 */

import { randomUUID } from "node:crypto";

/**
 * Generate an 8-character correlation ID for tracing operations.
 *
 * Uses randomUUID() and takes the first 8 characters for brevity.
 * This provides ~4 billion unique IDs, sufficient for local logging.
 *
 * @returns Short UUID string (e.g., "a1b2c3d4")
 *
 * @example
 * ```typescript
 * const runId = createCorrelationId();
 * logger.info("Run {runId} started", { runId });
 * // ... later ...
 * logger.info("Run {runId} done", { runId, durationMs: 150 });
 * ```
 */
export function createCorrelationId(): string {
	return randomUUID().slice(0, 8);
}
