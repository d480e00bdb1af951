/**
 * Collaborator interfaces of the pipeline.
 *
 * The pipeline receives one {@link RosterIO} value and resolves nothing on
 * its own: reading, prompting, writing and notifying all go through it.
 *
 * @module io/types
 */

import type { AsyncValue } from "../concurrency/async-value.js";

/** Supplies the raw record lines. */
export interface SourceProvider {
	/**
	 * Start reading. Completes with the lines in file order, or fails with
	 * `IoError`. Must not block the caller.
	 */
	fetchLines(): AsyncValue<string[]>;
}

/** Supplies the single integer adjustment for a run. */
export interface AdjustmentProvider {
	/**
	 * Start prompting. Completes with the integer, or fails with
	 * `InvalidInputError`.
	 */
	fetchAdjustment(): AsyncValue<number>;
}

/** Writes the final lines. */
export interface Sink {
	/** Write every line in one operation; fails with `IoError`. */
	write(lines: readonly string[]): AsyncValue<void>;
}

/** Receives one message per adjusted record. */
export interface Notifier {
	notify(message: string): void;
}

export interface RosterIO {
	source: SourceProvider;
	adjustment: AdjustmentProvider;
	sink: Sink;
	/** Defaults to discarding notifications. */
	notifier?: Notifier;
}
