/**
 * Steps shared by every strategy.
 *
 * A strategy only decides how the records and the adjustment are obtained.
 * Once both are present the run always goes through {@link transformStage},
 * then {@link writeStage} (or an equivalent write), then {@link finish}.
 *
 * @module pipeline/stages
 */

import { withTimeout } from "../concurrency/timeout.js";
import type { RosterIO } from "../io/types.js";
import {
	adjustAll,
	type PersonRecord,
	serializeRecords,
} from "../record/index.js";
import type { StateTracker } from "./state.js";

export const STRATEGIES = ["join", "sequential", "conversation"] as const;

export type Strategy = (typeof STRATEGIES)[number];

/** Everything a strategy needs for one run. */
export interface RunContext {
	readonly io: RosterIO;
	readonly runId: string;
	readonly strategy: Strategy;
	readonly tracker: StateTracker;
	/** Upper bound on the wait for both inputs. */
	readonly timeoutMs?: number;
}

export interface RunInputs {
	readonly records: PersonRecord[];
	readonly adjustment: number;
}

export interface TransformedRecords {
	readonly records: PersonRecord[];
	readonly lines: string[];
}

/**
 * Result of a successful run.
 */
export interface PipelineReport {
	readonly runId: string;
	readonly strategy: Strategy;
	readonly state: "done";
	readonly adjustment: number;
	/** Records after the adjustment, in input order. */
	readonly records: PersonRecord[];
	/** Lines handed to the sink. */
	readonly lines: string[];
}

/**
 * Wait for the inputs of a run, bounded by `timeoutMs` when set.
 *
 * @throws {TimeoutError} If the inputs take longer than `timeoutMs`
 */
export function awaitInputs(
	ctx: RunContext,
	inputs: Promise<RunInputs>,
): Promise<RunInputs> {
	if (ctx.timeoutMs === undefined) return inputs;
	return withTimeout(
		inputs,
		ctx.timeoutMs,
		`Inputs not available after ${ctx.timeoutMs}ms`,
	);
}

/**
 * Apply the adjustment and serialize, notifying once per record.
 */
export function transformStage(
	ctx: RunContext,
	inputs: RunInputs,
): TransformedRecords {
	ctx.tracker.advance("joined");
	ctx.tracker.advance("transforming");
	const { notifier } = ctx.io;
	const records = adjustAll(
		inputs.records,
		inputs.adjustment,
		notifier ? (message) => notifier.notify(message) : undefined,
	);
	return { records, lines: serializeRecords(records) };
}

export async function writeStage(
	ctx: RunContext,
	lines: readonly string[],
): Promise<void> {
	ctx.tracker.advance("writing");
	await ctx.io.sink.write(lines).await();
}

export function finish(
	ctx: RunContext,
	adjustment: number,
	transformed: TransformedRecords,
): PipelineReport {
	ctx.tracker.advance("done");
	return {
		runId: ctx.runId,
		strategy: ctx.strategy,
		state: "done",
		adjustment,
		records: transformed.records,
		lines: transformed.lines,
	};
}
