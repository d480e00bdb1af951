/**
 * The `join` and `sequential` strategies.
 *
 * @module pipeline/strategies
 */

import { join } from "../concurrency/join.js";
import { StructuredError } from "../errors/structured-error.js";
import { parseRecords } from "../record/index.js";
import {
	awaitInputs,
	finish,
	type PipelineReport,
	type RunContext,
	type RunInputs,
	transformStage,
	writeStage,
} from "./stages.js";

/**
 * Read and prompt concurrently, continue once both are present.
 *
 * Lines are parsed as soon as they arrive, so a malformed file fails the run
 * even while the prompt is still waiting for an answer.
 */
export async function runJoined(ctx: RunContext): Promise<PipelineReport> {
	const { io, tracker } = ctx;
	tracker.advance("reading-prompting");

	const inputs = join(
		io.source.fetchLines().map(parseRecords),
		io.adjustment.fetchAdjustment(),
		(records, adjustment): RunInputs => ({ records, adjustment }),
	);
	const { records, adjustment } = await awaitInputs(ctx, inputs.toPromise());

	const transformed = transformStage(ctx, { records, adjustment });
	await writeStage(ctx, transformed.lines);
	return finish(ctx, adjustment, transformed);
}

/**
 * Read, then prompt, then transform and write, each step awaited in turn.
 */
export async function runSequential(ctx: RunContext): Promise<PipelineReport> {
	ctx.tracker.advance("reading-prompting");

	const inputs = await awaitInputs(ctx, readThenPrompt(ctx));

	const transformed = transformStage(ctx, inputs);
	await writeStage(ctx, transformed.lines);
	return finish(ctx, inputs.adjustment, transformed);
}

/**
 * Once a timeout has failed the run, the read may still finish later; the
 * prompt must not start then.
 */
async function readThenPrompt({
	io,
	runId,
	tracker,
}: RunContext): Promise<RunInputs> {
	const records = parseRecords(await io.source.fetchLines().await());
	if (tracker.current !== "reading-prompting") {
		throw new StructuredError(
			`Run ${runId} ended before the prompt`,
			"INTERNAL",
			"RUN_ENDED",
			false,
			{ runId, state: tracker.current },
		);
	}
	const adjustment = await io.adjustment.fetchAdjustment().await();
	return { records, adjustment };
}
