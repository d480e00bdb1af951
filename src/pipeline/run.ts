/**
 * Pipeline runner.
 *
 * One run reads the records, obtains the adjustment, applies it to every
 * record and writes the result back, under one of three strategies:
 *
 * - `join` (default): read and prompt concurrently, combine through
 *   the two-source join
 * - `sequential`: read, then prompt, each awaited in turn
 * - `conversation`: a coordinator messaging two workers over channels
 *
 * All three write the same lines for the same inputs. Nothing is retried:
 * the first failure is logged and rethrown, and the sink is only reached
 * after both inputs arrived and every record was adjusted.
 *
 * @module pipeline/run
 */

import { getLogger } from "@logtape/logtape";
import { isStructuredError, toError } from "../errors/structured-error.js";
import type { RosterIO } from "../io/types.js";
import { createCorrelationId } from "../logging/correlation.js";
import { runConversation } from "./conversation.js";
import type { PipelineReport, RunContext, Strategy } from "./stages.js";
import { type StateChangeListener, StateTracker } from "./state.js";
import { runJoined, runSequential } from "./strategies.js";

const logger = getLogger(["roster-shift", "pipeline"]);

const RUNNERS: Readonly<
	Record<Strategy, (ctx: RunContext) => Promise<PipelineReport>>
> = {
	join: runJoined,
	sequential: runSequential,
	conversation: runConversation,
};

export interface RunOptions {
	/** Defaults to `"join"`. */
	strategy?: Strategy;
	/**
	 * Upper bound, in milliseconds, on the wait for the records and the
	 * adjustment. Transforming and writing are not bounded.
	 */
	timeoutMs?: number;
	/** Called on every state change, after it happened. */
	onStateChange?: StateChangeListener;
	/** Correlation id for the run's log entries. Generated when omitted. */
	runId?: string;
}

/**
 * Run the pipeline once.
 *
 * @returns Report of the completed run
 * @throws {MalformedRecordError} If a line cannot be parsed
 * @throws {InvalidInputError} If the adjustment is not an integer
 * @throws {IoError} If reading or writing fails
 * @throws {TimeoutError} If the inputs take longer than `timeoutMs`
 *
 * @example
 * ```typescript
 * const report = await runPipeline(
 *   {
 *     source: new FileSource("resources/protagonists.csv"),
 *     adjustment: new ConsolePrompt(),
 *     sink: new FileSink("resources/protagonists.csv"),
 *     notifier: new ConsoleNotifier(),
 *   },
 *   { strategy: "join", timeoutMs: 60_000 },
 * );
 * ```
 */
export async function runPipeline(
	io: RosterIO,
	options: RunOptions = {},
): Promise<PipelineReport> {
	const strategy = options.strategy ?? "join";
	const runId = options.runId ?? createCorrelationId();
	const tracker = new StateTracker((state, previous) => {
		logger.debug("Run {runId}: {previous} -> {state}", {
			runId,
			previous,
			state,
		});
		options.onStateChange?.(state, previous);
	});
	const ctx: RunContext = {
		io,
		runId,
		strategy,
		tracker,
		timeoutMs: options.timeoutMs,
	};

	const startTime = Date.now();
	logger.info("Run {runId} started", {
		runId,
		strategy,
		timeoutMs: options.timeoutMs,
	});

	try {
		const report = await RUNNERS[strategy](ctx);
		logger.info("Run {runId} done", {
			runId,
			strategy,
			adjustment: report.adjustment,
			records: report.records.length,
			durationMs: Date.now() - startTime,
		});
		return report;
	} catch (error) {
		const failure = toError(error);
		tracker.fail();
		logger.error("Run {runId} failed in {state}: {message}", {
			runId,
			strategy,
			state: tracker.failedFrom,
			message: failure.message,
			error: isStructuredError(failure)
				? failure.toJSON()
				: { name: failure.name, message: failure.message },
			durationMs: Date.now() - startTime,
		});
		throw failure;
	}
}
