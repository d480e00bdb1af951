/**
 * Two-source join.
 *
 * Combines two independently progressing {@link AsyncValue}s into one
 * downstream step that runs exactly once, only after both inputs completed,
 * and only if both succeeded.
 *
 * Failure policy: the first failure to arrive completes the joined value
 * immediately. If the other input fails later, that second failure is logged
 * at debug level and dropped.
 *
 * @module concurrency/join
 */

import { getLogger } from "@logtape/logtape";
import { AsyncValue, type AsyncSource, type Outcome } from "./async-value.js";
import { createCriticalSection } from "./critical-section.js";

const logger = getLogger(["roster-shift", "join"]);

export type JoinSide = "left" | "right";

interface JoinState<A, B> {
	left: Outcome<A> | undefined;
	right: Outcome<B> | undefined;
	/** Set by the one arrival that settles the join. */
	fired: boolean;
}

type Decision<A, B> =
	| { kind: "wait" }
	| { kind: "ignore" }
	| { kind: "fail"; error: Error }
	| { kind: "combine"; left: A; right: B };

/**
 * Join two asynchronous values.
 *
 * @param a - Left input
 * @param b - Right input
 * @param onBoth - Combination step; receives both success values. May return
 *   an `AsyncValue`, a promise or a plain value; a thrown error fails the join.
 * @returns Value completing with the outcome of `onBoth`, or with the first
 *   input failure
 *
 * @example
 * ```typescript
 * const written = join(source.fetchLines(), prompt.fetchAdjustment(), (lines, n) =>
 *   sink.write(shift(lines, n)),
 * );
 * await written.await();
 * ```
 */
export function join<A, B, R>(
	a: AsyncValue<A>,
	b: AsyncValue<B>,
	onBoth: (left: A, right: B) => AsyncSource<R>,
): AsyncValue<R> {
	const { value: joined, completer } = AsyncValue.deferred<R>();
	const section = createCriticalSection("join");
	const state: JoinState<A, B> = {
		left: undefined,
		right: undefined,
		fired: false,
	};

	const decide = (side: JoinSide, failure: Error | undefined): Decision<A, B> => {
		if (state.fired) {
			return { kind: "ignore" };
		}
		if (failure) {
			state.fired = true;
			return { kind: "fail", error: failure };
		}
		const { left, right } = state;
		if (left?.success === true && right?.success === true) {
			state.fired = true;
			return { kind: "combine", left: left.data, right: right.data };
		}
		logger.debug("Join waiting on {pending} input", {
			arrived: side,
			pending: side === "left" ? "right" : "left",
		});
		return { kind: "wait" };
	};

	const act = (side: JoinSide, decision: Decision<A, B>, failure?: Error) => {
		switch (decision.kind) {
			case "wait":
				return;
			case "ignore":
				if (failure) {
					logger.debug("Dropping {side} failure after join settled", {
						side,
						error: failure.message,
					});
				}
				return;
			case "fail":
				logger.debug("Join failed on {side} input", {
					side,
					error: decision.error.message,
				});
				completer.fail(decision.error);
				return;
			case "combine": {
				logger.debug("Both inputs present, combining");
				let combined: AsyncValue<R>;
				try {
					combined = AsyncValue.from<R>(onBoth(decision.left, decision.right));
				} catch (error) {
					completer.fail(error);
					return;
				}
				combined.onComplete(completer.complete);
				return;
			}
		}
	};

	a.onComplete((outcome) => {
		const failure = outcome.success ? undefined : outcome.error;
		const decision = section(() => {
			state.left = outcome;
			return decide("left", failure);
		});
		act("left", decision, failure);
	});

	b.onComplete((outcome) => {
		const failure = outcome.success ? undefined : outcome.error;
		const decision = section(() => {
			state.right = outcome;
			return decide("right", failure);
		});
		act("right", decision, failure);
	});

	return joined;
}

/**
 * Promise flavour of {@link join}.
 */
export function joinPromises<A, B, R>(
	a: PromiseLike<A>,
	b: PromiseLike<B>,
	onBoth: (left: A, right: B) => AsyncSource<R>,
): Promise<R> {
	return join(
		AsyncValue.fromPromise(a),
		AsyncValue.fromPromise(b),
		onBoth,
	).toPromise();
}
