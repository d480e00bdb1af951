/**
 * Concurrency primitives for the roster pipeline.
 *
 * ## AsyncValue
 *
 * A single-assignment value completed once by its producer, observed through
 * callbacks or awaited with an optional bound.
 *
 * ```typescript
 * import { AsyncValue } from "roster-shift/concurrency";
 *
 * const answer = AsyncValue.run(() => 42);
 * console.log(await answer.await(1000));
 * ```
 *
 * ## Join
 *
 * Waits for two independent values and runs the combination step exactly
 * once when both succeeded.
 *
 * ```typescript
 * import { join } from "roster-shift/concurrency";
 *
 * const total = join(AsyncValue.run(readCount), AsyncValue.run(askOffset), (a, b) => a + b);
 * ```
 *
 * ## Channels
 *
 * In-order message queues used by the conversation strategy.
 *
 * ## Timeouts
 *
 * ```typescript
 * import { withTimeout, TimeoutError } from "roster-shift/concurrency";
 *
 * try {
 *   await withTimeout(slowOperation(), 5000);
 * } catch (error) {
 *   if (error instanceof TimeoutError) {
 *     console.error(`Timed out after ${error.timeoutMs}ms`);
 *   }
 * }
 * ```
 *
 * @module concurrency
 */

export {
	type AsyncSource,
	AsyncValue,
	type AsyncValueState,
	type CompletionCallback,
	type Completer,
	type Outcome,
} from "./async-value.js";
export { Channel, ChannelClosedError } from "./channel.js";
export {
	type CriticalSection,
	createCriticalSection,
} from "./critical-section.js";
export { type JoinSide, join, joinPromises } from "./join.js";
export { TimeoutError, withTimeout } from "./timeout.js";
