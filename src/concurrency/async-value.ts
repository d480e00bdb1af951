/**
 * Single-assignment asynchronous value.
 *
 * An `AsyncValue<T>` starts pending and is completed at most once, with
 * either a value or an error. The state lives in an explicit container with a
 * callback list; both are only touched inside one critical section.
 *
 * - Callbacks registered while pending run, in registration order, when the
 *   value completes.
 * - Callbacks registered after completion run on a later microtask.
 * - Every callback runs exactly once.
 *
 * Only the holder of the {@link Completer} returned by
 * {@link AsyncValue.deferred} can complete a value. Consumers register
 * callbacks with {@link AsyncValue.onComplete} or wait with
 * {@link AsyncValue.await}.
 *
 * ```typescript
 * const lines = AsyncValue.run(() => readFile(path, "utf8"));
 * lines.onComplete((outcome) => {
 *   if (outcome.success) console.log(outcome.data.length);
 * });
 * ```
 *
 * @module concurrency/async-value
 */

import { getLogger } from "@logtape/logtape";
import { toError } from "../errors/structured-error.js";
import { createCriticalSection } from "./critical-section.js";
import { withTimeout } from "./timeout.js";

const logger = getLogger(["roster-shift", "async-value"]);

/**
 * Final result of an asynchronous computation (discriminated union).
 */
export type Outcome<T> =
	| { readonly success: true; readonly data: T }
	| { readonly success: false; readonly error: Error };

export type CompletionCallback<T> = (outcome: Outcome<T>) => void;

export type AsyncValueState = "pending" | "succeeded" | "failed";

/**
 * Producer side of an {@link AsyncValue}.
 *
 * Each method returns `true` if it completed the value and `false` if the
 * value was already complete (in which case nothing changes).
 */
export interface Completer<T> {
	readonly succeed: (value: T) => boolean;
	readonly fail: (error: unknown) => boolean;
	readonly complete: (outcome: Outcome<T>) => boolean;
}

/** Anything {@link AsyncValue.from} can adopt. */
export type AsyncSource<T> = AsyncValue<T> | PromiseLike<T> | T;

export class AsyncValue<T> {
	private outcome: Outcome<T> | undefined = undefined;
	private callbacks: CompletionCallback<T>[] = [];
	private readonly section = createCriticalSection("async-value");

	private constructor() {}

	/**
	 * Create a pending value together with the completer that settles it.
	 */
	static deferred<T>(): { value: AsyncValue<T>; completer: Completer<T> } {
		const value = new AsyncValue<T>();
		const complete = (outcome: Outcome<T>): boolean =>
			value.settle(outcome);
		return {
			value,
			completer: {
				complete,
				succeed: (data) => complete({ success: true, data }),
				fail: (error) => complete({ success: false, error: toError(error) }),
			},
		};
	}

	/**
	 * Run `task` on a later macrotask and complete with its result.
	 *
	 * The caller never executes any of `task` synchronously. A thrown error or
	 * a rejected promise completes the value with that failure.
	 */
	static run<T>(task: () => T | PromiseLike<T>): AsyncValue<T> {
		const { value, completer } = AsyncValue.deferred<T>();
		setImmediate(() => {
			try {
				const result = task();
				if (isPromiseLike(result)) {
					void result.then(completer.succeed, completer.fail);
				} else {
					completer.succeed(result);
				}
			} catch (error) {
				completer.fail(error);
			}
		});
		return value;
	}

	static succeeded<T>(data: T): AsyncValue<T> {
		const { value, completer } = AsyncValue.deferred<T>();
		completer.succeed(data);
		return value;
	}

	static failed<T = never>(error: unknown): AsyncValue<T> {
		const { value, completer } = AsyncValue.deferred<T>();
		completer.fail(error);
		return value;
	}

	/** Adopt the settlement of a promise. */
	static fromPromise<T>(promise: PromiseLike<T>): AsyncValue<T> {
		const { value, completer } = AsyncValue.deferred<T>();
		void promise.then(completer.succeed, completer.fail);
		return value;
	}

	/** Adopt an async value, a promise, or a plain value. */
	static from<T>(source: AsyncSource<T>): AsyncValue<T> {
		if (source instanceof AsyncValue) return source;
		if (isPromiseLike<T>(source)) return AsyncValue.fromPromise(source);
		return AsyncValue.succeeded(source);
	}

	get state(): AsyncValueState {
		if (!this.outcome) return "pending";
		return this.outcome.success ? "succeeded" : "failed";
	}

	get isCompleted(): boolean {
		return this.outcome !== undefined;
	}

	/** The final outcome, or `undefined` while pending. */
	get result(): Outcome<T> | undefined {
		return this.outcome;
	}

	/**
	 * Register a callback for the final outcome.
	 */
	onComplete(callback: CompletionCallback<T>): void {
		const settled = this.section(() => {
			if (!this.outcome) {
				this.callbacks.push(callback);
			}
			return this.outcome;
		});
		if (settled) {
			queueMicrotask(() => invoke(callback, settled));
		}
	}

	/**
	 * Derive a value by transforming the success value.
	 *
	 * Failures pass through; an error thrown by `fn` fails the derived value.
	 */
	map<U>(fn: (data: T) => U): AsyncValue<U> {
		return this.chain((data) => AsyncValue.succeeded(fn(data)));
	}

	/**
	 * Derive a value from another asynchronous step started on success.
	 */
	chain<U>(fn: (data: T) => AsyncSource<U>): AsyncValue<U> {
		const { value, completer } = AsyncValue.deferred<U>();
		this.onComplete((outcome) => {
			if (!outcome.success) {
				completer.fail(outcome.error);
				return;
			}
			let next: AsyncValue<U>;
			try {
				next = AsyncValue.from<U>(fn(outcome.data));
			} catch (error) {
				completer.fail(error);
				return;
			}
			next.onComplete(completer.complete);
		});
		return value;
	}

	toPromise(): Promise<T> {
		return new Promise<T>((resolve, reject) => {
			this.onComplete((outcome) => {
				if (outcome.success) {
					resolve(outcome.data);
				} else {
					reject(outcome.error);
				}
			});
		});
	}

	/**
	 * Wait for the value, optionally bounded.
	 *
	 * @param timeoutMs - Upper bound on the wait; omit to wait indefinitely
	 * @throws {TimeoutError} If the bound is exceeded before completion
	 */
	await(timeoutMs?: number): Promise<T> {
		const promise = this.toPromise();
		if (timeoutMs === undefined) return promise;
		return withTimeout(
			promise,
			timeoutMs,
			`Value not available after ${timeoutMs}ms`,
		);
	}

	private settle(outcome: Outcome<T>): boolean {
		const pending = this.section(() => {
			if (this.outcome) return undefined;
			this.outcome = outcome;
			const callbacks = this.callbacks;
			this.callbacks = [];
			return callbacks;
		});
		if (!pending) return false;
		for (const callback of pending) {
			invoke(callback, outcome);
		}
		return true;
	}
}

function invoke<T>(callback: CompletionCallback<T>, outcome: Outcome<T>): void {
	try {
		callback(outcome);
	} catch (error) {
		// A throwing callback must not stop the others; it still surfaces as an
		// uncaught exception.
		logger.error("Completion callback threw", {
			error: toError(error).message,
		});
		queueMicrotask(() => {
			throw error;
		});
	}
}

function isPromiseLike<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
	return (
		(typeof value === "object" || typeof value === "function") &&
		value !== null &&
		"then" in value &&
		typeof value.then === "function"
	);
}
