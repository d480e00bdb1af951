/**
 * Timeout utilities for async operations.
 *
 * Provides a Promise.race-based bound on how long a caller waits. The
 * operation itself is not cancelled (there is no cancellation in Node for an
 * arbitrary promise); only the wait ends. The timer is always cleared, so a
 * settled race never keeps the process alive.
 *
 * @module concurrency/timeout
 */

import { StructuredError } from "../errors/structured-error.js";

/**
 * Error thrown when a bounded wait is exceeded.
 *
 * Distinct from the failure of the operation being waited on.
 */
export class TimeoutError extends StructuredError {
	/**
	 * @param message - Error description
	 * @param timeoutMs - Timeout duration that was exceeded
	 */
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message, "TIMEOUT", "TIMEOUT", false, { timeoutMs });
		this.name = "TimeoutError";
	}
}

/**
 * Wrap an async operation with a timeout.
 *
 * @param promise - Async operation to wrap
 * @param timeoutMs - Maximum time to wait in milliseconds
 * @param message - Optional error message (default: "Operation timed out after {timeoutMs}ms")
 * @returns Result of the operation if completed within timeout
 * @throws {TimeoutError} If operation exceeds timeout
 *
 * @example
 * ```typescript
 * try {
 *   const lines = await withTimeout(source.fetchLines().toPromise(), 5000);
 * } catch (error) {
 *   if (error instanceof TimeoutError) {
 *     console.error(`Timed out after ${error.timeoutMs}ms`);
 *   }
 * }
 * ```
 */
export async function withTimeout<T>(
	promise: PromiseLike<T>,
	timeoutMs: number,
	message?: string,
): Promise<T> {
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			const errorMessage =
				message ?? `Operation timed out after ${timeoutMs}ms`;
			reject(new TimeoutError(errorMessage, timeoutMs));
		}, timeoutMs);
	});

	try {
		return await Promise.race([promise, timeout]);
	} finally {
		clearTimeout(timer);
	}
}
