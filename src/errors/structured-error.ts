/**
 * Structured error base for roster-shift.
 *
 * Every failure a run can end with is a `StructuredError` subclass carrying:
 * - a category shared by all errors of one kind
 * - a machine-readable code for the specific condition
 * - a `recoverable` flag (runs are never retried, so the pipeline's own
 *   errors are all non-recoverable)
 * - context metadata and an optional cause
 *
 * @module errors/structured-error
 */

/**
 * Error categories known to the pipeline.
 */
export type ErrorCategory =
	| "MALFORMED_RECORD" // Bad line shape, bad or out-of-range age
	| "INVALID_INPUT" // Adjustment could not be parsed
	| "IO" // Read or write failed
	| "TIMEOUT" // Bounded wait exceeded
	| "CONFIGURATION" // Invalid run configuration
	| "INTERNAL"; // Broken invariant or closed channel

/** JSON form produced by {@link StructuredError.toJSON}. */
export interface StructuredErrorJSON {
	name: string;
	message: string;
	category: ErrorCategory;
	code: string;
	recoverable: boolean;
	context: Record<string, unknown>;
	stack?: string;
	cause?: {
		name: string;
		message: string;
		stack?: string;
	};
}

/**
 * Structured error with categorization, recoverability, and context.
 *
 * @example
 * ```typescript
 * throw new StructuredError(
 *   "Join completed twice",
 *   "INTERNAL",
 *   "JOIN_STATE",
 *   false,
 *   { side: "left" },
 * );
 * ```
 */
export class StructuredError extends Error {
	/** High-level error category. */
	public readonly category: ErrorCategory;

	/** Machine-readable error code (e.g. "FIELD_COUNT", "ENOENT"). */
	public readonly code: string;

	/** Whether retrying could succeed. */
	public readonly recoverable: boolean;

	/** Arbitrary context metadata for debugging. */
	public readonly context: Record<string, unknown>;

	/** Original error, when this one wraps another. */
	public override readonly cause?: Error;

	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		recoverable: boolean,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message);
		this.name = "StructuredError";
		this.category = category;
		this.code = code;
		this.recoverable = recoverable;
		this.context = context;
		this.cause = cause;

		// Capture stack trace for V8 engines
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}

	/**
	 * Serialize error to JSON for logging.
	 */
	toJSON(): StructuredErrorJSON {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			recoverable: this.recoverable,
			context: this.context,
			stack: this.stack,
			cause: this.cause
				? {
						name: this.cause.name,
						message: this.cause.message,
						stack: this.cause.stack,
					}
				: undefined,
		};
	}
}

/**
 * Type guard to check if an error is a StructuredError.
 */
export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError;
}

/**
 * Coerce any thrown value into an Error.
 *
 * Thrown non-errors (strings, objects) are wrapped so that callers can always
 * rely on `message` and `stack`.
 */
export function toError(value: unknown): Error {
	if (value instanceof Error) return value;
	return new Error(typeof value === "string" ? value : String(value));
}
