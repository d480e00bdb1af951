/**
 * Domain errors raised by the codec, the providers and the configuration
 * layer. `TimeoutError` lives with the timeout helpers in
 * `concurrency/timeout.ts`.
 *
 * @module errors/pipeline-errors
 */

import { StructuredError } from "./structured-error.js";

/**
 * A line could not be parsed into a record, or an adjusted age no longer
 * fits a safe integer.
 */
export class MalformedRecordError extends StructuredError {
	constructor(
		message: string,
		code: "FIELD_COUNT" | "AGE_NOT_INTEGER" | "AGE_OUT_OF_RANGE",
		context: Record<string, unknown> = {},
	) {
		super(message, "MALFORMED_RECORD", code, false, context);
		this.name = "MalformedRecordError";
	}
}

/**
 * The adjustment typed at the prompt is not a base-10 integer, or input
 * ended before an answer arrived.
 */
export class InvalidInputError extends StructuredError {
	constructor(
		message: string,
		code: "NOT_INTEGER" | "INPUT_CLOSED",
		context: Record<string, unknown> = {},
	) {
		super(message, "INVALID_INPUT", code, false, context);
		this.name = "InvalidInputError";
	}
}

/**
 * Reading or writing the record file failed.
 *
 * The code is the Node error code when there is one (`ENOENT`, `EACCES`, ...).
 */
export class IoError extends StructuredError {
	constructor(
		message: string,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message, "IO", errnoCode(cause) ?? "IO_FAILED", false, context, cause);
		this.name = "IoError";
	}
}

/**
 * A run configuration failed validation.
 */
export class ConfigurationError extends StructuredError {
	constructor(
		message: string,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message, "CONFIGURATION", "INVALID_CONFIG", false, context, cause);
		this.name = "ConfigurationError";
	}
}

function errnoCode(error: Error | undefined): string | undefined {
	if (error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}
