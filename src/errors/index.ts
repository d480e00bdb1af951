/**
 * Error handling utilities and base classes.
 *
 * @module errors
 */

export {
	ConfigurationError,
	InvalidInputError,
	IoError,
	MalformedRecordError,
} from "./pipeline-errors.js";
export {
	type ErrorCategory,
	isStructuredError,
	StructuredError,
	type StructuredErrorJSON,
	toError,
} from "./structured-error.js";
