/**
 * Input validation utilities.
 *
 * @module validation
 */

export {
	BASE_TEN_INTEGER_PATTERN,
	type ValidateIntegerOptions,
	type ValidationResult,
	validateInteger,
} from "./numbers.js";
