/**
 * Integer validation for record ages and prompt answers.
 *
 * Parsing is strict: an optional leading `-` followed by base-10 digits,
 * nothing else. `Number.parseInt` would accept `"12abc"` and `"0x1f"`, so it
 * is never used here.
 *
 * @module validation/numbers
 */

/**
 * Result of a validation (discriminated union).
 */
export type ValidationResult<T> =
	| { readonly valid: true; readonly value: T }
	| { readonly valid: false; readonly error: string };

/** Optional leading minus, then at least one digit. */
export const BASE_TEN_INTEGER_PATTERN = /^-?\d+$/;

/**
 * Options for integer validation.
 */
export interface ValidateIntegerOptions {
	/** Field name for error messages */
	name: string;
	/** Minimum allowed value (default: Number.MIN_SAFE_INTEGER) */
	min?: number;
	/** Maximum allowed value (default: Number.MAX_SAFE_INTEGER) */
	max?: number;
	/** Trim surrounding whitespace from string input (default: false) */
	trim?: boolean;
}

/**
 * Validate that a value is an integer within optional bounds.
 *
 * Numbers must be integers; strings must match {@link BASE_TEN_INTEGER_PATTERN}
 * and fit in the safe-integer range.
 *
 * @example
 * ```ts
 * validateInteger("42", { name: "age" })
 * // => { valid: true, value: 42 }
 *
 * validateInteger("-2", { name: "adjustment" })
 * // => { valid: true, value: -2 }
 *
 * validateInteger("4.5", { name: "age" })
 * // => { valid: false, error: 'age must be a base-10 integer (got: "4.5")' }
 *
 * validateInteger(150, { name: "count", min: 1, max: 100 })
 * // => { valid: false, error: "count must be between 1 and 100" }
 * ```
 */
export function validateInteger(
	value: unknown,
	options: ValidateIntegerOptions,
): ValidationResult<number> {
	const {
		name,
		min = Number.MIN_SAFE_INTEGER,
		max = Number.MAX_SAFE_INTEGER,
		trim = false,
	} = options;

	if (value === undefined || value === null) {
		return { valid: false, error: `${name} is required` };
	}

	let num: number;
	if (typeof value === "string") {
		const text = trim ? value.trim() : value;
		if (!BASE_TEN_INTEGER_PATTERN.test(text)) {
			return {
				valid: false,
				error: `${name} must be a base-10 integer (got: ${JSON.stringify(value)})`,
			};
		}
		num = Number(text);
	} else if (typeof value === "number") {
		num = value;
	} else {
		return { valid: false, error: `${name} must be a number` };
	}

	if (!Number.isSafeInteger(num)) {
		return { valid: false, error: `${name} must be a safe integer` };
	}

	if (num < min || num > max) {
		return { valid: false, error: `${name} must be between ${min} and ${max}` };
	}

	// "-0" and -0 both come back as 0
	return { valid: true, value: num === 0 ? 0 : num };
}
