import { describe, expect, test } from "vitest";
import { validateInteger } from "./numbers.js";

describe("validation/numbers", () => {
	describe("validateInteger", () => {
		test("accepts integer numbers", () => {
			expect(validateInteger(42, { name: "age" })).toEqual({
				valid: true,
				value: 42,
			});
			expect(validateInteger(0, { name: "age" })).toEqual({
				valid: true,
				value: 0,
			});
		});

		test("parses base-10 strings including negatives", () => {
			expect(validateInteger("87", { name: "age" })).toEqual({
				valid: true,
				value: 87,
			});
			expect(validateInteger("-2", { name: "adjustment" })).toEqual({
				valid: true,
				value: -2,
			});
		});

		test("normalizes negative zero to zero", () => {
			const fromText = validateInteger("-0", { name: "age" });
			const fromNumber = validateInteger(-0, { name: "age" });

			expect(fromText.valid && Object.is(fromText.value, 0)).toBe(true);
			expect(fromNumber.valid && Object.is(fromNumber.value, 0)).toBe(true);
		});

		test("rejects strings with trailing garbage", () => {
			expect(validateInteger("12abc", { name: "age" })).toEqual({
				valid: false,
				error: 'age must be a base-10 integer (got: "12abc")',
			});
		});

		test("rejects decimals, hex, a leading plus and empty strings", () => {
			for (const raw of ["4.5", "0x1f", "+3", "", "-"]) {
				expect(validateInteger(raw, { name: "age" }).valid).toBe(false);
			}
		});

		test("rejects surrounding whitespace unless trimming", () => {
			expect(validateInteger(" 7 ", { name: "adjustment" }).valid).toBe(false);
			expect(
				validateInteger(" 7 ", { name: "adjustment", trim: true }),
			).toEqual({ valid: true, value: 7 });
		});

		test("rejects non-integer numbers", () => {
			expect(validateInteger(3.14, { name: "count" })).toEqual({
				valid: false,
				error: "count must be a safe integer",
			});
			expect(validateInteger(Number.NaN, { name: "count" }).valid).toBe(false);
		});

		test("rejects values beyond the safe-integer range", () => {
			expect(validateInteger("9007199254740993", { name: "age" })).toEqual({
				valid: false,
				error: "age must be a safe integer",
			});
		});

		test("rejects missing and non-numeric values", () => {
			expect(validateInteger(undefined, { name: "count" })).toEqual({
				valid: false,
				error: "count is required",
			});
			expect(validateInteger(true, { name: "count" })).toEqual({
				valid: false,
				error: "count must be a number",
			});
		});

		test("enforces bounds", () => {
			expect(validateInteger(0, { name: "timeoutMs", min: 1, max: 100 })).toEqual(
				{ valid: false, error: "timeoutMs must be between 1 and 100" },
			);
			expect(
				validateInteger(100, { name: "timeoutMs", min: 1, max: 100 }),
			).toEqual({ valid: true, value: 100 });
		});
	});
});
