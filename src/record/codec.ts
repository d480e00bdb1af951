/**
 * Person record codec.
 *
 * One record per line, three comma-separated fields: first name, last name,
 * age. There is no quoting or escaping, so names cannot contain commas.
 *
 * @module record/codec
 */

import { MalformedRecordError } from "../errors/pipeline-errors.js";
import { validateInteger } from "../validation/numbers.js";

/** Field delimiter for record lines. */
export const FIELD_DELIMITER = ",";

/** Number of fields in a record line. */
export const FIELD_COUNT = 3;

/**
 * One parsed data row.
 */
export interface PersonRecord {
	readonly firstName: string;
	readonly lastName: string;
	/** Safe integer; no range constraint. */
	readonly age: number;
}

/** Where a line came from, for error messages. */
export interface LineOrigin {
	/** Raw line */
	line?: string;
	/** 1-based line number */
	lineNumber?: number;
}

/**
 * Parse one line into a record.
 *
 * @throws {MalformedRecordError} If the line does not have exactly three
 *   fields or the age is not a base-10 integer
 *
 * @example
 * ```ts
 * parseRecord("Ada,Lovelace,36")
 * // → { firstName: "Ada", lastName: "Lovelace", age: 36 }
 * ```
 */
export function parseRecord(line: string, lineNumber?: number): PersonRecord {
	return recordFromFields(line.split(FIELD_DELIMITER), { line, lineNumber });
}

/**
 * Serialize a record back to a line. Inverse of {@link parseRecord}.
 */
export function serializeRecord(record: PersonRecord): string {
	return recordToFields(record).join(FIELD_DELIMITER);
}

/**
 * Build a record from its fields in `[firstName, lastName, age]` order.
 */
export function recordFromFields(
	fields: readonly string[],
	origin: LineOrigin = {},
): PersonRecord {
	const line = origin.line ?? fields.join(FIELD_DELIMITER);
	const { lineNumber } = origin;
	const prefix = lineNumber === undefined ? "" : `Line ${lineNumber}: `;
	const context = lineNumber === undefined ? { line } : { line, lineNumber };

	const [firstName, lastName, rawAge] = fields;
	if (
		fields.length !== FIELD_COUNT ||
		firstName === undefined ||
		lastName === undefined ||
		rawAge === undefined
	) {
		throw new MalformedRecordError(
			`${prefix}expected ${FIELD_COUNT} fields but found ${fields.length}`,
			"FIELD_COUNT",
			{ ...context, fieldCount: fields.length },
		);
	}

	const age = validateInteger(rawAge, { name: "age" });
	if (!age.valid) {
		throw new MalformedRecordError(`${prefix}${age.error}`, "AGE_NOT_INTEGER", {
			...context,
			age: rawAge,
		});
	}

	return { firstName, lastName, age: age.value };
}

/**
 * List form of a record: `[firstName, lastName, age]`.
 */
export function recordToFields(record: PersonRecord): string[] {
	return [record.firstName, record.lastName, String(record.age)];
}

/**
 * Parse every line, in order. Errors name the 1-based line number.
 */
export function parseRecords(lines: readonly string[]): PersonRecord[] {
	return lines.map((line, index) => parseRecord(line, index + 1));
}

/**
 * Serialize every record, in order.
 */
export function serializeRecords(records: readonly PersonRecord[]): string[] {
	return records.map(serializeRecord);
}
