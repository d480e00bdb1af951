/**
 * Age adjustment.
 *
 * @module record/transform
 */

import { MalformedRecordError } from "../errors/pipeline-errors.js";
import type { PersonRecord } from "./codec.js";

/** Receives one human-readable line per adjusted record. */
export type Notify = (message: string) => void;

/**
 * Notification text for one adjusted record.
 *
 * @example
 * ```ts
 * describeChange({ firstName: "Ada", lastName: "Lovelace", age: 36 }, 38)
 * // → "The age of Ada Lovelace changes from 36 to 38"
 * ```
 */
export function describeChange(record: PersonRecord, newAge: number): string {
	return `The age of ${record.firstName} ${record.lastName} changes from ${record.age} to ${newAge}`;
}

/**
 * Return a copy of `record` with `adjustment` added to its age.
 *
 * Zero and negative adjustments go through the same path as positive ones,
 * including the notification.
 *
 * @throws {MalformedRecordError} With code `AGE_OUT_OF_RANGE` when the new
 *   age is not a safe integer; nothing is notified for that record
 */
export function applyAdjustment(
	record: PersonRecord,
	adjustment: number,
	notify?: Notify,
): PersonRecord {
	const age = record.age + adjustment;
	if (!Number.isSafeInteger(age)) {
		throw new MalformedRecordError(
			`Age of ${record.firstName} ${record.lastName} out of range: ${record.age} + ${adjustment}`,
			"AGE_OUT_OF_RANGE",
			{ age: record.age, adjustment },
		);
	}
	notify?.(describeChange(record, age));
	return { ...record, age };
}

/**
 * Adjust every record; notifications follow input order.
 */
export function adjustAll(
	records: readonly PersonRecord[],
	adjustment: number,
	notify?: Notify,
): PersonRecord[] {
	return records.map((record) => applyAdjustment(record, adjustment, notify));
}
