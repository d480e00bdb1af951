/**
 * Non-reentrant critical section.
 *
 * Node runs callbacks to completion on one thread, so two producers can never
 * interleave inside a synchronous region. What can still go wrong is
 * re-entry: a callback invoked while the region is held that tries to update
 * the same state. The section turns that into an immediate error instead of a
 * torn update.
 *
 * @module concurrency/critical-section
 */

import { StructuredError } from "../errors/structured-error.js";

/** Runs `action` with exclusive access to the state it guards. */
export type CriticalSection = <R>(action: () => R) => R;

export function createCriticalSection(name: string): CriticalSection {
	let held = false;
	return (action) => {
		if (held) {
			throw new StructuredError(
				`Critical section "${name}" entered while held`,
				"INTERNAL",
				"REENTRANT_SECTION",
				false,
				{ section: name },
			);
		}
		try {
			held = true;
			return action();
		} finally {
			held = false;
		}
	};
}
