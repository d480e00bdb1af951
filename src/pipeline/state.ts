/**
 * Run state machine.
 *
 * ```
 * idle → reading-prompting → joined → transforming → writing → done
 *                 ↘               ↘            ↘           ↘
 *                                 failed
 * ```
 *
 * `done` and `failed` are terminal.
 *
 * @module pipeline/state
 */

import { StructuredError } from "../errors/structured-error.js";

export type PipelineState =
	| "idle"
	| "reading-prompting"
	| "joined"
	| "transforming"
	| "writing"
	| "done"
	| "failed";

const NEXT_STATE: Readonly<Record<PipelineState, PipelineState | undefined>> = {
	idle: "reading-prompting",
	"reading-prompting": "joined",
	joined: "transforming",
	transforming: "writing",
	writing: "done",
	done: undefined,
	failed: undefined,
};

export type StateChangeListener = (
	state: PipelineState,
	previous: PipelineState,
) => void;

/**
 * Tracks one run's state and reports each change.
 */
export class StateTracker {
	private state: PipelineState = "idle";
	private failedIn: PipelineState | undefined = undefined;

	constructor(private readonly listener?: StateChangeListener) {}

	get current(): PipelineState {
		return this.state;
	}

	/** State the run was in when it failed, if it failed. */
	get failedFrom(): PipelineState | undefined {
		return this.failedIn;
	}

	/**
	 * Move to the next state.
	 *
	 * @throws {StructuredError} If `next` does not follow the current state
	 */
	advance(next: PipelineState): void {
		if (NEXT_STATE[this.state] !== next) {
			throw new StructuredError(
				`Illegal state change from ${this.state} to ${next}`,
				"INTERNAL",
				"ILLEGAL_STATE_CHANGE",
				false,
				{ from: this.state, to: next },
			);
		}
		this.set(next);
	}

	/**
	 * Move to `failed`. Has no effect once the run reached a terminal state.
	 */
	fail(): void {
		if (this.state === "done" || this.state === "failed") return;
		this.failedIn = this.state;
		this.set("failed");
	}

	private set(next: PipelineState): void {
		const previous = this.state;
		this.state = next;
		this.listener?.(next, previous);
	}
}
