/**
 * In-memory collaborators for embedding the pipeline and for tests.
 *
 * @module io/memory
 */

import { AsyncValue } from "../concurrency/async-value.js";
import type {
	AdjustmentProvider,
	Notifier,
	Sink,
	SourceProvider,
} from "./types.js";

/** Source that yields fixed lines, or fails with a fixed error. */
export class MemorySource implements SourceProvider {
	/** Number of `fetchLines` calls so far. */
	reads = 0;

	constructor(private readonly lines: readonly string[] | Error) {}

	fetchLines(): AsyncValue<string[]> {
		this.reads++;
		const { lines } = this;
		return AsyncValue.run(() => {
			if (lines instanceof Error) throw lines;
			return [...lines];
		});
	}
}

/** Adjustment provider that answers with a fixed value or error. */
export class FixedAdjustment implements AdjustmentProvider {
	/** Number of `fetchAdjustment` calls so far. */
	asked = 0;

	constructor(private readonly answer: number | Error) {}

	fetchAdjustment(): AsyncValue<number> {
		this.asked++;
		const { answer } = this;
		return AsyncValue.run(() => {
			if (answer instanceof Error) throw answer;
			return answer;
		});
	}
}

/** Sink that records every write, optionally failing instead. */
export class MemorySink implements Sink {
	readonly writes: string[][] = [];

	constructor(private readonly failure?: Error) {}

	write(lines: readonly string[]): AsyncValue<void> {
		const { failure } = this;
		return AsyncValue.run(() => {
			if (failure) throw failure;
			this.writes.push([...lines]);
		});
	}

	/** Lines of the most recent write, if any. */
	get lastWrite(): string[] | undefined {
		return this.writes[this.writes.length - 1];
	}
}

/** Notifier that keeps every message. */
export class CollectingNotifier implements Notifier {
	readonly messages: string[] = [];

	notify(message: string): void {
		this.messages.push(message);
	}
}
