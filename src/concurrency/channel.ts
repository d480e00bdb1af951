/**
 * Unbounded in-order message channel.
 *
 * One side `send`s, the other `receive`s. Messages sent while nobody waits
 * are buffered; receivers waiting on an empty channel are resumed in the
 * order they called `receive`. Closing a channel rejects every pending and
 * future `receive` with {@link ChannelClosedError}.
 *
 * @module concurrency/channel
 */

import { StructuredError } from "../errors/structured-error.js";

export class ChannelClosedError extends StructuredError {
	constructor(channel: string) {
		super(`Channel "${channel}" is closed`, "INTERNAL", "CHANNEL_CLOSED", false, {
			channel,
		});
		this.name = "ChannelClosedError";
	}
}

interface Receiver<T> {
	resolve: (message: T) => void;
	reject: (error: Error) => void;
}

export class Channel<T> {
	private readonly buffer: Array<{ message: T }> = [];
	private readonly receivers: Receiver<T>[] = [];
	private closed = false;

	constructor(public readonly name: string) {}

	send(message: T): void {
		if (this.closed) {
			throw new ChannelClosedError(this.name);
		}
		const receiver = this.receivers.shift();
		if (receiver) {
			receiver.resolve(message);
		} else {
			this.buffer.push({ message });
		}
	}

	receive(): Promise<T> {
		const next = this.buffer.shift();
		if (next) {
			return Promise.resolve(next.message);
		}
		if (this.closed) {
			return Promise.reject(new ChannelClosedError(this.name));
		}
		return new Promise<T>((resolve, reject) => {
			this.receivers.push({ resolve, reject });
		});
	}

	/**
	 * Close the channel. Buffered messages can still be received.
	 */
	close(): void {
		if (this.closed) return;
		this.closed = true;
		for (const receiver of this.receivers.splice(0)) {
			receiver.reject(new ChannelClosedError(this.name));
		}
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/** Number of buffered, unreceived messages. */
	get size(): number {
		return this.buffer.length;
	}
}
