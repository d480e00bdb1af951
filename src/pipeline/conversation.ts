/**
 * The `conversation` strategy.
 *
 * A coordinator talks to two workers over channels. Each worker owns one
 * concern and only acts when asked:
 *
 * ```
 * coordinator            read-write worker        update worker
 *   greet ─────────────────────▶                      ◀──────── greet
 *   ◀──────────────────── greet-ok           greet-ok ────────▶
 *   read-request ──────────────▶                      ◀─ update-request
 *   ◀──────────────── read-answer       update-answer ────────▶
 *                 (join both answers, transform)
 *   write-request ─────────────▶
 *   ◀─────────────────── write-ok
 *   goodbye ───────────────────▶                      ◀──────── goodbye
 * ```
 *
 * A worker that fails answers with a `failed` message; the coordinator stops
 * the conversation on the first one and closes every channel, which ends the
 * workers.
 *
 * @module pipeline/conversation
 */

import { getLogger } from "@logtape/logtape";
import { AsyncValue } from "../concurrency/async-value.js";
import { Channel, ChannelClosedError } from "../concurrency/channel.js";
import { join } from "../concurrency/join.js";
import { StructuredError, toError } from "../errors/structured-error.js";
import type { RosterIO } from "../io/types.js";
import { parseRecords } from "../record/index.js";
import {
	awaitInputs,
	finish,
	type PipelineReport,
	type RunContext,
	type RunInputs,
	transformStage,
} from "./stages.js";

const logger = getLogger(["roster-shift", "conversation"]);

export type ReadWriteRequest =
	| { type: "greet" }
	| { type: "read-request" }
	| { type: "write-request"; lines: string[] }
	| { type: "goodbye" };

export type ReadWriteReply =
	| { type: "greet-ok" }
	| { type: "read-answer"; lines: string[] }
	| { type: "write-ok" }
	| { type: "failed"; error: Error };

export type UpdateRequest =
	| { type: "greet" }
	| { type: "update-request" }
	| { type: "goodbye" };

export type UpdateReply =
	| { type: "greet-ok" }
	| { type: "update-answer"; adjustment: number }
	| { type: "failed"; error: Error };

type Message = { type: string };

function hasType<M extends Message, K extends M["type"]>(
	message: M,
	type: K,
): message is Extract<M, { type: K }> {
	return message.type === type;
}

/** Two channels, one per direction, between the coordinator and a worker. */
export class Link<Request extends Message, Reply extends Message> {
	private readonly requests: Channel<Request>;
	private readonly replies: Channel<Reply>;

	constructor(readonly worker: string) {
		this.requests = new Channel(`${worker}:requests`);
		this.replies = new Channel(`${worker}:replies`);
	}

	/** Coordinator side: send a request to the worker. */
	request(message: Request): void {
		this.requests.send(message);
	}

	/**
	 * Coordinator side: wait for the next reply and require it to be of `type`.
	 *
	 * @throws The worker's error when it answered `failed`
	 * @throws {StructuredError} On any other unexpected reply
	 */
	async expect<K extends Reply["type"]>(
		type: K,
	): Promise<Extract<Reply, { type: K }>> {
		const reply = await this.replies.receive();
		logger.debug("{worker} worker replied {reply}", {
			worker: this.worker,
			reply: reply.type,
		});
		if (hasType(reply, type)) return reply;
		if ("error" in reply && reply.error instanceof Error) throw reply.error;
		throw new StructuredError(
			`Expected ${type} from ${this.worker} worker, got ${reply.type}`,
			"INTERNAL",
			"UNEXPECTED_REPLY",
			false,
			{ worker: this.worker, expected: type, received: reply.type },
		);
	}

	/**
	 * Worker side: the next request, or `undefined` once the link is closed.
	 */
	async nextRequest(): Promise<Request | undefined> {
		try {
			return await this.requests.receive();
		} catch (error) {
			if (error instanceof ChannelClosedError) return undefined;
			throw error;
		}
	}

	/** Worker side: answer, unless the coordinator has already hung up. */
	reply(message: Reply): void {
		if (this.replies.isClosed) {
			logger.debug("{worker} worker dropped {reply}, coordinator is gone", {
				worker: this.worker,
				reply: message.type,
			});
			return;
		}
		this.replies.send(message);
	}

	close(): void {
		this.requests.close();
		this.replies.close();
	}
}

/**
 * Serve read and write requests against the source and the sink.
 */
export async function readWriteWorker(
	link: Link<ReadWriteRequest, ReadWriteReply>,
	io: Pick<RosterIO, "source" | "sink">,
): Promise<void> {
	for (;;) {
		const request = await link.nextRequest();
		if (!request || request.type === "goodbye") return;

		switch (request.type) {
			case "greet":
				link.reply({ type: "greet-ok" });
				break;
			case "read-request":
				try {
					const lines = await io.source.fetchLines().await();
					link.reply({ type: "read-answer", lines });
				} catch (error) {
					link.reply({ type: "failed", error: toError(error) });
				}
				break;
			case "write-request":
				try {
					await io.sink.write(request.lines).await();
					link.reply({ type: "write-ok" });
				} catch (error) {
					link.reply({ type: "failed", error: toError(error) });
				}
				break;
		}
	}
}

/**
 * Serve update requests against the adjustment provider.
 */
export async function updateWorker(
	link: Link<UpdateRequest, UpdateReply>,
	io: Pick<RosterIO, "adjustment">,
): Promise<void> {
	for (;;) {
		const request = await link.nextRequest();
		if (!request || request.type === "goodbye") return;

		switch (request.type) {
			case "greet":
				link.reply({ type: "greet-ok" });
				break;
			case "update-request":
				try {
					const adjustment = await io.adjustment.fetchAdjustment().await();
					link.reply({ type: "update-answer", adjustment });
				} catch (error) {
					link.reply({ type: "failed", error: toError(error) });
				}
				break;
		}
	}
}

export async function runConversation(
	ctx: RunContext,
): Promise<PipelineReport> {
	const { io, tracker } = ctx;
	const readWrite = new Link<ReadWriteRequest, ReadWriteReply>("read-write");
	const update = new Link<UpdateRequest, UpdateReply>("update");
	const workers = Promise.all([
		readWriteWorker(readWrite, io),
		updateWorker(update, io),
	]);

	const fetchLines = async (): Promise<string[]> => {
		readWrite.request({ type: "greet" });
		await readWrite.expect("greet-ok");
		readWrite.request({ type: "read-request" });
		return (await readWrite.expect("read-answer")).lines;
	};

	const fetchAdjustment = async (): Promise<number> => {
		update.request({ type: "greet" });
		await update.expect("greet-ok");
		update.request({ type: "update-request" });
		return (await update.expect("update-answer")).adjustment;
	};

	try {
		tracker.advance("reading-prompting");
		const inputs = join(
			AsyncValue.fromPromise(fetchLines()).map(parseRecords),
			AsyncValue.fromPromise(fetchAdjustment()),
			(records, adjustment): RunInputs => ({ records, adjustment }),
		);
		const { records, adjustment } = await awaitInputs(
			ctx,
			inputs.toPromise(),
		);

		const transformed = transformStage(ctx, { records, adjustment });
		tracker.advance("writing");
		readWrite.request({ type: "write-request", lines: transformed.lines });
		await readWrite.expect("write-ok");

		readWrite.request({ type: "goodbye" });
		update.request({ type: "goodbye" });
		await workers;
		logger.debug("Shutdown");

		return finish(ctx, adjustment, transformed);
	} catch (error) {
		readWrite.close();
		update.close();
		// A worker still waiting on its provider ends once the provider answers.
		void workers.catch((workerError: unknown) => {
			logger.error("Worker ended with an error: {error}", {
				error: toError(workerError).message,
			});
		});
		throw error;
	}
}
