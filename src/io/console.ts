/**
 * Console prompt and notifier.
 *
 * @module io/console
 */

import { createInterface } from "node:readline";
import { getLogger } from "@logtape/logtape";
import { AsyncValue } from "../concurrency/async-value.js";
import { InvalidInputError } from "../errors/pipeline-errors.js";
import { validateInteger } from "../validation/numbers.js";
import type { AdjustmentProvider, Notifier } from "./types.js";

const logger = getLogger(["roster-shift", "io"]);

export const DEFAULT_PROMPT = "By how much should I update the age? ";

/** Printed before falling back to zero under `invalidInput: "zero"`. */
export const INVALID_INPUT_MESSAGE = "Invalid input";

/**
 * What to do with an answer that is not an integer.
 *
 * - `fail`: fail with `InvalidInputError`
 * - `zero`: print {@link INVALID_INPUT_MESSAGE} and use 0
 */
export const INVALID_INPUT_POLICIES = ["fail", "zero"] as const;

export type InvalidInputPolicy = (typeof INVALID_INPUT_POLICIES)[number];

export interface ConsolePromptOptions {
	/** Defaults to `process.stdin` */
	input?: NodeJS.ReadableStream;
	/** Defaults to `process.stdout` */
	output?: NodeJS.WritableStream;
	/** Defaults to {@link DEFAULT_PROMPT} */
	prompt?: string;
	/** Defaults to `fail` */
	invalidInput?: InvalidInputPolicy;
}

/**
 * Writes the prompt, reads one line and parses it as a base-10 integer.
 * Surrounding whitespace is ignored.
 */
export class ConsolePrompt implements AdjustmentProvider {
	private readonly input: NodeJS.ReadableStream;
	private readonly output: NodeJS.WritableStream;
	private readonly prompt: string;
	private readonly invalidInput: InvalidInputPolicy;

	constructor(options: ConsolePromptOptions = {}) {
		this.input = options.input ?? process.stdin;
		this.output = options.output ?? process.stdout;
		this.prompt = options.prompt ?? DEFAULT_PROMPT;
		this.invalidInput = options.invalidInput ?? "fail";
	}

	fetchAdjustment(): AsyncValue<number> {
		return AsyncValue.run(async () => this.parse(await this.readAnswer()));
	}

	private parse(answer: string): number {
		const result = validateInteger(answer, { name: "adjustment", trim: true });
		if (result.valid) {
			return result.value;
		}
		if (this.invalidInput === "zero") {
			logger.warning("Invalid adjustment {answer}, using 0", { answer });
			this.output.write(`${INVALID_INPUT_MESSAGE}\n`);
			return 0;
		}
		throw new InvalidInputError(result.error, "NOT_INTEGER", { answer });
	}

	private readAnswer(): Promise<string> {
		return new Promise((resolve, reject) => {
			const reader = createInterface({ input: this.input, terminal: false });
			let answered = false;

			reader.once("line", (line) => {
				answered = true;
				reader.close();
				resolve(line);
			});
			reader.once("close", () => {
				if (!answered) {
					reject(
						new InvalidInputError(
							"Input ended before an adjustment was entered",
							"INPUT_CLOSED",
						),
					);
				}
			});

			this.output.write(this.prompt);
		});
	}
}

/**
 * Prints each notification on its own line.
 */
export class ConsoleNotifier implements Notifier {
	constructor(
		private readonly output: NodeJS.WritableStream = process.stdout,
	) {}

	notify(message: string): void {
		this.output.write(`${message}\n`);
	}
}
