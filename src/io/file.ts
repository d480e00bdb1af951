/**
 * File-backed source and sink.
 *
 * Both point at the same path in a normal run: the sink overwrites the file
 * the source read.
 *
 * @module io/file
 */

import { getLogger } from "@logtape/logtape";
import { AsyncValue } from "../concurrency/async-value.js";
import { readLines, writeLines } from "../fs/index.js";
import type { Sink, SourceProvider } from "./types.js";

const logger = getLogger(["roster-shift", "io"]);

export class FileSource implements SourceProvider {
	constructor(readonly filePath: string) {}

	fetchLines(): AsyncValue<string[]> {
		return AsyncValue.run(async () => {
			const lines = await readLines(this.filePath);
			logger.debug("Read {count} lines from {path}", {
				count: lines.length,
				path: this.filePath,
			});
			return lines;
		});
	}
}

export class FileSink implements Sink {
	constructor(readonly filePath: string) {}

	write(lines: readonly string[]): AsyncValue<void> {
		return AsyncValue.run(async () => {
			await writeLines(this.filePath, lines);
			logger.debug("Wrote {count} lines to {path}", {
				count: lines.length,
				path: this.filePath,
			});
		});
	}
}
