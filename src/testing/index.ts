/**
 * Test fixtures for roster-shift
 *
 * - Temporary directories holding record files
 * - Scripted stdin/stdout pairs for the console prompt
 *
 * @example
 * ```ts
 * import { setupRosterDir, readTestFile, cleanupTestDir } from "../testing/index.js";
 *
 * const dir = setupRosterDir("pipeline-", ["Ada,Lovelace,36"]);
 * // ... run against path.join(dir, ROSTER_FILE) ...
 * cleanupTestDir(dir);
 * ```
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";

/** File name {@link setupRosterDir} writes the records to. */
export const ROSTER_FILE = "protagonists.csv";

/**
 * Create a temporary directory with a given prefix
 *
 * @param prefix - Prefix for the temp directory name (default: "test-")
 * @returns Absolute path to the created temp directory
 */
export function createTempDir(prefix = "test-"): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Write a test file to a directory, creating parent directories as needed
 *
 * @param dir - Base directory (absolute path)
 * @param relativePath - Path relative to dir (can include subdirectories)
 * @param content - File content to write
 * @returns Absolute path of the written file
 */
export function writeTestFile(
	dir: string,
	relativePath: string,
	content: string,
): string {
	const fullPath = path.join(dir, relativePath);
	fs.mkdirSync(path.dirname(fullPath), { recursive: true });
	fs.writeFileSync(fullPath, content, "utf8");
	return fullPath;
}

/**
 * Read a test file from a directory
 */
export function readTestFile(dir: string, relativePath: string): string {
	return fs.readFileSync(path.join(dir, relativePath), "utf8");
}

/**
 * Create a temp directory holding {@link ROSTER_FILE} with the given lines,
 * joined by `\n`.
 */
export function setupRosterDir(prefix: string, lines: readonly string[]): string {
	const dir = createTempDir(prefix);
	writeTestFile(dir, ROSTER_FILE, lines.join("\n"));
	return dir;
}

/**
 * Remove a test directory and all its contents
 */
export function cleanupTestDir(dir: string): void {
	fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * In-memory stdin/stdout pair.
 *
 * `answer` pushes a line into the input; `written` returns everything the
 * code under test wrote to the output, as of the last `flush`.
 */
export interface ScriptedTerminal {
	input: PassThrough;
	output: PassThrough;
	answer: (line: string) => void;
	endInput: () => void;
	/** Resolves once pending stream events have been delivered. */
	flush: () => Promise<void>;
	written: () => string;
}

export function createScriptedTerminal(): ScriptedTerminal {
	const input = new PassThrough();
	const output = new PassThrough();
	const chunks: string[] = [];
	output.setEncoding("utf8");
	output.on("data", (chunk: string) => chunks.push(chunk));

	return {
		input,
		output,
		answer: (line) => {
			input.write(`${line}\n`);
		},
		endInput: () => {
			input.end();
		},
		flush: () => new Promise((resolve) => setImmediate(resolve)),
		written: () => chunks.join(""),
	};
}
