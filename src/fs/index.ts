/**
 * Filesystem utilities on `node:fs/promises`.
 *
 * Failures are rethrown as {@link IoError}, carrying the Node error code and
 * the path in their context.
 */

import { readFile, writeFile } from "node:fs/promises";
import { IoError } from "../errors/pipeline-errors.js";
import { toError } from "../errors/structured-error.js";
import { joinLines, splitLines } from "./lines.js";

export { joinLines, LINE_SEPARATOR, splitLines } from "./lines.js";

/**
 * Read a UTF-8 file.
 *
 * @throws {IoError} If the file cannot be read (missing, permission denied, ...)
 */
export async function readTextFile(filePath: string): Promise<string> {
	try {
		return await readFile(filePath, "utf8");
	} catch (error) {
		throw new IoError(
			`Failed to read ${filePath}`,
			{ path: filePath, operation: "read" },
			toError(error),
		);
	}
}

/**
 * Write a UTF-8 file, replacing any previous contents.
 *
 * @throws {IoError} If the file cannot be written
 */
export async function writeTextFile(
	filePath: string,
	content: string,
): Promise<void> {
	try {
		await writeFile(filePath, content, "utf8");
	} catch (error) {
		throw new IoError(
			`Failed to write ${filePath}`,
			{ path: filePath, operation: "write" },
			toError(error),
		);
	}
}

/**
 * Read a file as lines (see {@link splitLines}).
 */
export async function readLines(filePath: string): Promise<string[]> {
	return splitLines(await readTextFile(filePath));
}

/**
 * Write lines to a file in one operation (see {@link joinLines}).
 */
export async function writeLines(
	filePath: string,
	lines: readonly string[],
): Promise<void> {
	await writeTextFile(filePath, joinLines(lines));
}
