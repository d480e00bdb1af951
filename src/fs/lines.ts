/**
 * Line framing for record files.
 *
 * Input may use `\n` or `\r\n`. One trailing line break does not produce an
 * extra empty line, and an empty file has no lines. Output lines are joined
 * with a single `\n` and no trailing newline.
 *
 * @module fs/lines
 */

/** Separator written between output lines. */
export const LINE_SEPARATOR = "\n";

/**
 * Split file contents into lines.
 *
 * @example
 * ```ts
 * splitLines("a\nb\n") // → ["a", "b"]
 * splitLines("a\r\nb") // → ["a", "b"]
 * splitLines("")       // → []
 * ```
 */
export function splitLines(content: string): string[] {
	if (content === "") return [];
	const lines = content.split(/\r?\n/);
	if (lines[lines.length - 1] === "") {
		lines.pop();
	}
	return lines;
}

/**
 * Join lines for writing. Zero lines give an empty string.
 */
export function joinLines(lines: readonly string[]): string {
	return lines.join(LINE_SEPARATOR);
}
