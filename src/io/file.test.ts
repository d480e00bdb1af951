import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { IoError } from "../errors/pipeline-errors.js";
import {
	cleanupTestDir,
	createTempDir,
	ROSTER_FILE,
	readTestFile,
	writeTestFile,
} from "../testing/index.js";
import { FileSink, FileSource } from "./file.js";

describe("file io", () => {
	let dir: string;

	beforeEach(() => {
		dir = createTempDir("roster-io-");
	});

	afterEach(() => {
		cleanupTestDir(dir);
	});

	test("FileSource reads lines in order", async () => {
		const file = writeTestFile(
			dir,
			ROSTER_FILE,
			"Ada,Lovelace,36\nAlan,Turing,41\nGrace,Hopper,85\n",
		);

		const lines = await new FileSource(file).fetchLines().await();

		expect(lines).toEqual(["Ada,Lovelace,36", "Alan,Turing,41", "Grace,Hopper,85"]);
	});

	test("FileSource reads an empty file as zero lines", async () => {
		const file = writeTestFile(dir, ROSTER_FILE, "");

		expect(await new FileSource(file).fetchLines().await()).toEqual([]);
	});

	test("FileSource fails with IoError for a missing file", async () => {
		const source = new FileSource(path.join(dir, "missing.csv"));

		const error = await source
			.fetchLines()
			.await()
			.catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(IoError);
		expect(error instanceof IoError && error.code).toBe("ENOENT");
	});

	test("FileSink overwrites the file", async () => {
		const file = writeTestFile(dir, ROSTER_FILE, "old,contents,1\nmore,old,2");

		await new FileSink(file).write(["Ada,Lovelace,38"]).await();

		expect(readTestFile(dir, ROSTER_FILE)).toBe("Ada,Lovelace,38");
	});

	test("FileSink writes an empty file for zero lines", async () => {
		const file = writeTestFile(dir, ROSTER_FILE, "Ada,Lovelace,36");

		await new FileSink(file).write([]).await();

		expect(readTestFile(dir, ROSTER_FILE)).toBe("");
	});

	test("FileSink fails with IoError when the directory is missing", async () => {
		const sink = new FileSink(path.join(dir, "gone", ROSTER_FILE));

		await expect(sink.write(["x,y,1"]).await()).rejects.toBeInstanceOf(IoError);
	});
});
