import path from "node:path";
import { reset } from "@logtape/logtape";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ConfigurationError } from "../errors/pipeline-errors.js";
import {
	cleanupTestDir,
	createScriptedTerminal,
	ROSTER_FILE,
	readTestFile,
	setupRosterDir,
	writeTestFile,
} from "../testing/index.js";
import {
	normalizeFlagValue,
	parseArgs,
	readCliRequest,
	runCli,
	USAGE,
} from "./index.js";

describe("parseArgs", () => {
	test("parses --flag value (spaced) format", () => {
		const result = parseArgs(["--strategy", "sequential"]);
		expect(result.flags.strategy).toBe("sequential");
	});

	test("parses --flag=value (equals) format", () => {
		const result = parseArgs(["--timeout=500"]);
		expect(result.flags.timeout).toBe("500");
	});

	test("keeps everything after the first = in the value", () => {
		const result = parseArgs(["--file=data/a=b.csv"]);
		expect(result.flags.file).toBe("data/a=b.csv");
	});

	test("parses boolean flags", () => {
		const result = parseArgs(["--help"]);
		expect(result.flags.help).toBe(true);
	});

	test("treats a single-dash value as a value", () => {
		const result = parseArgs(["--timeout", "-5"]);
		expect(result.flags.timeout).toBe("-5");
	});

	test("collects positional args", () => {
		const result = parseArgs(["extra", "--help", "more"], ["help"]);
		expect(result.positional).toEqual(["extra", "more"]);
		expect(result.flags.help).toBe(true);
	});

	test("takes the next token as the value of other flags", () => {
		const result = parseArgs(["--help", "more"]);
		expect(result).toEqual({ positional: [], flags: { help: "more" } });
	});

	test("stores duplicate flags as arrays", () => {
		const result = parseArgs(["--file", "a.csv", "--file", "b.csv"]);
		expect(result.flags.file).toEqual(["a.csv", "b.csv"]);
	});

	test("handles empty args", () => {
		expect(parseArgs([])).toEqual({ positional: [], flags: {} });
	});
});

describe("normalizeFlagValue", () => {
	test("returns single values as-is", () => {
		expect(normalizeFlagValue("test")).toBe("test");
		expect(normalizeFlagValue(true)).toBe(true);
		expect(normalizeFlagValue(undefined)).toBeUndefined();
	});

	test("takes the last of duplicate values", () => {
		expect(normalizeFlagValue(["first", "second"])).toBe("second");
	});
});

describe("readCliRequest", () => {
	test("maps flags onto config keys", () => {
		expect(
			readCliRequest([
				"--file",
				"people.csv",
				"--strategy",
				"conversation",
				"--timeout",
				"250",
				"--invalid-input",
				"zero",
				"--log-dir",
				"/tmp/logs",
				"--log-level",
				"debug",
				"--config",
				"roster.json",
			]),
		).toEqual({
			help: false,
			configPath: "roster.json",
			overrides: {
				filePath: "people.csv",
				strategy: "conversation",
				timeoutMs: 250,
				invalidInput: "zero",
				logDir: "/tmp/logs",
				logLevel: "debug",
			},
		});
	});

	test("recognizes --help", () => {
		expect(readCliRequest(["--help"])).toEqual({ help: true, overrides: {} });
	});

	test("does not let --help swallow a stray argument", () => {
		expect(() => readCliRequest(["--help", "stray"])).toThrow(
			"Unexpected argument stray",
		);
	});

	test("rejects unknown options", () => {
		expect(() => readCliRequest(["--verbose"])).toThrow(
			new ConfigurationError("Unknown option --verbose"),
		);
	});

	test("rejects positional arguments", () => {
		expect(() => readCliRequest(["people.csv"])).toThrow(
			"Unexpected argument people.csv",
		);
	});

	test("rejects an option without a value", () => {
		expect(() => readCliRequest(["--file"])).toThrow(
			"Option --file needs a value",
		);
	});

	test("rejects a non-integer timeout", () => {
		expect(() => readCliRequest(["--timeout", "soon"])).toThrow(
			'--timeout must be a base-10 integer (got: "soon")',
		);
	});
});

describe("runCli", () => {
	let dir: string;

	function setup() {
		const terminal = createScriptedTerminal();
		const errors = createScriptedTerminal();
		const streams = {
			stdin: terminal.input,
			stdout: terminal.output,
			stderr: errors.output,
		};
		const baseArgs = [
			"--file",
			path.join(dir, ROSTER_FILE),
			"--log-dir",
			path.join(dir, "logs"),
		];
		return { terminal, errors, streams, baseArgs };
	}

	beforeEach(() => {
		dir = setupRosterDir("roster-cli-", ["Ada,Lovelace,36", "Alan,Turing,41"]);
	});

	afterEach(async () => {
		await reset();
		cleanupTestDir(dir);
	});

	test("updates the file and prints each change", async () => {
		const { terminal, errors, streams, baseArgs } = setup();
		terminal.answer("2");

		const exitCode = await runCli(baseArgs, streams);
		await terminal.flush();
		await errors.flush();

		expect(exitCode).toBe(0);
		expect(readTestFile(dir, ROSTER_FILE)).toBe(
			"Ada,Lovelace,38\nAlan,Turing,43",
		);
		expect(terminal.written()).toBe(
			"By how much should I update the age? " +
				"The age of Ada Lovelace changes from 36 to 38\n" +
				"The age of Alan Turing changes from 41 to 43\n",
		);
		expect(errors.written()).toBe("");
	});

	test.each(["sequential", "conversation"])(
		"%s strategy writes the same file",
		async (strategy) => {
			const { terminal, streams, baseArgs } = setup();
			terminal.answer("-1");

			const exitCode = await runCli(
				[...baseArgs, "--strategy", strategy],
				streams,
			);

			expect(exitCode).toBe(0);
			expect(readTestFile(dir, ROSTER_FILE)).toBe(
				"Ada,Lovelace,35\nAlan,Turing,40",
			);
		},
	);

	test("exits 1 and keeps the file on an invalid answer", async () => {
		const { terminal, errors, streams, baseArgs } = setup();
		terminal.answer("two");

		const exitCode = await runCli(baseArgs, streams);
		await errors.flush();

		expect(exitCode).toBe(1);
		expect(errors.written()).toBe(
			'Error: adjustment must be a base-10 integer (got: "two")\n',
		);
		expect(readTestFile(dir, ROSTER_FILE)).toBe("Ada,Lovelace,36\nAlan,Turing,41");
	});

	test("uses zero for an invalid answer when asked to", async () => {
		const { terminal, streams, baseArgs } = setup();
		terminal.answer("two");

		const exitCode = await runCli(
			[...baseArgs, "--invalid-input", "zero"],
			streams,
		);
		await terminal.flush();

		expect(exitCode).toBe(0);
		expect(readTestFile(dir, ROSTER_FILE)).toBe("Ada,Lovelace,36\nAlan,Turing,41");
		expect(terminal.written()).toBe(
			"By how much should I update the age? Invalid input\n" +
				"The age of Ada Lovelace changes from 36 to 36\n" +
				"The age of Alan Turing changes from 41 to 41\n",
		);
	});

	test("exits 1 when the file is missing", async () => {
		const { errors, streams } = setup();
		const missing = path.join(dir, "missing.csv");

		const exitCode = await runCli(
			["--file", missing, "--log-dir", path.join(dir, "logs")],
			streams,
		);
		await errors.flush();

		expect(exitCode).toBe(1);
		expect(errors.written()).toBe(`Error: Failed to read ${missing}\n`);
	});

	test("exits 1 on an unknown strategy before reading anything", async () => {
		const { terminal, errors, streams, baseArgs } = setup();

		const exitCode = await runCli([...baseArgs, "--strategy", "fast"], streams);
		await terminal.flush();
		await errors.flush();

		expect(exitCode).toBe(1);
		expect(errors.written()).toMatch(/^Error: Invalid configuration: strategy: /);
		expect(terminal.written()).toBe("");
	});

	test("reads options from a config file", async () => {
		const { terminal, streams } = setup();
		const configPath = writeTestFile(
			dir,
			"roster.json",
			JSON.stringify({
				filePath: path.join(dir, ROSTER_FILE),
				logDir: path.join(dir, "logs"),
				strategy: "sequential",
				prompt: "Shift by? ",
			}),
		);
		terminal.answer("1");

		const exitCode = await runCli(["--config", configPath], streams);
		await terminal.flush();

		expect(exitCode).toBe(0);
		expect(readTestFile(dir, ROSTER_FILE)).toBe("Ada,Lovelace,37\nAlan,Turing,42");
		expect(terminal.written().startsWith("Shift by? ")).toBe(true);
	});

	test("prints usage for --help", async () => {
		const { terminal, streams } = setup();

		const exitCode = await runCli(["--help"], streams);
		await terminal.flush();

		expect(exitCode).toBe(0);
		expect(terminal.written()).toBe(USAGE);
	});
});
