#!/usr/bin/env node
/**
 * roster-shift executable.
 *
 * Exits explicitly: a prompt still waiting on stdin after a failed run would
 * otherwise keep the process alive.
 */

import { dispose } from "@logtape/logtape";
import { runCli } from "./index.js";

const exitCode = await runCli(process.argv.slice(2));
await dispose();
process.exit(exitCode);
