/**
 * roster-shift
 *
 * Reads person records, asks for an age adjustment, and writes the adjusted
 * records back. The record file and the answer are obtained concurrently and
 * combined once both arrived.
 *
 * Import from subpath exports to pull in a single concern:
 *   import { join, AsyncValue } from "roster-shift/concurrency";
 *   import { runPipeline } from "roster-shift/pipeline";
 *
 * @packageDocumentation
 */

export {
	DEFAULT_FILE_PATH,
	loadConfigFile,
	parseRunConfig,
	type RunConfig,
	RunConfigSchema,
	resolveRunConfig,
} from "./config/index.js";
export {
	type AsyncSource,
	AsyncValue,
	Channel,
	ChannelClosedError,
	type Completer,
	join,
	joinPromises,
	type Outcome,
	TimeoutError,
	withTimeout,
} from "./concurrency/index.js";
export {
	ConfigurationError,
	InvalidInputError,
	IoError,
	isStructuredError,
	MalformedRecordError,
	StructuredError,
} from "./errors/index.js";
export {
	CollectingNotifier,
	ConsoleNotifier,
	ConsolePrompt,
	FileSink,
	FileSource,
	FixedAdjustment,
	MemorySink,
	MemorySource,
	type AdjustmentProvider,
	type Notifier,
	type RosterIO,
	type Sink,
	type SourceProvider,
} from "./io/index.js";
export { createRosterLogger } from "./logging/index.js";
export {
	type PipelineReport,
	type PipelineState,
	type RunOptions,
	runPipeline,
	type Strategy,
} from "./pipeline/index.js";
export {
	adjustAll,
	applyAdjustment,
	type PersonRecord,
	parseRecord,
	parseRecords,
	serializeRecord,
	serializeRecords,
} from "./record/index.js";

export const VERSION = "0.1.0";
