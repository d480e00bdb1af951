/**
 * Sources, adjustment providers, sinks and notifiers.
 *
 * @module io
 */

export {
	ConsoleNotifier,
	ConsolePrompt,
	type ConsolePromptOptions,
	DEFAULT_PROMPT,
	INVALID_INPUT_MESSAGE,
	INVALID_INPUT_POLICIES,
	type InvalidInputPolicy,
} from "./console.js";
export { FileSink, FileSource } from "./file.js";
export {
	CollectingNotifier,
	FixedAdjustment,
	MemorySink,
	MemorySource,
} from "./memory.js";
export type {
	AdjustmentProvider,
	Notifier,
	RosterIO,
	Sink,
	SourceProvider,
} from "./types.js";
