/**
 * Pipeline runner and its strategies.
 *
 * @module pipeline
 */

export {
	Link,
	type ReadWriteReply,
	type ReadWriteRequest,
	readWriteWorker,
	type UpdateReply,
	type UpdateRequest,
	updateWorker,
} from "./conversation.js";
export { type RunOptions, runPipeline } from "./run.js";
export {
	type PipelineReport,
	STRATEGIES,
	type Strategy,
} from "./stages.js";
export {
	type PipelineState,
	type StateChangeListener,
	StateTracker,
} from "./state.js";
