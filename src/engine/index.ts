export { analyze } from "./analyzer.js";
export type { AnalyzeDependencies } from "./analyzer.js";
export { IllegalTransitionError, SCAN_STATES, ScanStateMachine } from "./scan-state.js";
export type { ScanState, StateTransition } from "./scan-state.js";
export { runWorkerPool } from "./worker-pool.js";
export type { WorkerPoolOptions, WorkerPoolOutcome } from "./worker-pool.js";
