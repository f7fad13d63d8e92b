export { BatchOrchestrator } from "./batch-orchestrator";
export { VALID_TRANSITIONS, TERMINAL_STATES } from "./types";
export type { BatchEvents, FileExists } from "./types";
