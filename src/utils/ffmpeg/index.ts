/**
 * FFmpeg Utilities
 *
 * Re-exports all FFmpeg utilities for easy imports.
 */

// Path resolver
export { getFFmpegPath, getFFprobePath, getToolPath } from "./path-resolver";
export type { ToolName } from "./path-resolver";

// Process plumbing
export { spawnTool, terminateProcess, isMissingToolError } from "./process";
export type { SpawnTool, ToolProcess } from "./process";

// Probing
export { createProbe, parseProbeOutput, buildProbeArgs } from "./probe";
export type { ProbeSource } from "./probe";

// Speed filters
export {
  buildTempoStages,
  buildTempoFilter,
  buildVideoSpeedFilter,
  formatRatio,
  isUnitSpeed,
} from "./tempo";

// Availability
export { verifyTool } from "./tool-check";
export type { ToolCheckResult } from "./tool-check";
