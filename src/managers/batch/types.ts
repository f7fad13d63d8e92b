/**
 * Batch Orchestrator Types
 */

import type { BatchPhase, BatchSummary, ConversionJob, JobState } from "@pptmp4/types";

/**
 * Valid job state transitions. Terminal states have none.
 */
export const VALID_TRANSITIONS: Record<JobState, JobState[]> = {
  queued: ["running", "skipped"],
  running: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
  skipped: [],
};

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set(["succeeded", "failed", "skipped"]);

/**
 * Events emitted to front ends
 */
export interface BatchEvents {
  "phase-changed": (phase: BatchPhase) => void;
  "job-started": (job: ConversionJob) => void;
  "job-progress": (job: ConversionJob) => void;
  "job-log": (jobId: string, line: string) => void;
  "job-finished": (job: ConversionJob) => void;
  "batch-progress": (fraction: number) => void;
  "batch-completed": (summary: BatchSummary) => void;
}

export type FileExists = (filePath: string) => Promise<boolean>;
