/**
 * pptmp4 Shared Types
 * Common types used between the conversion core and its front ends
 */

import type { EncodingProfileId } from "./constants";

// Conversion Types
export interface ConversionOptions {
  speedFactor: number;
  normalizeAudio: boolean;
  outputDirectory: string;
  profile: EncodingProfileId;
  overwrite: boolean;
}

export type JobState = "queued" | "running" | "succeeded" | "failed" | "skipped";

export type ErrorCode =
  | "TOOL_NOT_FOUND"
  | "INVALID_SOURCE"
  | "ENCODING_FAILED"
  | "CANCELLED"
  | "VALIDATION_ERROR"
  | "FILE_SYSTEM_ERROR"
  | "CONFIG_ERROR"
  | "BATCH_BUSY";

export interface JobError {
  code: ErrorCode;
  message: string;
  exitCode?: number | null;
  diagnostics?: string;
}

export interface ConversionJob {
  id: string;
  sourcePath: string;
  outputPath: string;
  options: Readonly<ConversionOptions>;
  state: JobState;
  progressPercent: number;
  progressIndeterminate: boolean;
  logLines: string[];
  error?: JobError;
}

// Source probing
export interface SourceInfo {
  durationSeconds: number;
  hasVideo: boolean;
  hasAudio: boolean;
}

// Runner events
export type ConversionEvent =
  | { type: "command"; args: string[] }
  | { type: "log"; line: string }
  | { type: "progress"; percent: number | null; outTimeSeconds: number | null };

export type ConversionOutcome =
  | { status: "succeeded"; outputPath: string }
  | { status: "failed"; error: JobError };

// Batch Types
export type BatchPhase = "idle" | "running" | "completed";

export interface BatchFailure {
  sourcePath: string;
  code: ErrorCode;
  message: string;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  notStarted: number;
  cancelled: boolean;
  failures: BatchFailure[];
  jobs: ConversionJob[];
  log: string[];
}

export interface BatchSnapshot {
  phase: BatchPhase;
  currentIndex: number;
  progress: number;
  jobs: ConversionJob[];
}
