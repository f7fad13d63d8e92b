/**
 * Conversion Runner Types
 */

import type { ConversionEvent, ConversionOptions, ConversionOutcome } from "@pptmp4/types";
import type { ProbeSource, SpawnTool } from "../../utils/ffmpeg";

/**
 * A started conversion
 */
export interface ConversionHandle {
  readonly sourcePath: string;
  readonly outputPath: string;
  /** Lazy, finite, single-pass stream of command/log/progress events */
  events(): AsyncIterable<ConversionEvent>;
  /** Settles once the job is terminal; never rejects */
  readonly done: Promise<ConversionOutcome>;
  cancel(): void;
}

/**
 * Anything that can run one conversion at a time for the orchestrator
 */
export interface JobRunner {
  start(sourcePath: string, options: Readonly<ConversionOptions>): ConversionHandle;
}

export interface RunnerFileSystem {
  assertReadable(filePath: string): Promise<void>;
  ensureDirectory(directory: string): Promise<void>;
  removeFile(filePath: string): Promise<void>;
}

export interface RunnerDependencies {
  ffmpegPath: string;
  spawn: SpawnTool;
  probe: ProbeSource;
  fileSystem: RunnerFileSystem;
  killGraceMs?: number;
}
