/**
 * Conversion Runner
 *
 * Runs one source through ffmpeg: validate and probe the source, build the
 * argument list, spawn, translate stderr into progress, and settle with a
 * ConversionOutcome. Failures are reported, never retried.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  ConversionEvent,
  ConversionOptions,
  ConversionOutcome,
  SourceInfo,
} from "@pptmp4/types";
import { PROGRESS } from "@pptmp4/types";
import {
  AppError,
  CancelledError,
  EncodingFailedError,
  FileSystemError,
  InvalidSourceError,
  ToolNotFoundError,
  toError,
} from "../../core/app-error";
import { EventChannel } from "../../utils/event-channel";
import { logger } from "../../utils/logger";
import { ProgressTracker } from "../../utils/progress-tracker";
import {
  createProbe,
  isMissingToolError,
  spawnTool,
  terminateProcess,
  type ToolProcess,
} from "../../utils/ffmpeg";
import { buildConversionArgs, buildOutputPath } from "./ffmpeg-args-builder";
import { StderrHandler } from "./stderr-handler";
import type {
  ConversionHandle,
  JobRunner,
  RunnerDependencies,
  RunnerFileSystem,
} from "./types";

/**
 * fs.promises-backed file system used outside tests
 */
export const nodeFileSystem: RunnerFileSystem = {
  assertReadable: (filePath) => fs.promises.access(filePath, fs.constants.R_OK),
  ensureDirectory: async (directory) => {
    await fs.promises.mkdir(directory, { recursive: true });
  },
  removeFile: (filePath) => fs.promises.rm(filePath, { force: true }),
};

/**
 * Wire the runner to real binaries
 */
export function createDefaultRunnerDependencies(
  ffmpegPath: string,
  ffprobePath: string
): RunnerDependencies {
  return {
    ffmpegPath,
    spawn: spawnTool,
    probe: createProbe(ffprobePath, spawnTool),
    fileSystem: nodeFileSystem,
  };
}

/**
 * Percent of the expected output already written. Output time runs at the
 * new speed, so the expected length is the source duration over the factor.
 */
export function computePercent(
  outTimeSeconds: number,
  sourceDurationSeconds: number,
  speedFactor: number
): number {
  const expected = sourceDurationSeconds / speedFactor;
  if (!Number.isFinite(expected) || expected <= 0) return 0;
  return (outTimeSeconds / expected) * 100;
}

/**
 * State of a single in-flight conversion
 */
class ConversionTask implements ConversionHandle {
  readonly outputPath: string;
  readonly done: Promise<ConversionOutcome>;

  private readonly channel = new EventChannel<ConversionEvent>();
  private readonly tracker = new ProgressTracker(PROGRESS.MAX_WHILE_RUNNING);
  private process: ToolProcess | null = null;
  private cancelRequested = false;
  private outputTouched = false;

  constructor(
    readonly sourcePath: string,
    private readonly options: Readonly<ConversionOptions>,
    private readonly deps: RunnerDependencies
  ) {
    this.outputPath = buildOutputPath(sourcePath, options.outputDirectory);
    this.done = this.execute();
  }

  events(): AsyncIterable<ConversionEvent> {
    return this.channel;
  }

  cancel(): void {
    if (this.cancelRequested) return;
    this.cancelRequested = true;
    logger.info("Cancelling conversion", { sourcePath: this.sourcePath });
    if (this.process) {
      terminateProcess(this.process, this.deps.killGraceMs);
    }
  }

  private async execute(): Promise<ConversionOutcome> {
    try {
      const source = await this.inspectSource();
      this.throwIfCancelled();
      await this.prepareOutput();
      this.throwIfCancelled();
      await this.encode(source);

      this.tracker.complete();
      this.channel.push({ type: "progress", percent: 100, outTimeSeconds: null });
      logger.info("Conversion completed", {
        sourcePath: this.sourcePath,
        outputPath: this.outputPath,
      });
      return { status: "succeeded", outputPath: this.outputPath };
    } catch (error) {
      const appError = this.toAppError(error);
      if (appError instanceof CancelledError) {
        logger.info("Conversion cancelled", { sourcePath: this.sourcePath });
      } else {
        logger.error("Conversion failed", { sourcePath: this.sourcePath, ...appError.toJSON() });
      }
      await this.discardPartialOutput();
      return { status: "failed", error: appError.toJobError() };
    } finally {
      this.channel.close();
    }
  }

  private async inspectSource(): Promise<SourceInfo> {
    try {
      await this.deps.fileSystem.assertReadable(this.sourcePath);
    } catch (error) {
      throw new InvalidSourceError(`Source not readable: ${this.sourcePath}`, toError(error));
    }
    const info = await this.deps.probe(this.sourcePath);
    logger.debug("Source probed", { sourcePath: this.sourcePath, ...info });
    return info;
  }

  private async prepareOutput(): Promise<void> {
    const directory = path.dirname(this.outputPath);
    try {
      await this.deps.fileSystem.ensureDirectory(directory);
    } catch (error) {
      throw new FileSystemError(`Cannot create output folder ${directory}`, toError(error));
    }
  }

  private encode(source: SourceInfo): Promise<void> {
    const args = buildConversionArgs({
      input: this.sourcePath,
      output: this.outputPath,
      speedFactor: this.options.speedFactor,
      normalizeAudio: this.options.normalizeAudio,
      profile: this.options.profile,
      hasAudio: source.hasAudio,
    });

    this.channel.push({ type: "command", args: [this.deps.ffmpegPath, ...args] });
    logger.debug("FFmpeg conversion command", {
      ffmpegPath: this.deps.ffmpegPath,
      args: args.join(" "),
    });

    const stderr = new StderrHandler({
      onDiagnostic: (line) => this.channel.push({ type: "log", line }),
      onTime: (seconds) => {
        const percent = computePercent(
          seconds,
          source.durationSeconds,
          this.options.speedFactor
        );
        if (this.tracker.update(percent)) {
          this.channel.push({
            type: "progress",
            percent: this.tracker.getProgress(),
            outTimeSeconds: seconds,
          });
        }
      },
    });

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const settle = (error?: AppError) => {
        if (settled) return;
        settled = true;
        this.process = null;
        if (error) reject(error);
        else resolve();
      };

      let child: ToolProcess;
      try {
        child = this.deps.spawn(this.deps.ffmpegPath, args);
      } catch (error) {
        const cause = toError(error);
        settle(new ToolNotFoundError("ffmpeg", cause, { path: this.deps.ffmpegPath }));
        return;
      }
      this.process = child;
      this.outputTouched = true;
      this.channel.push({ type: "progress", percent: null, outTimeSeconds: null });

      child.onStderr((chunk) => stderr.processChunk(chunk));

      child.onError((error) => {
        if (isMissingToolError(error)) {
          settle(new ToolNotFoundError("ffmpeg", error, { path: this.deps.ffmpegPath }));
        } else {
          settle(new AppError(`ffmpeg process error: ${error.message}`, "ENCODING_FAILED", error));
        }
      });

      child.onClose((code, signal) => {
        stderr.flush();
        if (this.cancelRequested) {
          settle(new CancelledError());
        } else if (code === 0) {
          settle();
        } else {
          settle(
            new EncodingFailedError(code, stderr.getRecentStderr(), {
              signal,
              sourcePath: this.sourcePath,
            })
          );
        }
      });
    });
  }

  private throwIfCancelled(): void {
    if (this.cancelRequested) {
      throw new CancelledError();
    }
  }

  private toAppError(error: unknown): AppError {
    if (this.cancelRequested && !(error instanceof ToolNotFoundError)) {
      return error instanceof CancelledError ? error : new CancelledError();
    }
    if (AppError.isAppError(error)) {
      return error;
    }
    const cause = toError(error);
    return new AppError(cause.message, "ENCODING_FAILED", cause);
  }

  private async discardPartialOutput(): Promise<void> {
    if (!this.outputTouched) return;
    try {
      await this.deps.fileSystem.removeFile(this.outputPath);
    } catch (error) {
      logger.warn("Failed to remove partial output", {
        outputPath: this.outputPath,
        error: toError(error).message,
      });
    }
  }
}

/**
 * Starts conversions against ffmpeg
 */
export class ConversionRunner implements JobRunner {
  constructor(private readonly deps: RunnerDependencies) {}

  start(sourcePath: string, options: Readonly<ConversionOptions>): ConversionHandle {
    logger.info("Starting conversion", { sourcePath, options });
    return new ConversionTask(sourcePath, Object.freeze({ ...options }), this.deps);
  }
}
