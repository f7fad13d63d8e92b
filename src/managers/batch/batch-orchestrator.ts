/**
 * Batch Orchestrator
 *
 * Owns the job queue of a batch and drives the runner over it strictly in
 * order, one job at a time. A failed job is recorded and the batch moves on;
 * cancel() stops the running job and leaves the rest queued. Front ends
 * subscribe to the typed events below and read snapshots, they never mutate
 * jobs.
 */

import { EventEmitter } from "events";
import * as fs from "fs";
import * as path from "path";
import { randomUUID } from "crypto";
import type {
  BatchPhase,
  BatchSnapshot,
  BatchSummary,
  ConversionEvent,
  ConversionJob,
  ConversionOptions,
  JobState,
} from "@pptmp4/types";
import { BatchError } from "../../core/app-error";
import { conversionOptionsSchema, sourcePathsSchema } from "../../core/schemas";
import { validateInput } from "../../core/validation";
import { logger } from "../../utils/logger";
import { buildOutputPath } from "../conversion/ffmpeg-args-builder";
import type { ConversionHandle, JobRunner } from "../conversion/types";
import { TERMINAL_STATES, VALID_TRANSITIONS, type BatchEvents, type FileExists } from "./types";

const defaultFileExists: FileExists = async (filePath) => {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
};

export interface BatchOrchestrator {
  on<E extends keyof BatchEvents>(event: E, listener: BatchEvents[E]): this;
  once<E extends keyof BatchEvents>(event: E, listener: BatchEvents[E]): this;
  off<E extends keyof BatchEvents>(event: E, listener: BatchEvents[E]): this;
  emit<E extends keyof BatchEvents>(event: E, ...args: Parameters<BatchEvents[E]>): boolean;
}

export class BatchOrchestrator extends EventEmitter {
  private phase: BatchPhase = "idle";
  private jobs: ConversionJob[] = [];
  private currentIndex = -1;
  private batchLog: string[] = [];
  private cancelRequested = false;
  private activeHandle: ConversionHandle | null = null;

  constructor(
    private readonly runner: JobRunner,
    private readonly fileExists: FileExists = defaultFileExists
  ) {
    super();
  }

  /**
   * Convert every source in order and resolve with the batch summary
   */
  async run(sourcePaths: readonly string[], options: ConversionOptions): Promise<BatchSummary> {
    if (this.phase === "running") {
      throw new BatchError("A batch is already running");
    }

    const jobOptions = Object.freeze(
      validateInput(conversionOptionsSchema, options, "conversion options")
    );
    const sources = validateInput(sourcePathsSchema, sourcePaths, "source list");

    this.jobs = sources.map((sourcePath) => ({
      id: randomUUID(),
      sourcePath,
      outputPath: buildOutputPath(sourcePath, jobOptions.outputDirectory),
      options: jobOptions,
      state: "queued",
      progressPercent: 0,
      progressIndeterminate: true,
      logLines: [],
    }));
    this.currentIndex = -1;
    this.batchLog = [];
    this.cancelRequested = false;

    logger.info("Batch started", { total: this.jobs.length, options: jobOptions });
    this.setPhase("running");
    this.emit("batch-progress", this.getProgress());

    try {
      for (let index = 0; index < this.jobs.length; index++) {
        if (this.cancelRequested) break;
        this.currentIndex = index;
        await this.processJob(this.jobs[index]);
        this.emit("batch-progress", this.getProgress());
      }
    } finally {
      this.activeHandle = null;
      this.setPhase("completed");
    }

    const summary = this.buildSummary();
    logger.info("Batch completed", {
      total: summary.total,
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped: summary.skipped,
      notStarted: summary.notStarted,
      cancelled: summary.cancelled,
    });
    this.emit("batch-completed", summary);
    return summary;
  }

  /**
   * Stop the running job; no further job is started
   */
  cancel(): void {
    if (this.phase !== "running" || this.cancelRequested) return;
    this.cancelRequested = true;
    this.batchLog.push("[CANCEL] Batch cancelled by user");
    logger.info("Batch cancellation requested", { currentIndex: this.currentIndex });
    this.activeHandle?.cancel();
  }

  getPhase(): BatchPhase {
    return this.phase;
  }

  /**
   * Copy of the batch state for read-only consumers
   */
  getSnapshot(): BatchSnapshot {
    return {
      phase: this.phase,
      currentIndex: this.currentIndex,
      progress: this.getProgress(),
      jobs: this.jobs.map((job) => structuredClone(job)),
    };
  }

  /**
   * Overall fraction: finished jobs plus the running job's share
   */
  getProgress(): number {
    if (this.jobs.length === 0) {
      return this.phase === "idle" ? 0 : 1;
    }
    let done = 0;
    for (const job of this.jobs) {
      if (TERMINAL_STATES.has(job.state)) {
        done += 1;
      } else if (job.state === "running") {
        done += job.progressPercent / 100;
      }
    }
    return Math.min(1, done / this.jobs.length);
  }

  private async processJob(job: ConversionJob): Promise<void> {
    const name = path.basename(job.sourcePath);

    if (!job.options.overwrite && (await this.fileExists(job.outputPath))) {
      this.transition(job, "skipped");
      this.appendLog(job, `[SKIP] Exists (enable overwrite to replace): ${job.outputPath}`);
      this.emit("job-finished", structuredClone(job));
      return;
    }
    // cancel() may have landed while the output check was pending
    if (this.cancelRequested) return;

    this.transition(job, "running");
    this.appendLog(job, `[START] ${name}`);
    this.emit("job-started", structuredClone(job));

    const handle = this.runner.start(job.sourcePath, job.options);
    this.activeHandle = handle;

    for await (const event of handle.events()) {
      this.applyEvent(job, event);
    }
    const outcome = await handle.done;
    this.activeHandle = null;

    if (outcome.status === "succeeded") {
      job.progressPercent = 100;
      job.progressIndeterminate = false;
      this.transition(job, "succeeded");
      this.appendLog(job, `[OK] ${outcome.outputPath}`);
    } else {
      job.error = outcome.error;
      this.transition(job, "failed");
      this.appendLog(job, `[ERROR] ${name}: ${outcome.error.message}`);
    }
    this.emit("job-finished", structuredClone(job));
  }

  private applyEvent(job: ConversionJob, event: ConversionEvent): void {
    switch (event.type) {
      case "command":
        this.appendLog(job, `[CMD] ${event.args.join(" ")}`);
        break;
      case "log":
        this.appendLog(job, event.line);
        break;
      case "progress": {
        if (event.percent === null) {
          job.progressIndeterminate = job.progressPercent === 0;
        } else {
          job.progressIndeterminate = false;
          job.progressPercent = Math.max(job.progressPercent, Math.min(100, event.percent));
        }
        this.emit("job-progress", structuredClone(job));
        this.emit("batch-progress", this.getProgress());
        break;
      }
    }
  }

  private transition(job: ConversionJob, next: JobState): void {
    if (!VALID_TRANSITIONS[job.state].includes(next)) {
      throw new Error(`Invalid job transition ${job.state} -> ${next}`);
    }
    job.state = next;
  }

  private appendLog(job: ConversionJob, line: string): void {
    job.logLines.push(line);
    this.batchLog.push(line);
    this.emit("job-log", job.id, line);
  }

  private setPhase(phase: BatchPhase): void {
    if (this.phase === phase) return;
    this.phase = phase;
    this.emit("phase-changed", phase);
  }

  private buildSummary(): BatchSummary {
    const count = (state: JobState) => this.jobs.filter((job) => job.state === state).length;
    return {
      total: this.jobs.length,
      succeeded: count("succeeded"),
      failed: count("failed"),
      skipped: count("skipped"),
      notStarted: count("queued"),
      cancelled: this.cancelRequested,
      failures: this.jobs.flatMap((job) =>
        job.state === "failed" && job.error
          ? [{ sourcePath: job.sourcePath, code: job.error.code, message: job.error.message }]
          : []
      ),
      jobs: this.jobs.map((job) => structuredClone(job)),
      log: [...this.batchLog],
    };
  }
}
