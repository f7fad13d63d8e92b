/**
 * Progress Reporter
 *
 * Renders orchestrator events as terminal lines. Percentages are written only
 * when the integer value changes; on a TTY the line is rewritten in place.
 */

import * as path from "path";
import type { BatchSummary, ConversionJob } from "@pptmp4/types";
import type { BatchOrchestrator } from "../managers/batch";

export interface OutputStream {
  write(text: string): void;
}

export interface ReporterOptions {
  interactive?: boolean;
}

/**
 * Final report: counts, then each failed file with its reason
 */
export function formatSummary(summary: BatchSummary): string {
  const lines = [
    `Done: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped (${summary.total} total)`,
  ];
  if (summary.cancelled) {
    lines.push(`Cancelled: ${summary.notStarted} not started`);
  }
  if (summary.failures.length > 0) {
    lines.push("Failed:");
    for (const failure of summary.failures) {
      lines.push(`  - ${failure.sourcePath}: ${failure.message}`);
    }
  }
  return lines.join("\n") + "\n";
}

export function formatFinishedJob(job: ConversionJob): string {
  const name = path.basename(job.sourcePath);
  switch (job.state) {
    case "succeeded":
      return `✔ ${name} → ${job.outputPath}`;
    case "skipped":
      return `↷ ${name} skipped, ${job.outputPath} exists`;
    case "failed":
      return `✖ ${name}: ${job.error?.message ?? "failed"}`;
    default:
      return `${name}: ${job.state}`;
  }
}

export class ProgressReporter {
  private lastPercent: number | null = null;
  private lineOpen = false;
  private readonly interactive: boolean;

  constructor(
    private readonly out: OutputStream,
    options: ReporterOptions = {}
  ) {
    this.interactive = options.interactive ?? false;
  }

  /**
   * Subscribe to an orchestrator; returns the unsubscribe function
   */
  attach(orchestrator: BatchOrchestrator): () => void {
    const onStarted = (job: ConversionJob) => {
      const snapshot = orchestrator.getSnapshot();
      this.lastPercent = null;
      this.writeLine(
        `[${snapshot.currentIndex + 1}/${snapshot.jobs.length}] ${path.basename(job.sourcePath)}`
      );
    };
    const onProgress = (job: ConversionJob) => this.renderProgress(job);
    const onFinished = (job: ConversionJob) => this.writeLine(formatFinishedJob(job));
    const onCompleted = (summary: BatchSummary) => this.writeLine(formatSummary(summary).trimEnd());

    orchestrator.on("job-started", onStarted);
    orchestrator.on("job-progress", onProgress);
    orchestrator.on("job-finished", onFinished);
    orchestrator.on("batch-completed", onCompleted);

    return () => {
      orchestrator.off("job-started", onStarted);
      orchestrator.off("job-progress", onProgress);
      orchestrator.off("job-finished", onFinished);
      orchestrator.off("batch-completed", onCompleted);
    };
  }

  private renderProgress(job: ConversionJob): void {
    if (job.progressIndeterminate) return;
    const percent = Math.floor(job.progressPercent);
    if (percent === this.lastPercent) return;
    this.lastPercent = percent;

    const text = `  ${percent}%`;
    if (this.interactive) {
      this.out.write(`\r${text}`);
      this.lineOpen = true;
    } else {
      this.out.write(`${text}\n`);
    }
  }

  private writeLine(text: string): void {
    if (this.lineOpen) {
      this.out.write("\n");
      this.lineOpen = false;
    }
    this.out.write(`${text}\n`);
  }
}
