import { describe, expect, it, vi } from "vitest";
import type { BatchPhase, ConversionJob, ConversionOptions } from "@pptmp4/types";
import { BatchError, ValidationError } from "../../core/app-error";
import { FakeRunner, succeed } from "../../test/fake-runner";
import { BatchOrchestrator } from "./batch-orchestrator";

const OPTIONS: ConversionOptions = {
  speedFactor: 1.5,
  normalizeAudio: false,
  outputDirectory: "/out",
  profile: "compatible",
  overwrite: true,
};

const noFiles = async () => false;

describe("BatchOrchestrator", () => {
  it("runs jobs one at a time and keeps going after a failure", async () => {
    const runner = new FakeRunner((source) =>
      source.endsWith("b.mov") ? (h) => h.fail("Encoding failed with code 1") : succeed
    );
    const orchestrator = new BatchOrchestrator(runner, noFiles);

    const summary = await orchestrator.run(["/v/a.mov", "/v/b.mov", "/v/c.mov"], OPTIONS);

    expect(runner.started.map((h) => h.sourcePath)).toEqual(["/v/a.mov", "/v/b.mov", "/v/c.mov"]);
    expect(runner.maxActive).toBe(1);
    expect(summary.total).toBe(3);
    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.skipped).toBe(0);
    expect(summary.notStarted).toBe(0);
    expect(summary.cancelled).toBe(false);
    expect(summary.failures).toEqual([
      { sourcePath: "/v/b.mov", code: "ENCODING_FAILED", message: "Encoding failed with code 1" },
    ]);
    expect(summary.jobs.map((j) => j.state)).toEqual(["succeeded", "failed", "succeeded"]);
    expect(orchestrator.getPhase()).toBe("completed");
  });

  it("records the job log in order", async () => {
    const orchestrator = new BatchOrchestrator(new FakeRunner(() => succeed), noFiles);

    const summary = await orchestrator.run(["/v/a.mov"], OPTIONS);

    expect(summary.jobs[0].logLines).toEqual([
      "[START] a.mov",
      "[CMD] ffmpeg -i /v/a.mov",
      "Stream mapping:",
      "[OK] /out/a_ppt.mp4",
    ]);
    expect(summary.log).toEqual(summary.jobs[0].logLines);
    expect(summary.jobs[0].progressPercent).toBe(100);
    expect(summary.jobs[0].outputPath).toBe("/out/a_ppt.mp4");
  });

  it("records the error on failed jobs", async () => {
    const runner = new FakeRunner(() => (h) => h.fail("Encoding failed with code 1"));
    const summary = await new BatchOrchestrator(runner, noFiles).run(["/v/a.mov"], OPTIONS);

    expect(summary.jobs[0].error).toEqual({
      code: "ENCODING_FAILED",
      message: "Encoding failed with code 1",
      exitCode: 1,
      diagnostics: "",
    });
    expect(summary.jobs[0].logLines).toEqual([
      "[START] a.mov",
      "[ERROR] a.mov: Encoding failed with code 1",
    ]);
  });

  it("skips existing outputs when overwrite is off", async () => {
    const runner = new FakeRunner(() => succeed);
    const fileExists = vi.fn(async (filePath: string) => filePath === "/out/b_ppt.mp4");
    const orchestrator = new BatchOrchestrator(runner, fileExists);

    const summary = await orchestrator.run(["/v/a.mov", "/v/b.mov"], {
      ...OPTIONS,
      overwrite: false,
    });

    expect(runner.started.map((h) => h.sourcePath)).toEqual(["/v/a.mov"]);
    expect(summary.skipped).toBe(1);
    expect(summary.succeeded).toBe(1);
    expect(summary.jobs[1].state).toBe("skipped");
    expect(summary.jobs[1].logLines).toEqual([
      "[SKIP] Exists (enable overwrite to replace): /out/b_ppt.mp4",
    ]);
  });

  it("does not check for existing outputs when overwriting", async () => {
    const fileExists = vi.fn(async () => true);
    const summary = await new BatchOrchestrator(new FakeRunner(() => succeed), fileExists).run(
      ["/v/a.mov"],
      OPTIONS
    );

    expect(fileExists).not.toHaveBeenCalled();
    expect(summary.succeeded).toBe(1);
  });

  it("cancels the running job and leaves the rest queued", async () => {
    const runner = new FakeRunner(() => (h) => {
      h.push({ type: "progress", percent: 30, outTimeSeconds: 3 });
    });
    const orchestrator = new BatchOrchestrator(runner, noFiles);
    orchestrator.on("job-progress", () => orchestrator.cancel());

    const summary = await orchestrator.run(["/v/a.mov", "/v/b.mov", "/v/c.mov"], OPTIONS);

    expect(runner.started).toHaveLength(1);
    expect(runner.started[0].cancelled).toBe(true);
    expect(summary.cancelled).toBe(true);
    expect(summary.failed).toBe(1);
    expect(summary.notStarted).toBe(2);
    expect(summary.failures[0].code).toBe("CANCELLED");
    expect(summary.jobs.map((j) => j.state)).toEqual(["failed", "queued", "queued"]);
    expect(summary.log).toContain("[CANCEL] Batch cancelled by user");
  });

  it("leaves the next job queued when cancelled during the output check", async () => {
    const runner = new FakeRunner(() => succeed);
    const checked: string[] = [];
    const ref: { orchestrator?: BatchOrchestrator } = {};
    const fileExists = async (outputPath: string) => {
      checked.push(outputPath);
      if (checked.length === 2) ref.orchestrator?.cancel();
      return false;
    };
    const orchestrator = new BatchOrchestrator(runner, fileExists);
    ref.orchestrator = orchestrator;

    const summary = await orchestrator.run(["/v/a.mov", "/v/b.mov", "/v/c.mov"], {
      ...OPTIONS,
      overwrite: false,
    });

    expect(checked).toEqual(["/out/a_ppt.mp4", "/out/b_ppt.mp4"]);
    expect(runner.started.map((h) => h.sourcePath)).toEqual(["/v/a.mov"]);
    expect(summary.jobs.map((j) => j.state)).toEqual(["succeeded", "queued", "queued"]);
    expect(summary.cancelled).toBe(true);
    expect(summary.succeeded).toBe(1);
    expect(summary.notStarted).toBe(2);
  });

  it("reports blended batch progress that never goes backwards", async () => {
    const orchestrator = new BatchOrchestrator(new FakeRunner(() => succeed), noFiles);
    const fractions: number[] = [];
    orchestrator.on("batch-progress", (fraction) => fractions.push(fraction));

    await orchestrator.run(["/v/a.mov", "/v/b.mov"], OPTIONS);

    expect(fractions[0]).toBe(0);
    expect(fractions).toContain(0.25);
    expect(fractions).toContain(0.75);
    expect(fractions[fractions.length - 1]).toBe(1);
    for (let i = 1; i < fractions.length; i++) {
      expect(fractions[i]).toBeGreaterThanOrEqual(fractions[i - 1]);
    }
  });

  it("keeps job progress monotonic", async () => {
    const runner = new FakeRunner(() => (h) => {
      h.push({ type: "progress", percent: 40, outTimeSeconds: 4 });
      h.push({ type: "progress", percent: 30, outTimeSeconds: 3 });
      h.fail("Encoding failed with code 1");
    });
    const orchestrator = new BatchOrchestrator(runner, noFiles);
    const seen: number[] = [];
    orchestrator.on("job-progress", (job: ConversionJob) => seen.push(job.progressPercent));

    const summary = await orchestrator.run(["/v/a.mov"], OPTIONS);

    expect(seen).toEqual([40, 40]);
    expect(summary.jobs[0].progressPercent).toBe(40);
  });

  it("emits phase changes and the job lifecycle", async () => {
    const orchestrator = new BatchOrchestrator(new FakeRunner(() => succeed), noFiles);
    const phases: BatchPhase[] = [];
    const lifecycle: string[] = [];
    orchestrator.on("phase-changed", (phase) => phases.push(phase));
    orchestrator.on("job-started", (job) => lifecycle.push(`started:${job.state}`));
    orchestrator.on("job-finished", (job) => lifecycle.push(`finished:${job.state}`));
    orchestrator.on("batch-completed", (summary) => lifecycle.push(`completed:${summary.total}`));

    await orchestrator.run(["/v/a.mov"], OPTIONS);

    expect(phases).toEqual(["running", "completed"]);
    expect(lifecycle).toEqual(["started:running", "finished:succeeded", "completed:1"]);
  });

  it("completes an empty batch immediately", async () => {
    const runner = new FakeRunner(() => succeed);
    const orchestrator = new BatchOrchestrator(runner, noFiles);

    const summary = await orchestrator.run([], OPTIONS);

    expect(summary.total).toBe(0);
    expect(runner.started).toHaveLength(0);
    expect(orchestrator.getPhase()).toBe("completed");
    expect(orchestrator.getProgress()).toBe(1);
  });

  it("rejects a second run while one is in progress", async () => {
    let release: () => void = () => {};
    const runner = new FakeRunner(() => (h) => {
      release = () => h.succeed();
    });
    const orchestrator = new BatchOrchestrator(runner, noFiles);

    const first = orchestrator.run(["/v/a.mov"], OPTIONS);
    await expect(orchestrator.run(["/v/b.mov"], OPTIONS)).rejects.toBeInstanceOf(BatchError);

    await vi.waitFor(() => expect(runner.started).toHaveLength(1));
    await Promise.resolve();
    release();
    const summary = await first;
    expect(summary.succeeded).toBe(1);
  });

  it("rejects invalid options before creating jobs", async () => {
    const orchestrator = new BatchOrchestrator(new FakeRunner(() => succeed), noFiles);

    await expect(
      orchestrator.run(["/v/a.mov"], { ...OPTIONS, speedFactor: 0 })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(orchestrator.getPhase()).toBe("idle");
    expect(orchestrator.getSnapshot().jobs).toEqual([]);
  });

  it("hands out snapshots that do not alias internal state", async () => {
    const orchestrator = new BatchOrchestrator(new FakeRunner(() => succeed), noFiles);
    await orchestrator.run(["/v/a.mov"], OPTIONS);

    const snapshot = orchestrator.getSnapshot();
    snapshot.jobs[0].logLines.push("tampered");

    expect(orchestrator.getSnapshot().jobs[0].logLines).not.toContain("tampered");
    expect(snapshot.currentIndex).toBe(0);
    expect(snapshot.progress).toBe(1);
  });
});
