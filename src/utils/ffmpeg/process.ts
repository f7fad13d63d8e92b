/**
 * Tool Process
 *
 * Narrow view of a spawned ffmpeg/ffprobe process. The runner and the prober
 * only depend on this interface, so tests can drive them without a binary.
 */

import { spawn } from "child_process";
import { logger } from "../logger";

export interface ToolProcess {
  onStdout(listener: (chunk: string) => void): void;
  onStderr(listener: (chunk: string) => void): void;
  onClose(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  onError(listener: (error: NodeJS.ErrnoException) => void): void;
  kill(signal?: NodeJS.Signals): boolean;
  hasExited(): boolean;
}

export type SpawnTool = (command: string, args: readonly string[]) => ToolProcess;

/**
 * Spawn a tool with stdin closed and both output streams decoded as UTF-8
 */
export const spawnTool: SpawnTool = (command, args) => {
  const child = spawn(command, [...args], {
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
  });
  let exited = false;
  child.once("exit", () => {
    exited = true;
  });
  child.once("error", () => {
    exited = true;
  });
  child.stdout?.setEncoding("utf8");
  child.stderr?.setEncoding("utf8");

  return {
    onStdout: (listener) => {
      child.stdout?.on("data", listener);
    },
    onStderr: (listener) => {
      child.stderr?.on("data", listener);
    },
    onClose: (listener) => {
      child.once("close", listener);
    },
    onError: (listener) => {
      child.once("error", listener);
    },
    kill: (signal) => child.kill(signal),
    hasExited: () => exited,
  };
};

/**
 * Terminate a process, escalating to SIGKILL if it ignores SIGTERM
 */
export function terminateProcess(process: ToolProcess, graceMs = 2000): void {
  if (process.hasExited()) {
    return;
  }

  try {
    process.kill("SIGTERM");
  } catch (error) {
    logger.warn("Error sending SIGTERM to encoder", {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const timer = setTimeout(() => {
    if (!process.hasExited()) {
      logger.warn("Encoder did not exit, force killing");
      process.kill("SIGKILL");
    }
  }, graceMs);
  timer.unref();
  process.onClose(() => clearTimeout(timer));
}

/**
 * True when a spawn error means the binary itself is unusable
 */
export function isMissingToolError(error: NodeJS.ErrnoException): boolean {
  return error.code === "ENOENT" || error.code === "EACCES" || error.code === "EPERM";
}
