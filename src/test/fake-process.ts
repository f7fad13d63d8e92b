/**
 * In-process stand-in for a spawned ffmpeg/ffprobe
 */

import type { SpawnTool, ToolProcess } from "../utils/ffmpeg";

type CloseListener = (code: number | null, signal: NodeJS.Signals | null) => void;

export class FakeProcess implements ToolProcess {
  readonly killSignals: NodeJS.Signals[] = [];
  private readonly stdoutListeners: Array<(chunk: string) => void> = [];
  private readonly stderrListeners: Array<(chunk: string) => void> = [];
  private readonly closeListeners: CloseListener[] = [];
  private readonly errorListeners: Array<(error: NodeJS.ErrnoException) => void> = [];
  private exited = false;

  constructor(private readonly exitOnKill = true) {}

  onStdout(listener: (chunk: string) => void): void {
    this.stdoutListeners.push(listener);
  }

  onStderr(listener: (chunk: string) => void): void {
    this.stderrListeners.push(listener);
  }

  onClose(listener: CloseListener): void {
    this.closeListeners.push(listener);
  }

  onError(listener: (error: NodeJS.ErrnoException) => void): void {
    this.errorListeners.push(listener);
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.killSignals.push(signal);
    if (this.exitOnKill) {
      queueMicrotask(() => this.close(null, signal));
    }
    return true;
  }

  hasExited(): boolean {
    return this.exited;
  }

  writeStdout(chunk: string): void {
    for (const listener of this.stdoutListeners) listener(chunk);
  }

  writeStderr(chunk: string): void {
    for (const listener of this.stderrListeners) listener(chunk);
  }

  close(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exited = true;
    for (const listener of this.closeListeners) listener(code, signal);
  }

  fail(error: NodeJS.ErrnoException): void {
    this.exited = true;
    for (const listener of this.errorListeners) listener(error);
  }
}

export interface SpawnCall {
  command: string;
  args: readonly string[];
  process: FakeProcess;
}

/**
 * SpawnTool that records calls; `script` drives each process once the
 * caller has attached its listeners
 */
export function createFakeSpawn(script?: (proc: FakeProcess, call: SpawnCall) => void): {
  spawn: SpawnTool;
  calls: SpawnCall[];
} {
  const calls: SpawnCall[] = [];
  const spawn: SpawnTool = (command, args) => {
    const proc = new FakeProcess();
    const call = { command, args, process: proc };
    calls.push(call);
    if (script) {
      queueMicrotask(() => script(proc, call));
    }
    return proc;
  };
  return { spawn, calls };
}

export function errnoError(message: string, code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}
