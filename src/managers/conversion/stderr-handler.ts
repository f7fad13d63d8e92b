/**
 * FFmpeg Stderr Handler
 *
 * Splits ffmpeg's diagnostic stream into lines (status lines end in \r),
 * separates periodic status lines carrying `time=` from ordinary diagnostics,
 * and keeps a short tail for error reports.
 */

import { PROGRESS } from "@pptmp4/types";
import { logger } from "../../utils/logger";

const TIME_PATTERN = /time=\s*(-?\d+):(\d{2}):(\d{2}(?:\.\d+)?)/;
const STATUS_LINE_PATTERN = /^\s*(frame|size)=/;

/**
 * Parse an ffmpeg timecode marker from a status line, in seconds
 */
export function parseTimeMarker(line: string): number | null {
  const match = line.match(TIME_PATTERN);
  if (!match) return null;
  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const seconds = parseFloat(match[3]);
  const total = hours * 3600 + minutes * 60 + seconds;
  return Number.isFinite(total) && total >= 0 ? total : null;
}

export interface StderrCallbacks {
  onDiagnostic?: (line: string) => void;
  onTime?: (seconds: number) => void;
}

/**
 * Stderr handler for one ffmpeg process
 */
export class StderrHandler {
  private partial = "";
  private stderrTail: string[] = [];

  constructor(private readonly callbacks: StderrCallbacks = {}) {}

  /**
   * Process stderr chunk
   */
  processChunk(chunk: string): void {
    const lines = (this.partial + chunk).split(/\r\n|\r|\n/);
    this.partial = lines.pop() ?? "";
    for (const line of lines) {
      this.processLine(line);
    }
  }

  /**
   * Process whatever is left after the stream ends
   */
  flush(): void {
    if (this.partial) {
      const line = this.partial;
      this.partial = "";
      this.processLine(line);
    }
  }

  /**
   * Get recent diagnostic lines
   */
  getRecentStderr(): string {
    return this.stderrTail.join("\n").trim();
  }

  private processLine(rawLine: string): void {
    const line = rawLine.trimEnd();
    if (!line.trim()) return;

    if (STATUS_LINE_PATTERN.test(line)) {
      const seconds = parseTimeMarker(line);
      if (seconds !== null) {
        this.callbacks.onTime?.(seconds);
      }
      return;
    }

    this.stderrTail.push(line);
    if (this.stderrTail.length > PROGRESS.STDERR_TAIL_LINES) {
      this.stderrTail.shift();
    }

    if (/\b(error|invalid|failed)\b/i.test(line)) {
      logger.debug("ffmpeg reported a problem", { line: line.slice(0, 500) });
    }
    this.callbacks.onDiagnostic?.(line);
  }
}
