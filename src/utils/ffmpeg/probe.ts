/**
 * Source Probe
 *
 * Reads duration and stream layout of a source through ffprobe's JSON output.
 */

import { z } from "zod";
import type { SourceInfo } from "@pptmp4/types";
import { InvalidSourceError, ToolNotFoundError } from "../../core/app-error";
import { logger } from "../logger";
import { isMissingToolError, spawnTool, type SpawnTool, type ToolProcess } from "./process";

const probeOutputSchema = z.object({
  streams: z
    .array(z.object({ codec_type: z.string().optional() }).passthrough())
    .default([]),
  format: z
    .object({ duration: z.union([z.string(), z.number()]).optional() })
    .passthrough()
    .optional(),
});

export type ProbeSource = (sourcePath: string) => Promise<SourceInfo>;

export function buildProbeArgs(sourcePath: string): string[] {
  return [
    "-v",
    "error",
    "-show_entries",
    "format=duration:stream=codec_type",
    "-of",
    "json",
    sourcePath,
  ];
}

/**
 * Turn ffprobe JSON into SourceInfo, rejecting sources that cannot be converted
 */
export function parseProbeOutput(stdout: string, sourcePath: string): SourceInfo {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    throw new InvalidSourceError(
      `Could not read media information for ${sourcePath}`,
      error instanceof Error ? error : undefined
    );
  }

  const parsed = probeOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidSourceError(`Unexpected media information for ${sourcePath}`);
  }

  const { streams, format } = parsed.data;
  const hasVideo = streams.some((s) => s.codec_type === "video");
  const hasAudio = streams.some((s) => s.codec_type === "audio");
  const durationSeconds = Number(format?.duration);

  if (!hasVideo) {
    throw new InvalidSourceError(`No video stream in ${sourcePath}`);
  }
  if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
    throw new InvalidSourceError(`Source has no usable duration: ${sourcePath}`);
  }

  return { durationSeconds, hasVideo, hasAudio };
}

/**
 * Create a prober bound to an ffprobe binary
 */
export function createProbe(ffprobePath: string, spawn: SpawnTool = spawnTool): ProbeSource {
  return (sourcePath) =>
    new Promise<SourceInfo>((resolve, reject) => {
      let child: ToolProcess;
      try {
        child = spawn(ffprobePath, buildProbeArgs(sourcePath));
      } catch (error) {
        reject(
          new ToolNotFoundError("ffprobe", error instanceof Error ? error : undefined, {
            path: ffprobePath,
          })
        );
        return;
      }
      let stdout = "";
      let stderr = "";
      let settled = false;

      child.onStdout((chunk) => {
        stdout += chunk;
      });
      child.onStderr((chunk) => {
        stderr += chunk;
      });

      child.onError((error) => {
        if (settled) return;
        settled = true;
        logger.error("ffprobe process error", { error: error.message, ffprobePath });
        reject(
          isMissingToolError(error)
            ? new ToolNotFoundError("ffprobe", error, { path: ffprobePath })
            : new InvalidSourceError(`Could not probe ${sourcePath}`, error)
        );
      });

      child.onClose((code) => {
        if (settled) return;
        settled = true;
        if (code !== 0) {
          reject(
            new InvalidSourceError(`Unreadable source: ${sourcePath}`, undefined, {
              exitCode: code,
              stderr: stderr.trim().slice(-500),
            })
          );
          return;
        }
        try {
          resolve(parseProbeOutput(stdout, sourcePath));
        } catch (error) {
          reject(error);
        }
      });
    });
}
