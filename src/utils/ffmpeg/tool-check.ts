/**
 * Tool availability check (ffmpeg -version / ffprobe -version)
 */

import { ToolNotFoundError } from "../../core/app-error";
import { isMissingToolError, spawnTool, type SpawnTool, type ToolProcess } from "./process";

export interface ToolCheckResult {
  tool: string;
  path: string;
  version: string | null;
}

/**
 * Resolve with the reported version line, reject with ToolNotFoundError
 */
export function verifyTool(
  tool: string,
  toolPath: string,
  spawn: SpawnTool = spawnTool
): Promise<ToolCheckResult> {
  return new Promise((resolve, reject) => {
    let child: ToolProcess;
    try {
      child = spawn(toolPath, ["-version"]);
    } catch (error) {
      reject(new ToolNotFoundError(tool, error instanceof Error ? error : undefined, { path: toolPath }));
      return;
    }

    let stdout = "";
    child.onStdout((chunk) => {
      stdout += chunk;
    });
    child.onError((error) => {
      reject(
        new ToolNotFoundError(tool, error, {
          path: toolPath,
          reason: isMissingToolError(error) ? "missing" : error.code,
        })
      );
    });
    child.onClose((code) => {
      if (code !== 0) {
        reject(new ToolNotFoundError(tool, undefined, { path: toolPath, exitCode: code }));
        return;
      }
      const firstLine = stdout.split(/\r?\n/)[0]?.trim();
      resolve({ tool, path: toolPath, version: firstLine || null });
    });
  });
}
