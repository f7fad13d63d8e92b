/**
 * FFmpeg Path Resolver
 *
 * Resolves the ffmpeg and ffprobe binaries. Order: explicit path (setting or
 * environment variable), the binary bundled by the npm installer package,
 * then the bare command name so the OS searches PATH.
 */

import * as fs from "fs";
import { createRequire } from "module";
import { z } from "zod";
import { PLATFORM, executableName } from "../platform";
import { logger } from "../logger";

export type ToolName = "ffmpeg" | "ffprobe";

const INSTALLER_PACKAGES: Record<ToolName, string> = {
  ffmpeg: "@ffmpeg-installer/ffmpeg",
  ffprobe: "@ffprobe-installer/ffprobe",
};

const ENV_OVERRIDES: Record<ToolName, string> = {
  ffmpeg: "PPTMP4_FFMPEG_PATH",
  ffprobe: "PPTMP4_FFPROBE_PATH",
};

const installerModuleSchema = z.object({ path: z.string().min(1) });

const requireModule = createRequire(import.meta.url);

/**
 * Path of the binary shipped by the installer package, if it is installed
 * for this platform
 */
function getInstallerPath(tool: ToolName): string | null {
  let loaded: unknown;
  try {
    loaded = requireModule(INSTALLER_PACKAGES[tool]);
  } catch (error) {
    logger.debug(`${INSTALLER_PACKAGES[tool]} unavailable`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const parsed = installerModuleSchema.safeParse(loaded);
  if (!parsed.success || !fs.existsSync(parsed.data.path)) {
    return null;
  }

  const binaryPath = parsed.data.path;
  if (!PLATFORM.IS_WINDOWS) {
    try {
      fs.accessSync(binaryPath, fs.constants.X_OK);
    } catch {
      try {
        fs.chmodSync(binaryPath, 0o755);
        logger.debug(`${tool} executable permissions set`, { path: binaryPath });
      } catch (e) {
        logger.warn(`Could not set ${tool} executable permissions`, {
          path: binaryPath,
          error: e instanceof Error ? e.message : String(e),
        });
      }
    }
  }
  return binaryPath;
}

/**
 * Get the path (or command name) used to launch a tool
 */
export function getToolPath(tool: ToolName, configured?: string): string {
  const explicit = configured?.trim() || process.env[ENV_OVERRIDES[tool]]?.trim();
  if (explicit) {
    logger.debug(`Using configured ${tool}`, { path: explicit });
    return explicit;
  }

  const bundled = getInstallerPath(tool);
  if (bundled) {
    logger.debug(`${tool} found in installer package`, { path: bundled });
    return bundled;
  }

  return executableName(tool);
}

export function getFFmpegPath(configured?: string): string {
  return getToolPath("ffmpeg", configured);
}

export function getFFprobePath(configured?: string): string {
  return getToolPath("ffprobe", configured);
}
