/**
 * Settings Store
 *
 * Persisted defaults for the converter, validated against a JSON schema.
 * PPTMP4_CONFIG_DIR relocates the settings file.
 */

import Conf from "conf";
import { ENCODING_PROFILE_IDS, DEFAULT_PROFILE } from "@pptmp4/types";
import { AppSettings } from "./types";
import { ConfigError, toError } from "../core/app-error";

let store: Conf<AppSettings> | null = null;

/**
 * Main application settings store (lazy; the file is read on first access)
 */
export function getStore(): Conf<AppSettings> {
  if (store) return store;

  try {
    store = new Conf<AppSettings>({
      projectName: "pptmp4",
      cwd: process.env.PPTMP4_CONFIG_DIR || undefined,
      schema: {
        outputDirectory: { type: "string", default: "" },
        speed: { type: "string", default: "1.0x" },
        profile: { type: "string", enum: [...ENCODING_PROFILE_IDS], default: DEFAULT_PROFILE },
        normalizeAudio: { type: "boolean", default: false },
        overwrite: { type: "boolean", default: true },
        ffmpegPath: { type: "string", default: "" },
        ffprobePath: { type: "string", default: "" },
      },
    });
  } catch (error) {
    throw new ConfigError("Unable to load settings", toError(error));
  }
  return store;
}

/**
 * Read all settings as a plain object
 */
export function getSettings(): AppSettings {
  return { ...getStore().store };
}

/**
 * Persist a subset of settings
 */
export function saveSettings(updates: Partial<AppSettings>): void {
  const settings = getStore();
  for (const [key, value] of Object.entries(updates)) {
    // conf rejects undefined; clearing a value goes through delete()
    if (value !== undefined) {
      settings.set(key, value);
    }
  }
}
