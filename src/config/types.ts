/**
 * Configuration Type Definitions
 */

import type { EncodingProfileId } from "@pptmp4/types";

/**
 * Application settings schema
 */
export interface AppSettings {
  outputDirectory: string; // "" = home directory
  speed: string; // preset ("1.5x") or custom factor ("1.15")
  profile: EncodingProfileId;
  normalizeAudio: boolean;
  overwrite: boolean;
  ffmpegPath: string; // "" = auto-detect
  ffprobePath: string; // "" = auto-detect
}
