/**
 * pptmp4 Constants
 */

// Output profile expected by PowerPoint
export const OUTPUT = {
  FRAME_RATE: 30,
  PIXEL_FORMAT: "yuv420p",
  VIDEO_CODEC: "libx264",
  AUDIO_CODEC: "aac",
  AUDIO_BITRATE: "128k",
  AUDIO_SAMPLE_RATE: 48000,
  AUDIO_CHANNELS: 2,
  FILE_SUFFIX: "_ppt",
  FILE_EXTENSION: ".mp4",
  // H.264 needs even width and height
  EVEN_DIMENSIONS_FILTER: "scale=trunc(iw/2)*2:trunc(ih/2)*2",
  LOUDNORM_FILTER: "loudnorm=I=-16:TP=-1.5:LRA=11",
} as const;

// Playback speed
export const SPEED = {
  MIN_FACTOR: 0.1,
  MAX_FACTOR: 100,
  DEFAULT_FACTOR: 1,
  // A single atempo stage only accepts ratios inside this band
  TEMPO_STAGE_MIN: 0.5,
  TEMPO_STAGE_MAX: 2.0,
  TOLERANCE: 1e-6,
} as const;

export const SPEED_PRESETS = [
  "0.5x",
  "0.75x",
  "1.0x",
  "1.25x",
  "1.5x",
  "2.0x",
  "2.5x",
  "3.0x",
  "4.0x",
] as const;

export type SpeedPreset = (typeof SPEED_PRESETS)[number];

// x264 settings per profile
export const ENCODING_PROFILES = {
  compatible: {
    label: "Most Compatible (Baseline L3.1, 30fps)",
    profile: "baseline",
    level: "3.1",
    preset: "veryfast",
    crf: "20",
  },
  balanced: {
    label: "Balanced (Main L4.0, 30fps)",
    profile: "main",
    level: "4.0",
    preset: "faster",
    crf: "20",
  },
  high: {
    label: "High Quality (High L4.1, 30fps)",
    profile: "high",
    level: "4.1",
    preset: "fast",
    crf: "18",
  },
} as const;

export type EncodingProfileId = keyof typeof ENCODING_PROFILES;

export const ENCODING_PROFILE_IDS = [
  "compatible",
  "balanced",
  "high",
] as const satisfies readonly EncodingProfileId[];

export const DEFAULT_PROFILE: EncodingProfileId = "compatible";

// Progress reporting
export const PROGRESS = {
  // Held below 100 until the encoder exits cleanly
  MAX_WHILE_RUNNING: 99,
  STDERR_TAIL_LINES: 20,
} as const;
