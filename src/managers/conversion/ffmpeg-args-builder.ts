/**
 * FFmpeg Arguments Builder
 *
 * Builds the fixed PowerPoint-compatible encode: H.264 yuv420p at constant
 * 30 fps, AAC stereo audio (silent track injected when the source has none),
 * optional speed change and loudness normalization, fast-start MP4.
 */

import * as path from "path";
import { ENCODING_PROFILES, OUTPUT, type EncodingProfileId } from "@pptmp4/types";
import { buildTempoFilter, buildVideoSpeedFilter } from "../../utils/ffmpeg";

export interface ConversionArgsOptions {
  input: string;
  output: string;
  speedFactor: number;
  normalizeAudio: boolean;
  profile: EncodingProfileId;
  hasAudio: boolean;
}

/**
 * Output file for a source: <dir>/<name>_ppt.mp4
 */
export function buildOutputPath(sourcePath: string, outputDirectory: string): string {
  const base = path.parse(sourcePath).name;
  return path.join(outputDirectory, `${base}${OUTPUT.FILE_SUFFIX}${OUTPUT.FILE_EXTENSION}`);
}

/**
 * Silent stereo source used when the input carries no audio
 */
export function buildSilentAudioInputArgs(): string[] {
  return [
    "-f",
    "lavfi",
    "-i",
    `anullsrc=channel_layout=stereo:sample_rate=${OUTPUT.AUDIO_SAMPLE_RATE}`,
  ];
}

/**
 * Video filter chain: speed, even dimensions, 30 fps
 */
export function buildVideoFilter(speedFactor: number): string {
  const parts: string[] = [];
  const speedFilter = buildVideoSpeedFilter(speedFactor);
  if (speedFilter) parts.push(speedFilter);
  parts.push(OUTPUT.EVEN_DIMENSIONS_FILTER, `fps=${OUTPUT.FRAME_RATE}`);
  return parts.join(",");
}

/**
 * Audio filter chain: tempo stages, then loudness normalization
 */
export function buildAudioFilter(speedFactor: number, normalizeAudio: boolean): string | null {
  const parts: string[] = [];
  const tempo = buildTempoFilter(speedFactor);
  if (tempo) parts.push(tempo);
  if (normalizeAudio) parts.push(OUTPUT.LOUDNORM_FILTER);
  return parts.length > 0 ? parts.join(",") : null;
}

/**
 * Encoder settings for a profile
 */
export function buildVideoEncodingArgs(profileId: EncodingProfileId): string[] {
  const profile = ENCODING_PROFILES[profileId];
  return [
    "-c:v",
    OUTPUT.VIDEO_CODEC,
    "-profile:v",
    profile.profile,
    "-level",
    profile.level,
    "-preset",
    profile.preset,
    "-crf",
    profile.crf,
  ];
}

/**
 * 4:2:0 chroma and the index at the front of the file, both required by PowerPoint
 */
export function buildPixelFormatArgs(): string[] {
  return ["-pix_fmt", OUTPUT.PIXEL_FORMAT, "-movflags", "+faststart"];
}

export function buildAudioEncodingArgs(): string[] {
  return [
    "-c:a",
    OUTPUT.AUDIO_CODEC,
    "-b:a",
    OUTPUT.AUDIO_BITRATE,
    "-ar",
    String(OUTPUT.AUDIO_SAMPLE_RATE),
    "-ac",
    String(OUTPUT.AUDIO_CHANNELS),
  ];
}

/**
 * Build the full ffmpeg argument list for one conversion
 */
export function buildConversionArgs(options: ConversionArgsOptions): string[] {
  const { input, output, speedFactor, normalizeAudio, profile, hasAudio } = options;

  const args = ["-hide_banner", "-y", "-i", input];

  if (!hasAudio) {
    args.push(...buildSilentAudioInputArgs());
  }

  args.push("-map_metadata", "-1", "-map", "0:v:0", "-map", hasAudio ? "0:a:0" : "1:a:0");

  args.push("-vf", buildVideoFilter(speedFactor));
  args.push("-vsync", "cfr", "-r", String(OUTPUT.FRAME_RATE));
  args.push(...buildVideoEncodingArgs(profile));
  args.push(...buildPixelFormatArgs());

  // The injected silence is not retimed or normalized; -shortest trims it to the video
  if (hasAudio) {
    const audioFilter = buildAudioFilter(speedFactor, normalizeAudio);
    if (audioFilter) args.push("-af", audioFilter);
  }
  args.push(...buildAudioEncodingArgs());
  if (!hasAudio) {
    args.push("-shortest");
  }

  args.push(output);
  return args;
}
