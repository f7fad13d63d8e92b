/**
 * Command line parsing
 *
 * argv → validated CliInput → ConversionOptions, with unset options taken
 * from the saved settings.
 */

import * as path from "path";
import { parseArgs } from "util";
import type { ConversionOptions } from "@pptmp4/types";
import { ENCODING_PROFILE_IDS, SPEED, SPEED_PRESETS } from "@pptmp4/types";
import { ValidationError, getErrorMessage, toError } from "../core/app-error";
import { cliInputSchema, speedInputSchema, type CliInput } from "../core/schemas";
import { validateInput } from "../core/validation";
import type { AppSettings } from "../config/types";
import { logger } from "../utils/logger";

const OPTIONS = {
  "output-dir": { type: "string", short: "o" },
  speed: { type: "string", short: "s" },
  profile: { type: "string", short: "p" },
  normalize: { type: "boolean", short: "n" },
  "no-overwrite": { type: "boolean" },
  save: { type: "boolean" },
  help: { type: "boolean", short: "h" },
} as const;

export const HELP_TEXT = `Usage: pptmp4 [options] <file...>

Convert videos to PowerPoint-friendly MP4 (H.264/AAC, 30 fps, faststart).

Options:
  -o, --output-dir <dir>   output folder (default: saved setting, else home)
  -s, --speed <value>      ${SPEED_PRESETS.join(", ")} or a custom factor ("1.15x", "3")
  -p, --profile <id>       ${ENCODING_PROFILE_IDS.join(" | ")}
  -n, --normalize          loudness-normalize audio
      --no-overwrite       skip files whose output already exists
      --save               persist the given options as defaults
  -h, --help               show this help
`;

export type ParsedCommand = { help: true } | { help: false; input: CliInput };

function readArgv(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: OPTIONS,
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    const message = getErrorMessage(error);
    throw new ValidationError(`Invalid arguments: ${message}`, [message], toError(error));
  }
}

/**
 * Parse and validate argv (without the node and script entries)
 */
export function parseCommandLine(argv: readonly string[]): ParsedCommand {
  const { values, positionals } = readArgv(argv);
  if (values.help) {
    return { help: true };
  }

  const input = validateInput(
    cliInputSchema,
    {
      files: dedupe(positionals),
      outputDirectory: values["output-dir"],
      speed: values.speed,
      profile: values.profile,
      normalize: values.normalize,
      overwrite: values["no-overwrite"] ? false : undefined,
      save: values.save ?? false,
    },
    "arguments"
  );
  return { help: false, input };
}

/**
 * Drop repeated paths, keeping the first occurrence
 */
export function dedupe(files: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const file of files) {
    const key = path.resolve(file);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(file);
  }
  return result;
}

/**
 * Saved speed setting as a factor; an unusable value falls back to 1x
 */
export function parseSpeedSetting(value: string): number {
  const parsed = speedInputSchema.safeParse(value);
  if (parsed.success) return parsed.data;
  logger.warn("Ignoring invalid saved speed", { value });
  return SPEED.DEFAULT_FACTOR;
}

/**
 * Merge command line values over saved settings
 */
export function resolveOptions(
  input: CliInput,
  settings: AppSettings,
  defaultOutputDirectory: string
): ConversionOptions {
  return {
    speedFactor: input.speed ?? parseSpeedSetting(settings.speed),
    normalizeAudio: input.normalize ?? settings.normalizeAudio,
    outputDirectory: path.resolve(
      input.outputDirectory ?? (settings.outputDirectory || defaultOutputDirectory)
    ),
    profile: input.profile ?? settings.profile,
    overwrite: input.overwrite ?? settings.overwrite,
  };
}

/**
 * Settings to persist for --save: only what was given on the command line
 */
export function settingsFromInput(input: CliInput, options: ConversionOptions): Partial<AppSettings> {
  return {
    outputDirectory: input.outputDirectory !== undefined ? options.outputDirectory : undefined,
    speed: input.speed !== undefined ? `${input.speed}x` : undefined,
    profile: input.profile,
    normalizeAudio: input.normalize,
    overwrite: input.overwrite,
  };
}
