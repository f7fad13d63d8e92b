/**
 * Validation Schemas
 *
 * Zod schemas for conversion options and front-end input.
 */

import { z } from "zod";
import { ENCODING_PROFILE_IDS, SPEED } from "@pptmp4/types";

// =============================================================================
// Common Schemas
// =============================================================================

/**
 * Non-empty file path with a sane length
 */
const filePath = z
  .string()
  .trim()
  .min(1, "Path cannot be empty")
  .max(4096, "Path too long");

export const profileSchema = z.enum(ENCODING_PROFILE_IDS);

/**
 * Speed multiplier; factors outside the bounds are rejected, not clamped
 */
export const speedFactorSchema = z
  .number()
  .finite()
  .min(SPEED.MIN_FACTOR, `Speed must be at least ${SPEED.MIN_FACTOR}x`)
  .max(SPEED.MAX_FACTOR, `Speed must be at most ${SPEED.MAX_FACTOR}x`);

/**
 * Speed as typed by a user: preset label or custom value, "x" suffix optional
 * ("1.5x", "1.15", " 2X ")
 */
export const speedInputSchema = z
  .string()
  .trim()
  .regex(/^(\d+(\.\d*)?|\.\d+)\s*x?$/i, "Speed must be a number such as 1.5 or 1.5x")
  .transform((value) => parseFloat(value))
  .pipe(speedFactorSchema);

// =============================================================================
// Conversion Schemas
// =============================================================================

export const conversionOptionsSchema = z
  .object({
    speedFactor: speedFactorSchema,
    normalizeAudio: z.boolean(),
    outputDirectory: filePath,
    profile: profileSchema,
    overwrite: z.boolean(),
  })
  .strict();

export const sourcePathsSchema = z.array(filePath);

// =============================================================================
// CLI Schemas
// =============================================================================

/**
 * Parsed command line, before defaults from settings are applied
 */
export const cliInputSchema = z
  .object({
    files: z.array(filePath).min(1, "Add at least one video file"),
    outputDirectory: filePath.optional(),
    speed: speedInputSchema.optional(),
    profile: profileSchema.optional(),
    normalize: z.boolean().optional(),
    overwrite: z.boolean().optional(),
    save: z.boolean().default(false),
  })
  .strict();

export type CliInput = z.infer<typeof cliInputSchema>;
