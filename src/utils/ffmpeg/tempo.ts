/**
 * Speed Filters
 *
 * Video speed changes rescale timestamps; audio uses pitch-preserving atempo
 * stages. One atempo stage only accepts [0.5, 2.0], so larger changes are
 * split into several stages whose product is the requested factor.
 */

import { SPEED } from "@pptmp4/types";
import { ValidationError } from "../../core/app-error";

/**
 * Render a ratio without float noise (1.2000000000000002 -> 1.2)
 */
export function formatRatio(value: number): string {
  return String(Number(value.toPrecision(12)));
}

export function isUnitSpeed(speedFactor: number): boolean {
  return Math.abs(speedFactor - 1) <= SPEED.TOLERANCE;
}

/**
 * Split a speed factor into atempo stage ratios
 */
export function buildTempoStages(speedFactor: number): number[] {
  if (!Number.isFinite(speedFactor) || speedFactor <= 0) {
    throw new ValidationError(`Speed factor must be a positive number, got ${speedFactor}`);
  }

  const stages: number[] = [];
  let remaining = speedFactor;

  while (remaining > SPEED.TEMPO_STAGE_MAX) {
    stages.push(SPEED.TEMPO_STAGE_MAX);
    remaining /= SPEED.TEMPO_STAGE_MAX;
  }
  while (remaining < SPEED.TEMPO_STAGE_MIN) {
    stages.push(SPEED.TEMPO_STAGE_MIN);
    remaining /= SPEED.TEMPO_STAGE_MIN;
  }

  if (!isUnitSpeed(remaining)) {
    stages.push(remaining);
  }
  return stages;
}

/**
 * atempo filter chain for a speed factor ("" when no change is needed)
 */
export function buildTempoFilter(speedFactor: number): string {
  return buildTempoStages(speedFactor)
    .map((stage) => `atempo=${formatRatio(stage)}`)
    .join(",");
}

/**
 * Timestamp filter for the video stream (null at normal speed)
 */
export function buildVideoSpeedFilter(speedFactor: number): string | null {
  return isUnitSpeed(speedFactor) ? null : `setpts=PTS/${formatRatio(speedFactor)}`;
}
