// src/features/climbs/detectClimbs.ts
// Pure climb detection pipeline (no stores, no logging, no I/O)

import type { Climb, ClimbAnalysis, ClimbDetectConfig, ElevationProfile } from "./climbs.types";
import { ElevationProfileSchema } from "./climbs.schemas";
import { InvalidInputError, formatZodIssues } from "./climbs.errors";
import { createClimbDetectConfig } from "./climbs.config";
import { smoothElevation } from "./analysis/smoothElevation";
import { computeGradients } from "./analysis/computeGradients";
import { segmentClimbs } from "./analysis/segmentClimbs";
import { mergeClimbs } from "./analysis/mergeClimbs";
import { filterClimbs } from "./analysis/filterClimbs";
import { scoreClimbs } from "./analysis/scoreClimbs";

/**
 * @throws InvalidInputError
 */
export function assertValidProfile(profile: ElevationProfile): void {
    const parsed = ElevationProfileSchema.safeParse(profile);
    if (!parsed.success) {
        throw new InvalidInputError(formatZodIssues(parsed.error.issues));
    }
}

/**
 * Smoothed series plus the ordered, non-overlapping climbs of a profile.
 *
 * The config is validated before the profile; both fail fast with a typed
 * error and no partial result.
 */
export function analyzeClimbs(
    profile: ElevationProfile,
    cfg: Partial<ClimbDetectConfig> = {}
): ClimbAnalysis {
    const c = createClimbDetectConfig(cfg);
    assertValidProfile(profile);

    const smoothed = smoothElevation(profile, c.smoothingWindow);
    const gradients = computeGradients(smoothed);

    const candidates = segmentClimbs(
        gradients,
        { minGradientPct: c.minGradientPct, breakGradientPct: c.breakGradientPct },
        smoothed.length - 1
    );

    const merged = mergeClimbs(candidates, smoothed, gradients, c.mergeGapM);
    const admitted = filterClimbs(merged, c);

    return { smoothed, climbs: scoreClimbs(admitted, c.categories) };
}

export function detectClimbs(
    profile: ElevationProfile,
    cfg: Partial<ClimbDetectConfig> = {}
): Climb[] {
    return analyzeClimbs(profile, cfg).climbs;
}
