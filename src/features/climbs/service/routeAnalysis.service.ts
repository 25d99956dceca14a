// src/features/climbs/service/routeAnalysis.service.ts
import type { Climb, ClimbDetectConfig, TrackPoint } from "../climbs.types";
import type { GeoTrackPoint, ProfileSummary } from "../profile/profile.types";
import { buildElevationProfile, summarizeProfile } from "../profile/buildProfile";
import { analyzeClimbs } from "../detectClimbs";

export type RouteAnalysis = {
    profile: TrackPoint[];
    summary: ProfileSummary;
    smoothed: TrackPoint[];
    climbs: Climb[];
    skippedPoints: number;
};

/**
 * Everything the route view needs for one uploaded track.
 * Detection errors (InvalidInputError / InvalidConfigError) propagate.
 */
export function analyzeRoute(
    points: readonly GeoTrackPoint[],
    cfg: Partial<ClimbDetectConfig> = {}
): RouteAnalysis {
    const { profile, skipped } = buildElevationProfile(points);

    if (skipped > 0) {
        console.warn(`[route-analysis] skipped ${skipped} of ${points.length} points without usable position/elevation`);
    }

    const { smoothed, climbs } = analyzeClimbs(profile, cfg);

    return {
        profile,
        summary: summarizeProfile(profile),
        smoothed,
        climbs,
        skippedPoints: skipped,
    };
}
