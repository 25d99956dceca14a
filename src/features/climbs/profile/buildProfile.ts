import type { ElevationProfile, TrackPoint } from "../climbs.types";
import type { BuiltProfile, GeoTrackPoint, ProfileSummary } from "./profile.types";

/**
 * Earth radius in meters.
 */
const EARTH_RADIUS_M = 6371000;

/**
 * Convert degrees to radians.
 */
function toRad(v: number): number {
    return (v * Math.PI) / 180;
}

/**
 * Haversine distance between two lat/lon points in meters.
 */
export function haversineM(
    lat1: number,
    lon1: number,
    lat2: number,
    lon2: number
): number {
    const dLat = toRad(lat2 - lat1);
    const dLon = toRad(lon2 - lon1);

    const a =
        Math.sin(dLat / 2) ** 2 +
        Math.cos(toRad(lat1)) *
        Math.cos(toRad(lat2)) *
        Math.sin(dLon / 2) ** 2;

    return 2 * EARTH_RADIUS_M * Math.asin(Math.sqrt(a));
}

function isUsable(p: GeoTrackPoint): p is GeoTrackPoint & { elevationM: number } {
    return (
        Number.isFinite(p.lat) &&
        Number.isFinite(p.lon) &&
        typeof p.elevationM === "number" &&
        Number.isFinite(p.elevationM)
    );
}

/**
 * Turn geographic points into an elevation profile with cumulative
 * along-track distance. Broken points are skipped and counted.
 */
export function buildElevationProfile(points: readonly GeoTrackPoint[]): BuiltProfile {
    const profile: TrackPoint[] = [];
    let skipped = 0;
    let prev: GeoTrackPoint | null = null;
    let distanceM = 0;

    for (const p of points) {
        if (!isUsable(p)) {
            skipped++;
            continue;
        }

        if (prev) distanceM += haversineM(prev.lat, prev.lon, p.lat, p.lon);

        profile.push({ distanceM, elevationM: p.elevationM });
        prev = p;
    }

    return { profile, skipped };
}

/**
 * Route totals on the raw (unsmoothed) profile.
 */
export function summarizeProfile(profile: ElevationProfile): ProfileSummary {
    if (profile.length === 0) {
        return {
            totalDistanceM: 0,
            totalElevationGainM: 0,
            maxElevationM: 0,
            minElevationM: 0,
            pointCount: 0,
        };
    }

    let gain = 0;
    let maxElevationM = profile[0].elevationM;
    let minElevationM = profile[0].elevationM;

    for (let i = 1; i < profile.length; i++) {
        const e = profile[i].elevationM;
        const diff = e - profile[i - 1].elevationM;
        if (diff > 0) gain += diff;
        if (e > maxElevationM) maxElevationM = e;
        if (e < minElevationM) minElevationM = e;
    }

    return {
        totalDistanceM: profile[profile.length - 1].distanceM,
        totalElevationGainM: gain,
        maxElevationM,
        minElevationM,
        pointCount: profile.length,
    };
}
