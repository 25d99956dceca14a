import type { ElevationProfile, GradientSample } from "../climbs.types";

/**
 * One sample per consecutive pair of points. Zero-length steps (duplicate
 * points) carry no distance and are skipped.
 */
export function computeGradients(profile: ElevationProfile): GradientSample[] {
    const out: GradientSample[] = [];

    for (let i = 0; i < profile.length - 1; i++) {
        const a = profile[i];
        const b = profile[i + 1];

        const lengthM = b.distanceM - a.distanceM;
        if (lengthM <= 0) continue;

        out.push({
            fromIdx: i,
            toIdx: i + 1,
            distanceM: (a.distanceM + b.distanceM) / 2,
            lengthM,
            gradientPct: (100 * (b.elevationM - a.elevationM)) / lengthM,
        });
    }

    return out;
}
