import type { ElevationProfile, TrackPoint } from "../climbs.types";

/**
 * Centered moving average over elevation; distances pass through unchanged.
 *
 * Near the ends the window shrinks symmetrically, so the first and last point
 * keep their raw elevation and no value outside the series is ever read.
 */
export function smoothElevation(profile: ElevationProfile, window: number): TrackPoint[] {
    if (!Number.isFinite(window) || window <= 1) {
        return profile.map((p) => ({ distanceM: p.distanceM, elevationM: p.elevationM }));
    }

    const n = profile.length;
    const maxHalf = Math.floor(window / 2);

    // prefix sums keep this linear in n
    const prefix = new Array<number>(n + 1);
    prefix[0] = 0;
    for (let i = 0; i < n; i++) prefix[i + 1] = prefix[i] + profile[i].elevationM;

    const out: TrackPoint[] = [];
    for (let i = 0; i < n; i++) {
        const half = Math.min(maxHalf, i, n - 1 - i);
        const from = i - half;
        const to = i + half;
        const sum = prefix[to + 1] - prefix[from];

        out.push({
            distanceM: profile[i].distanceM,
            elevationM: sum / (to - from + 1),
        });
    }

    return out;
}
