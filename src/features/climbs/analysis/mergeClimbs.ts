import type { ClimbSpan, ElevationProfile, GradientSample, MeasuredClimb } from "../climbs.types";

/**
 * Join spans whose gap (next start - current end) is <= mergeGapM.
 * Chains of close spans collapse into one.
 */
export function mergeClimbSpans(
    spans: readonly ClimbSpan[],
    points: ElevationProfile,
    mergeGapM: number
): ClimbSpan[] {
    const out: ClimbSpan[] = [];

    for (const span of spans) {
        const last = out[out.length - 1];
        if (last) {
            const gapM = points[span.startIdx].distanceM - points[last.endIdx].distanceM;
            if (gapM <= mergeGapM) {
                out[out.length - 1] = { startIdx: last.startIdx, endIdx: Math.max(last.endIdx, span.endIdx) };
                continue;
            }
        }
        out.push({ ...span });
    }

    return out;
}

/** First sample with fromIdx >= idx (samples are ordered by fromIdx). */
export function lowerBoundSample(gradients: readonly GradientSample[], idx: number) {
    let lo = 0;
    let hi = gradients.length;
    while (lo < hi) {
        const mid = (lo + hi) >> 1;
        if (gradients[mid].fromIdx < idx) lo = mid + 1;
        else hi = mid;
    }
    return lo;
}

/**
 * Measure a span over its full extent. Gain is end minus start elevation,
 * so dips inside a merged climb are not counted twice.
 */
export function measureClimbSpan(
    span: ClimbSpan,
    points: ElevationProfile,
    gradients: readonly GradientSample[]
): MeasuredClimb {
    const start = points[span.startIdx];
    const end = points[span.endIdx];

    const lengthM = end.distanceM - start.distanceM;
    const elevationGainM = Math.max(0, end.elevationM - start.elevationM);
    const avgGradientPct = lengthM > 0 ? (100 * elevationGainM) / lengthM : 0;

    let maxGradientPct = Number.NEGATIVE_INFINITY;
    for (let k = lowerBoundSample(gradients, span.startIdx); k < gradients.length; k++) {
        const g = gradients[k];
        if (g.toIdx > span.endIdx) break;
        if (g.gradientPct > maxGradientPct) maxGradientPct = g.gradientPct;
    }
    if (!Number.isFinite(maxGradientPct)) maxGradientPct = avgGradientPct;

    return {
        startIdx: span.startIdx,
        endIdx: span.endIdx,
        startDistanceM: start.distanceM,
        endDistanceM: end.distanceM,
        startElevationM: start.elevationM,
        endElevationM: end.elevationM,
        lengthM,
        elevationGainM,
        avgGradientPct,
        maxGradientPct,
    };
}

export function mergeClimbs(
    candidates: readonly ClimbSpan[],
    points: ElevationProfile,
    gradients: readonly GradientSample[],
    mergeGapM: number
): MeasuredClimb[] {
    return mergeClimbSpans(candidates, points, mergeGapM).map((span) =>
        measureClimbSpan(span, points, gradients)
    );
}
