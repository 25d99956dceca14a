// src/features/climbs/climbProfile.engine.ts
// Pure helpers for the elevation chart and climb table (no chart lib, no DOM)

import type { Climb, ClimbCategory, ElevationProfile } from "./climbs.types";

// ------------------------------
// TYPES
// ------------------------------

/** [distanceKm, elevationM] */
export type ElevationSeriesPoint = [number, number];

export type ClimbMarker = {
    /** 1-based, in route order */
    index: number;
    label: string;
    color: string;
    category: ClimbCategory;
    startKm: number;
    endKm: number;
    topElevationM: number;
};

export type ClimbSummaryRow = {
    index: number;
    startKm: string;
    endKm: string;
    lengthKm: string;
    gainM: string;
    avgGradientPct: string;
    maxGradientPct: string;
    category: ClimbCategory;
};

// ------------------------------
// CONSTS / UTILS
// ------------------------------

const CATEGORY_COLORS: Record<ClimbCategory, string> = {
    HC: "#E63946",
    "1": "#F77F00",
    "2": "#FCBF49",
    "3": "#06A77D",
    "4": "#457B9D",
};

export function categoryColor(category: ClimbCategory) {
    return CATEGORY_COLORS[category];
}

export function categoryLabel(category: ClimbCategory) {
    return `Cat ${category}`;
}

export function mToKm(m: number) {
    return m / 1000;
}

export function fmtFixed(n: number, digits: number) {
    return n.toFixed(digits);
}

// ------------------------------
// SERIES / MARKERS
// ------------------------------

export function buildElevationSeries(points: ElevationProfile): ElevationSeriesPoint[] {
    return points.map((p) => [mToKm(p.distanceM), p.elevationM]);
}

export function buildClimbMarkers(climbs: readonly Climb[]): ClimbMarker[] {
    return climbs.map((c, i) => ({
        index: i + 1,
        label: categoryLabel(c.category),
        color: categoryColor(c.category),
        category: c.category,
        startKm: mToKm(c.startDistanceM),
        endKm: mToKm(c.endDistanceM),
        topElevationM: Math.max(c.startElevationM, c.endElevationM),
    }));
}

export function buildClimbSummaryRows(climbs: readonly Climb[]): ClimbSummaryRow[] {
    return climbs.map((c, i) => ({
        index: i + 1,
        startKm: fmtFixed(mToKm(c.startDistanceM), 2),
        endKm: fmtFixed(mToKm(c.endDistanceM), 2),
        lengthKm: fmtFixed(mToKm(c.lengthM), 2),
        gainM: fmtFixed(c.elevationGainM, 0),
        avgGradientPct: fmtFixed(c.avgGradientPct, 1),
        maxGradientPct: fmtFixed(c.maxGradientPct, 1),
        category: c.category,
    }));
}
