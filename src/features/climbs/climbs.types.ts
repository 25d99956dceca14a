// Domain types for climb detection

/**
 * One point of an elevation profile.
 */
export type TrackPoint = {
    /** Cumulative distance from the route start in meters (non-decreasing) */
    distanceM: number;

    /** Elevation in meters */
    elevationM: number;
};

export type ElevationProfile = readonly TrackPoint[];

/**
 * Gradient between two consecutive points with a positive step length.
 */
export type GradientSample = {
    fromIdx: number;
    toIdx: number;

    /** Midpoint of the step */
    distanceM: number;

    lengthM: number;
    gradientPct: number;
};

/**
 * Candidate climb as point indices into the smoothed profile.
 */
export type ClimbSpan = {
    startIdx: number;
    endIdx: number;
};

/**
 * A span measured over its full extent (before scoring).
 */
export type MeasuredClimb = ClimbSpan & {
    startDistanceM: number;
    endDistanceM: number;
    startElevationM: number;
    endElevationM: number;
    lengthM: number;
    elevationGainM: number;
    avgGradientPct: number;
    maxGradientPct: number;
};

export type ClimbCategory = "HC" | "1" | "2" | "3" | "4";

/** Categories that have a row in the threshold table ("4" is the fallback). */
export type RankedCategory = Exclude<ClimbCategory, "4">;

export type Climb = MeasuredClimb & {
    /** elevationGainM * avgGradientPct */
    difficultyScore: number;
    category: ClimbCategory;
};

export type CategoryThreshold = {
    readonly category: RankedCategory;

    /** Qualifies when elevation gain is strictly above this value */
    readonly gainAboveM: number;

    /** Qualifies when difficulty score is strictly above this value */
    readonly scoreAbove: number;
};

export type ClimbDetectConfig = {
    /** Entry threshold of the segmenter and minimum average gradient of a climb */
    readonly minGradientPct: number;

    /** Minimum total gain of a climb */
    readonly minElevationGainM: number;

    /** An open climb ends when the gradient drops below this value */
    readonly breakGradientPct: number;

    /** Width of the centered moving average (odd, 1 = off) */
    readonly smoothingWindow: number;

    /** Candidates closer than this are merged into one climb */
    readonly mergeGapM: number;

    /** Minimum climb length (0 = no length gate) */
    readonly minLengthM: number;

    /** Ordered hardest first; the first matching row wins */
    readonly categories: readonly CategoryThreshold[];
};

export type ClimbAnalysis = {
    /** Smoothed profile, same length and distances as the input */
    smoothed: TrackPoint[];
    climbs: Climb[];
};
