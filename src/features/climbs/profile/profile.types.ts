import type { TrackPoint } from "../climbs.types";

/**
 * One already-parsed point of a recorded or planned route.
 */
export type GeoTrackPoint = {
    /** Latitude in decimal degrees */
    lat: number;

    /** Longitude in decimal degrees */
    lon: number;

    /** Elevation in meters; points without one are skipped */
    elevationM?: number | null;
};

export type BuiltProfile = {
    profile: TrackPoint[];

    /** Number of input points dropped because of missing/non-finite values */
    skipped: number;
};

export type ProfileSummary = {
    totalDistanceM: number;
    totalElevationGainM: number;
    maxElevationM: number;
    minElevationM: number;
    pointCount: number;
};
