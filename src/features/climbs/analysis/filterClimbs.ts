import type { ClimbDetectConfig, MeasuredClimb } from "../climbs.types";

type AdmissionThresholds = Pick<ClimbDetectConfig, "minElevationGainM" | "minGradientPct" | "minLengthM">;

export function isAdmitted(climb: MeasuredClimb, c: AdmissionThresholds): boolean {
    return (
        climb.elevationGainM >= c.minElevationGainM &&
        climb.avgGradientPct >= c.minGradientPct &&
        climb.lengthM >= c.minLengthM
    );
}

/** Final admission gate after merging. */
export function filterClimbs<T extends MeasuredClimb>(climbs: readonly T[], c: AdmissionThresholds): T[] {
    return climbs.filter((climb) => isAdmitted(climb, c));
}
