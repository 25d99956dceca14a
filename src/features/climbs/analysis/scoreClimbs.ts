import type { CategoryThreshold, Climb, MeasuredClimb } from "../climbs.types";
import { categorizeClimb } from "./categorizeClimb";

/**
 * Length-times-steepness index: gain (m) * average gradient (%).
 */
export function difficultyScore(elevationGainM: number, avgGradientPct: number): number {
    return elevationGainM * avgGradientPct;
}

export function scoreClimb(climb: MeasuredClimb, table: readonly CategoryThreshold[]): Climb {
    const avgGradientPct = climb.lengthM > 0 ? (100 * climb.elevationGainM) / climb.lengthM : 0;
    const score = difficultyScore(climb.elevationGainM, avgGradientPct);

    return {
        ...climb,
        avgGradientPct,
        difficultyScore: score,
        category: categorizeClimb(climb.elevationGainM, score, table),
    };
}

export function scoreClimbs(climbs: readonly MeasuredClimb[], table: readonly CategoryThreshold[]): Climb[] {
    return climbs.map((climb) => scoreClimb(climb, table));
}
