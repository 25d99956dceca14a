import type { TrackPoint } from "../climbs.types";

export type GradeSection = {
    lengthM: number;
    gradePct: number;
};

/**
 * Synthetic profile from constant-grade sections sampled every stepM.
 * Keep gradePct * stepM a multiple of 100 for integer elevations.
 */
export function profileFromSections(
    sections: GradeSection[],
    stepM = 50,
    startElevationM = 100
): TrackPoint[] {
    const points: TrackPoint[] = [{ distanceM: 0, elevationM: startElevationM }];
    let distanceM = 0;
    let elevationM = startElevationM;

    for (const s of sections) {
        const steps = Math.round(s.lengthM / stepM);
        for (let i = 0; i < steps; i++) {
            distanceM += stepM;
            elevationM += (s.gradePct * stepM) / 100;
            points.push({ distanceM, elevationM });
        }
    }

    return points;
}

export function profileFromElevations(elevations: number[], stepM: number): TrackPoint[] {
    return elevations.map((elevationM, i) => ({ distanceM: i * stepM, elevationM }));
}
