import { describe, it, expect } from "vitest";
import type { Climb } from "./climbs.types";
import {
    buildClimbMarkers,
    buildClimbSummaryRows,
    buildElevationSeries,
    categoryColor,
} from "./climbProfile.engine";

const CLIMB: Climb = {
    startIdx: 20,
    endIdx: 60,
    startDistanceM: 1000,
    endDistanceM: 3000,
    startElevationM: 101.8,
    endElevationM: 216.4,
    lengthM: 2000,
    elevationGainM: 114.6,
    avgGradientPct: 5.73,
    maxGradientPct: 6.04,
    difficultyScore: 656.658,
    category: "4",
};

describe("climbProfile.engine", () => {
    it("maps categories to colors", () => {
        expect(categoryColor("HC")).toBe("#E63946");
        expect(categoryColor("4")).toBe("#457B9D");
    });

    it("builds the elevation series in km", () => {
        expect(
            buildElevationSeries([
                { distanceM: 0, elevationM: 100 },
                { distanceM: 1500, elevationM: 180 },
            ])
        ).toEqual([
            [0, 100],
            [1.5, 180],
        ]);
    });

    it("builds one marker per climb", () => {
        expect(buildClimbMarkers([CLIMB])).toEqual([
            {
                index: 1,
                label: "Cat 4",
                color: "#457B9D",
                category: "4",
                startKm: 1,
                endKm: 3,
                topElevationM: 216.4,
            },
        ]);
    });

    it("formats the summary table", () => {
        expect(buildClimbSummaryRows([CLIMB])).toEqual([
            {
                index: 1,
                startKm: "1.00",
                endKm: "3.00",
                lengthKm: "2.00",
                gainM: "115",
                avgGradientPct: "5.7",
                maxGradientPct: "6.0",
                category: "4",
            },
        ]);
    });
});
