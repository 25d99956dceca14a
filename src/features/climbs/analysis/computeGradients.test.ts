import { describe, it, expect } from "vitest";
import { computeGradients } from "./computeGradients";

describe("computeGradients", () => {
    it("computes percent grade per step", () => {
        const samples = computeGradients([
            { distanceM: 0, elevationM: 100 },
            { distanceM: 100, elevationM: 105 },
            { distanceM: 300, elevationM: 95 },
        ]);

        expect(samples).toEqual([
            { fromIdx: 0, toIdx: 1, distanceM: 50, lengthM: 100, gradientPct: 5 },
            { fromIdx: 1, toIdx: 2, distanceM: 200, lengthM: 200, gradientPct: -5 },
        ]);
    });

    it("skips zero-length steps instead of producing infinite grades", () => {
        const samples = computeGradients([
            { distanceM: 0, elevationM: 100 },
            { distanceM: 100, elevationM: 105 },
            { distanceM: 100, elevationM: 110 },
            { distanceM: 200, elevationM: 100 },
        ]);

        expect(samples).toHaveLength(2);
        expect(samples[1]).toEqual({ fromIdx: 2, toIdx: 3, distanceM: 150, lengthM: 100, gradientPct: -10 });
        expect(samples.every((s) => Number.isFinite(s.gradientPct))).toBe(true);
    });

    it("returns nothing for a single point", () => {
        expect(computeGradients([{ distanceM: 0, elevationM: 1 }])).toEqual([]);
    });
});
