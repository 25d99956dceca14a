import { describe, it, expect } from "vitest";
import { defaultCategoryThresholds } from "../climbs.config";
import { categorizeClimb, categoryRank } from "./categorizeClimb";
import { difficultyScore, scoreClimb } from "./scoreClimbs";

const table = defaultCategoryThresholds;

describe("categorizeClimb", () => {
    it("qualifies on gain alone", () => {
        expect(categorizeClimb(1300, 0, table)).toBe("HC");
        expect(categorizeClimb(900, 0, table)).toBe("1");
        expect(categorizeClimb(600, 0, table)).toBe("2");
        expect(categorizeClimb(301, 0, table)).toBe("3");
    });

    it("qualifies on score alone", () => {
        expect(categorizeClimb(100, 8001, table)).toBe("HC");
        expect(categorizeClimb(100, 5001, table)).toBe("1");
        expect(categorizeClimb(100, 3001, table)).toBe("2");
        expect(categorizeClimb(100, 1501, table)).toBe("3");
    });

    it("uses strict thresholds and falls back to category 4", () => {
        expect(categorizeClimb(300, 1500, table)).toBe("4");
        expect(categorizeClimb(1200, 8000, table)).toBe("1");
        expect(categorizeClimb(20, 60, table)).toBe("4");
    });

    it("follows an overridden table", () => {
        const custom = [{ category: "2" as const, gainAboveM: 50, scoreAbove: 200 }];
        expect(categorizeClimb(60, 0, custom)).toBe("2");
        expect(categorizeClimb(1300, 0, custom)).toBe("2");
        expect(categorizeClimb(10, 10, custom)).toBe("4");
    });

    it("never rates a harder climb easier", () => {
        const gains = [0, 150, 310, 450, 520, 790, 810, 1100, 1250, 2000];
        const scores = [0, 900, 1600, 2500, 3100, 4800, 5200, 7900, 8100, 20000];
        const cases = gains.flatMap((g) => scores.map((s) => ({ g, s, rank: categoryRank(categorizeClimb(g, s, table)) })));

        for (const a of cases) {
            for (const b of cases) {
                if (a.g > b.g && a.s > b.s) {
                    expect(a.rank).toBeLessThanOrEqual(b.rank);
                }
            }
        }
    });
});

describe("scoreClimb", () => {
    it("scores gain times average gradient", () => {
        expect(difficultyScore(500, 8)).toBe(4000);
    });

    it("derives average gradient, score and category from the measured climb", () => {
        const climb = scoreClimb(
            {
                startIdx: 0,
                endIdx: 100,
                startDistanceM: 0,
                endDistanceM: 10000,
                startElevationM: 0,
                endElevationM: 1000,
                lengthM: 10000,
                elevationGainM: 1000,
                avgGradientPct: 10,
                maxGradientPct: 12,
            },
            table
        );

        expect(climb.avgGradientPct).toBe(10);
        expect(climb.difficultyScore).toBe(10000);
        expect(climb.maxGradientPct).toBe(12);
        expect(climb.category).toBe("HC");
    });
});
