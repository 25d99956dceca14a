import type { CategoryThreshold, ClimbDetectConfig } from "./climbs.types";
import { ClimbDetectConfigSchema, type ClimbDetectConfigInput } from "./climbs.schemas";
import { InvalidConfigError, formatZodIssues } from "./climbs.errors";

const DEFAULT_CATEGORY_ROWS: CategoryThreshold[] = [
    { category: "HC", gainAboveM: 1200, scoreAbove: 8000 },
    { category: "1", gainAboveM: 800, scoreAbove: 5000 },
    { category: "2", gainAboveM: 500, scoreAbove: 3000 },
    { category: "3", gainAboveM: 300, scoreAbove: 1500 },
];

export const defaultCategoryThresholds: readonly CategoryThreshold[] = Object.freeze(
    DEFAULT_CATEGORY_ROWS.map((row) => Object.freeze(row))
);

export const defaultClimbDetectConfig: ClimbDetectConfig = Object.freeze({
    minGradientPct: 3,
    minElevationGainM: 20,
    breakGradientPct: 0,
    smoothingWindow: 5,     // GPS/baro noise filter
    mergeGapM: 250,         // switchbacks, short false flats
    minLengthM: 0,          // off
    categories: defaultCategoryThresholds,
});

/**
 * Merge a partial config over the defaults, validate it and freeze the result.
 *
 * @throws InvalidConfigError
 */
export function createClimbDetectConfig(
    partial: Partial<ClimbDetectConfig> = {}
): ClimbDetectConfig {
    const parsed = ClimbDetectConfigSchema.safeParse({
        ...defaultClimbDetectConfig,
        ...partial,
    });

    if (!parsed.success) {
        throw new InvalidConfigError(formatZodIssues(parsed.error.issues));
    }

    const c: ClimbDetectConfigInput = parsed.data;
    return Object.freeze({
        ...c,
        categories: Object.freeze(c.categories.map((row) => Object.freeze({ ...row }))),
    });
}
