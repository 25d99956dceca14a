import type { CategoryThreshold, ClimbCategory } from "../climbs.types";

export const FALLBACK_CATEGORY: ClimbCategory = "4";

/** HC is the hardest (0), "4" the easiest. */
export const CATEGORY_ORDER: readonly ClimbCategory[] = ["HC", "1", "2", "3", "4"];

export function categoryRank(category: ClimbCategory): number {
    return CATEGORY_ORDER.indexOf(category);
}

/**
 * First row (hardest first) where either the gain or the score is above its
 * threshold. Admitted climbs matching no row are category 4.
 */
export function categorizeClimb(
    elevationGainM: number,
    difficultyScore: number,
    table: readonly CategoryThreshold[]
): ClimbCategory {
    for (const row of table) {
        if (elevationGainM > row.gainAboveM || difficultyScore > row.scoreAbove) {
            return row.category;
        }
    }
    return FALLBACK_CATEGORY;
}
