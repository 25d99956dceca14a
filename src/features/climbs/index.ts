export * from "./climbs.types";
export * from "./climbs.errors";
export * from "./climbs.schemas";
export * from "./climbs.config";
export * from "./detectClimbs";
export * from "./climbProfile.engine";

export { smoothElevation } from "./analysis/smoothElevation";
export { computeGradients } from "./analysis/computeGradients";
export { segmentClimbs, stepSegmenter, initialSegmenterState } from "./analysis/segmentClimbs";
export type { SegmenterContext, SegmenterState, SegmenterStep } from "./analysis/segmentClimbs";
export { mergeClimbs, mergeClimbSpans, measureClimbSpan } from "./analysis/mergeClimbs";
export { filterClimbs, isAdmitted } from "./analysis/filterClimbs";
export { scoreClimb, scoreClimbs, difficultyScore } from "./analysis/scoreClimbs";
export { categorizeClimb, categoryRank, CATEGORY_ORDER, FALLBACK_CATEGORY } from "./analysis/categorizeClimb";

export type * from "./profile/profile.types";
export { buildElevationProfile, summarizeProfile, haversineM } from "./profile/buildProfile";

export { analyzeRoute } from "./service/routeAnalysis.service";
export type { RouteAnalysis } from "./service/routeAnalysis.service";

export { createClimbConfigStore, CLIMB_CONFIG_STORAGE_KEY } from "./store/climbConfig.store";
export type { ClimbConfigState } from "./store/climbConfig.store";
