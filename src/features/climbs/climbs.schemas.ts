import { z } from "zod";

const CATEGORY_RANK = { HC: 0, "1": 1, "2": 2, "3": 3 } as const;

const nonNegative = z.number().finite().nonnegative();

export const TrackPointSchema = z.object({
    distanceM: z.number().finite().nonnegative(),
    elevationM: z.number().finite(),
});

export const ElevationProfileSchema = z
    .array(TrackPointSchema)
    .min(2, "at least 2 points are required")
    .superRefine((points, ctx) => {
        for (let i = 1; i < points.length; i++) {
            if (points[i].distanceM < points[i - 1].distanceM) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: [i, "distanceM"],
                    message: `distance decreases (${points[i - 1].distanceM} -> ${points[i].distanceM})`,
                });
                return;
            }
        }
    });

export const CategoryThresholdSchema = z.object({
    category: z.enum(["HC", "1", "2", "3"]),
    gainAboveM: nonNegative,
    scoreAbove: nonNegative,
});

export const ClimbDetectConfigSchema = z
    .object({
        minGradientPct: nonNegative,
        minElevationGainM: nonNegative,
        breakGradientPct: nonNegative,
        smoothingWindow: z
            .number()
            .int()
            .positive()
            .refine((n) => n % 2 === 1, "must be odd"),
        mergeGapM: nonNegative,
        minLengthM: nonNegative,
        categories: z.array(CategoryThresholdSchema).superRefine((rows, ctx) => {
            for (let i = 1; i < rows.length; i++) {
                if (CATEGORY_RANK[rows[i].category] <= CATEGORY_RANK[rows[i - 1].category]) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        path: [i, "category"],
                        message: "categories must be listed hardest first, each at most once",
                    });
                    return;
                }
            }
        }),
    })
    .refine((c) => c.breakGradientPct < c.minGradientPct, {
        path: ["breakGradientPct"],
        message: "must be lower than minGradientPct",
    });

export type ClimbDetectConfigInput = z.infer<typeof ClimbDetectConfigSchema>;
