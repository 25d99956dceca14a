import type { ClimbSpan, GradientSample } from "../climbs.types";

export type SegmenterContext = {
    /** flat -> climbing when gradient >= minGradientPct */
    minGradientPct: number;

    /** climbing -> flat when gradient < breakGradientPct */
    breakGradientPct: number;
};

export type SegmenterState =
    | { kind: "flat" }
    | { kind: "climbing"; startIdx: number };

export type SegmenterStep = {
    state: SegmenterState;
    emitted: ClimbSpan | null;
};

export const initialSegmenterState: SegmenterState = { kind: "flat" };

/**
 * One transition of the hysteresis state machine.
 *
 * Entry needs a real uphill sample (>= minGradientPct); once climbing, anything
 * at or above breakGradientPct keeps the segment open. The segment ends at the
 * point where the drop occurs.
 */
export function stepSegmenter(
    state: SegmenterState,
    sample: GradientSample,
    ctx: SegmenterContext
): SegmenterStep {
    switch (state.kind) {
        case "flat":
            if (sample.gradientPct >= ctx.minGradientPct) {
                return {
                    state: { kind: "climbing", startIdx: sample.fromIdx },
                    emitted: null,
                };
            }
            return { state, emitted: null };

        case "climbing":
            if (sample.gradientPct >= ctx.breakGradientPct) {
                return { state, emitted: null };
            }
            return {
                state: { kind: "flat" },
                emitted: { startIdx: state.startIdx, endIdx: sample.fromIdx },
            };
    }
}

/**
 * Run the state machine over a gradient series and collect candidate spans.
 * A climb still open at the end of the series ends at the last point.
 */
export function segmentClimbs(
    gradients: readonly GradientSample[],
    ctx: SegmenterContext,
    lastIdx: number
): ClimbSpan[] {
    const out: ClimbSpan[] = [];
    let state = initialSegmenterState;

    for (const sample of gradients) {
        const next = stepSegmenter(state, sample, ctx);
        if (next.emitted) out.push(next.emitted);
        state = next.state;
    }

    if (state.kind === "climbing") {
        out.push({ startIdx: state.startIdx, endIdx: lastIdx });
    }

    return out;
}
