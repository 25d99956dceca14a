import type { ZodIssue } from "zod";

export class ClimbDetectionError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
        this.name = new.target.name;
        this.issues = issues;
    }
}

/** The elevation profile cannot be analysed. */
export class InvalidInputError extends ClimbDetectionError {
    constructor(issues: string[]) {
        super("Invalid elevation profile", issues);
    }
}

/** The detection parameters are inconsistent or out of range. */
export class InvalidConfigError extends ClimbDetectionError {
    constructor(issues: string[]) {
        super("Invalid climb detection config", issues);
    }
}

export function formatZodIssues(issues: readonly ZodIssue[]): string[] {
    return issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}
