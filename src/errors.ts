import type { ZodError } from "zod";

export type FeatureErrorCode =
    | "INVALID_UNIT"
    | "UNSUPPORTED_PRIMITIVE"
    | "DEGENERATE_DIMENSION"
    | "INVALID_COUNT"
    | "UNRESOLVABLE_REFERENCE"
    | "INVALID_OPERATION";

/**
 * A local failure raised while building one feature payload. These are
 * deterministic for a given request, so callers must not retry them.
 */
export class FeatureBuildError extends Error {
    readonly code: FeatureErrorCode;
    readonly details?: Record<string, unknown>;
    readonly retryable = false;

    constructor(code: FeatureErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
    }
}

export class InvalidUnitError extends FeatureBuildError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("INVALID_UNIT", message, details);
    }
}

export class UnsupportedPrimitiveError extends FeatureBuildError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("UNSUPPORTED_PRIMITIVE", message, details);
    }
}

export class DegenerateDimensionError extends FeatureBuildError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("DEGENERATE_DIMENSION", message, details);
    }
}

export class InvalidCountError extends FeatureBuildError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("INVALID_COUNT", message, details);
    }
}

export class UnresolvableReferenceError extends FeatureBuildError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("UNRESOLVABLE_REFERENCE", message, details);
    }
}

export class InvalidOperationError extends FeatureBuildError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("INVALID_OPERATION", message, details);
    }
}

export function fromZodError(error: ZodError, what: string): InvalidOperationError {
    const issues = error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
    }));
    const first = issues[0];
    const summary = first ? `${first.path || "<root>"}: ${first.message}` : "invalid input";
    return new InvalidOperationError(`Invalid ${what}: ${summary}`, { issues });
}

export function isFeatureBuildError(error: unknown): error is FeatureBuildError {
    return error instanceof FeatureBuildError;
}
