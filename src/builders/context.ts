import { DegenerateDimensionError, InvalidOperationError } from "../errors.js";
import type { LengthValue } from "../schemas.js";
import { normalizeAngle, normalizeLength, type NormalizedValue, type VariableLookup } from "../units.js";

export interface BuildContext {
    variables?: VariableLookup;
    /** Meters. Fillet radii and chamfer distances at or below this are rejected. */
    minimumDimension: number;
}

export const DEFAULT_MINIMUM_DIMENSION = 0.00001;

export function defaultContext(overrides: Partial<BuildContext> = {}): BuildContext {
    return { minimumDimension: DEFAULT_MINIMUM_DIMENSION, ...overrides };
}

export function length(value: LengthValue, role: string, context: BuildContext): NormalizedValue {
    return normalizeLength(value, { variables: context.variables, role });
}

export function angle(value: LengthValue, role: string, context: BuildContext): NormalizedValue {
    return normalizeAngle(value, { variables: context.variables, role });
}

/**
 * Rejects a value known to be at or below `minimum`. A variable whose value
 * is not known yet passes; the service checks it on regeneration.
 */
export function requireAbove(
    value: NormalizedValue,
    minimum: number,
    details: Record<string, unknown>
): NormalizedValue {
    if (value.numericValue !== null && value.numericValue <= minimum) {
        throw new DegenerateDimensionError(
            `${String(details.dimension ?? "Dimension")} ${value.expression} must be greater than ${minimum} m`,
            { ...details, expression: value.expression, minimum }
        );
    }
    return value;
}

/** Sketch coordinates are placed geometry and need a concrete value. */
export function coordinate(value: LengthValue, role: string, context: BuildContext): number {
    const normalized = length(value, role, context);
    if (normalized.numericValue === null) {
        throw new InvalidOperationError(
            `Coordinate ${normalized.expression} has no known value`,
            { role, expression: normalized.expression }
        );
    }
    return normalized.numericValue;
}
