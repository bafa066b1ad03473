import { InvalidOperationError, InvalidUnitError } from "./errors.js";
import type { AngleValue, LengthValue } from "./schemas.js";

export type LengthUnit = "in" | "ft" | "mm" | "cm" | "m";
export type AngleUnit = "deg" | "rad";
export type QuantityKind = "length" | "angle";

export const METERS_PER_INCH = 0.0254;

const lengthFactors: Record<LengthUnit, number> = {
    in: METERS_PER_INCH,
    ft: 0.3048,
    mm: 0.001,
    cm: 0.01,
    m: 1,
};

const angleFactors: Record<AngleUnit, number> = {
    deg: Math.PI / 180,
    rad: 1,
};

const unitAliases = new Map<string, LengthUnit | AngleUnit>([
    ["in", "in"],
    ["inch", "in"],
    ["inches", "in"],
    ["ft", "ft"],
    ["foot", "ft"],
    ["feet", "ft"],
    ["mm", "mm"],
    ["millimeter", "mm"],
    ["millimeters", "mm"],
    ["cm", "cm"],
    ["centimeter", "cm"],
    ["centimeters", "cm"],
    ["m", "m"],
    ["meter", "m"],
    ["meters", "m"],
    ["deg", "deg"],
    ["degree", "deg"],
    ["degrees", "deg"],
    ["rad", "rad"],
    ["radian", "rad"],
    ["radians", "rad"],
]);

const literalPattern = /^([-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?)\s*([A-Za-z]*)$/;

export interface NormalizedValue {
    /** Text the service's expression parser accepts, e.g. "0.75 in" or "#depth". */
    expression: string;
    /** Meters or radians; null when a variable has no known default yet. */
    numericValue: number | null;
    variable?: string;
}

/** Read-only view of a variable table: name in, current expression out. */
export interface VariableLookup {
    lookup(name: string): string | undefined;
}

export interface NormalizeOptions {
    variables?: VariableLookup;
    /** Names the dimension in error details. */
    role?: string;
}

export function normalizeLength(value: LengthValue, options: NormalizeOptions = {}): NormalizedValue {
    return normalizeQuantity(value, "length", options);
}

export function normalizeAngle(value: AngleValue, options: NormalizeOptions = {}): NormalizedValue {
    return normalizeQuantity(value, "angle", options);
}

export function normalizeQuantity(
    value: LengthValue,
    kind: QuantityKind,
    options: NormalizeOptions = {}
): NormalizedValue {
    if (typeof value === "number") {
        return literal(value, defaultUnit(kind), kind);
    }
    if (typeof value === "string") {
        const text = value.trim();
        if (text.startsWith("#")) {
            return variableValue(text.slice(1), undefined, kind, options);
        }
        const parsed = parseLiteral(text, kind, options.role);
        return literal(parsed.value, parsed.unit, kind);
    }
    if ("variable" in value) {
        return variableValue(value.variable, value.fallback, kind, options);
    }
    const unit = value.unit === undefined ? defaultUnit(kind) : resolveUnit(value.unit, kind, options.role);
    return literal(value.value, unit, kind);
}

/** Parses "<number> <unit>" with no arithmetic; the unit defaults to inches or degrees. */
export function parseLiteral(
    text: string,
    kind: QuantityKind,
    role?: string
): { value: number; unit: LengthUnit | AngleUnit } {
    const match = literalPattern.exec(text.trim());
    if (!match) {
        throw new InvalidOperationError(`Cannot read "${text}" as a ${kind}`, { value: text, role });
    }
    const unit = match[2] ? resolveUnit(match[2], kind, role) : defaultUnit(kind);
    return { value: Number(match[1]), unit };
}

export function toBaseUnits(value: number, unit: LengthUnit | AngleUnit): number {
    return isAngleUnit(unit) ? value * angleFactors[unit] : value * lengthFactors[unit];
}

export function inchesToMeters(inches: number): number {
    return inches * METERS_PER_INCH;
}

export function degreesToRadians(degrees: number): number {
    return degrees * angleFactors.deg;
}

export function formatNumber(value: number): string {
    return Object.is(value, -0) ? "0" : String(value);
}

function literal(value: number, unit: LengthUnit | AngleUnit, kind: QuantityKind): NormalizedValue {
    if (!Number.isFinite(value)) {
        throw new InvalidOperationError(`A ${kind} must be a finite number`, { value });
    }
    return {
        expression: `${formatNumber(value)} ${unit}`,
        numericValue: toBaseUnits(value, unit),
    };
}

function variableValue(
    name: string,
    fallback: number | undefined,
    kind: QuantityKind,
    options: NormalizeOptions
): NormalizedValue {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
        throw new InvalidOperationError(`"${name}" is not a valid variable name`, { variable: name, role: options.role });
    }
    return {
        expression: `#${name}`,
        numericValue: fallback ?? defaultFromTable(name, kind, options.variables),
        variable: name,
    };
}

// Display-only; a default that is itself an expression stays deferred.
function defaultFromTable(name: string, kind: QuantityKind, variables?: VariableLookup): number | null {
    const expression = variables?.lookup(name);
    if (expression === undefined) return null;
    const match = literalPattern.exec(expression.trim());
    if (!match) return null;
    const unit = match[2] ? unitAliases.get(match[2].toLowerCase()) : defaultUnit(kind);
    if (unit === undefined || isAngleUnit(unit) !== (kind === "angle")) return null;
    return toBaseUnits(Number(match[1]), unit);
}

function resolveUnit(raw: string, kind: QuantityKind, role?: string): LengthUnit | AngleUnit {
    const unit = unitAliases.get(raw.trim().toLowerCase());
    if (unit === undefined) {
        throw new InvalidUnitError(`Unrecognized unit "${raw}"`, { unit: raw, role });
    }
    if (isAngleUnit(unit) !== (kind === "angle")) {
        throw new InvalidUnitError(`"${raw}" is not a ${kind} unit`, { unit: raw, role });
    }
    return unit;
}

function defaultUnit(kind: QuantityKind): LengthUnit | AngleUnit {
    return kind === "angle" ? "deg" : "in";
}

function isAngleUnit(unit: LengthUnit | AngleUnit): unit is AngleUnit {
    return unit === "deg" || unit === "rad";
}
