import { DegenerateDimensionError, InvalidCountError } from "../errors.js";
import type { CircularPatternOperation, LinearPatternOperation } from "../schemas.js";
import type { NormalizedValue } from "../units.js";
import {
    definitionCall,
    deterministicQuery,
    enumParameter,
    feature,
    integerParameter,
    quantityParameter,
    queryListParameter,
    type FeaturePayload,
} from "../wire.js";
import { angle, length, type BuildContext } from "./context.js";
import { axisQuery } from "./queries.js";

export function buildLinearPattern(operation: LinearPatternOperation, context: BuildContext): FeaturePayload {
    const count = instanceCount(operation.count, "linearPattern");
    const spacing = nonZero(length(operation.spacing, "spacing", context), "linearPattern", "spacing");
    return definitionCall(feature("linearPattern", operation.name, [
        queryListParameter("entities", [deterministicQuery([...operation.seedFeatureIds])]),
        queryListParameter("directionQuery", [axisQuery(operation.direction)]),
        enumParameter("patternType", "PatternType", "FEATURE"),
        quantityParameter("distance", spacing),
        integerParameter("instanceCount", count),
    ]));
}

export function buildCircularPattern(operation: CircularPatternOperation, context: BuildContext): FeaturePayload {
    const count = instanceCount(operation.count, "circularPattern");
    const total = nonZero(angle(operation.angle, "angle", context), "circularPattern", "angle");
    return definitionCall(feature("circularPattern", operation.name, [
        queryListParameter("entities", [deterministicQuery([...operation.seedFeatureIds])]),
        queryListParameter("axisQuery", [axisQuery(operation.axis)]),
        enumParameter("patternType", "PatternType", "FEATURE"),
        quantityParameter("angle", total),
        integerParameter("instanceCount", count),
    ]));
}

/** Instance count includes the seed, so anything below two patterns nothing. */
function instanceCount(count: number, pattern: string): number {
    if (!Number.isInteger(count) || count < 2) {
        throw new InvalidCountError(`A ${pattern} needs a whole instance count of at least 2, got ${count}`, {
            feature: pattern,
            count,
        });
    }
    return count;
}

// Negative spacing runs the pattern the other way; zero stacks every instance on the seed.
function nonZero(value: NormalizedValue, pattern: string, dimension: string): NormalizedValue {
    if (value.numericValue === 0) {
        throw new DegenerateDimensionError(`The ${dimension} of a ${pattern} cannot be zero`, {
            feature: pattern,
            dimension,
            expression: value.expression,
        });
    }
    return value;
}
