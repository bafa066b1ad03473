import { InvalidOperationError } from "../errors.js";
import type { LengthValue, MateConnectorOperation, MateOperation } from "../schemas.js";
import { degreesToRadians, formatNumber, inchesToMeters, type NormalizedValue } from "../units.js";
import type {
    BooleanParameter,
    EnumParameter,
    FeaturePayload,
    QuantityParameter,
    WireParameter,
} from "../wire.js";
import { angle, length, type BuildContext } from "./context.js";

// Assembly features take their parameters in this short form.
function flag(parameterId: string, value: boolean): BooleanParameter {
    return { btType: "BTMParameterBoolean-144", parameterId, value };
}

function choice(parameterId: string, enumName: string, value: string): EnumParameter {
    return { btType: "BTMParameterEnum-145", parameterId, enumName, value };
}

function amount(parameterId: string, expression: string): QuantityParameter {
    return { btType: "BTMParameterQuantity-147", parameterId, expression, isInteger: false };
}

/** A known value is written out in base units; a variable stays as its expression. */
function baseExpression(value: NormalizedValue, unit: "m" | "rad"): string {
    return value.numericValue === null ? value.expression : `${formatNumber(value.numericValue)} ${unit}`;
}

/**
 * Mate connector at the centroid of a face on one assembly occurrence, its
 * primary axis along the face normal.
 */
export function buildMateConnector(operation: MateConnectorOperation, context: BuildContext): FeaturePayload {
    const parameters: WireParameter[] = [
        choice("originType", "Origin type", "ON_ENTITY"),
        {
            btType: "BTMParameterQueryWithOccurrenceList-67",
            parameterId: "originQuery",
            queries: [{
                btType: "BTMInferenceQueryWithOccurrence-1083",
                inferenceType: "CENTROID",
                path: [...operation.occurrencePath],
                deterministicIds: [operation.faceId],
            }],
        },
    ];

    if (operation.flipPrimary) {
        parameters.push(flag("flipPrimary", true));
    }
    if (operation.secondaryAxis !== "PLUS_X") {
        parameters.push(choice("secondaryAxisType", "Reorient secondary axis", operation.secondaryAxis));
    }
    if (operation.translation !== undefined || operation.rotation !== undefined) {
        const zero: LengthValue = 0;
        const [x, y, z] = operation.translation ?? [zero, zero, zero];
        parameters.push(
            flag("transform", true),
            amount("translationX", baseExpression(length(x, "translationX", context), "m")),
            amount("translationY", baseExpression(length(y, "translationY", context), "m")),
            amount("translationZ", baseExpression(length(z, "translationZ", context), "m")),
            choice("rotationType", "Rotation axis", operation.rotation?.axis ?? "ABOUT_Z"),
            amount("rotation", baseExpression(angle(operation.rotation?.angle ?? zero, "rotation", context), "rad")),
        );
    }

    return {
        feature: {
            btType: "BTMMateConnector-66",
            featureType: "mateConnector",
            name: operation.name,
            suppressed: false,
            parameters,
        },
    };
}

/**
 * Mate between two mate connector features. A revolute mate turns about
 * the connectors' shared primary axis, so no separate axis is sent.
 */
export function buildMate(operation: MateOperation): FeaturePayload {
    const [first, second] = operation.connectors;
    const parameters: WireParameter[] = [
        choice("mateType", "Mate type", operation.mateType),
        {
            btType: "BTMParameterQueryWithOccurrenceList-67",
            parameterId: "mateConnectorsQuery",
            queries: [first, second].map((featureId) => ({
                btType: "BTMFeatureQueryWithOccurrence-157" as const,
                featureId,
                path: [],
                queryData: "",
            })),
        },
    ];

    const { limits } = operation;
    if (limits !== undefined) {
        if (limits.min > limits.max) {
            throw new InvalidOperationError(`Mate limits are reversed: ${limits.min} > ${limits.max}`, {
                feature: "mate",
                limits,
            });
        }
        parameters.push(flag("limitsEnabled", true));
        switch (operation.mateType) {
            case "SLIDER":
            case "CYLINDRICAL":
                parameters.push(
                    amount("limitAxialZMin", `${formatNumber(inchesToMeters(limits.min))} m`),
                    amount("limitAxialZMax", `${formatNumber(inchesToMeters(limits.max))} m`),
                );
                break;
            case "REVOLUTE":
                parameters.push(
                    amount("limitRotationMin", `${formatNumber(degreesToRadians(limits.min))} rad`),
                    amount("limitRotationMax", `${formatNumber(degreesToRadians(limits.max))} rad`),
                );
                break;
            case "FASTENED":
                throw new InvalidOperationError("A fastened mate has no degrees of freedom to limit", {
                    feature: "mate",
                    mateType: operation.mateType,
                });
        }
    }

    return {
        feature: {
            btType: "BTMMate-64",
            featureType: "mate",
            name: operation.name,
            suppressed: false,
            parameters,
        },
    };
}
