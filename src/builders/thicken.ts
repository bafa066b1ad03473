import type { ThickenOperation } from "../schemas.js";
import {
    booleanParameter,
    enumParameter,
    quantityParameter,
    queryListParameter,
    type FeaturePayload,
} from "../wire.js";
import { length, requireAbove, type BuildContext } from "./context.js";
import { referenceQueries } from "./queries.js";

/**
 * Thicken is submitted as a bare feature with unlabelled parameters, the
 * form the feature endpoint accepted for it.
 */
export function buildThicken(operation: ThickenOperation, context: BuildContext): FeaturePayload {
    const thickness = requireAbove(length(operation.thickness, "thickness", context), 0, {
        feature: "thicken",
        dimension: "thickness",
    });
    return {
        feature: {
            btType: "BTMFeature-134",
            name: operation.name,
            suppressed: false,
            namespace: "",
            featureType: "thicken",
            parameters: [
                enumParameter("operationType", "NewBodyOperationType", operation.operationType, "bare"),
                queryListParameter("entities", referenceQueries([operation.sourceSketchRef]), "bare"),
                booleanParameter("midplane", operation.midplane, "bare"),
                quantityParameter("thickness1", thickness, "bare"),
                booleanParameter("oppositeDirection", operation.oppositeDirection, "bare"),
                quantityParameter("thickness2", { expression: "0 in", numericValue: 0 }, "bare"),
            ],
        },
    };
}
