import type { RevolveOperation } from "../schemas.js";
import {
    booleanParameter,
    definitionCall,
    enumParameter,
    feature,
    quantityParameter,
    queryListParameter,
    type FeaturePayload,
} from "../wire.js";
import { angle, requireAbove, type BuildContext } from "./context.js";
import { axisQuery, referenceQueries } from "./queries.js";

export function buildRevolve(operation: RevolveOperation, context: BuildContext): FeaturePayload {
    const revolveAngle = requireAbove(angle(operation.angle, "angle", context), 0, {
        feature: "revolve",
        dimension: "angle",
    });
    const axis = typeof operation.axis === "string"
        ? [axisQuery(operation.axis)]
        : referenceQueries([operation.axis]);
    return definitionCall(feature("revolve", operation.name, [
        queryListParameter("entities", referenceQueries([operation.sourceSketchRef])),
        queryListParameter("axis", axis),
        enumParameter("operationType", "NewBodyOperationType", operation.operationType),
        quantityParameter("revolveAngle", revolveAngle),
        booleanParameter("oppositeDirection", operation.oppositeDirection),
    ]));
}
