import type { ExtrudeOperation } from "../schemas.js";
import {
    booleanParameter,
    definitionCall,
    enumParameter,
    feature,
    quantityParameter,
    queryListParameter,
    type FeaturePayload,
} from "../wire.js";
import { length, requireAbove, type BuildContext } from "./context.js";
import { referenceQueries } from "./queries.js";

export function buildExtrude(operation: ExtrudeOperation, context: BuildContext): FeaturePayload {
    const depth = requireAbove(length(operation.depth, "depth", context), 0, {
        feature: "extrude",
        dimension: "depth",
    });
    return definitionCall(feature("extrude", operation.name, [
        queryListParameter("entities", referenceQueries([operation.sourceSketchRef])),
        enumParameter("operationType", "NewBodyOperationType", operation.operationType),
        quantityParameter("depth", depth),
        booleanParameter("oppositeDirection", operation.oppositeDirection),
    ]));
}
