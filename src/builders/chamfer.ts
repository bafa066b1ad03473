import type { ChamferOperation } from "../schemas.js";
import {
    definitionCall,
    enumParameter,
    feature,
    quantityParameter,
    queryListParameter,
    type FeaturePayload,
} from "../wire.js";
import { length, requireAbove, type BuildContext } from "./context.js";
import { referenceQueries } from "./queries.js";

export function buildChamfer(operation: ChamferOperation, context: BuildContext): FeaturePayload {
    const distance = requireAbove(length(operation.distance, "distance", context), context.minimumDimension, {
        feature: "chamfer",
        dimension: "distance",
    });
    return definitionCall(feature("chamfer", operation.name, [
        queryListParameter("entities", referenceQueries(operation.edges)),
        enumParameter("chamferType", "ChamferType", operation.chamferType),
        quantityParameter("width", distance),
    ]));
}
