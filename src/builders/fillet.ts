import type { FilletOperation } from "../schemas.js";
import {
    definitionCall,
    feature,
    quantityParameter,
    queryListParameter,
    type FeaturePayload,
} from "../wire.js";
import { length, requireAbove, type BuildContext } from "./context.js";
import { referenceQueries } from "./queries.js";

export function buildFillet(operation: FilletOperation, context: BuildContext): FeaturePayload {
    const radius = requireAbove(length(operation.radius, "radius", context), context.minimumDimension, {
        feature: "fillet",
        dimension: "radius",
    });
    return definitionCall(feature("fillet", operation.name, [
        queryListParameter("entities", referenceQueries(operation.edges)),
        quantityParameter("radius", radius),
    ]));
}
