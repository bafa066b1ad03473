import type { BooleanOperation } from "../schemas.js";
import {
    definitionCall,
    enumParameter,
    feature,
    queryListParameter,
    type FeaturePayload,
    type WireParameter,
} from "../wire.js";
import { referenceQueries } from "./queries.js";

/**
 * SUBTRACT keeps the first body and removes the rest from it; UNION and
 * INTERSECT take every body as a tool, in the order given.
 */
export function buildBoolean(operation: BooleanOperation): FeaturePayload {
    const [first, ...rest] = operation.bodies;
    const subtract = operation.operationType === "SUBTRACT";
    const parameters: WireParameter[] = [
        enumParameter("booleanOperationType", "BooleanOperationType", operation.operationType),
        queryListParameter("tools", referenceQueries(subtract ? rest : operation.bodies)),
    ];
    if (subtract && first !== undefined) {
        parameters.push(queryListParameter("targets", referenceQueries([first])));
    }
    return definitionCall(feature("boolean", operation.name, parameters));
}
