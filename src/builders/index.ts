import type { EntityId } from "../idAllocator.js";
import type { LogicalOperation } from "../schemas.js";
import { deepFreeze, type FeaturePayload } from "../wire.js";
import { buildBoolean } from "./boolean.js";
import { buildChamfer } from "./chamfer.js";
import type { BuildContext } from "./context.js";
import { buildExtrude } from "./extrude.js";
import { buildFillet } from "./fillet.js";
import { buildMate, buildMateConnector } from "./mate.js";
import { buildCircularPattern, buildLinearPattern } from "./pattern.js";
import { buildRevolve } from "./revolve.js";
import { buildSketch } from "./sketch.js";
import { buildThicken } from "./thicken.js";

export { axisQuery, referenceQueries } from "./queries.js";
export { defaultContext, DEFAULT_MINIMUM_DIMENSION, type BuildContext } from "./context.js";
export {
    buildBoolean,
    buildChamfer,
    buildCircularPattern,
    buildExtrude,
    buildFillet,
    buildLinearPattern,
    buildMate,
    buildMateConnector,
    buildRevolve,
    buildSketch,
    buildThicken,
};

export interface PayloadBuild {
    payload: FeaturePayload;
    /** Ids allocated while building; only sketches allocate any. */
    entityIds: readonly EntityId[];
    logicalNames: Readonly<Record<string, EntityId>>;
}

/**
 * Builds the payload for one operation whose references are already
 * resolved. The result is deep-frozen.
 */
export function buildPayload(operation: LogicalOperation, context: BuildContext): PayloadBuild {
    if (operation.kind === "sketch") {
        return deepFreeze(buildSketch(operation, context));
    }
    return deepFreeze({ payload: buildFeature(operation, context), entityIds: [], logicalNames: {} });
}

function buildFeature(operation: Exclude<LogicalOperation, { kind: "sketch" }>, context: BuildContext): FeaturePayload {
    switch (operation.kind) {
        case "extrude":
            return buildExtrude(operation, context);
        case "revolve":
            return buildRevolve(operation, context);
        case "thicken":
            return buildThicken(operation, context);
        case "fillet":
            return buildFillet(operation, context);
        case "chamfer":
            return buildChamfer(operation, context);
        case "boolean":
            return buildBoolean(operation);
        case "linearPattern":
            return buildLinearPattern(operation, context);
        case "circularPattern":
            return buildCircularPattern(operation, context);
        case "mateConnector":
            return buildMateConnector(operation, context);
        case "mate":
            return buildMate(operation);
        default: {
            const unknown: never = operation;
            throw new Error(`Unhandled operation ${JSON.stringify(unknown)}`);
        }
    }
}
