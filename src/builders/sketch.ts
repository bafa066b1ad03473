import { constraintsFor, type Constraint, type DimensionBindings } from "../constraints.js";
import { DegenerateDimensionError } from "../errors.js";
import { IdAllocator, type EntityId } from "../idAllocator.js";
import { shortNameOf } from "../sketchEntities.js";
import type {
    ArcPrimitive,
    CirclePrimitive,
    LengthValue,
    LinePrimitive,
    Primitive,
    RectanglePrimitive,
    SketchOperation,
} from "../schemas.js";
import {
    queryListParameter,
    stringParameter,
    type CircleGeometry,
    type EnumParameter,
    type FeaturePayload,
    type QuantityParameter,
    type SketchConstraint,
    type SketchCurveSegment,
    type SketchEntity,
    type WireFeature,
} from "../wire.js";
import { angle, coordinate, type BuildContext } from "./context.js";
import { referenceQueries } from "./queries.js";

export interface SketchBuild {
    payload: FeaturePayload;
    /** Every entity and constraint id the sketch allocated, in order. */
    entityIds: EntityId[];
    /** Short names ("right", "circle.center") of the entities that have one. */
    logicalNames: Record<string, EntityId>;
}

interface PrimitiveParts {
    entities: SketchEntity[];
    ids: Record<string, EntityId>;
    bindings: DimensionBindings;
}

/**
 * Builds a `BTMSketch-151` feature. Geometry is placed in meters; dimension
 * constraints keep the caller's expression so variables stay linked.
 */
export function buildSketch(operation: SketchOperation, context: BuildContext): SketchBuild {
    const allocator = new IdAllocator(operation.name, shortNameOf);
    const entities: SketchEntity[] = [];
    const constraints: SketchConstraint[] = [];

    for (const primitive of operation.primitives) {
        const parts = placePrimitive(primitive, allocator, context);
        entities.push(...parts.entities);
        const generated = constraintsFor(primitive, parts.ids, parts.bindings, {
            allocator,
            variables: context.variables,
        });
        constraints.push(...generated.map(toWireConstraint));
    }

    const feature: WireFeature = {
        btType: "BTMSketch-151",
        featureType: "newSketch",
        name: operation.name,
        suppressed: false,
        parameters: [queryListParameter("sketchPlane", referenceQueries([operation.plane]), "bare")],
        entities,
        constraints,
    };
    return {
        payload: { feature },
        entityIds: allocator.ids(),
        logicalNames: Object.fromEntries(allocator.entries()),
    };
}

function placePrimitive(primitive: Primitive, allocator: IdAllocator, context: BuildContext): PrimitiveParts {
    switch (primitive.type) {
        case "rectangle":
            return placeRectangle(primitive, allocator, context);
        case "circle":
            return placeCircle(primitive, allocator, context);
        case "line":
            return placeLine(primitive, allocator, context);
        case "arc":
            return placeArc(primitive, allocator, context);
    }
}

function placeRectangle(rectangle: RectanglePrimitive, allocator: IdAllocator, context: BuildContext): PrimitiveParts {
    const [rawX1, rawY1] = rectangle.corner1;
    const [rawX2, rawY2] = rectangle.corner2;
    const x1 = coordinate(rawX1, "corner1.x", context);
    const y1 = coordinate(rawY1, "corner1.y", context);
    const x2 = coordinate(rawX2, "corner2.x", context);
    const y2 = coordinate(rawY2, "corner2.y", context);
    const width = Math.abs(x2 - x1);
    const height = Math.abs(y2 - y1);

    const group = allocator.next("rect");
    if (width === 0 || height === 0) {
        throw new DegenerateDimensionError(`Rectangle ${group} has zero ${width === 0 ? "width" : "height"}`, {
            primitive: "rectangle",
            entity: group,
            dimension: width === 0 ? "width" : "height",
        });
    }

    const ids: Record<string, EntityId> = { group };
    const side = (role: string, pntX: number, pntY: number, dirX: number, dirY: number, extent: number): SketchCurveSegment => {
        const entityId = allocator.allocate(group, role);
        const startPointId = allocator.allocate(entityId, "start");
        const endPointId = allocator.allocate(entityId, "end");
        ids[role] = entityId;
        ids[`${role}.start`] = startPointId;
        ids[`${role}.end`] = endPointId;
        return {
            btType: "BTMSketchCurveSegment-155",
            entityId,
            startPointId,
            endPointId,
            startParam: 0,
            endParam: extent,
            geometry: { btType: "BTCurveGeometryLine-117", pntX, pntY, dirX, dirY },
            isConstruction: false,
        };
    };

    const xDir = x2 > x1 ? 1 : -1;
    const yDir = y2 > y1 ? 1 : -1;
    return {
        entities: [
            side("bottom", x1, y1, xDir, 0, width),
            side("right", x2, y1, 0, yDir, height),
            side("top", x2, y2, -xDir, 0, width),
            side("left", x1, y2, 0, -yDir, height),
        ],
        ids,
        bindings: {
            ...rectangle.dimensions,
            width: rectangle.variableWidth !== undefined
                ? { variable: rectangle.variableWidth }
                : rectangle.dimensions?.width ?? span(rawX1, rawX2, width),
            height: rectangle.variableHeight !== undefined
                ? { variable: rectangle.variableHeight }
                : rectangle.dimensions?.height ?? span(rawY1, rawY2, height),
        },
    };
}

function placeCircle(circle: CirclePrimitive, allocator: IdAllocator, context: BuildContext): PrimitiveParts {
    const xCenter = coordinate(circle.center[0], "center.x", context);
    const yCenter = coordinate(circle.center[1], "center.y", context);
    const radius = coordinate(circle.radius, "radius", context);
    const group = allocator.next("circle");
    requirePositiveRadius(radius, "circle", group);
    const center = allocator.allocate(group, "center");

    return {
        entities: [{
            btType: "BTMSketchCurve-4",
            entityId: group,
            geometry: circleGeometry(radius, xCenter, yCenter),
            centerId: center,
            isConstruction: false,
        }],
        ids: { group, curve: group, center },
        bindings: { ...circle.dimensions, radius: circle.dimensions?.radius ?? circle.radius },
    };
}

function placeLine(line: LinePrimitive, allocator: IdAllocator, context: BuildContext): PrimitiveParts {
    const startX = coordinate(line.start[0], "start.x", context);
    const startY = coordinate(line.start[1], "start.y", context);
    const endX = coordinate(line.end[0], "end.x", context);
    const endY = coordinate(line.end[1], "end.y", context);
    const span = Math.hypot(endX - startX, endY - startY);
    const group = allocator.next("line");
    if (span === 0) {
        throw new DegenerateDimensionError(`Line ${group} has zero length`, { primitive: "line", entity: group });
    }
    const start = allocator.allocate(group, "start");
    const end = allocator.allocate(group, "end");

    return {
        entities: [{
            btType: "BTMSketchCurveSegment-155",
            entityId: group,
            startPointId: start,
            endPointId: end,
            startParam: 0,
            endParam: span,
            geometry: {
                btType: "BTCurveGeometryLine-117",
                pntX: startX,
                pntY: startY,
                dirX: (endX - startX) / span,
                dirY: (endY - startY) / span,
            },
            isConstruction: line.isConstruction ?? false,
        }],
        ids: { group, curve: group, start, end },
        bindings: { ...line.dimensions },
    };
}

function placeArc(arc: ArcPrimitive, allocator: IdAllocator, context: BuildContext): PrimitiveParts {
    const xCenter = coordinate(arc.center[0], "center.x", context);
    const yCenter = coordinate(arc.center[1], "center.y", context);
    const radius = coordinate(arc.radius, "radius", context);
    const startAngle = angle(arc.startAngle, "startAngle", context).numericValue;
    const endAngle = angle(arc.endAngle, "endAngle", context).numericValue;
    const group = allocator.next("arc");
    requirePositiveRadius(radius, "arc", group);
    if (startAngle === null || endAngle === null || startAngle === endAngle) {
        throw new DegenerateDimensionError(`Arc ${group} needs distinct, known start and end angles`, {
            primitive: "arc",
            entity: group,
            dimension: "sweep",
        });
    }
    const center = allocator.allocate(group, "center");
    const start = allocator.allocate(group, "start");
    const end = allocator.allocate(group, "end");

    return {
        entities: [{
            btType: "BTMSketchCurveSegment-155",
            entityId: group,
            startPointId: start,
            endPointId: end,
            startParam: startAngle,
            endParam: endAngle,
            geometry: circleGeometry(radius, xCenter, yCenter),
            isConstruction: false,
            centerId: center,
        }],
        ids: { group, curve: group, center, start, end },
        bindings: { ...arc.dimensions, radius: arc.dimensions?.radius ?? arc.radius },
    };
}

function circleGeometry(radius: number, xCenter: number, yCenter: number): CircleGeometry {
    return {
        btType: "BTCurveGeometryCircle-115",
        radius,
        xCenter,
        yCenter,
        xDir: 1,
        yDir: 0,
        clockwise: false,
    };
}

function requirePositiveRadius(radius: number, primitive: string, entity: EntityId): void {
    if (radius <= 0) {
        throw new DegenerateDimensionError(`The radius of ${entity} must be greater than zero`, {
            primitive,
            entity,
            dimension: "radius",
        });
    }
}

// Inches stay inches when both corners were given that way; anything else is dimensioned in meters.
function span(from: LengthValue, to: LengthValue, meters: number): LengthValue {
    if (typeof from === "number" && typeof to === "number") {
        return Math.abs(to - from);
    }
    return { value: meters, unit: "m" };
}

function toWireConstraint(constraint: Constraint): SketchConstraint {
    switch (constraint.type) {
        case "coincident":
            return wireConstraint("COINCIDENT", constraint.id, [
                stringParameter("localFirst", constraint.pointA),
                stringParameter("localSecond", constraint.pointB),
            ]);
        case "perpendicular":
        case "parallel":
            return wireConstraint(constraint.type === "parallel" ? "PARALLEL" : "PERPENDICULAR", constraint.id, [
                stringParameter("localFirst", constraint.lineA),
                stringParameter("localSecond", constraint.lineB),
            ]);
        case "horizontal":
        case "vertical":
            return wireConstraint(constraint.type === "vertical" ? "VERTICAL" : "HORIZONTAL", constraint.id, [
                stringParameter("localFirst", constraint.line),
            ]);
        case "length": {
            const quantity: QuantityParameter = {
                btType: "BTMParameterQuantity-147",
                expression: constraint.value.expression,
                parameterId: "length",
                isInteger: false,
            };
            if (constraint.measure === "radius") {
                return wireConstraint("RADIUS", constraint.id, [
                    stringParameter("localFirst", constraint.entity),
                    quantity,
                ]);
            }
            return wireConstraint("LENGTH", constraint.id, [
                stringParameter("localFirst", constraint.entity),
                dimensionEnum("direction", "DimensionDirection", constraint.direction),
                quantity,
                dimensionEnum("alignment", "DimensionAlignment", constraint.alignment),
            ]);
        }
    }
}

function wireConstraint(
    constraintType: SketchConstraint["constraintType"],
    entityId: EntityId,
    parameters: SketchConstraint["parameters"]
): SketchConstraint {
    return { btType: "BTMSketchConstraint-2", constraintType, entityId, parameters };
}

function dimensionEnum(parameterId: string, enumName: string, value: string): EnumParameter {
    return { btType: "BTMParameterEnum-145", value, enumName, parameterId };
}
