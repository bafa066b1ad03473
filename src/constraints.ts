/**
 * Sketch constraint generation.
 *
 * Produces the constraint set a primitive needs, in a fixed order:
 * coincidences, then orientation, then dimensions. The service's solver
 * replays constraints in order during incremental edits, so the order here
 * matches what known-good sketches use.
 */

import { DegenerateDimensionError, UnsupportedPrimitiveError } from "./errors.js";
import type { EntityId, IdAllocator } from "./idAllocator.js";
import type { LengthValue, Primitive } from "./schemas.js";
import { normalizeLength, type NormalizedValue, type VariableLookup } from "./units.js";

export type DimensionDirection = "MINIMUM" | "MAXIMUM";
export type DimensionAlignment = "ALIGNED" | "HORIZONTAL" | "VERTICAL";

export type Constraint =
    | { type: "coincident"; id: EntityId; pointA: EntityId; pointB: EntityId }
    | { type: "perpendicular"; id: EntityId; lineA: EntityId; lineB: EntityId }
    | { type: "parallel"; id: EntityId; lineA: EntityId; lineB: EntityId }
    | { type: "horizontal"; id: EntityId; line: EntityId }
    | { type: "vertical"; id: EntityId; line: EntityId }
    | {
            type: "length";
            id: EntityId;
            entity: EntityId;
            /** "radius" dimensions a circle or arc, "length" a segment. */
            measure: "length" | "radius";
            role: string;
            value: NormalizedValue;
            direction: DimensionDirection;
            alignment: DimensionAlignment;
        };

export type ConstraintType = Constraint["type"];

/** Entity ids of one primitive keyed by role, e.g. "bottom", "bottom.start", "curve". */
export type PrimitiveEntityIds = Readonly<Record<string, EntityId>>;

export type DimensionBindings = Readonly<Record<string, LengthValue>>;

export interface ConstraintOptions {
    /** Scope the constraint ids are drawn from; the primitive's group id is the parent. */
    allocator: IdAllocator;
    variables?: VariableLookup;
}

const dimensionRoles: Record<Primitive["type"], readonly string[]> = {
    rectangle: ["width", "height"],
    circle: ["radius"],
    line: [],
    arc: ["radius"],
};

export function constraintsFor(
    primitive: Primitive,
    entityIds: PrimitiveEntityIds,
    dimensionBindings: DimensionBindings,
    options: ConstraintOptions
): Constraint[] {
    const allowed = dimensionRoles[primitive.type];
    for (const role of Object.keys(dimensionBindings)) {
        if (!allowed.includes(role)) {
            throw new UnsupportedPrimitiveError(
                `A ${primitive.type} has no "${role}" dimension`,
                { primitive: primitive.type, dimension: role, group: entityIds.group }
            );
        }
    }

    const ids = new RoleIds(primitive.type, entityIds);
    const group = ids.need("group");
    const { allocator } = options;
    const dimension = (role: string, entity: EntityId, measure: "length" | "radius"): Constraint | undefined => {
        const bound = dimensionBindings[role];
        if (bound === undefined) return undefined;
        const value = normalizeLength(bound, { variables: options.variables, role });
        if (value.numericValue !== null && value.numericValue <= 0) {
            throw new DegenerateDimensionError(
                `The ${role} of ${group} must be greater than zero`,
                { primitive: primitive.type, dimension: role, entity, expression: value.expression }
            );
        }
        return {
            type: "length",
            id: allocator.allocate(group, role),
            entity,
            measure,
            role,
            value,
            direction: "MINIMUM",
            alignment: "ALIGNED",
        };
    };

    switch (primitive.type) {
        case "rectangle": {
            const bottom = ids.need("bottom");
            const right = ids.need("right");
            const left = ids.need("left");
            const corners: Array<[EntityId, EntityId]> = [
                [ids.need("bottom.start"), ids.need("left.end")],
                [ids.need("bottom.end"), ids.need("right.start")],
                [ids.need("top.start"), ids.need("right.end")],
                [ids.need("top.end"), ids.need("left.start")],
            ];
            const out = corners.map(([pointA, pointB], index): Constraint => ({
                type: "coincident",
                id: allocator.allocate(group, `corner${index}`),
                pointA,
                pointB,
            }));
            out.push(
                { type: "perpendicular", id: allocator.allocate(group, "perpendicular1"), lineA: bottom, lineB: left },
                { type: "perpendicular", id: allocator.allocate(group, "perpendicular2"), lineA: bottom, lineB: right },
                { type: "horizontal", id: allocator.allocate(group, "horizontal"), line: bottom }
            );
            const width = dimension("width", bottom, "length");
            const height = dimension("height", right, "length");
            if (width) out.push(width);
            if (height) out.push(height);
            return out;
        }
        case "circle":
        case "arc": {
            const radius = dimension("radius", ids.need("curve"), "radius");
            return radius ? [radius] : [];
        }
        case "line": {
            const line = ids.need("curve");
            if (primitive.horizontal && primitive.vertical) {
                throw new UnsupportedPrimitiveError(
                    "A line cannot be both horizontal and vertical",
                    { primitive: "line", group }
                );
            }
            if (primitive.horizontal) {
                return [{ type: "horizontal", id: allocator.allocate(group, "horizontal"), line }];
            }
            if (primitive.vertical) {
                return [{ type: "vertical", id: allocator.allocate(group, "vertical"), line }];
            }
            return [];
        }
        default: {
            const unknown: never = primitive;
            throw new UnsupportedPrimitiveError("Unsupported sketch primitive", { primitive: unknown });
        }
    }
}

class RoleIds {
    constructor(
        private readonly primitive: string,
        private readonly ids: PrimitiveEntityIds
    ) {}

    need(role: string): EntityId {
        const id = this.ids[role];
        if (id === undefined) {
            throw new UnsupportedPrimitiveError(
                `Missing "${role}" entity for ${this.primitive}`,
                { primitive: this.primitive, role }
            );
        }
        return id;
    }
}
