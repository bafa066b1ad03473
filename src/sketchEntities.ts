/**
 * The entity ids a sketch allocates, and the short names callers use for
 * them. Only the first primitive of each kind has a short name: "right" is
 * `rect.1.right`, "right.start" its start point, "circle.center" is
 * `circle.1.center`. Rectangle groups (`rect.N`) and constraint ids are not
 * entities.
 */

import type { EntityId } from "./idAllocator.js";

export const rectangleSides = ["bottom", "right", "top", "left"] as const;
export type RectangleSide = (typeof rectangleSides)[number];

const entityIdPattern =
    /^(?:rect\.\d+\.(?:bottom|right|top|left)(?:\.(?:start|end))?|circle\.\d+(?:\.center)?|line\.\d+(?:\.(?:start|end))?|arc\.\d+(?:\.(?:center|start|end))?)$/;

const firstOfKind = /^(rect|circle|line|arc)\.1(?:\.(.+))?$/;

export function isSketchEntityId(id: string): boolean {
    return entityIdPattern.test(id);
}

export function shortNameOf(id: EntityId): string | undefined {
    if (!isSketchEntityId(id)) return undefined;
    const match = firstOfKind.exec(id);
    if (!match) return undefined;
    const [, kind, rest] = match;
    if (kind === "rect") return rest;
    return rest === undefined ? kind : `${kind}.${rest}`;
}

/** Inverse of `shortNameOf`. */
export function entityIdForShortName(name: string): EntityId | undefined {
    const head = name.split(".", 1)[0] ?? "";
    const candidate = rectangleSides.some((side) => side === head)
        ? `rect.1.${name}`
        : `${head}.1${name.slice(head.length)}`;
    return shortNameOf(candidate) === name ? candidate : undefined;
}
