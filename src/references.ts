/**
 * Geometry reference resolution.
 *
 * Standard planes resolve to the plane's deterministic id, looked up once
 * per element session. Derived references resolve locally: the selector is
 * mapped to the id the sketch builder allocated, the operation chain is
 * walked through a table of known transitions, and the result is packed
 * into a query token.
 */

import { UnresolvableReferenceError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import {
    decodeQueryToken,
    encodeQueryToken,
    stableStringify,
    type QueryTokenRecord,
    type QueryTokenStep,
} from "./queryToken.js";
import type {
    DerivedReference,
    EntityType,
    GeometryReference,
    OperationKind,
    StandardPlaneName,
    StandardPlaneReference,
} from "./schemas.js";
import { entityIdForShortName, isSketchEntityId } from "./sketchEntities.js";

/** Where standard-plane deterministic ids come from; usually an element session. */
export interface PlaneIdSource {
    lookupPlaneId(name: StandardPlaneName): Promise<string>;
}

/** Ids a fresh Part Studio reports for its default planes. */
export const DEFAULT_PLANE_IDS: Readonly<Record<StandardPlaneName, string>> = {
    Front: "JCC",
    Top: "JDC",
    Right: "JEC",
};

export class StaticPlaneIdSource implements PlaneIdSource {
    constructor(private readonly ids: Readonly<Record<StandardPlaneName, string>> = DEFAULT_PLANE_IDS) {}

    async lookupPlaneId(name: StandardPlaneName): Promise<string> {
        return this.ids[name];
    }
}

/**
 * Per-session plane id cache. Concurrent lookups of one plane share a single
 * in-flight request; a failed lookup is dropped so the next call retries.
 */
export class StandardPlaneCache implements PlaneIdSource {
    private readonly pending = new Map<StandardPlaneName, Promise<string>>();

    constructor(
        private readonly source: PlaneIdSource,
        private readonly logger: Logger = silentLogger
    ) {}

    lookupPlaneId(name: StandardPlaneName): Promise<string> {
        const cached = this.pending.get(name);
        if (cached) return cached;
        this.logger.debug(`Looking up ${name} plane id`);
        const lookup = this.source.lookupPlaneId(name).catch((error: unknown) => {
            this.pending.delete(name);
            throw error;
        });
        this.pending.set(name, lookup);
        return lookup;
    }

    get size(): number {
        return this.pending.size;
    }

    clear(): void {
        this.pending.clear();
    }
}

const pointRoles = ["start", "end", "center"];

/**
 * Maps a selector to the sketch entity it names: a short name ("right",
 * "circle.center") or a full entity id ("rect.2.top"). Group and constraint
 * ids name no entity and are rejected.
 */
export function selectorToEntityId(selector: string): string {
    const trimmed = selector.trim();
    if (isSketchEntityId(trimmed)) return trimmed;
    const entityId = entityIdForShortName(trimmed);
    if (entityId === undefined) {
        throw new UnresolvableReferenceError(`Unknown entity selector "${selector}"`, { selector });
    }
    return entityId;
}

export function entityTypeOf(entityId: string): EntityType {
    const last = entityId.slice(entityId.lastIndexOf(".") + 1);
    return pointRoles.includes(last) ? "VERTEX" : "EDGE";
}

interface Transition {
    entityType: EntityType;
    role: string;
}

const transitions: Readonly<Record<EntityType, Partial<Record<OperationKind, Transition>>>> = {
    VERTEX: {
        extrude: { entityType: "EDGE", role: "sweptEdge" },
        revolve: { entityType: "EDGE", role: "sweptEdge" },
        thicken: { entityType: "EDGE", role: "sweptEdge" },
    },
    EDGE: {
        extrude: { entityType: "FACE", role: "sweptFace" },
        revolve: { entityType: "FACE", role: "sweptFace" },
        thicken: { entityType: "FACE", role: "sweptFace" },
        fillet: { entityType: "FACE", role: "filletFace" },
        chamfer: { entityType: "FACE", role: "chamferFace" },
    },
    FACE: {
        fillet: { entityType: "FACE", role: "trimmedFace" },
        chamfer: { entityType: "FACE", role: "trimmedFace" },
        boolean: { entityType: "FACE", role: "survivingFace" },
        thicken: { entityType: "BODY", role: "thickenedBody" },
    },
    BODY: {},
};

/** Key under which a caller can hand back a token resolved in an earlier call. */
export function referenceKey(ref: GeometryReference): string {
    switch (ref.kind) {
        case "standardPlane":
            return `plane:${ref.name}`;
        case "derived": {
            const chain = ref.operationChain
                .map((step) => (step.featureId ? `${step.kind}@${step.featureId}` : step.kind))
                .join(">");
            return `derived:${ref.sourceFeatureId}/${ref.sourceEntitySelector}${chain ? `>${chain}` : ""}`;
        }
        case "sketchRegion":
            return `region:${ref.featureId}`;
        case "deterministic":
            return `ids:${ref.ids.join(",")}`;
    }
}

export interface ResolverOptions {
    /** Tokens resolved earlier, keyed by `referenceKey`. */
    known?: ReadonlyMap<string, string>;
    logger?: Logger;
}

export class GeometryReferenceResolver {
    private readonly logger: Logger;
    private readonly known: ReadonlyMap<string, string>;

    constructor(private readonly planes: PlaneIdSource, options: ResolverOptions = {}) {
        this.logger = options.logger ?? silentLogger;
        this.known = options.known ?? new Map();
    }

    resolve(ref: StandardPlaneReference): Promise<StandardPlaneReference>;
    resolve(ref: DerivedReference): Promise<DerivedReference>;
    resolve(ref: GeometryReference): Promise<GeometryReference>;
    async resolve(ref: GeometryReference): Promise<GeometryReference> {
        switch (ref.kind) {
            case "standardPlane":
                return this.resolvePlane(ref);
            case "derived":
                return this.resolveDerived(ref);
            case "sketchRegion":
            case "deterministic":
                return ref;
        }
    }

    private async resolvePlane(ref: StandardPlaneReference): Promise<StandardPlaneReference> {
        const token = ref.resolvedToken ?? this.known.get(referenceKey(ref));
        if (token !== undefined) return { ...ref, resolvedToken: token };
        const id = await this.planes.lookupPlaneId(ref.name);
        if (!id) {
            throw new UnresolvableReferenceError(`No id for the ${ref.name} plane`, { plane: ref.name });
        }
        return { ...ref, resolvedToken: id };
    }

    private resolveDerived(ref: DerivedReference): DerivedReference {
        const token = ref.resolvedToken ?? this.known.get(referenceKey(ref));
        if (token !== undefined) {
            const given = decodeQueryToken(token);
            if (stableStringify(given) !== stableStringify(derivedRecord(ref))) {
                throw new UnresolvableReferenceError(
                    `Token for ${given.target} does not match ${referenceKey(ref)}`,
                    { reference: referenceKey(ref), tokenTarget: given.target }
                );
            }
            return { ...ref, resolvedToken: token };
        }
        const resolved = { ...ref, resolvedToken: encodeDerived(ref) };
        this.logger.debug(`Resolved ${referenceKey(ref)}`);
        return resolved;
    }
}

/** Builds the query token for a derived reference without any remote lookup. */
export function encodeDerived(ref: DerivedReference): string {
    return encodeQueryToken(derivedRecord(ref));
}

function derivedRecord(ref: DerivedReference): QueryTokenRecord {
    const entityId = selectorToEntityId(ref.sourceEntitySelector);
    const originType = ref.entityType ?? entityTypeOf(entityId);
    let current = originType;
    let target = `${ref.sourceFeatureId}/${entityId}`;
    const steps: QueryTokenStep[] = [];
    for (const step of ref.operationChain) {
        const next = transitions[current][step.kind];
        if (next === undefined) {
            throw new UnresolvableReferenceError(
                `No known result of ${step.kind} on a ${current.toLowerCase()}`,
                { sourceFeatureId: ref.sourceFeatureId, selector: ref.sourceEntitySelector, entityType: current, operation: step.kind }
            );
        }
        steps.push({ op: step.kind, featureId: step.featureId, entityType: next.entityType, role: next.role });
        target += `>${step.kind}${step.featureId ? `@${step.featureId}` : ""}:${next.role}`;
        current = next.entityType;
    }
    return {
        v: 1,
        origin: { featureId: ref.sourceFeatureId, entityId, entityType: originType },
        steps,
        target,
    };
}
