import { buildPayload, DEFAULT_MINIMUM_DIMENSION, type BuildContext } from "./builders/index.js";
import { fromZodError } from "./errors.js";
import type { EntityId } from "./idAllocator.js";
import { silentLogger, type Logger } from "./logger.js";
import {
    GeometryReferenceResolver,
    referenceKey,
    StandardPlaneCache,
    StaticPlaneIdSource,
    type PlaneIdSource,
} from "./references.js";
import {
    logicalOperationSchema,
    type GeometryReference,
    type LogicalOperation,
    type LogicalOperationInput,
} from "./schemas.js";
import type { VariableLookup } from "./units.js";
import type { FeaturePayload } from "./wire.js";

export interface FeatureBuilderOptions {
    /** Plane id lookup for this element; ids of a fresh Part Studio when omitted. */
    planes?: PlaneIdSource;
    variables?: VariableLookup;
    /** Meters. */
    minimumDimension?: number;
    /** Tokens resolved by earlier builds, keyed by `referenceKey`. */
    known?: ReadonlyMap<string, string>;
    logger?: Logger;
}

export interface BuiltFeature {
    kind: LogicalOperation["kind"];
    payload: FeaturePayload;
    entityIds: readonly EntityId[];
    /** Short names a derived reference can use for this sketch's entities. */
    logicalNames: Readonly<Record<string, EntityId>>;
    /** Every plane or derived reference this build resolved, by `referenceKey`. */
    references: ReadonlyMap<string, string>;
}

type Resolve = (ref: GeometryReference) => Promise<GeometryReference>;

/**
 * Turns one logical operation into a ready-to-submit feature payload:
 * validate, resolve geometry references, then build.
 *
 * One instance belongs to one element; its plane cache lives as long as it does.
 */
export class FeatureBuilder {
    private readonly planes: StandardPlaneCache;
    private readonly logger: Logger;
    private readonly context: BuildContext;
    private readonly known: ReadonlyMap<string, string>;

    constructor(options: FeatureBuilderOptions = {}) {
        this.logger = options.logger ?? silentLogger;
        this.planes = new StandardPlaneCache(options.planes ?? new StaticPlaneIdSource(), this.logger);
        this.context = {
            variables: options.variables,
            minimumDimension: options.minimumDimension ?? DEFAULT_MINIMUM_DIMENSION,
        };
        this.known = options.known ?? new Map();
    }

    parse(input: LogicalOperationInput): LogicalOperation {
        const parsed = logicalOperationSchema.safeParse(input);
        if (!parsed.success) {
            throw fromZodError(parsed.error, "operation");
        }
        return parsed.data;
    }

    async build(input: LogicalOperationInput, known?: ReadonlyMap<string, string>): Promise<BuiltFeature> {
        const operation = this.parse(input);
        const resolver = new GeometryReferenceResolver(this.planes, {
            known: known ? new Map([...this.known, ...known]) : this.known,
            logger: this.logger,
        });
        const references = new Map<string, string>();
        const resolve: Resolve = async (ref) => {
            const resolved = await resolver.resolve(ref);
            if ((resolved.kind === "standardPlane" || resolved.kind === "derived") && resolved.resolvedToken) {
                references.set(referenceKey(resolved), resolved.resolvedToken);
            }
            return resolved;
        };

        const ready = await resolveReferences(operation, resolve);
        const { payload, entityIds, logicalNames } = buildPayload(ready, this.context);
        this.logger.debug(`Built ${operation.kind} "${operation.name}"`);
        return { kind: operation.kind, payload, entityIds, logicalNames, references };
    }

    /** Drops cached plane ids, e.g. after switching workspace. */
    clearPlaneCache(): void {
        this.planes.clear();
    }
}

async function resolveReferences(operation: LogicalOperation, resolve: Resolve): Promise<LogicalOperation> {
    const all = (refs: GeometryReference[]) => Promise.all(refs.map(resolve));
    switch (operation.kind) {
        case "sketch":
            return { ...operation, plane: await resolve(operation.plane) };
        case "extrude":
            return { ...operation, sourceSketchRef: await resolve(operation.sourceSketchRef) };
        case "thicken":
            return { ...operation, sourceSketchRef: await resolve(operation.sourceSketchRef) };
        case "revolve":
            return {
                ...operation,
                sourceSketchRef: await resolve(operation.sourceSketchRef),
                axis: typeof operation.axis === "string" ? operation.axis : await resolve(operation.axis),
            };
        case "fillet":
            return { ...operation, edges: await all(operation.edges) };
        case "chamfer":
            return { ...operation, edges: await all(operation.edges) };
        case "boolean":
            return { ...operation, bodies: await all(operation.bodies) };
        case "linearPattern":
        case "circularPattern":
        case "mateConnector":
        case "mate":
            return operation;
    }
}
