/**
 * Entity id allocation for one feature.
 *
 * Ids are plain dotted paths: a group id from a per-prefix counter
 * (`rect.1`, `rect.2`, `circle.1`) followed by a fixed role suffix
 * (`rect.1.right`, `rect.1.right.start`). Replaying the same sequence of
 * requests in a fresh scope yields the same ids, which is what lets a later
 * build name an entity created by an earlier one.
 */

export type EntityId = string;

export class IdAllocator {
    private readonly counters = new Map<string, number>();
    private readonly issued = new Set<EntityId>();
    private readonly byLogicalName = new Map<string, EntityId>();

    /**
     * @param scope Label used in error details.
     * @param nameOf Logical name for an id allocated without one.
     */
    constructor(
        readonly scope: string = "feature",
        private readonly nameOf?: (id: EntityId) => string | undefined
    ) {}

    /**
     * Allocate the next group id for a prefix: `rect.1`, then `rect.2`.
     */
    next(prefix: string, logicalName?: string): EntityId {
        const count = (this.counters.get(prefix) ?? 0) + 1;
        this.counters.set(prefix, count);
        return this.claim(`${prefix}.${count}`, logicalName);
    }

    /**
     * Allocate a child id under `parent` with a fixed role suffix.
     */
    allocate(parent: EntityId, role: string, logicalName?: string): EntityId {
        return this.claim(`${parent}.${suffixOf(role)}`, logicalName);
    }

    lookup(logicalName: string): EntityId | undefined {
        return this.byLogicalName.get(logicalName);
    }

    /** Logical name to id, in allocation order. */
    entries(): ReadonlyMap<string, EntityId> {
        return this.byLogicalName;
    }

    /** Every id handed out, in allocation order. */
    ids(): EntityId[] {
        return [...this.issued];
    }

    has(id: EntityId): boolean {
        return this.issued.has(id);
    }

    get size(): number {
        return this.issued.size;
    }

    private claim(id: EntityId, logicalName?: string): EntityId {
        if (this.issued.has(id)) {
            throw new Error(`Entity id "${id}" was already allocated in ${this.scope}`);
        }
        this.issued.add(id);
        const name = logicalName ?? this.nameOf?.(id);
        if (name !== undefined) {
            this.byLogicalName.set(name, id);
        }
        return id;
    }
}

function suffixOf(role: string): string {
    const suffix = role.trim().toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_+|_+$/g, "");
    if (!suffix) {
        throw new Error(`Cannot derive an id suffix from "${role}"`);
    }
    return suffix;
}
