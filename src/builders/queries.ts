import { UnresolvableReferenceError } from "../errors.js";
import type { AxisName, GeometryReference } from "../schemas.js";
import {
    deterministicQuery,
    queryStringQuery,
    sketchRegionQuery,
    type WireQuery,
} from "../wire.js";

const axisFeatures: Record<AxisName, string> = {
    X: "RIGHT",
    Y: "TOP",
    Z: "FRONT",
};

/** Edge created by one of the default planes, standing in for a world axis. */
export function axisQuery(axis: AxisName): WireQuery {
    return queryStringQuery(`query = qCreatedBy(makeId("${axisFeatures[axis]}"), EntityType.EDGE);`);
}

/**
 * One query per reference in caller order, except that adjacent references
 * known by deterministic id share a single query.
 */
export function referenceQueries(refs: readonly GeometryReference[]): WireQuery[] {
    const queries: WireQuery[] = [];
    let pending: string[] = [];
    const flush = () => {
        if (pending.length > 0) queries.push(deterministicQuery(pending));
        pending = [];
    };
    for (const ref of refs) {
        switch (ref.kind) {
            case "deterministic":
                pending.push(...ref.ids);
                break;
            case "standardPlane":
                pending.push(requireToken(ref.resolvedToken, `${ref.name} plane`));
                break;
            case "derived":
                flush();
                queries.push(queryStringQuery(
                    requireToken(ref.resolvedToken, `${ref.sourceEntitySelector} of ${ref.sourceFeatureId}`)
                ));
                break;
            case "sketchRegion":
                flush();
                queries.push(sketchRegionQuery(ref.featureId));
                break;
        }
    }
    flush();
    return queries;
}

function requireToken(token: string | undefined, what: string): string {
    if (token === undefined) {
        throw new UnresolvableReferenceError(`Reference to ${what} has not been resolved`, { reference: what });
    }
    return token;
}
