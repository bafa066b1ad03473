/**
 * Compressed query tokens for derived references.
 *
 * A token is `Q1.` followed by base64url(deflate(JSON)) of a versioned
 * record naming the originating entity, each operation it passed through,
 * and the resulting target path. The JSON is written with sorted keys so
 * that equal records always give equal tokens.
 */

import { deflateSync, inflateSync, strFromU8, strToU8 } from "fflate";
import { z } from "zod";
import { UnresolvableReferenceError } from "./errors.js";
import { entityTypes, operationKinds } from "./schemas.js";

export const QUERY_TOKEN_PREFIX = "Q1.";
export const QUERY_TOKEN_VERSION = 1;

const tokenStepSchema = z.object({
    op: z.enum(operationKinds),
    featureId: z.string().min(1).optional(),
    entityType: z.enum(entityTypes),
    role: z.string().min(1),
});

export const queryTokenRecordSchema = z.object({
    v: z.literal(QUERY_TOKEN_VERSION),
    origin: z.object({
        featureId: z.string().min(1),
        entityId: z.string().min(1),
        entityType: z.enum(entityTypes),
    }),
    steps: z.array(tokenStepSchema),
    target: z.string().min(1),
});

export type QueryTokenStep = z.infer<typeof tokenStepSchema>;
export type QueryTokenRecord = z.infer<typeof queryTokenRecordSchema>;

export function encodeQueryToken(record: QueryTokenRecord): string {
    const packed = deflateSync(strToU8(stableStringify(record)), { level: 9 });
    return QUERY_TOKEN_PREFIX + Buffer.from(packed).toString("base64url");
}

export function decodeQueryToken(token: string): QueryTokenRecord {
    if (!token.startsWith(QUERY_TOKEN_PREFIX)) {
        throw new UnresolvableReferenceError("Query token has an unknown header", { token });
    }
    let text: string;
    try {
        const packed = Buffer.from(token.slice(QUERY_TOKEN_PREFIX.length), "base64url");
        text = strFromU8(inflateSync(packed));
    } catch (error) {
        throw new UnresolvableReferenceError("Query token body cannot be inflated", {
            token,
            cause: error instanceof Error ? error.message : String(error),
        });
    }
    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch {
        throw new UnresolvableReferenceError("Query token body is not JSON", { token });
    }
    const parsed = queryTokenRecordSchema.safeParse(json);
    if (!parsed.success) {
        throw new UnresolvableReferenceError("Query token body has an unexpected shape", {
            token,
            issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        });
    }
    return parsed.data;
}

export function isQueryToken(value: string): boolean {
    return value.startsWith(QUERY_TOKEN_PREFIX);
}

/** JSON with object keys sorted at every level; undefined members are dropped. */
export function stableStringify(value: unknown): string {
    if (Array.isArray(value)) {
        return `[${value.map((item) => stableStringify(item === undefined ? null : item)).join(",")}]`;
    }
    if (value !== null && typeof value === "object") {
        const members = Object.entries(value)
            .filter(([, member]) => member !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([key, member]) => `${JSON.stringify(key)}:${stableStringify(member)}`);
        return `{${members.join(",")}}`;
    }
    return JSON.stringify(value);
}
