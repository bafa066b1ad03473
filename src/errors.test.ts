import { z } from "zod";
import { describe, expect, it } from "vitest";
import {
    DegenerateDimensionError,
    fromZodError,
    InvalidOperationError,
    isFeatureBuildError,
} from "./errors.js";
import { OnshapeApiError } from "./onshapeApi.js";

describe("fromZodError", () => {
    it("summarizes the first issue and keeps them all", () => {
        const parsed = z.object({ depth: z.number(), name: z.string() }).safeParse({ depth: "deep" });
        if (parsed.success) throw new Error("expected a parse failure");

        const error = fromZodError(parsed.error, "extrude");
        expect(error).toBeInstanceOf(InvalidOperationError);
        expect(error.code).toBe("INVALID_OPERATION");
        expect(error.message).toBe("Invalid extrude: depth: Expected number, received string");
        expect(error.details?.issues).toHaveLength(2);
    });
});

describe("isFeatureBuildError", () => {
    it("tells local build failures from remote ones", () => {
        const local = new DegenerateDimensionError("Fillet radius is zero", { dimension: "radius" });
        expect(isFeatureBuildError(local)).toBe(true);
        expect(local.name).toBe("DegenerateDimensionError");
        expect(local.retryable).toBe(false);
        expect(isFeatureBuildError(new OnshapeApiError("failed", "GET", "/x", 500))).toBe(false);
        expect(isFeatureBuildError("failed")).toBe(false);
    });
});
