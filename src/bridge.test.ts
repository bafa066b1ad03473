import { Response } from "node-fetch";
import { describe, expect, it, vi } from "vitest";
import { ElementBridge } from "./bridge.js";
import type { BridgeConfig } from "./config.js";
import type { FetchLike } from "./onshapeApi.js";
import type { LogicalOperationInput } from "./schemas.js";

const config: BridgeConfig = {
    apiUrl: "https://cad.example.test/api",
    accessKey: "test-access",
    secretKey: "test-secret",
    minimumDimension: 0.00001,
    requestTimeoutMs: 1000,
    logLevel: "error",
};

const element = { documentId: "d1", workspaceId: "w1", elementId: "e1" };

function json(body: unknown): Response {
    return new Response(JSON.stringify(body), { status: 200 });
}

// Stands in for one Part Studio: a Front plane, one variable, and a feature list.
function fakeElement(): FetchLike {
    let created = 0;
    return async (url) => {
        if (url.includes("/featurescript")) {
            return json({ result: { value: [{ value: "JFRONT" }] } });
        }
        if (url.includes("/variables/")) {
            return json([{ variables: [{ name: "depth", expression: "1 in" }] }]);
        }
        created += 1;
        return json({ feature: { featureId: `F${created}` }, featureState: { featureStatus: "OK" } });
    };
}

describe("ElementBridge", () => {
    it("builds and submits operations against one element", async () => {
        const fetch = vi.fn(fakeElement());
        const bridge = await ElementBridge.open(element, { config, fetch, loadVariables: true });

        const sketch = await bridge.apply({
            kind: "sketch",
            primitives: [{ type: "rectangle", corner1: [0, 0], corner2: [1, 1] }],
        });
        const extrude = await bridge.apply({ kind: "extrude", sourceSketchRef: "F1", depth: "#depth" });
        await bridge.apply({ kind: "sketch", primitives: [{ type: "circle", center: [0, 0], radius: 0.25 }] });

        expect(sketch.response.feature?.featureId).toBe("F1");
        expect(sketch.payload.feature.parameters[0]).toMatchObject({
            queries: [{ deterministicIds: ["JFRONT"] }],
        });
        expect(extrude.payload.feature.parameters[2]).toMatchObject({ expression: "#depth", value: 0.0254 });

        const urls = fetch.mock.calls.map(([url]) => url.replace(config.apiUrl, ""));
        expect(urls).toEqual([
            "/variables/d/d1/w/w1/e/e1/variables",
            "/partstudios/d/d1/w/w1/e/e1/featurescript?rollbackBarIndex=-1",
            "/partstudios/d/d1/w/w1/e/e1/features",
            "/partstudios/d/d1/w/w1/e/e1/features",
            "/partstudios/d/d1/w/w1/e/e1/features",
        ]);
    });

    it("does not submit an operation that fails to build", async () => {
        const fetch = vi.fn(fakeElement());
        const bridge = await ElementBridge.open(element, { config, fetch });

        await expect(bridge.apply({ kind: "fillet", edges: ["e1"], radius: 0 })).rejects.toThrow("must be greater than");
        expect(fetch).not.toHaveBeenCalled();
    });

    it("keeps tokens only from features the service accepted", async () => {
        const accept = fakeElement();
        let reject = true;
        const fetch = vi.fn<FetchLike>(async (url, init) => {
            if (reject && url.endsWith("/features")) {
                return new Response("regeneration failed", { status: 500, statusText: "Internal Server Error" });
            }
            return accept(url, init);
        });
        const bridge = await ElementBridge.open(element, { config, fetch });
        const fillet: LogicalOperationInput = {
            kind: "fillet",
            radius: 0.1,
            edges: [{ kind: "derived", sourceFeatureId: "F1", sourceEntitySelector: "top", operationChain: ["extrude"] }],
        };

        await expect(bridge.apply(fillet)).rejects.toThrow("Onshape API Error: 500");
        expect(bridge.references().size).toBe(0);

        reject = false;
        await bridge.apply(fillet);
        expect([...bridge.references().keys()]).toEqual(["derived:F1/top>extrude"]);
    });
});
