import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";
import { InvalidOperationError } from "./errors.js";

describe("loadConfig", () => {
    it("fills in defaults", () => {
        expect(loadConfig({})).toEqual({
            apiUrl: "https://cad.onshape.com/api/v9",
            accessKey: undefined,
            secretKey: undefined,
            minimumDimension: 0.00001,
            requestTimeoutMs: 30000,
            logLevel: "info",
        });
    });

    it("reads keys and numbers from the environment", () => {
        const config = loadConfig({
            ONSHAPE_API_URL: "https://cad.example.test/api/v6/",
            ONSHAPE_ACCESS_KEY: "test-access",
            ONSHAPE_SECRET_KEY: "test-secret",
            ONSHAPE_MIN_DIMENSION: "0.001",
            ONSHAPE_REQUEST_TIMEOUT_MS: "5000",
            LOG_LEVEL: "debug",
        });
        expect(config).toEqual({
            apiUrl: "https://cad.example.test/api/v6",
            accessKey: "test-access",
            secretKey: "test-secret",
            minimumDimension: 0.001,
            requestTimeoutMs: 5000,
            logLevel: "debug",
        });
    });

    it("treats empty keys as unset", () => {
        expect(loadConfig({ ONSHAPE_ACCESS_KEY: "" }).accessKey).toBeUndefined();
    });

    it("rejects a malformed setting", () => {
        expect(() => loadConfig({ ONSHAPE_REQUEST_TIMEOUT_MS: "soon" })).toThrow(InvalidOperationError);
        expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(InvalidOperationError);
    });
});
