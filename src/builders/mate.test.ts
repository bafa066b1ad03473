import { describe, expect, it } from "vitest";
import { InvalidOperationError } from "../errors.js";
import type { MateConnectorOperation, MateOperation } from "../schemas.js";
import { degreesToRadians, inchesToMeters } from "../units.js";
import { defaultContext } from "./context.js";
import { buildMate, buildMateConnector } from "./mate.js";

const connector: MateConnectorOperation = {
    kind: "mateConnector",
    name: "Hinge connector",
    faceId: "JHW",
    occurrencePath: ["MkLk3XbQ"],
    flipPrimary: false,
    secondaryAxis: "PLUS_X",
};

const mate: MateOperation = {
    kind: "mate",
    name: "Hinge",
    mateType: "REVOLUTE",
    connectors: ["FmC1", "FmC2"],
};

describe("buildMateConnector", () => {
    it("places a connector at a face centroid", () => {
        expect(buildMateConnector(connector, defaultContext())).toEqual({
            feature: {
                btType: "BTMMateConnector-66",
                featureType: "mateConnector",
                name: "Hinge connector",
                suppressed: false,
                parameters: [
                    { btType: "BTMParameterEnum-145", parameterId: "originType", enumName: "Origin type", value: "ON_ENTITY" },
                    {
                        btType: "BTMParameterQueryWithOccurrenceList-67",
                        parameterId: "originQuery",
                        queries: [{
                            btType: "BTMInferenceQueryWithOccurrence-1083",
                            inferenceType: "CENTROID",
                            path: ["MkLk3XbQ"],
                            deterministicIds: ["JHW"],
                        }],
                    },
                ],
            },
        });
    });

    it("adds orientation parameters only when they differ from the default", () => {
        const payload = buildMateConnector({ ...connector, flipPrimary: true, secondaryAxis: "MINUS_Y" }, defaultContext());
        expect(payload.feature.parameters.slice(2)).toEqual([
            { btType: "BTMParameterBoolean-144", parameterId: "flipPrimary", value: true },
            {
                btType: "BTMParameterEnum-145",
                parameterId: "secondaryAxisType",
                enumName: "Reorient secondary axis",
                value: "MINUS_Y",
            },
        ]);
    });

    it("writes the transform in meters and radians", () => {
        const payload = buildMateConnector({
            ...connector,
            translation: [1, 0, "#lift"],
            rotation: { axis: "ABOUT_Z", angle: 90 },
        }, defaultContext());
        expect(payload.feature.parameters.slice(2)).toEqual([
            { btType: "BTMParameterBoolean-144", parameterId: "transform", value: true },
            { btType: "BTMParameterQuantity-147", parameterId: "translationX", expression: "0.0254 m", isInteger: false },
            { btType: "BTMParameterQuantity-147", parameterId: "translationY", expression: "0 m", isInteger: false },
            { btType: "BTMParameterQuantity-147", parameterId: "translationZ", expression: "#lift", isInteger: false },
            { btType: "BTMParameterEnum-145", parameterId: "rotationType", enumName: "Rotation axis", value: "ABOUT_Z" },
            {
                btType: "BTMParameterQuantity-147",
                parameterId: "rotation",
                expression: `${90 * (Math.PI / 180)} rad`,
                isInteger: false,
            },
        ]);
    });
});

describe("buildMate", () => {
    it("joins two connectors by feature id", () => {
        const payload = buildMate({ ...mate, mateType: "FASTENED" });
        expect(payload.feature.btType).toBe("BTMMate-64");
        expect(payload.feature.parameters).toEqual([
            { btType: "BTMParameterEnum-145", parameterId: "mateType", enumName: "Mate type", value: "FASTENED" },
            {
                btType: "BTMParameterQueryWithOccurrenceList-67",
                parameterId: "mateConnectorsQuery",
                queries: [
                    { btType: "BTMFeatureQueryWithOccurrence-157", featureId: "FmC1", path: [], queryData: "" },
                    { btType: "BTMFeatureQueryWithOccurrence-157", featureId: "FmC2", path: [], queryData: "" },
                ],
            },
        ]);
    });

    it("limits a revolute mate in radians", () => {
        const payload = buildMate({ ...mate, limits: { min: 0, max: 90 } });
        expect(payload.feature.parameters.slice(2)).toEqual([
            { btType: "BTMParameterBoolean-144", parameterId: "limitsEnabled", value: true },
            { btType: "BTMParameterQuantity-147", parameterId: "limitRotationMin", expression: "0 rad", isInteger: false },
            {
                btType: "BTMParameterQuantity-147",
                parameterId: "limitRotationMax",
                expression: `${degreesToRadians(90)} rad`,
                isInteger: false,
            },
        ]);
    });

    it("limits a slider in meters", () => {
        const payload = buildMate({ ...mate, mateType: "SLIDER", limits: { min: 0, max: 2 } });
        expect(payload.feature.parameters.slice(3)).toEqual([
            { btType: "BTMParameterQuantity-147", parameterId: "limitAxialZMin", expression: "0 m", isInteger: false },
            {
                btType: "BTMParameterQuantity-147",
                parameterId: "limitAxialZMax",
                expression: `${inchesToMeters(2)} m`,
                isInteger: false,
            },
        ]);
    });

    it("refuses limits a mate cannot use", () => {
        expect(() => buildMate({ ...mate, mateType: "FASTENED", limits: { min: 0, max: 1 } })).toThrow(InvalidOperationError);
        expect(() => buildMate({ ...mate, limits: { min: 10, max: 0 } })).toThrow(InvalidOperationError);
    });
});
