import { describe, expect, it } from "vitest";
import { DegenerateDimensionError, InvalidCountError } from "../errors.js";
import type { GeometryReference } from "../schemas.js";
import { buildBoolean } from "./boolean.js";
import { buildChamfer } from "./chamfer.js";
import { defaultContext } from "./context.js";
import { buildFillet } from "./fillet.js";
import { buildCircularPattern, buildLinearPattern } from "./pattern.js";
import { buildRevolve } from "./revolve.js";
import { buildThicken } from "./thicken.js";

const ids = (...values: string[]): GeometryReference => ({ kind: "deterministic", ids: values });
const region: GeometryReference = { kind: "sketchRegion", featureId: "FsK1" };

describe("buildRevolve", () => {
    it("revolves a full turn about a world axis", () => {
        const payload = buildRevolve({
            kind: "revolve",
            name: "Revolve",
            sourceSketchRef: region,
            axis: "Y",
            angle: 360,
            operationType: "NEW",
            oppositeDirection: true,
        }, defaultContext());

        expect(payload.feature.featureType).toBe("revolve");
        expect(payload.feature.parameters.map((parameter) => parameter.parameterId)).toEqual([
            "entities",
            "axis",
            "operationType",
            "revolveAngle",
            "oppositeDirection",
        ]);
        expect(payload.feature.parameters[1]).toMatchObject({
            queries: [{
                btType: "BTMIndividualQuery-138",
                deterministicIds: [],
                queryStatement: null,
                queryString: 'query = qCreatedBy(makeId("TOP"), EntityType.EDGE);',
            }],
        });
        expect(payload.feature.parameters[3]).toMatchObject({ expression: "360 deg", value: 360 * (Math.PI / 180) });
        expect(payload.feature.parameters[4]).toMatchObject({ value: true });
    });

    it("revolves about a sketched edge", () => {
        const payload = buildRevolve({
            kind: "revolve",
            name: "Revolve",
            sourceSketchRef: region,
            axis: ids("JHD"),
            angle: "180 deg",
            operationType: "ADD",
            oppositeDirection: false,
        }, defaultContext());
        expect(payload.feature.parameters[1]).toMatchObject({
            queries: [{ btType: "BTMIndividualQuery-138", deterministicIds: ["JHD"] }],
        });
    });
});

describe("buildThicken", () => {
    it("uses the bare feature form", () => {
        const payload = buildThicken({
            kind: "thicken",
            name: "Thicken",
            sourceSketchRef: region,
            thickness: 0.25,
            operationType: "NEW",
            midplane: true,
            oppositeDirection: false,
        }, defaultContext());

        expect(payload.btType).toBeUndefined();
        expect(Object.keys(payload.feature)).toEqual(["btType", "name", "suppressed", "namespace", "featureType", "parameters"]);
        expect(payload.feature.parameters).toEqual([
            { btType: "BTMParameterEnum-145", enumName: "NewBodyOperationType", value: "NEW", parameterId: "operationType" },
            {
                btType: "BTMParameterQueryList-148",
                queries: [{
                    btType: "BTMIndividualSketchRegionQuery-140",
                    queryStatement: null,
                    filterInnerLoops: true,
                    queryString: 'query = qSketchRegion(id + "FsK1", true);',
                    featureId: "FsK1",
                    deterministicIds: [],
                }],
                parameterId: "entities",
            },
            { btType: "BTMParameterBoolean-144", value: true, parameterId: "midplane" },
            { btType: "BTMParameterQuantity-147", expression: "0.25 in", value: 0.25 * 0.0254, parameterId: "thickness1" },
            { btType: "BTMParameterBoolean-144", value: false, parameterId: "oppositeDirection" },
            { btType: "BTMParameterQuantity-147", expression: "0 in", value: 0, parameterId: "thickness2" },
        ]);
    });

    it("leaves the value out for a variable with no known default", () => {
        const payload = buildThicken({
            kind: "thicken",
            name: "Thicken",
            sourceSketchRef: region,
            thickness: "#wall",
            operationType: "NEW",
            midplane: false,
            oppositeDirection: false,
        }, defaultContext());
        expect(payload.feature.parameters[3]).toEqual({
            btType: "BTMParameterQuantity-147",
            expression: "#wall",
            parameterId: "thickness1",
        });
    });
});

describe("buildFillet", () => {
    it("lists adjacent edge ids in one query", () => {
        const payload = buildFillet({
            kind: "fillet",
            name: "Fillet",
            edges: [ids("JHK"), ids("JHO")],
            radius: 0.125,
        }, defaultContext());
        expect(payload.feature.parameters[0]).toEqual({
            btType: "BTMParameterQueryList-148",
            queries: [{ btType: "BTMIndividualQuery-138", deterministicIds: ["JHK", "JHO"] }],
            parameterId: "entities",
            parameterName: "",
            libraryRelationType: "NONE",
        });
        expect(payload.feature.parameters[1]).toMatchObject({ parameterId: "radius", expression: "0.125 in" });
    });

    it("keeps caller order around a derived edge", () => {
        const derived: GeometryReference = {
            kind: "derived",
            sourceFeatureId: "FsK1",
            sourceEntitySelector: "right",
            operationChain: [],
            resolvedToken: "Q1.token",
        };
        const payload = buildFillet({
            kind: "fillet",
            name: "Fillet",
            edges: [ids("JHK"), derived, ids("JHO")],
            radius: 0.125,
        }, defaultContext());
        expect(payload.feature.parameters[0]).toMatchObject({
            queries: [
                { btType: "BTMIndividualQuery-138", deterministicIds: ["JHK"] },
                { btType: "BTMIndividualQuery-138", deterministicIds: [], queryStatement: null, queryString: "Q1.token" },
                { btType: "BTMIndividualQuery-138", deterministicIds: ["JHO"] },
            ],
        });
    });

    it("rejects a zero radius", () => {
        expect(() => buildFillet({ kind: "fillet", name: "Fillet", edges: [ids("JHK")], radius: 0 }, defaultContext()))
            .toThrow(DegenerateDimensionError);
    });

    it("rejects a radius below the configured minimum", () => {
        const edges = [ids("JHK")];
        expect(() => buildFillet({ kind: "fillet", name: "Fillet", edges, radius: "0.005 mm" }, defaultContext()))
            .toThrow(DegenerateDimensionError);
        expect(() => buildFillet({ kind: "fillet", name: "Fillet", edges, radius: "0.5 mm" }, defaultContext({ minimumDimension: 0.001 })))
            .toThrow(DegenerateDimensionError);
    });
});

describe("buildChamfer", () => {
    it("carries the chamfer type and width", () => {
        const payload = buildChamfer({
            kind: "chamfer",
            name: "Chamfer",
            edges: [ids("JHK")],
            distance: "2 mm",
            chamferType: "TWO_OFFSETS",
        }, defaultContext());
        expect(payload.feature.parameters.map((parameter) => parameter.parameterId)).toEqual(["entities", "chamferType", "width"]);
        expect(payload.feature.parameters[1]).toMatchObject({ enumName: "ChamferType", value: "TWO_OFFSETS" });
        expect(payload.feature.parameters[2]).toMatchObject({ expression: "2 mm", value: 2 * 0.001 });
    });

    it("rejects a zero distance", () => {
        expect(() => buildChamfer({
            kind: "chamfer",
            name: "Chamfer",
            edges: [ids("JHK")],
            distance: 0,
            chamferType: "EQUAL_OFFSETS",
        }, defaultContext())).toThrow(DegenerateDimensionError);
    });
});

describe("buildBoolean", () => {
    it("subtracts every later body from the first", () => {
        const payload = buildBoolean({
            kind: "boolean",
            name: "Boolean",
            operationType: "SUBTRACT",
            bodies: [ids("JHA"), ids("JHB"), ids("JHC")],
        });
        expect(payload.feature.parameters).toEqual([
            {
                btType: "BTMParameterEnum-145",
                namespace: "",
                enumName: "BooleanOperationType",
                value: "SUBTRACT",
                parameterId: "booleanOperationType",
                parameterName: "",
                libraryRelationType: "NONE",
            },
            {
                btType: "BTMParameterQueryList-148",
                queries: [{ btType: "BTMIndividualQuery-138", deterministicIds: ["JHB", "JHC"] }],
                parameterId: "tools",
                parameterName: "",
                libraryRelationType: "NONE",
            },
            {
                btType: "BTMParameterQueryList-148",
                queries: [{ btType: "BTMIndividualQuery-138", deterministicIds: ["JHA"] }],
                parameterId: "targets",
                parameterName: "",
                libraryRelationType: "NONE",
            },
        ]);
    });

    it("unites bodies in the order given", () => {
        const payload = buildBoolean({
            kind: "boolean",
            name: "Boolean",
            operationType: "UNION",
            bodies: [ids("JHB"), ids("JHA")],
        });
        expect(payload.feature.parameters).toHaveLength(2);
        expect(payload.feature.parameters[1]).toMatchObject({
            parameterId: "tools",
            queries: [{ deterministicIds: ["JHB", "JHA"] }],
        });
    });
});

describe("pattern builders", () => {
    it("builds a linear pattern of features", () => {
        const payload = buildLinearPattern({
            kind: "linearPattern",
            name: "Linear pattern",
            seedFeatureIds: ["FeX1"],
            direction: "X",
            count: 3,
            spacing: 2,
        }, defaultContext());
        expect(payload.feature.parameters.map((parameter) => parameter.parameterId)).toEqual([
            "entities",
            "directionQuery",
            "patternType",
            "distance",
            "instanceCount",
        ]);
        expect(payload.feature.parameters[0]).toMatchObject({
            queries: [{ btType: "BTMIndividualQuery-138", deterministicIds: ["FeX1"] }],
        });
        expect(payload.feature.parameters[1]).toMatchObject({
            queries: [{ queryString: 'query = qCreatedBy(makeId("RIGHT"), EntityType.EDGE);' }],
        });
        expect(payload.feature.parameters[2]).toMatchObject({ enumName: "PatternType", value: "FEATURE" });
        expect(payload.feature.parameters[4]).toEqual({
            btType: "BTMParameterQuantity-147",
            isInteger: true,
            value: 3,
            units: "",
            expression: "3",
            parameterId: "instanceCount",
            parameterName: "",
            libraryRelationType: "NONE",
        });
    });

    it("builds a circular pattern about Z", () => {
        const payload = buildCircularPattern({
            kind: "circularPattern",
            name: "Circular pattern",
            seedFeatureIds: ["FeX1", "FeX2"],
            axis: "Z",
            count: 6,
            angle: 360,
        }, defaultContext());
        expect(payload.feature.featureType).toBe("circularPattern");
        expect(payload.feature.parameters[1]).toMatchObject({
            parameterId: "axisQuery",
            queries: [{ queryString: 'query = qCreatedBy(makeId("FRONT"), EntityType.EDGE);' }],
        });
        expect(payload.feature.parameters[3]).toMatchObject({ parameterId: "angle", expression: "360 deg" });
    });

    it("rejects fewer than two instances", () => {
        const operation = {
            kind: "linearPattern" as const,
            name: "Linear pattern",
            seedFeatureIds: ["FeX1"],
            direction: "X" as const,
            count: 1,
            spacing: 2,
        };
        expect(() => buildLinearPattern(operation, defaultContext())).toThrow(InvalidCountError);
        expect(() => buildLinearPattern({ ...operation, count: 2.5 }, defaultContext())).toThrow(InvalidCountError);
    });

    it("rejects a zero spacing", () => {
        expect(() => buildLinearPattern({
            kind: "linearPattern",
            name: "Linear pattern",
            seedFeatureIds: ["FeX1"],
            direction: "Y",
            count: 2,
            spacing: 0,
        }, defaultContext())).toThrow(DegenerateDimensionError);
    });
});
