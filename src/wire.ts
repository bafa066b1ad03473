/**
 * Wire shapes of feature definitions as the Part Studio and Assembly
 * feature endpoints accept them.
 *
 * The service rejects payloads that stray from known-good examples without
 * saying why, so every constructor here emits its keys in a fixed order and
 * with the exact placeholder values (`parameterName: ""`,
 * `libraryRelationType: "NONE"`) those examples carry.
 */

import type { NormalizedValue } from "./units.js";

export type DefinitionCallType = "BTFeatureDefinitionCall-1406";

// Queries

export interface DeterministicQuery {
    btType: "BTMIndividualQuery-138";
    deterministicIds: string[];
}

export interface QueryStringQuery {
    btType: "BTMIndividualQuery-138";
    deterministicIds: string[];
    queryStatement: null;
    queryString: string;
}

export interface SketchRegionQuery {
    btType: "BTMIndividualSketchRegionQuery-140";
    queryStatement: null;
    filterInnerLoops: boolean;
    queryString: string;
    featureId: string;
    deterministicIds: string[];
}

export interface InferenceQueryWithOccurrence {
    btType: "BTMInferenceQueryWithOccurrence-1083";
    inferenceType: "CENTROID";
    path: string[];
    deterministicIds: string[];
}

export interface FeatureQueryWithOccurrence {
    btType: "BTMFeatureQueryWithOccurrence-157";
    featureId: string;
    path: string[];
    queryData: string;
}

export type WireQuery = DeterministicQuery | QueryStringQuery | SketchRegionQuery;
export type OccurrenceQuery = InferenceQueryWithOccurrence | FeatureQueryWithOccurrence;

// Parameters

interface Labelled {
    parameterName?: string;
    libraryRelationType?: "NONE";
}

export interface QueryListParameter extends Labelled {
    btType: "BTMParameterQueryList-148";
    queries: WireQuery[];
    parameterId: string;
}

export interface EnumParameter extends Labelled {
    btType: "BTMParameterEnum-145";
    namespace?: string;
    enumName: string;
    value: string;
    parameterId: string;
}

export interface QuantityParameter extends Labelled {
    btType: "BTMParameterQuantity-147";
    isInteger?: boolean;
    value?: number;
    units?: string;
    expression: string;
    parameterId: string;
}

export interface BooleanParameter extends Labelled {
    btType: "BTMParameterBoolean-144";
    value: boolean;
    parameterId: string;
}

export interface StringParameter {
    btType: "BTMParameterString-149";
    value: string;
    parameterId: string;
}

export interface OccurrenceQueryListParameter {
    btType: "BTMParameterQueryWithOccurrenceList-67";
    parameterId: string;
    queries: OccurrenceQuery[];
}

export type WireParameter =
    | QueryListParameter
    | EnumParameter
    | QuantityParameter
    | BooleanParameter
    | StringParameter
    | OccurrenceQueryListParameter;

// Sketch geometry

export interface LineGeometry {
    btType: "BTCurveGeometryLine-117";
    pntX: number;
    pntY: number;
    dirX: number;
    dirY: number;
}

export interface CircleGeometry {
    btType: "BTCurveGeometryCircle-115";
    radius: number;
    xCenter: number;
    yCenter: number;
    xDir: number;
    yDir: number;
    clockwise: boolean;
}

export interface SketchCurveSegment {
    btType: "BTMSketchCurveSegment-155";
    entityId: string;
    startPointId: string;
    endPointId: string;
    startParam: number;
    endParam: number;
    geometry: LineGeometry | CircleGeometry;
    isConstruction: boolean;
    centerId?: string;
}

export interface SketchCurve {
    btType: "BTMSketchCurve-4";
    entityId: string;
    geometry: CircleGeometry;
    centerId: string;
    isConstruction: boolean;
}

export type SketchEntity = SketchCurveSegment | SketchCurve;

export type SketchConstraintType =
    | "COINCIDENT"
    | "PERPENDICULAR"
    | "PARALLEL"
    | "HORIZONTAL"
    | "VERTICAL"
    | "LENGTH"
    | "RADIUS";

export interface SketchConstraint {
    btType: "BTMSketchConstraint-2";
    constraintType: SketchConstraintType;
    entityId: string;
    parameters: Array<StringParameter | EnumParameter | QuantityParameter>;
}

// Features

export type FeatureBtType = "BTMFeature-134" | "BTMSketch-151" | "BTMMateConnector-66" | "BTMMate-64";

export interface WireFeature {
    btType: FeatureBtType;
    featureType: string;
    name: string;
    suppressed: boolean;
    namespace?: string;
    parameters: WireParameter[];
    entities?: SketchEntity[];
    constraints?: SketchConstraint[];
}

/** One submission-ready feature. Frozen once built. */
export interface FeaturePayload {
    btType?: DefinitionCallType;
    feature: WireFeature;
}

/**
 * `labelled` parameters carry the empty `parameterName` and
 * `libraryRelationType` fields; `bare` ones are just the value.
 */
export type ParameterStyle = "labelled" | "bare";

function label<T extends Labelled>(parameter: T, style: ParameterStyle): T {
    return style === "labelled"
        ? { ...parameter, parameterName: "", libraryRelationType: "NONE" }
        : parameter;
}

export function queryListParameter(parameterId: string, queries: WireQuery[], style: ParameterStyle = "labelled"): QueryListParameter {
    return label<QueryListParameter>({ btType: "BTMParameterQueryList-148", queries, parameterId }, style);
}

export function enumParameter(
    parameterId: string,
    enumName: string,
    value: string,
    style: ParameterStyle = "labelled"
): EnumParameter {
    if (style === "bare") {
        return { btType: "BTMParameterEnum-145", enumName, value, parameterId };
    }
    return label<EnumParameter>({ btType: "BTMParameterEnum-145", namespace: "", enumName, value, parameterId }, style);
}

/** `value` carries meters or radians; it is left out while a variable's value is unknown. */
export function quantityParameter(
    parameterId: string,
    quantity: NormalizedValue,
    style: ParameterStyle = "labelled"
): QuantityParameter {
    const { expression, numericValue } = quantity;
    if (style === "bare") {
        return numericValue === null
            ? { btType: "BTMParameterQuantity-147", expression, parameterId }
            : { btType: "BTMParameterQuantity-147", expression, value: numericValue, parameterId };
    }
    const parameter: QuantityParameter = numericValue === null
        ? { btType: "BTMParameterQuantity-147", isInteger: false, units: "", expression, parameterId }
        : { btType: "BTMParameterQuantity-147", isInteger: false, value: numericValue, units: "", expression, parameterId };
    return label(parameter, style);
}

export function integerParameter(parameterId: string, count: number): QuantityParameter {
    return label<QuantityParameter>({
        btType: "BTMParameterQuantity-147",
        isInteger: true,
        value: count,
        units: "",
        expression: String(count),
        parameterId,
    }, "labelled");
}

export function booleanParameter(parameterId: string, value: boolean, style: ParameterStyle = "labelled"): BooleanParameter {
    return label<BooleanParameter>({ btType: "BTMParameterBoolean-144", value, parameterId }, style);
}

export function stringParameter(parameterId: string, value: string): StringParameter {
    return { btType: "BTMParameterString-149", value, parameterId };
}

export function deterministicQuery(ids: string[]): DeterministicQuery {
    return { btType: "BTMIndividualQuery-138", deterministicIds: ids };
}

export function queryStringQuery(queryString: string): QueryStringQuery {
    return { btType: "BTMIndividualQuery-138", deterministicIds: [], queryStatement: null, queryString };
}

export function sketchRegionQuery(featureId: string): SketchRegionQuery {
    return {
        btType: "BTMIndividualSketchRegionQuery-140",
        queryStatement: null,
        filterInnerLoops: true,
        queryString: `query = qSketchRegion(id + ${JSON.stringify(featureId)}, true);`,
        featureId,
        deterministicIds: [],
    };
}

export function feature(featureType: string, name: string, parameters: WireParameter[]): WireFeature {
    return {
        btType: "BTMFeature-134",
        featureType,
        name,
        suppressed: false,
        namespace: "",
        parameters,
    };
}

export function definitionCall(wire: WireFeature): FeaturePayload {
    return { btType: "BTFeatureDefinitionCall-1406", feature: wire };
}

export function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}
