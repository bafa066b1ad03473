import { z } from "zod";

// Values: a bare number is inches (lengths) or degrees (angles); strings may carry
// a unit suffix ("12 mm", "90 deg") or name a variable ("#wall_thickness").
const literalValueSchema = z.object({
    value: z.number().finite(),
    unit: z.string().optional(),
}).strict();

const variableValueSchema = z.object({
    variable: z.string().min(1).describe("Variable table entry, without the leading '#'."),
    fallback: z.number().finite().optional().describe("Value in base units used when the variable table has no default."),
}).strict();

export const lengthValueSchema = z.union([
    z.number().finite(),
    z.string().min(1),
    literalValueSchema,
    variableValueSchema,
]);

export const angleValueSchema = lengthValueSchema;

export const pointSchema = z.tuple([lengthValueSchema, lengthValueSchema]);

const dimensionsSchema = z.record(lengthValueSchema).optional()
    .describe("Dimension bindings keyed by role (width, height, radius).");

export const rectangleSchema = z.object({
    type: z.literal("rectangle"),
    corner1: pointSchema.describe("First corner [x, y], inches unless a unit is given."),
    corner2: pointSchema.describe("Opposite corner [x, y]."),
    variableWidth: z.string().min(1).optional().describe("Optional variable name for the width dimension."),
    variableHeight: z.string().min(1).optional().describe("Optional variable name for the height dimension."),
    dimensions: dimensionsSchema,
});

export const circleSchema = z.object({
    type: z.literal("circle"),
    center: pointSchema,
    radius: lengthValueSchema,
    dimensions: dimensionsSchema,
});

export const lineSchema = z.object({
    type: z.literal("line"),
    start: pointSchema,
    end: pointSchema,
    horizontal: z.boolean().optional(),
    vertical: z.boolean().optional(),
    isConstruction: z.boolean().optional(),
    dimensions: dimensionsSchema,
});

export const arcSchema = z.object({
    type: z.literal("arc"),
    center: pointSchema,
    radius: lengthValueSchema,
    startAngle: angleValueSchema.describe("Start angle, degrees unless a unit is given."),
    endAngle: angleValueSchema.describe("End angle, degrees unless a unit is given."),
    dimensions: dimensionsSchema,
});

export const primitiveSchema = z.discriminatedUnion("type", [
    rectangleSchema,
    circleSchema,
    lineSchema,
    arcSchema,
]);

export const standardPlaneNames = ["Front", "Top", "Right"] as const;
export const entityTypes = ["VERTEX", "EDGE", "FACE", "BODY"] as const;
export const operationKinds = [
    "extrude",
    "revolve",
    "thicken",
    "fillet",
    "chamfer",
    "boolean",
    "linearPattern",
    "circularPattern",
] as const;

export const operationStepSchema = z.union([
    z.enum(operationKinds),
    z.object({
        kind: z.enum(operationKinds),
        featureId: z.string().min(1).optional().describe("Feature that applied the operation."),
    }).strict(),
]).transform((step): { kind: OperationKind; featureId?: string } =>
    typeof step === "string" ? { kind: step } : step);

export const standardPlaneRefSchema = z.object({
    kind: z.literal("standardPlane"),
    name: z.enum(standardPlaneNames),
    resolvedToken: z.string().min(1).optional(),
});

export const derivedRefSchema = z.object({
    kind: z.literal("derived"),
    sourceFeatureId: z.string().min(1),
    sourceEntitySelector: z.string().min(1).describe("Logical entity, e.g. 'right' or 'rect.2.top'."),
    entityType: z.enum(entityTypes).optional(),
    operationChain: z.array(operationStepSchema).default([]),
    resolvedToken: z.string().min(1).optional(),
});

export const sketchRegionRefSchema = z.object({
    kind: z.literal("sketchRegion"),
    featureId: z.string().min(1),
});

export const deterministicRefSchema = z.object({
    kind: z.literal("deterministic"),
    ids: z.array(z.string().min(1)).min(1),
});

export const geometryReferenceSchema = z.discriminatedUnion("kind", [
    standardPlaneRefSchema,
    derivedRefSchema,
    sketchRegionRefSchema,
    deterministicRefSchema,
]);

// Shorthands: a plane name, or a bare id (sketch feature id for profiles, deterministic id for edges/bodies).
const planeInputSchema = z.union([
    z.enum(standardPlaneNames).transform((name) => ({ kind: "standardPlane" as const, name })),
    geometryReferenceSchema,
]);

const profileInputSchema = z.union([
    z.string().min(1).transform((featureId) => ({ kind: "sketchRegion" as const, featureId })),
    geometryReferenceSchema,
]);

const entityInputSchema = z.union([
    z.string().min(1).transform((id) => ({ kind: "deterministic" as const, ids: [id] })),
    geometryReferenceSchema,
]);

export const newBodyOperationTypes = ["NEW", "ADD", "REMOVE", "INTERSECT"] as const;
export const axisNames = ["X", "Y", "Z"] as const;

export const sketchOperationSchema = z.object({
    kind: z.literal("sketch"),
    name: z.string().min(1).default("Sketch"),
    plane: planeInputSchema.default("Front"),
    primitives: z.array(primitiveSchema).min(1),
});

export const extrudeOperationSchema = z.object({
    kind: z.literal("extrude"),
    name: z.string().min(1).default("Extrude"),
    sourceSketchRef: profileInputSchema,
    depth: lengthValueSchema,
    operationType: z.enum(newBodyOperationTypes).default("NEW"),
    oppositeDirection: z.boolean().default(false),
});

export const revolveOperationSchema = z.object({
    kind: z.literal("revolve"),
    name: z.string().min(1).default("Revolve"),
    sourceSketchRef: profileInputSchema,
    axis: z.union([z.enum(axisNames), geometryReferenceSchema]).default("Y"),
    angle: angleValueSchema.default(360),
    operationType: z.enum(newBodyOperationTypes).default("NEW"),
    oppositeDirection: z.boolean().default(false),
});

export const thickenOperationSchema = z.object({
    kind: z.literal("thicken"),
    name: z.string().min(1).default("Thicken"),
    sourceSketchRef: profileInputSchema,
    thickness: lengthValueSchema,
    operationType: z.enum(newBodyOperationTypes).default("NEW"),
    midplane: z.boolean().default(false),
    oppositeDirection: z.boolean().default(false),
});

export const filletOperationSchema = z.object({
    kind: z.literal("fillet"),
    name: z.string().min(1).default("Fillet"),
    edges: z.array(entityInputSchema).min(1),
    radius: lengthValueSchema,
});

export const chamferTypes = ["EQUAL_OFFSETS", "TWO_OFFSETS", "OFFSET_ANGLE"] as const;

export const chamferOperationSchema = z.object({
    kind: z.literal("chamfer"),
    name: z.string().min(1).default("Chamfer"),
    edges: z.array(entityInputSchema).min(1),
    distance: lengthValueSchema,
    chamferType: z.enum(chamferTypes).default("EQUAL_OFFSETS"),
});

export const booleanTypes = ["UNION", "SUBTRACT", "INTERSECT"] as const;

export const booleanOperationSchema = z.object({
    kind: z.literal("boolean"),
    name: z.string().min(1).default("Boolean"),
    operationType: z.enum(booleanTypes),
    bodies: z.array(entityInputSchema).min(2).describe("For SUBTRACT the first body is kept and the rest are removed from it."),
});

export const linearPatternOperationSchema = z.object({
    kind: z.literal("linearPattern"),
    name: z.string().min(1).default("Linear pattern"),
    seedFeatureIds: z.array(z.string().min(1)).min(1),
    direction: z.enum(axisNames).default("X"),
    count: z.number(),
    spacing: lengthValueSchema,
});

export const circularPatternOperationSchema = z.object({
    kind: z.literal("circularPattern"),
    name: z.string().min(1).default("Circular pattern"),
    seedFeatureIds: z.array(z.string().min(1)).min(1),
    axis: z.enum(axisNames).default("Z"),
    count: z.number(),
    angle: angleValueSchema.default(360),
});

export const secondaryAxisTypes = ["PLUS_X", "PLUS_Y", "MINUS_X", "MINUS_Y"] as const;
export const rotationAxisTypes = ["ABOUT_X", "ABOUT_Y", "ABOUT_Z"] as const;

export const mateConnectorOperationSchema = z.object({
    kind: z.literal("mateConnector"),
    name: z.string().min(1).default("Mate connector"),
    faceId: z.string().min(1).describe("Deterministic id of the face the connector sits on."),
    occurrencePath: z.array(z.string().min(1)).min(1).describe("Instance ids from the assembly root down."),
    flipPrimary: z.boolean().default(false),
    secondaryAxis: z.enum(secondaryAxisTypes).default("PLUS_X"),
    translation: z.tuple([lengthValueSchema, lengthValueSchema, lengthValueSchema]).optional(),
    rotation: z.object({
        axis: z.enum(rotationAxisTypes).default("ABOUT_Z"),
        angle: angleValueSchema,
    }).optional(),
});

export const mateTypes = ["FASTENED", "REVOLUTE", "SLIDER", "CYLINDRICAL"] as const;

export const mateOperationSchema = z.object({
    kind: z.literal("mate"),
    name: z.string().min(1).default("Mate"),
    mateType: z.enum(mateTypes).default("FASTENED"),
    connectors: z.tuple([z.string().min(1), z.string().min(1)])
        .describe("Feature ids of the two mate connectors; a revolute mate turns about their primary axis."),
    limits: z.object({
        min: z.number().finite(),
        max: z.number().finite(),
    }).optional().describe("Inches for slider/cylindrical, degrees for revolute."),
});

export const logicalOperationSchema = z.discriminatedUnion("kind", [
    sketchOperationSchema,
    extrudeOperationSchema,
    revolveOperationSchema,
    thickenOperationSchema,
    filletOperationSchema,
    chamferOperationSchema,
    booleanOperationSchema,
    linearPatternOperationSchema,
    circularPatternOperationSchema,
    mateConnectorOperationSchema,
    mateOperationSchema,
]);

export type LengthValue = z.infer<typeof lengthValueSchema>;
export type AngleValue = z.infer<typeof angleValueSchema>;
export type Point = z.infer<typeof pointSchema>;
export type Primitive = z.infer<typeof primitiveSchema>;
export type RectanglePrimitive = z.infer<typeof rectangleSchema>;
export type CirclePrimitive = z.infer<typeof circleSchema>;
export type LinePrimitive = z.infer<typeof lineSchema>;
export type ArcPrimitive = z.infer<typeof arcSchema>;

export type StandardPlaneName = (typeof standardPlaneNames)[number];
export type EntityType = (typeof entityTypes)[number];
export type OperationKind = (typeof operationKinds)[number];
export type OperationStep = z.infer<typeof operationStepSchema>;
export type AxisName = (typeof axisNames)[number];

export type StandardPlaneReference = z.infer<typeof standardPlaneRefSchema>;
export type DerivedReference = z.infer<typeof derivedRefSchema>;
export type SketchRegionReference = z.infer<typeof sketchRegionRefSchema>;
export type DeterministicReference = z.infer<typeof deterministicRefSchema>;
export type GeometryReference = z.infer<typeof geometryReferenceSchema>;

export type SketchOperation = z.infer<typeof sketchOperationSchema>;
export type ExtrudeOperation = z.infer<typeof extrudeOperationSchema>;
export type RevolveOperation = z.infer<typeof revolveOperationSchema>;
export type ThickenOperation = z.infer<typeof thickenOperationSchema>;
export type FilletOperation = z.infer<typeof filletOperationSchema>;
export type ChamferOperation = z.infer<typeof chamferOperationSchema>;
export type BooleanOperation = z.infer<typeof booleanOperationSchema>;
export type LinearPatternOperation = z.infer<typeof linearPatternOperationSchema>;
export type CircularPatternOperation = z.infer<typeof circularPatternOperationSchema>;
export type MateConnectorOperation = z.infer<typeof mateConnectorOperationSchema>;
export type MateOperation = z.infer<typeof mateOperationSchema>;

/** Validated descriptor, defaults applied. */
export type LogicalOperation = z.infer<typeof logicalOperationSchema>;
/** Descriptor as a caller writes it, shorthands and omitted defaults allowed. */
export type LogicalOperationInput = z.input<typeof logicalOperationSchema>;
