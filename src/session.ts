import { z } from "zod";
import { UnresolvableReferenceError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { OnshapeApiClient } from "./onshapeApi.js";
import type { PlaneIdSource } from "./references.js";
import type { StandardPlaneName } from "./schemas.js";
import { VariableTable } from "./variables.js";
import type { FeaturePayload } from "./wire.js";

export interface ElementRef {
    documentId: string;
    workspaceId: string;
    elementId: string;
}

const planeLookupResultSchema = z.object({
    result: z.object({
        value: z.array(z.object({ value: z.string() })),
    }),
});

const featureStateSchema = z.object({
    feature: z.object({ featureId: z.string().optional() }).passthrough().optional(),
    featureState: z.object({ featureStatus: z.string().optional() }).passthrough().optional(),
}).passthrough();

export type SubmitResult = z.infer<typeof featureStateSchema>;

// Mate connectors and mates live in assemblies; every other feature goes to a Part Studio.
const assemblyFeatureTypes = new Set(["BTMMate-64", "BTMMateConnector-66"]);

/**
 * The remote side of one document/workspace/element: where payloads are
 * submitted, plane ids are looked up, and variables are read.
 */
export class ElementSession implements PlaneIdSource {
    private readonly logger: Logger;

    constructor(
        private readonly client: OnshapeApiClient,
        readonly element: ElementRef,
        logger: Logger = silentLogger,
    ) {
        this.logger = logger;
    }

    private path(area: "partstudios" | "assemblies" | "variables", suffix = ""): string {
        const { documentId, workspaceId, elementId } = this.element;
        return `/${area}/d/${documentId}/w/${workspaceId}/e/${elementId}${suffix}`;
    }

    async submit(payload: FeaturePayload): Promise<SubmitResult> {
        const area = assemblyFeatureTypes.has(payload.feature.btType) ? "assemblies" : "partstudios";
        this.logger.info(`Submitting ${payload.feature.featureType} "${payload.feature.name}" to ${area}`);
        const response = await this.client.post(this.path(area, "/features"), payload);
        const parsed = featureStateSchema.safeParse(response);
        if (!parsed.success) {
            this.logger.warn(`Unexpected response shape after submitting "${payload.feature.name}"`);
            return {};
        }
        const status = parsed.data.featureState?.featureStatus;
        if (status !== undefined && status !== "OK") {
            this.logger.warn(`Feature "${payload.feature.name}" regenerated with status ${status}`);
        }
        return parsed.data;
    }

    getFeatures(): Promise<unknown> {
        return this.client.get(this.path("partstudios", "/features"));
    }

    async lookupPlaneId(name: StandardPlaneName): Promise<string> {
        const script = [
            "function(context is Context, queries) {",
            `    return transientQueriesToStrings(evaluateQuery(context, qCreatedBy(makeId("${name}"), EntityType.FACE)));`,
            "}",
        ].join("\n");
        const response = await this.client.post(
            this.path("partstudios", "/featurescript"),
            { script },
            new URLSearchParams({ rollbackBarIndex: "-1" }),
        );
        const parsed = planeLookupResultSchema.safeParse(response);
        const id = parsed.success ? parsed.data.result.value[0]?.value : undefined;
        if (!id) {
            throw new UnresolvableReferenceError(`The ${name} plane was not found in this element`, {
                plane: name,
                ...this.element,
            });
        }
        this.logger.debug(`${name} plane is ${id}`);
        return id;
    }

    async loadVariables(): Promise<VariableTable> {
        const response = await this.client.get(this.path("variables", "/variables"));
        return VariableTable.fromResponse(response);
    }
}
