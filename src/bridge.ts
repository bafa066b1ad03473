import { loadConfig, type BridgeConfig } from "./config.js";
import { FeatureBuilder, type BuiltFeature } from "./featureBuilder.js";
import { createLogger, type Logger } from "./logger.js";
import { OnshapeApiClient, type FetchLike } from "./onshapeApi.js";
import type { LogicalOperationInput } from "./schemas.js";
import { ElementSession, type ElementRef, type SubmitResult } from "./session.js";

export interface ElementBridgeOptions {
    config?: BridgeConfig;
    fetch?: FetchLike;
    logger?: Logger;
    /** Read the element's variable table before the first build. */
    loadVariables?: boolean;
}

export interface AppliedFeature extends BuiltFeature {
    response: SubmitResult;
}

/**
 * Builder and session for one element, wired from configuration. Tokens
 * resolved by earlier builds are handed to later ones.
 */
export class ElementBridge {
    private readonly tokens = new Map<string, string>();

    private constructor(
        readonly session: ElementSession,
        readonly builder: FeatureBuilder,
        private readonly logger: Logger,
    ) {}

    static async open(element: ElementRef, options: ElementBridgeOptions = {}): Promise<ElementBridge> {
        const config = options.config ?? loadConfig();
        const logger = options.logger ?? createLogger("onshape", config.logLevel);
        const client = new OnshapeApiClient(config, { fetch: options.fetch, logger: logger.child("api") });
        const session = new ElementSession(client, element, logger.child("session"));
        const variables = options.loadVariables ? await session.loadVariables() : undefined;
        const builder = new FeatureBuilder({
            planes: session,
            variables,
            minimumDimension: config.minimumDimension,
            logger: logger.child("builder"),
        });
        return new ElementBridge(session, builder, logger);
    }

    /** Tokens of every reference an accepted feature used, by `referenceKey`. */
    references(): ReadonlyMap<string, string> {
        return new Map(this.tokens);
    }

    async apply(operation: LogicalOperationInput): Promise<AppliedFeature> {
        const built = await this.builder.build(operation, this.tokens);
        const response = await this.session.submit(built.payload);
        // Only geometry the service accepted can be referred to later.
        for (const [key, token] of built.references) {
            this.tokens.set(key, token);
        }
        this.logger.info(`Applied ${built.kind} ${response.feature?.featureId ?? ""}`.trim());
        return { ...built, response };
    }
}
