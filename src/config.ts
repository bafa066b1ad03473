import "dotenv/config"; // Load environment variables from .env
import { z } from "zod";
import { fromZodError } from "./errors.js";

export const logLevels = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof logLevels)[number];

const envSchema = z.object({
    ONSHAPE_API_URL: z.string().url().default("https://cad.onshape.com/api/v9"),
    ONSHAPE_ACCESS_KEY: z.string().optional(),
    ONSHAPE_SECRET_KEY: z.string().optional(),
    // Meters. Fillet radii and chamfer distances at or below this are rejected locally.
    ONSHAPE_MIN_DIMENSION: z.coerce.number().nonnegative().default(0.00001),
    ONSHAPE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    LOG_LEVEL: z.enum(logLevels).default("info"),
});

export interface BridgeConfig {
    apiUrl: string;
    accessKey?: string;
    secretKey?: string;
    minimumDimension: number;
    requestTimeoutMs: number;
    logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw fromZodError(parsed.error, "environment configuration");
    }
    const vars = parsed.data;
    return {
        apiUrl: vars.ONSHAPE_API_URL.replace(/\/+$/, ""),
        accessKey: vars.ONSHAPE_ACCESS_KEY || undefined,
        secretKey: vars.ONSHAPE_SECRET_KEY || undefined,
        minimumDimension: vars.ONSHAPE_MIN_DIMENSION,
        requestTimeoutMs: vars.ONSHAPE_REQUEST_TIMEOUT_MS,
        logLevel: vars.LOG_LEVEL,
    };
}
