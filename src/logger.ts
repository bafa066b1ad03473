import type { LogLevel } from "./config.js";

const levelRank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
    child(scope: string): Logger;
}

// Everything goes to stderr; stdout is left to whatever process hosts the bridge.
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
    const threshold = levelRank[level];
    const emit = (at: LogLevel, message: string, args: unknown[]) => {
        if (levelRank[at] < threshold) return;
        console.error(`[${at}] ${scope}: ${message}`, ...args);
    };
    return {
        debug: (message, ...args) => emit("debug", message, args),
        info: (message, ...args) => emit("info", message, args),
        warn: (message, ...args) => emit("warn", message, args),
        error: (message, ...args) => emit("error", message, args),
        child: (childScope) => createLogger(`${scope}:${childScope}`, level),
    };
}

export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => silentLogger,
};
