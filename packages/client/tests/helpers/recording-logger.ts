/**
 * Logger that records every call, for asserting on facade logging.
 */

// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { Logger } from "@keyway/core";

export interface LoggedCall {
    readonly level: "debug" | "info" | "warn" | "error";
    readonly message: string;
    readonly attributes: Record<string, unknown> | undefined;
}

export function createRecordingLogger(): { logger: Logger; calls: LoggedCall[] } {
    const calls: LoggedCall[] = [];
    const logger: Logger = {
        debug: (message, attributes) => calls.push({ level: "debug", message, attributes }),
        info: (message, attributes) => calls.push({ level: "info", message, attributes }),
        warn: (message, attributes) => calls.push({ level: "warn", message, attributes }),
        error: (message, attributes) => calls.push({ level: "error", message, attributes }),
    };
    return { logger, calls };
}
