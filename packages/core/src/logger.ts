/**
 * Logger backed by the OpenTelemetry logs API
 *
 * Records go to whatever LoggerProvider the application registered
 * globally; without one they are dropped by the no-op provider.
 *
 * @module logger
 */

import type { AnyValueMap, LogRecord } from "@opentelemetry/api-logs";
import { logs, SeverityNumber } from "@opentelemetry/api-logs";

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Anything that accepts log records
 */
export interface LogEmitter {
    emit(record: LogRecord): void;
}

export interface LoggerOptions {
    defaultAttributes?: AnyValueMap | undefined;
    /**
     * Minimum level emitted
     * @default "debug"
     */
    level?: LogLevel | undefined;
    /**
     * Record sink
     * @default logs.getLogger(name) from the global provider
     */
    emitter?: LogEmitter | undefined;
}

export interface Logger {
    info(message: string, attributes?: AnyValueMap): void;
    warn(message: string, attributes?: AnyValueMap): void;
    error(message: string, attributes?: AnyValueMap): void;
    debug(message: string, attributes?: AnyValueMap): void;
}

const SEVERITY: Record<LogLevel, SeverityNumber> = {
    debug: SeverityNumber.DEBUG,
    info: SeverityNumber.INFO,
    warn: SeverityNumber.WARN,
    error: SeverityNumber.ERROR,
};

export function getLogger(name: string, options?: LoggerOptions): Logger {
    const defaultAttrs = options?.defaultAttributes;
    const minSeverity = SEVERITY[options?.level ?? "debug"];

    function buildAttributes(callAttributes?: AnyValueMap): AnyValueMap {
        const base: AnyValueMap = { "logger.name": name, ...defaultAttrs };
        return callAttributes ? { ...base, ...callAttributes } : base;
    }

    function emitLog(level: LogLevel, message: string, attributes?: AnyValueMap): void {
        const severityNumber = SEVERITY[level];
        if (severityNumber < minSeverity) return;
        // Resolved per call so a provider registered after getLogger() still receives records
        const emitter = options?.emitter ?? logs.getLogger(name);
        emitter.emit({
            severityNumber,
            severityText: level.toUpperCase(),
            body: message,
            attributes: buildAttributes(attributes),
        });
    }

    return {
        info(message, attributes?) {
            emitLog("info", message, attributes);
        },
        warn(message, attributes?) {
            emitLog("warn", message, attributes);
        },
        error(message, attributes?) {
            emitLog("error", message, attributes);
        },
        debug(message, attributes?) {
            emitLog("debug", message, attributes);
        },
    };
}
