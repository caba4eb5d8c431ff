/**
 * Environment configuration validation with Zod
 *
 * Provides type-safe client configuration from environment variables
 * following 12-Factor App principles.
 *
 * @module @keyway/core/config
 */

import { z } from "zod";

/**
 * Log level schema with validation
 */
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]).default("info");

/**
 * Authentication scheme schema
 */
export const AuthSchemeSchema = z.enum(["bearer", "basic"]).default("bearer");

/**
 * Keyway environment configuration schema
 *
 * Presence of the credential variables is checked here; whether their
 * values are acceptable (e.g., non-empty token) is decided by the
 * credential constructors.
 *
 * @example
 * ```typescript
 * const config = KeywayEnvSchema.parse(process.env);
 * console.log(config.KEYWAY_AUTH_SCHEME); // 'bearer' (default)
 * ```
 */
export const KeywayEnvSchema = z
    .object({
        /**
         * Base URL every request is anchored at
         */
        KEYWAY_BASE_URL: z.string().url(),

        /**
         * Authentication scheme
         * @default 'bearer'
         */
        KEYWAY_AUTH_SCHEME: AuthSchemeSchema,

        /**
         * Bearer token (required when scheme is bearer)
         */
        KEYWAY_TOKEN: z.string().optional(),

        /**
         * Basic username (required when scheme is basic)
         */
        KEYWAY_USERNAME: z.string().optional(),

        /**
         * Basic password (required when scheme is basic)
         */
        KEYWAY_PASSWORD: z.string().optional(),

        /**
         * Minimum log level
         * @default 'info'
         */
        LOG_LEVEL: LogLevelSchema,
    })
    .superRefine((env, ctx) => {
        if (env.KEYWAY_AUTH_SCHEME === "bearer" && env.KEYWAY_TOKEN === undefined) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["KEYWAY_TOKEN"], message: "KEYWAY_TOKEN is required for bearer authentication" });
        }
        if (env.KEYWAY_AUTH_SCHEME === "basic") {
            if (env.KEYWAY_USERNAME === undefined) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["KEYWAY_USERNAME"], message: "KEYWAY_USERNAME is required for basic authentication" });
            }
            if (env.KEYWAY_PASSWORD === undefined) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["KEYWAY_PASSWORD"], message: "KEYWAY_PASSWORD is required for basic authentication" });
            }
        }
    });

/**
 * Keyway environment configuration type
 */
export type KeywayEnv = z.infer<typeof KeywayEnvSchema>;

/**
 * Parse and validate environment configuration
 *
 * @example
 * ```typescript
 * const config = parseEnvConfig();
 * // or with custom env
 * const config = parseEnvConfig({ KEYWAY_BASE_URL: 'https://api.example.com', KEYWAY_TOKEN: 'tok' });
 * ```
 */
export function parseEnvConfig(env: Record<string, string | undefined> = process.env): KeywayEnv {
    return KeywayEnvSchema.parse(env);
}

/**
 * Safely parse environment configuration (returns result object)
 *
 * @example
 * ```typescript
 * const result = safeParseEnvConfig();
 * if (result.success) {
 *   console.log(result.data.KEYWAY_BASE_URL);
 * } else {
 *   console.error(result.error.format());
 * }
 * ```
 */
export function safeParseEnvConfig(env: Record<string, string | undefined> = process.env) {
    return KeywayEnvSchema.safeParse(env);
}
