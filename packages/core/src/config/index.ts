/**
 * Configuration module
 *
 * Provides type-safe environment configuration validation
 * using Zod schemas. Follows 12-Factor App principles.
 *
 * @example
 * ```typescript
 * import { parseEnvConfig, type KeywayEnv } from '@keyway/core/config';
 *
 * const config = parseEnvConfig();
 * console.log(`Calling ${config.KEYWAY_BASE_URL} with ${config.KEYWAY_AUTH_SCHEME} auth`);
 * ```
 *
 * @module @keyway/core/config
 */

export { AuthSchemeSchema, KeywayEnvSchema, LogLevelSchema, parseEnvConfig, safeParseEnvConfig, type KeywayEnv } from "./envSchema.ts";
