/**
 * @keyway/core
 *
 * Shared building blocks for Keyway.
 *
 * Provides:
 * - RequestData: transport-agnostic request model and its helpers
 * - RequestCodec / TextCodec: bidirectional codec contracts
 * - Base URL anchoring and conversion to/from fetch Requests
 * - Error taxonomy (ConnectError based, sanitizable)
 * - Logger on the OpenTelemetry logs API
 *
 * @module @keyway/core
 */

// =============================================================================
// REQUEST MODEL
// =============================================================================

export type { MultiMap, RequestData } from "./request-data.ts";
export { appendPath, emptyRequestData, getHeaderValues, withBody, withHeader, withMethod, withQuery } from "./request-data.ts";

export type { BaseURL } from "./base-url.ts";
export { anchorAtBaseURL, hasBasePath, parseBaseURL, stripBaseURL } from "./base-url.ts";

export type { IncomingRequestInit } from "./request.ts";
export { fromRequest, requestFor, toRequest, toRequestData, toURL } from "./request.ts";

// =============================================================================
// CODECS
// =============================================================================

export type { CodecValue, RequestCodec, TextCodec } from "./codec.ts";

// =============================================================================
// ERRORS
// =============================================================================

export type { KeywayError, SanitizableError } from "./errors.ts";
export {
    CredentialValidationError,
    DecodeError,
    DecodeFailure,
    describeError,
    EncodeError,
    isKeywayError,
    isSanitizableError,
    KeywayConnectError,
    RequestConstructionError,
    ValidationFailure,
} from "./errors.ts";

// =============================================================================
// LOGGING
// =============================================================================

export type { LogEmitter, Logger, LoggerOptions, LogLevel } from "./logger.ts";
export { getLogger } from "./logger.ts";

// =============================================================================
// CONFIGURATION
// =============================================================================

// Environment configuration (12-Factor App)
export { AuthSchemeSchema, KeywayEnvSchema, LogLevelSchema, parseEnvConfig, safeParseEnvConfig, type KeywayEnv } from "./config/index.ts";
