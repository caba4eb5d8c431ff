/**
 * @keyway/client
 *
 * Authenticated client facade for Keyway.
 *
 * Provides:
 * - createAuthenticatedClient(): facade building pre-authenticated requests
 * - createBearerClient() / createBasicClient(): credential-specific factories
 * - createClientFromEnv(): factory configured from KEYWAY_* variables
 * - createAuthorizationInterceptor(): ConnectRPC client interceptor
 *
 * @module @keyway/client
 * @mergeModuleWith <project>
 */

export { createAuthenticatedClient, createBasicClient, createBearerClient, createClientFromEnv } from "./AuthenticatedClient.ts";
export { createAuthorizationInterceptor } from "./authorization-interceptor.ts";

export type {
    AuthenticatedClient,
    AuthenticatedClientOptions,
    BasicClientOptions,
    BearerClientOptions,
    BuildClient,
    ClientFactoryOptions,
    EnvClientOptions,
    MakeRequest,
} from "./types.ts";
