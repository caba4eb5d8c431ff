/**
 * Shared types for @keyway/auth
 *
 * @module types
 */

// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { Logger, RequestCodec } from "@keyway/core";

/**
 * HTTP authentication scheme names, as written in the Authorization header
 */
export const AuthScheme = {
    /** RFC 7617 */
    BASIC: "Basic",
    /** RFC 6750 */
    BEARER: "Bearer",
} as const;

export type AuthScheme = (typeof AuthScheme)[keyof typeof AuthScheme];

/**
 * Credential value
 *
 * Immutable; two credentials are equal when scheme and fields are equal.
 */
export interface Credential {
    readonly scheme: AuthScheme;
    equals(other: Credential): boolean;
}

/**
 * Credential paired with an application route value.
 *
 * @template C - Credential type
 * @template R - Application route type
 */
export interface AuthenticatedRoute<C extends Credential, R> {
    /** Credentials sent with the request */
    readonly auth: C;
    /** Application route */
    readonly api: R;
}

/**
 * Options for the composed authenticated codec
 */
export interface AuthenticatedCodecOptions<C extends Credential, R> {
    /** Base URL every request is anchored at */
    readonly baseURL: string | URL;
    /** Codec for the Authorization header (e.g., bearerAuthRouter) */
    readonly authRouter: RequestCodec<C>;
    /** Application route codec */
    readonly apiRouter: RequestCodec<R>;
}

/**
 * Server-side credential interceptor options
 */
export interface CredentialAuthInterceptorOptions<C extends Credential> {
    /**
     * Codec reading the credential from request headers.
     * REQUIRED. Decides the accepted scheme.
     */
    readonly authRouter: RequestCodec<C>;

    /**
     * Check a decoded credential against a user store, key list, etc.
     * Returning false or throwing rejects the request with Code.Unauthenticated.
     * When omitted every well-formed credential is accepted.
     */
    readonly verifyCredential?: ((credential: C) => boolean | Promise<boolean>) | undefined;

    /**
     * Methods that do not require credentials.
     *
     * @param procedure - Service type name and method name
     * @returns true to skip authentication
     */
    readonly skip?: ((procedure: { readonly service: string; readonly method: string }) => boolean) | undefined;

    /**
     * Logger for rejected credentials
     * @default getLogger("keyway.auth")
     */
    readonly logger?: Logger | undefined;
}
