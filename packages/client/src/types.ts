/**
 * Shared types for @keyway/client
 *
 * @module types
 */

// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { AuthenticatedCodec, Credential } from "@keyway/auth";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { Logger, RequestCodec } from "@keyway/core";

/**
 * Turns an application route into a ready-to-send fetch Request.
 */
export type MakeRequest<R> = (route: R) => Request;

/**
 * Builds the application's client around makeRequest.
 */
export type BuildClient<R, T> = (makeRequest: MakeRequest<R>) => T;

/**
 * Options shared by every facade factory
 */
export interface ClientFactoryOptions<R, T> {
    /** Base URL every request is anchored at */
    readonly baseURL: string | URL;
    /** Application route codec */
    readonly apiRouter: RequestCodec<R>;
    /** Called once with makeRequest; its result is exposed as `.client` */
    readonly buildClient: BuildClient<R, T>;
    /**
     * Logger for request construction
     * @default getLogger("keyway.client")
     */
    readonly logger?: Logger | undefined;
}

export interface AuthenticatedClientOptions<C extends Credential, R, T> extends ClientFactoryOptions<R, T> {
    /** Credential attached to every request */
    readonly credential: C;
    /** Authorization header codec matching the credential */
    readonly authRouter: RequestCodec<C>;
}

export interface BearerClientOptions<R, T> extends ClientFactoryOptions<R, T> {
    readonly token: string;
}

export interface BasicClientOptions<R, T> extends ClientFactoryOptions<R, T> {
    readonly username: string;
    readonly password: string;
}

export interface EnvClientOptions<R, T> {
    readonly apiRouter: RequestCodec<R>;
    readonly buildClient: BuildClient<R, T>;
    /**
     * Environment to read
     * @default process.env
     */
    readonly env?: Record<string, string | undefined> | undefined;
}

/**
 * Authenticated client facade
 *
 * @template C - Credential type
 * @template R - Application route type
 * @template T - Client type returned by buildClient
 */
export interface AuthenticatedClient<C extends Credential, R, T> {
    /** The client built once by buildClient */
    readonly client: T;
    readonly credential: C;
    /** Composed codec used by makeRequest */
    readonly codec: AuthenticatedCodec<C, R>;
    readonly makeRequest: MakeRequest<R>;
}
