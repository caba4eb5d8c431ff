/**
 * Authenticated client facade
 *
 * Builds the composed codec once and hands the application a makeRequest
 * function whose every request carries the configured credential.
 *
 * @module AuthenticatedClient
 */

// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { Credential } from "@keyway/auth";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import { authenticatedRoute, BasicCredential, BearerCredential, basicAuthRouter, bearerAuthRouter, createAuthenticatedCodec } from "@keyway/auth";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { RequestData } from "@keyway/core";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import { describeError, getLogger, parseEnvConfig, RequestConstructionError, toRequest } from "@keyway/core";
import type { AuthenticatedClient, AuthenticatedClientOptions, BasicClientOptions, BearerClientOptions, EnvClientOptions, MakeRequest } from "./types.ts";

/**
 * Create an authenticated client.
 *
 * `buildClient` is called exactly once, with a makeRequest function that
 * encodes `authenticatedRoute(credential, route)` and converts the result
 * into a fetch Request.
 *
 * @throws RequestConstructionError when the base URL is invalid
 *
 * @example
 * ```typescript
 * import { BearerCredential, bearerAuthRouter } from '@keyway/auth';
 * import { createAuthenticatedClient } from '@keyway/client';
 *
 * const users = createAuthenticatedClient({
 *   baseURL: 'https://api.example.com/v1',
 *   credential: new BearerCredential(process.env.API_TOKEN ?? ''),
 *   authRouter: bearerAuthRouter,
 *   apiRouter: usersRouter,
 *   buildClient: (makeRequest) => ({
 *     getUser: (id: string) => fetch(makeRequest({ type: 'getUser', id })),
 *   }),
 * });
 *
 * await users.client.getUser('42');
 * ```
 */
export function createAuthenticatedClient<C extends Credential, R, T>(options: AuthenticatedClientOptions<C, R, T>): AuthenticatedClient<C, R, T> {
    const { credential, buildClient } = options;
    const logger = options.logger ?? getLogger("keyway.client");
    const codec = createAuthenticatedCodec({ baseURL: options.baseURL, authRouter: options.authRouter, apiRouter: options.apiRouter });

    const makeRequest: MakeRequest<R> = (route) => {
        let data: RequestData;
        try {
            data = codec.encode(authenticatedRoute(credential, route));
        } catch (err) {
            logger.warn("Request encoding failed", { scheme: credential.scheme, error: describeError(err) });
            throw err;
        }

        let request: Request;
        try {
            request = toRequest(data);
        } catch (err) {
            const failure = err instanceof RequestConstructionError ? err : new RequestConstructionError(`Request construction failed: ${describeError(err)}`, err);
            logger.warn("Request construction failed", { scheme: credential.scheme, error: describeError(failure) });
            throw failure;
        }

        // Never log header values: they carry the credential
        logger.debug("Request constructed", { "http.request.method": request.method, "url.full": request.url, scheme: credential.scheme });
        return request;
    };

    const client = buildClient(makeRequest);

    return Object.freeze({ client, credential, codec, makeRequest });
}

/**
 * Create a client authenticating with `Authorization: Bearer <token>`.
 *
 * @throws CredentialValidationError (emptyToken) when the token is empty
 */
export function createBearerClient<R, T>(options: BearerClientOptions<R, T>): AuthenticatedClient<BearerCredential, R, T> {
    return createAuthenticatedClient({
        baseURL: options.baseURL,
        credential: new BearerCredential(options.token),
        authRouter: bearerAuthRouter,
        apiRouter: options.apiRouter,
        buildClient: options.buildClient,
        logger: options.logger,
    });
}

/**
 * Create a client authenticating with `Authorization: Basic <base64(username:password)>`.
 *
 * @throws CredentialValidationError (emptyUsername, invalidUsername, emptyPassword)
 */
export function createBasicClient<R, T>(options: BasicClientOptions<R, T>): AuthenticatedClient<BasicCredential, R, T> {
    return createAuthenticatedClient({
        baseURL: options.baseURL,
        credential: new BasicCredential(options.username, options.password),
        authRouter: basicAuthRouter,
        apiRouter: options.apiRouter,
        buildClient: options.buildClient,
        logger: options.logger,
    });
}

/**
 * Create a client from KEYWAY_* environment variables.
 *
 * KEYWAY_AUTH_SCHEME picks the Bearer or Basic factory; LOG_LEVEL sets the
 * minimum level of the client logger.
 *
 * @throws ZodError when the environment is incomplete, CredentialValidationError when a credential is rejected
 *
 * @example
 * ```typescript
 * // KEYWAY_BASE_URL=https://api.example.com KEYWAY_TOKEN=... node app.js
 * const { client } = createClientFromEnv({ apiRouter: usersRouter, buildClient });
 * ```
 */
export function createClientFromEnv<R, T>(options: EnvClientOptions<R, T>): AuthenticatedClient<BasicCredential | BearerCredential, R, T> {
    const config = parseEnvConfig(options.env);
    const logger = getLogger("keyway.client", { level: config.LOG_LEVEL, defaultAttributes: { "keyway.auth_scheme": config.KEYWAY_AUTH_SCHEME } });

    if (config.KEYWAY_AUTH_SCHEME === "basic") {
        return createBasicClient({
            baseURL: config.KEYWAY_BASE_URL,
            username: config.KEYWAY_USERNAME ?? "",
            password: config.KEYWAY_PASSWORD ?? "",
            apiRouter: options.apiRouter,
            buildClient: options.buildClient,
            logger,
        });
    }

    return createBearerClient({
        baseURL: config.KEYWAY_BASE_URL,
        token: config.KEYWAY_TOKEN ?? "",
        apiRouter: options.apiRouter,
        buildClient: options.buildClient,
        logger,
    });
}
