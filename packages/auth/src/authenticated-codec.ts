/**
 * Authenticated-route codec
 *
 * Composes an Authorization header router with an application route codec
 * into a single codec over AuthenticatedRoute values.
 *
 * @module authenticated-codec
 */

import { isDeepStrictEqual } from "node:util";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { BaseURL, RequestCodec, RequestData } from "@keyway/core";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import { anchorAtBaseURL, DecodeError, DecodeFailure, describeError, EncodeError, emptyRequestData, getHeaderValues, hasBasePath, parseBaseURL, stripBaseURL } from "@keyway/core";
import { authenticatedRoute } from "./authenticated-route.ts";
import type { AuthenticatedCodecOptions, AuthenticatedRoute, Credential } from "./types.ts";

/**
 * Codec printing and parsing authenticated requests.
 *
 * Stateless apart from its configuration; one instance can serve
 * concurrent calls.
 *
 * @template C - Credential type
 * @template R - Application route type
 *
 * @example
 * ```typescript
 * import { AuthenticatedCodec, BearerCredential, authenticatedRoute, bearerAuthRouter } from '@keyway/auth';
 * import { toRequest } from '@keyway/core';
 *
 * const codec = new AuthenticatedCodec({
 *   baseURL: 'https://api.example.com',
 *   authRouter: bearerAuthRouter,
 *   apiRouter: usersRouter,
 * });
 *
 * const data = codec.encode(authenticatedRoute(new BearerCredential('tok'), { type: 'getUser', id: '42' }));
 * const request = toRequest(data); // GET https://api.example.com/users/42, Authorization: Bearer tok
 *
 * // Server side: authentication is checked before the route is matched
 * const { auth, api } = codec.decode(incoming);
 * ```
 */
export class AuthenticatedCodec<C extends Credential, R> implements RequestCodec<AuthenticatedRoute<C, R>> {
    readonly baseURL: BaseURL;
    readonly authRouter: RequestCodec<C>;
    readonly apiRouter: RequestCodec<R>;

    /**
     * @throws RequestConstructionError when the base URL is invalid
     */
    constructor(options: AuthenticatedCodecOptions<C, R>) {
        this.baseURL = parseBaseURL(options.baseURL);
        this.authRouter = options.authRouter;
        this.apiRouter = options.apiRouter;
    }

    /**
     * Print credential and route into one request.
     *
     * The auth router owns the header fields it writes; a route codec that
     * changes one of them fails the encode.
     *
     * @throws EncodeError wrapping the failing sub-encoder's error
     */
    encode(route: AuthenticatedRoute<C, R>, into: RequestData = emptyRequestData()): RequestData {
        let data = anchorAtBaseURL(into, this.baseURL);
        try {
            data = this.authRouter.encode(route.auth, data);
            const owned = Object.keys(this.authRouter.encode(route.auth, emptyRequestData()).headers).map((name) => ({ name, values: getHeaderValues(data, name) }));
            data = this.apiRouter.encode(route.api, data);
            for (const { name, values } of owned) {
                if (!isDeepStrictEqual(getHeaderValues(data, name), values)) {
                    throw new EncodeError(`Route codec overwrote the ${name} header`, undefined);
                }
            }
        } catch (err) {
            throw EncodeError.wrap(err);
        }
        return data;
    }

    /**
     * Parse credential and route from one request.
     *
     * The credential is decoded first, so a request without valid
     * credentials is rejected as unauthenticated before any route matching.
     * The request path must start with the base path, which is removed
     * before the route codec runs.
     *
     * @throws DecodeError (authenticationFailed or routeNotMatched), with the underlying failure as cause
     */
    decode(data: RequestData): AuthenticatedRoute<C, R> {
        let auth: C;
        try {
            auth = this.authRouter.decode(data);
        } catch (err) {
            throw new DecodeError(DecodeFailure.AUTHENTICATION_FAILED, `Authentication failed: ${describeError(err)}`, err);
        }

        if (!hasBasePath(data, this.baseURL)) {
            throw new DecodeError(DecodeFailure.ROUTE_NOT_MATCHED, `No route matched: /${data.path.join("/")} is outside the base path /${this.baseURL.path.join("/")}`);
        }

        let api: R;
        try {
            api = this.apiRouter.decode(stripBaseURL(data, this.baseURL));
        } catch (err) {
            throw new DecodeError(DecodeFailure.ROUTE_NOT_MATCHED, `No route matched: ${describeError(err)}`, err);
        }

        return authenticatedRoute(auth, api);
    }
}

/**
 * Create an authenticated-route codec.
 */
export function createAuthenticatedCodec<C extends Credential, R>(options: AuthenticatedCodecOptions<C, R>): AuthenticatedCodec<C, R> {
    return new AuthenticatedCodec(options);
}
