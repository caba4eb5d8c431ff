/**
 * ConnectRPC client interceptor stamping the Authorization header
 *
 * @module authorization-interceptor
 */

import type { Interceptor } from "@connectrpc/connect";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { Credential } from "@keyway/auth";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import { AUTHORIZATION_HEADER, BasicCredential, BearerCredential, basicAuthRouter, bearerAuthRouter } from "@keyway/auth";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { RequestCodec } from "@keyway/core";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import { EncodeError, emptyRequestData, getHeaderValues } from "@keyway/core";

function authorizationValue<C extends Credential>(credential: C, router: RequestCodec<C>): string {
    let value: string | undefined;
    try {
        value = getHeaderValues(router.encode(credential, emptyRequestData()), AUTHORIZATION_HEADER)[0];
    } catch (err) {
        throw EncodeError.wrap(err);
    }
    if (value === undefined) {
        throw new EncodeError("Router wrote no Authorization header", undefined);
    }
    return value;
}

function defaultAuthorizationValue(credential: Credential): string {
    if (credential instanceof BasicCredential) {
        return authorizationValue(credential, basicAuthRouter);
    }
    if (credential instanceof BearerCredential) {
        return authorizationValue(credential, bearerAuthRouter);
    }
    throw new EncodeError(`No default router for the ${credential.scheme} scheme`, undefined);
}

/**
 * Create a client interceptor that sets the `authorization` header of every
 * outgoing RPC.
 *
 * The header value is encoded once, when the interceptor is created.
 * Without a router, the Basic or Bearer router is picked from the
 * credential's class.
 *
 * @throws EncodeError when the router cannot print the credential
 *
 * @example
 * ```typescript
 * import { createConnectTransport } from '@connectrpc/connect-node';
 * import { BearerCredential } from '@keyway/auth';
 * import { createAuthorizationInterceptor } from '@keyway/client';
 *
 * const transport = createConnectTransport({
 *     baseUrl: 'http://localhost:5000',
 *     httpVersion: '2',
 *     interceptors: [createAuthorizationInterceptor(new BearerCredential(token))],
 * });
 * ```
 */
export function createAuthorizationInterceptor(credential: BasicCredential | BearerCredential): Interceptor;
export function createAuthorizationInterceptor<C extends Credential>(credential: C, router: RequestCodec<C>): Interceptor;
export function createAuthorizationInterceptor(credential: Credential, router?: RequestCodec<Credential>): Interceptor {
    const value = router ? authorizationValue(credential, router) : defaultAuthorizationValue(credential);

    return (next) => async (req) => {
        req.header.set(AUTHORIZATION_HEADER, value);
        return await next(req);
    };
}
