/**
 * Authorization header routers
 *
 * Lift a scheme codec into the request data model by binding it to the
 * Authorization header field.
 *
 * @module header-router
 */

// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { RequestCodec, TextCodec } from "@keyway/core";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import { DecodeError, DecodeFailure, emptyRequestData, getHeaderValues, withHeader } from "@keyway/core";
import { type BasicCredential, basicCredentialCodec } from "./basic.ts";
import { type BearerCredential, bearerCredentialCodec } from "./bearer.ts";

export const AUTHORIZATION_HEADER = "Authorization";

/**
 * Create a router for the Authorization header.
 *
 * Encoding replaces the Authorization field and leaves every other part of
 * the request alone. Decoding reads the first Authorization value without
 * consuming it, so the application router still sees all headers.
 *
 * @param codec - Scheme codec for the header value
 */
export function createAuthorizationRouter<C>(codec: TextCodec<C>): RequestCodec<C> {
    return {
        encode(credential, into = emptyRequestData()) {
            return withHeader(into, AUTHORIZATION_HEADER, [codec.encode(credential)]);
        },
        decode(data) {
            const value = getHeaderValues(data, AUTHORIZATION_HEADER)[0];
            if (!value) {
                throw new DecodeError(DecodeFailure.MISSING_HEADER, "Missing Authorization header");
            }
            return codec.decode(value);
        },
    };
}

/**
 * Router for `Authorization: Basic <base64(username:password)>`
 */
export const basicAuthRouter: RequestCodec<BasicCredential> = createAuthorizationRouter(basicCredentialCodec);

/**
 * Router for `Authorization: Bearer <token>`
 */
export const bearerAuthRouter: RequestCodec<BearerCredential> = createAuthorizationRouter(bearerCredentialCodec);
