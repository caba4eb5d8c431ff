/**
 * Authenticated route values
 *
 * @module authenticated-route
 */

import { isDeepStrictEqual } from "node:util";
import { BearerCredential } from "./bearer.ts";
import type { AuthenticatedRoute, Credential } from "./types.ts";

/**
 * Pair a credential with an application route.
 *
 * @example
 * ```typescript
 * import { authenticatedRoute, BasicCredential } from '@keyway/auth';
 *
 * const route = authenticatedRoute(new BasicCredential('api', 'secret-key'), { type: 'getUser', id: '123' });
 * ```
 */
export function authenticatedRoute<C extends Credential, R>(auth: C, api: R): AuthenticatedRoute<C, R> {
    return Object.freeze({ auth, api });
}

/**
 * Pair a Bearer token built from a raw API key with an application route.
 *
 * @throws CredentialValidationError (emptyToken) when the key is empty
 */
export function bearerAuthenticatedRoute<R>(apiKey: string, api: R): AuthenticatedRoute<BearerCredential, R> {
    return authenticatedRoute(new BearerCredential(apiKey), api);
}

/**
 * Structural equality: equal credentials and deeply equal routes.
 */
export function isSameAuthenticatedRoute<C extends Credential, R>(a: AuthenticatedRoute<C, R>, b: AuthenticatedRoute<C, R>): boolean {
    return a.auth.equals(b.auth) && isDeepStrictEqual(a.api, b.api);
}
