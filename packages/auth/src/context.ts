/**
 * Per-request credential
 *
 * The credential interceptor decodes the Authorization header once and
 * runs the rest of the call inside `credentialStorage.run()`. Handlers
 * read the Basic or Bearer credential back here instead of parsing the
 * header again.
 *
 * @module context
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { Code, ConnectError } from "@connectrpc/connect";
import { BasicCredential } from "./basic.ts";
import { BearerCredential } from "./bearer.ts";
import type { Credential } from "./types.ts";
import { AuthScheme } from "./types.ts";

/**
 * Credential of the call in progress. Empty for skipped methods.
 */
export const credentialStorage = new AsyncLocalStorage<Credential>();

/**
 * Credential the caller authenticated with, if any.
 *
 * @example Per-user lookup from a Basic login
 * ```typescript
 * import { BasicCredential, getCredential } from '@keyway/auth';
 *
 * const credential = getCredential();
 * const owner = credential instanceof BasicCredential ? credential.username : 'anonymous';
 * ```
 */
export function getCredential(): Credential | undefined {
    return credentialStorage.getStore();
}

/**
 * Credential the caller authenticated with, optionally of one scheme.
 *
 * @throws ConnectError (Code.Unauthenticated) when the call carries no
 * credential or one of another scheme
 */
export function requireCredential(scheme: typeof AuthScheme.BASIC): BasicCredential;
export function requireCredential(scheme: typeof AuthScheme.BEARER): BearerCredential;
export function requireCredential(scheme?: AuthScheme): Credential;
export function requireCredential(scheme?: AuthScheme): Credential {
    const credential = credentialStorage.getStore();
    if (!credential) {
        throw new ConnectError("Authentication required", Code.Unauthenticated);
    }
    const expected = scheme === AuthScheme.BASIC ? BasicCredential : scheme === AuthScheme.BEARER ? BearerCredential : undefined;
    if (expected && !(credential instanceof expected)) {
        throw new ConnectError(`${scheme} credentials required`, Code.Unauthenticated);
    }
    return credential;
}
