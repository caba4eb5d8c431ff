/**
 * Credential authentication interceptor
 *
 * Decodes the request credential with an Authorization header router,
 * optionally verifies it, and stores it in AsyncLocalStorage for
 * downstream access.
 *
 * @module auth-interceptor
 */

import type { Interceptor, StreamRequest, UnaryRequest } from "@connectrpc/connect";
import { Code, ConnectError } from "@connectrpc/connect";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import { DecodeError, DecodeFailure, describeError, getLogger, toRequestData } from "@keyway/core";
import { credentialStorage } from "./context.ts";
import type { Credential, CredentialAuthInterceptorOptions } from "./types.ts";

/**
 * Create a credential authentication interceptor.
 *
 * @param options - Interceptor options
 * @returns ConnectRPC interceptor
 *
 * @example Basic auth against a user store
 * ```typescript
 * import { basicAuthRouter, createCredentialAuthInterceptor } from '@keyway/auth';
 *
 * const auth = createCredentialAuthInterceptor({
 *   authRouter: basicAuthRouter,
 *   verifyCredential: async ({ username, password }) => users.checkPassword(username, password),
 *   skip: ({ service }) => service === 'grpc.health.v1.Health',
 * });
 * ```
 */
export function createCredentialAuthInterceptor<C extends Credential>(options: CredentialAuthInterceptorOptions<C>): Interceptor {
    const { authRouter, verifyCredential, skip } = options;
    const logger = options.logger ?? getLogger("keyway.auth");

    return (next) => async (req: UnaryRequest | StreamRequest) => {
        const service: string = req.service.typeName;
        const method: string = req.method.name;

        if (skip?.({ service, method })) {
            return await next(req);
        }

        let credential: C;
        try {
            credential = authRouter.decode(toRequestData({ method: req.requestMethod, url: req.url, headers: req.header }));
        } catch (err) {
            logger.debug("Credential rejected", { "rpc.service": service, "rpc.method": method, reason: describeError(err) });
            if (err instanceof ConnectError) {
                throw err;
            }
            throw new DecodeError(DecodeFailure.AUTHENTICATION_FAILED, `Authentication failed: ${describeError(err)}`, err);
        }

        if (verifyCredential) {
            let accepted: boolean;
            try {
                accepted = await verifyCredential(credential);
            } catch (err) {
                if (err instanceof ConnectError) {
                    throw err;
                }
                throw new ConnectError("Authentication failed", Code.Unauthenticated, undefined, undefined, err);
            }
            if (!accepted) {
                logger.debug("Credential not accepted", { "rpc.service": service, "rpc.method": method, scheme: credential.scheme });
                throw new ConnectError("Authentication failed", Code.Unauthenticated);
            }
        }

        // Run downstream with the credential in AsyncLocalStorage
        return await credentialStorage.run(credential, () => next(req));
    };
}
