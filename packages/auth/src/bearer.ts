/**
 * OAuth 2.0 Bearer tokens (RFC 6750)
 *
 * @module bearer
 */

// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { TextCodec } from "@keyway/core";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import { CredentialValidationError, DecodeError, DecodeFailure, describeError, ValidationFailure } from "@keyway/core";
import { createSchemeCodec, stripSchemePrefix } from "./scheme.ts";
import type { Credential } from "./types.ts";
import { AuthScheme } from "./types.ts";

/**
 * Opaque token sent as `Authorization: Bearer <token>`.
 */
export class BearerCredential implements Credential {
    readonly scheme = AuthScheme.BEARER;
    readonly token: string;

    /**
     * @throws CredentialValidationError (emptyToken)
     */
    constructor(token: string) {
        if (token.length === 0) {
            throw new CredentialValidationError(ValidationFailure.EMPTY_TOKEN, "Bearer token must not be empty");
        }
        this.token = token;
    }

    /**
     * Parse a full header value of the form "Bearer <token>".
     *
     * The token is taken verbatim and must not be empty, like at construction.
     *
     * @throws DecodeError (prefixMismatch, malformedPayload)
     */
    static parse(text: string): BearerCredential {
        return BearerCredential.fromPayload(stripSchemePrefix(text, AuthScheme.BEARER));
    }

    /**
     * @throws DecodeError (malformedPayload)
     */
    static fromPayload(payload: string): BearerCredential {
        try {
            return new BearerCredential(payload);
        } catch (err) {
            throw new DecodeError(DecodeFailure.MALFORMED_PAYLOAD, `Invalid Bearer token: ${describeError(err)}`, err);
        }
    }

    equals(other: Credential): boolean {
        return other instanceof BearerCredential && other.token === this.token;
    }

    toString(): string {
        return "BearerCredential(***)";
    }
}

/**
 * Codec between BearerCredential and "Bearer <token>".
 */
export const bearerCredentialCodec: TextCodec<BearerCredential> = createSchemeCodec(AuthScheme.BEARER, {
    encode: (credential: BearerCredential) => credential.token,
    decode: (payload: string) => BearerCredential.fromPayload(payload),
});
