/**
 * HTTP Basic credentials (RFC 7617)
 *
 * @module basic
 */

// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { TextCodec } from "@keyway/core";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import { CredentialValidationError, DecodeError, DecodeFailure, describeError, ValidationFailure } from "@keyway/core";
import type { EmailAddress } from "./email.ts";
import { createSchemeCodec, stripSchemePrefix } from "./scheme.ts";
import type { Credential } from "./types.ts";
import { AuthScheme } from "./types.ts";

const STRICT_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const utf8 = new TextDecoder("utf-8", { fatal: true });

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Username and password sent as `Authorization: Basic <base64(username:password)>`.
 *
 * Empty usernames and passwords are rejected, and so is a colon in the
 * username: decoding splits on the first colon, so such a username could
 * never be read back. Unpaired UTF-16 surrogates have no UTF-8 encoding
 * and are rejected in both fields.
 *
 * @example
 * ```typescript
 * import { BasicCredential } from '@keyway/auth';
 *
 * const auth = new BasicCredential('api', 'secret-key');
 * auth.encoded(); // "YXBpOnNlY3JldC1rZXk="
 * ```
 */
export class BasicCredential implements Credential {
    readonly scheme = AuthScheme.BASIC;
    readonly username: string;
    readonly password: string;

    /**
     * @throws CredentialValidationError (emptyUsername, invalidUsername, emptyPassword, invalidPassword)
     */
    constructor(username: string, password: string) {
        if (username.length === 0) {
            throw new CredentialValidationError(ValidationFailure.EMPTY_USERNAME, "Basic username must not be empty");
        }
        if (username.includes(":")) {
            throw new CredentialValidationError(ValidationFailure.INVALID_USERNAME, "Basic username must not contain ':'");
        }
        if (LONE_SURROGATE.test(username)) {
            throw new CredentialValidationError(ValidationFailure.INVALID_USERNAME, "Basic username contains an unpaired surrogate");
        }
        if (password.length === 0) {
            throw new CredentialValidationError(ValidationFailure.EMPTY_PASSWORD, "Basic password must not be empty");
        }
        if (LONE_SURROGATE.test(password)) {
            throw new CredentialValidationError(ValidationFailure.INVALID_PASSWORD, "Basic password contains an unpaired surrogate");
        }
        this.username = username;
        this.password = password;
    }

    /**
     * Use an email address as the username.
     */
    static fromEmailAddress(emailAddress: EmailAddress, password: string): BasicCredential {
        return new BasicCredential(emailAddress.toString(), password);
    }

    /**
     * Parse a full header value of the form "Basic <base64>".
     *
     * @throws DecodeError (prefixMismatch, malformedPayload)
     */
    static parse(text: string): BasicCredential {
        return BasicCredential.fromPayload(stripSchemePrefix(text, AuthScheme.BASIC));
    }

    /**
     * Parse the Base64 text that follows "Basic ".
     *
     * @throws DecodeError (malformedPayload)
     */
    static fromPayload(payload: string): BasicCredential {
        if (!STRICT_BASE64.test(payload)) {
            throw new DecodeError(DecodeFailure.MALFORMED_PAYLOAD, "Basic credentials are not valid Base64");
        }

        let decoded: string;
        try {
            decoded = utf8.decode(Buffer.from(payload, "base64"));
        } catch (err) {
            throw new DecodeError(DecodeFailure.MALFORMED_PAYLOAD, "Basic credentials are not valid UTF-8", err);
        }

        const colon = decoded.indexOf(":");
        if (colon === -1) {
            throw new DecodeError(DecodeFailure.MALFORMED_PAYLOAD, "Basic credentials have no ':' separator");
        }

        try {
            return new BasicCredential(decoded.slice(0, colon), decoded.slice(colon + 1));
        } catch (err) {
            throw new DecodeError(DecodeFailure.MALFORMED_PAYLOAD, `Invalid Basic credentials: ${describeError(err)}`, err);
        }
    }

    /**
     * Base64 of the UTF-8 bytes of "username:password" (padded, standard alphabet).
     */
    encoded(): string {
        return Buffer.from(`${this.username}:${this.password}`, "utf8").toString("base64");
    }

    equals(other: Credential): boolean {
        return other instanceof BasicCredential && other.username === this.username && other.password === this.password;
    }

    toString(): string {
        return `BasicCredential(${this.username})`;
    }
}

/**
 * Codec between BasicCredential and "Basic <base64>".
 */
export const basicCredentialCodec: TextCodec<BasicCredential> = createSchemeCodec(AuthScheme.BASIC, {
    encode: (credential: BasicCredential) => credential.encoded(),
    decode: (payload: string) => BasicCredential.fromPayload(payload),
});
