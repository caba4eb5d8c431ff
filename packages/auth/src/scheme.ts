/**
 * Scheme codecs
 *
 * A scheme codec maps a credential to the full Authorization header value
 * ("<Scheme> <payload>") and back.
 *
 * @module scheme
 */

// biome-ignore lint/correctness/useImportExtensions: workspace package import
import type { TextCodec } from "@keyway/core";
// biome-ignore lint/correctness/useImportExtensions: workspace package import
import { DecodeError, DecodeFailure } from "@keyway/core";
import type { AuthScheme } from "./types.ts";

/**
 * Remove the literal "<Scheme> " prefix from a header value.
 *
 * The match is exact and case-sensitive.
 *
 * @throws DecodeError (prefixMismatch) when the prefix is absent
 */
export function stripSchemePrefix(text: string, scheme: AuthScheme): string {
    const prefix = `${scheme} `;
    if (!text.startsWith(prefix)) {
        throw new DecodeError(DecodeFailure.PREFIX_MISMATCH, `Expected "${prefix}" prefix in Authorization value`);
    }
    return text.slice(prefix.length);
}

/**
 * Create a codec for one authentication scheme.
 *
 * @param scheme - Scheme name written before the payload
 * @param payload - Codec for the text after "<Scheme> "
 */
export function createSchemeCodec<C>(scheme: AuthScheme, payload: TextCodec<C>): TextCodec<C> {
    return {
        encode(credential) {
            return `${scheme} ${payload.encode(credential)}`;
        },
        decode(text) {
            return payload.decode(stripSchemePrefix(text, scheme));
        },
    };
}
