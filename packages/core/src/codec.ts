/**
 * Bidirectional codec contracts
 *
 * A codec both prints a value into its wire form and parses the wire form
 * back into the value. Route codecs work on RequestData; scheme codecs work
 * on the text of a single header value.
 *
 * @module codec
 */

import type { RequestData } from "./request-data.ts";

/**
 * Codec between a value and request data.
 *
 * Application routers implement this for their route type. `encode` must
 * start from `into` and only add to it, so several codecs can print into
 * the same request. `decode` reads the request without consuming it.
 *
 * @template T - Decoded value type
 */
export interface RequestCodec<T> {
    /**
     * Print a value into request data.
     *
     * @param value - Value to print
     * @param into - Request being built (defaults to an empty GET request)
     * @throws When the value cannot be represented
     */
    encode(value: T, into?: RequestData): RequestData;

    /**
     * Parse a value out of request data.
     *
     * @throws When the request does not describe a value of this codec
     */
    decode(data: RequestData): T;
}

/**
 * Codec between a value and a string.
 *
 * @template T - Decoded value type
 */
export interface TextCodec<T> {
    encode(value: T): string;
    decode(text: string): T;
}

/**
 * Extract the decoded type of a request codec.
 */
export type CodecValue<C> = C extends RequestCodec<infer T> ? T : never;
