/**
 * Base URL anchoring
 *
 * @module base-url
 */

import { describeError, RequestConstructionError } from "./errors.ts";
import type { RequestData } from "./request-data.ts";

/**
 * Parsed base URL
 *
 * Path segments exclude empty pieces, so "https://host/v1" and
 * "https://host/v1/" anchor requests identically.
 */
export interface BaseURL {
    readonly scheme: string;
    readonly host: string;
    readonly port?: number | undefined;
    readonly path: ReadonlyArray<string>;
}

/**
 * Parse a base URL.
 *
 * Query string and fragment are ignored.
 *
 * @throws RequestConstructionError when the URL is not absolute or has a malformed escape
 */
export function parseBaseURL(input: string | URL): BaseURL {
    let url: URL;
    try {
        url = new URL(input);
    } catch (err) {
        throw new RequestConstructionError(`Invalid base URL: ${String(input)}`, err);
    }

    let path: string[];
    try {
        path = url.pathname
            .split("/")
            .filter((segment) => segment.length > 0)
            .map((segment) => decodeURIComponent(segment));
    } catch (err) {
        throw new RequestConstructionError(`Invalid base URL path: ${describeError(err)}`, err);
    }

    return {
        scheme: url.protocol.slice(0, -1),
        host: url.hostname,
        port: url.port ? Number(url.port) : undefined,
        path,
    };
}

/**
 * Anchor request data at a base URL.
 *
 * Sets scheme, host and port, and puts the base path in front of whatever
 * path the request already has.
 */
export function anchorAtBaseURL(data: RequestData, base: BaseURL): RequestData {
    return {
        ...data,
        scheme: base.scheme,
        host: base.host,
        port: base.port,
        path: [...base.path, ...data.path],
    };
}

/**
 * Whether the request path starts with the base path.
 */
export function hasBasePath(data: RequestData, base: BaseURL): boolean {
    return data.path.length >= base.path.length && base.path.every((segment, i) => data.path[i] === segment);
}

/**
 * Remove the base path prefix from request data, when present.
 *
 * Requests whose path does not start with the base path are returned as-is.
 */
export function stripBaseURL(data: RequestData, base: BaseURL): RequestData {
    if (base.path.length === 0 || !hasBasePath(data, base)) {
        return data;
    }
    return { ...data, path: data.path.slice(base.path.length) };
}
