/**
 * Conversion between RequestData and WHATWG fetch requests
 *
 * @module request
 */

import { anchorAtBaseURL, parseBaseURL } from "./base-url.ts";
import type { RequestCodec } from "./codec.ts";
import { describeError, EncodeError, RequestConstructionError } from "./errors.ts";
import type { RequestData } from "./request-data.ts";
import { emptyRequestData } from "./request-data.ts";

/**
 * Serialize the URL parts of request data.
 *
 * Path segments are percent-encoded one by one, so a segment containing
 * "/" stays a single segment. Empty, "." and ".." segments are rejected.
 *
 * @throws RequestConstructionError when there is no host, a segment is unsendable or the URL is invalid
 */
export function toURL(data: RequestData): URL {
    if (!data.host) {
        throw new RequestConstructionError("Request data has no host; anchor it at a base URL first");
    }

    const unsendable = data.path.find((segment) => segment === "" || segment === "." || segment === "..");
    if (unsendable !== undefined) {
        throw new RequestConstructionError(`Path segment ${JSON.stringify(unsendable)} cannot be sent; URL parsing would drop or resolve it`);
    }

    const scheme = data.scheme ?? "https";
    const port = data.port === undefined ? "" : `:${data.port}`;
    const path = data.path.map((segment) => encodeURIComponent(segment)).join("/");

    let url: URL;
    try {
        url = new URL(`${scheme}://${data.host}${port}/${path}`);
    } catch (err) {
        throw new RequestConstructionError(`Invalid request URL: ${describeError(err)}`, err);
    }

    for (const [name, values] of Object.entries(data.query)) {
        for (const value of values) {
            url.searchParams.append(name, value);
        }
    }
    return url;
}

/**
 * Build a fetch Request from request data.
 *
 * @throws RequestConstructionError when the URL, a header value or the method/body combination is invalid
 */
export function toRequest(data: RequestData): Request {
    const url = toURL(data);

    const headers = new Headers();
    try {
        for (const [name, values] of Object.entries(data.headers)) {
            for (const value of values) {
                headers.append(name, value);
            }
        }
    } catch (err) {
        throw new RequestConstructionError(`Invalid request header: ${describeError(err)}`, err);
    }

    try {
        return new Request(url, {
            method: data.method,
            headers,
            body: data.body ?? null,
        });
    } catch (err) {
        throw new RequestConstructionError(`Invalid request: ${describeError(err)}`, err);
    }
}

/**
 * Incoming request parts, as exposed by fetch-style servers and RPC interceptors
 */
export interface IncomingRequestInit {
    readonly method: string;
    readonly url: string | URL;
    readonly headers?: Headers | undefined;
    readonly body?: Uint8Array | undefined;
}

/**
 * Build request data from incoming request parts.
 *
 * Header names come out lower-cased, the way Headers stores them.
 *
 * @throws RequestConstructionError when the URL is not absolute or has a malformed escape
 */
export function toRequestData(init: IncomingRequestInit): RequestData {
    let url: URL;
    try {
        url = new URL(init.url);
    } catch (err) {
        throw new RequestConstructionError(`Invalid request URL: ${String(init.url)}`, err);
    }

    let path: string[];
    try {
        path = url.pathname
            .split("/")
            .filter((segment) => segment.length > 0)
            .map((segment) => decodeURIComponent(segment));
    } catch (err) {
        throw new RequestConstructionError(`Invalid request path: ${describeError(err)}`, err);
    }

    const query: Record<string, string[]> = {};
    for (const [name, value] of url.searchParams) {
        (query[name] ??= []).push(value);
    }

    const headers: Record<string, string[]> = {};
    init.headers?.forEach((value, name) => {
        (headers[name] ??= []).push(value);
    });

    return {
        method: init.method.toUpperCase(),
        scheme: url.protocol.slice(0, -1),
        host: url.hostname,
        port: url.port ? Number(url.port) : undefined,
        path,
        query,
        headers,
        body: init.body,
    };
}

/**
 * Build request data from a fetch Request, reading its body.
 */
export async function fromRequest(request: Request): Promise<RequestData> {
    const body = request.body === null ? undefined : new Uint8Array(await request.arrayBuffer());
    return toRequestData({
        method: request.method,
        url: request.url,
        headers: request.headers,
        body,
    });
}

/**
 * Print a single codec value anchored at a base URL and build the Request.
 *
 * @example Standalone Authorization header request
 * ```typescript
 * import { requestFor } from '@keyway/core';
 * import { BearerCredential, bearerAuthRouter } from '@keyway/auth';
 *
 * const request = requestFor(bearerAuthRouter, new BearerCredential('tok'), 'https://api.example.com');
 * request.headers.get('authorization'); // "Bearer tok"
 * ```
 *
 * @throws EncodeError when the codec fails, RequestConstructionError when conversion fails
 */
export function requestFor<T>(codec: RequestCodec<T>, value: T, baseURL: string | URL): Request {
    const anchored = anchorAtBaseURL(emptyRequestData(), parseBaseURL(baseURL));
    let data: RequestData;
    try {
        data = codec.encode(value, anchored);
    } catch (err) {
        throw EncodeError.wrap(err);
    }
    return toRequest(data);
}
