/**
 * Request data model
 *
 * Transport-agnostic description of an HTTP request: method, URL parts,
 * path segments, multi-valued query parameters and headers, optional body.
 * Codecs print values into this shape and parse values out of it.
 *
 * All helpers return new values; a RequestData is never mutated in place.
 *
 * @module request-data
 */

/**
 * Multi-valued string map (query parameters, headers)
 */
export type MultiMap = Readonly<Record<string, ReadonlyArray<string>>>;

/**
 * Abstract HTTP request
 */
export interface RequestData {
    /** HTTP method, upper case */
    readonly method: string;
    /** URL scheme without the colon (e.g., "https") */
    readonly scheme?: string | undefined;
    /** Host name */
    readonly host?: string | undefined;
    /** Explicit port */
    readonly port?: number | undefined;
    /** Decoded path segments, in order */
    readonly path: ReadonlyArray<string>;
    /** Query parameters */
    readonly query: MultiMap;
    /** Header fields; names compare case-insensitively */
    readonly headers: MultiMap;
    /** Raw body bytes */
    readonly body?: Uint8Array | undefined;
}

/**
 * Create an empty GET request with no URL parts.
 */
export function emptyRequestData(): RequestData {
    return {
        method: "GET",
        path: [],
        query: {},
        headers: {},
    };
}

export function withMethod(data: RequestData, method: string): RequestData {
    return { ...data, method: method.toUpperCase() };
}

/**
 * Append path segments after the existing ones.
 */
export function appendPath(data: RequestData, ...segments: string[]): RequestData {
    return { ...data, path: [...data.path, ...segments] };
}

/**
 * Replace all values of a query parameter.
 */
export function withQuery(data: RequestData, name: string, values: ReadonlyArray<string>): RequestData {
    return { ...data, query: { ...data.query, [name]: [...values] } };
}

export function withBody(data: RequestData, body: Uint8Array): RequestData {
    return { ...data, body };
}

function sameHeaderName(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
}

/**
 * Replace all values of a header field.
 *
 * Any existing field whose name differs only in case is removed, so the
 * result carries exactly one spelling of the name.
 */
export function withHeader(data: RequestData, name: string, values: ReadonlyArray<string>): RequestData {
    const headers: Record<string, ReadonlyArray<string>> = {};
    for (const [key, existing] of Object.entries(data.headers)) {
        if (!sameHeaderName(key, name)) {
            headers[key] = existing;
        }
    }
    headers[name] = [...values];
    return { ...data, headers };
}

/**
 * Read all values of a header field (case-insensitive name match).
 *
 * @returns Values in insertion order, empty when the field is absent
 */
export function getHeaderValues(data: RequestData, name: string): ReadonlyArray<string> {
    const values: string[] = [];
    for (const [key, existing] of Object.entries(data.headers)) {
        if (sameHeaderName(key, name)) {
            values.push(...existing);
        }
    }
    return values;
}
