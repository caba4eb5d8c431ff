/**
 * Unit tests for RequestData <-> fetch Request conversion
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import type { RequestCodec } from "../../src/codec.ts";
import { EncodeError, RequestConstructionError } from "../../src/errors.ts";
import { fromRequest, requestFor, toRequest, toRequestData, toURL } from "../../src/request.ts";
import type { RequestData } from "../../src/request-data.ts";
import { emptyRequestData, getHeaderValues, withHeader } from "../../src/request-data.ts";

function anchored(overrides: Partial<RequestData> = {}): RequestData {
    return { ...emptyRequestData(), scheme: "https", host: "api.example.com", ...overrides };
}

describe("request", () => {
    describe("toURL()", () => {
        it("should percent-encode each path segment", () => {
            const url = toURL(anchored({ path: ["files", "a b/c"] }));
            assert.strictEqual(url.href, "https://api.example.com/files/a%20b%2Fc");
        });

        it("should append multi-valued query parameters", () => {
            const url = toURL(anchored({ path: ["items"], query: { tag: ["a", "b"], q: ["x y"] } }));
            assert.strictEqual(url.href, "https://api.example.com/items?tag=a&tag=b&q=x+y");
        });

        it("should include an explicit port", () => {
            const url = toURL(anchored({ scheme: "http", host: "localhost", port: 8080 }));
            assert.strictEqual(url.href, "http://localhost:8080/");
        });

        for (const segment of ["", ".", ".."]) {
            it(`should reject the path segment ${JSON.stringify(segment)}`, () => {
                assert.throws(
                    () => toURL(anchored({ path: ["v1", "users", segment] })),
                    (err: unknown) => {
                        assert.ok(err instanceof RequestConstructionError);
                        assert.strictEqual(err.rawMessage, `Path segment ${JSON.stringify(segment)} cannot be sent; URL parsing would drop or resolve it`);
                        return true;
                    },
                );
            });
        }

        it("should keep other dot-only segments", () => {
            assert.strictEqual(toURL(anchored({ path: ["files", "...", ".env"] })).href, "https://api.example.com/files/.../.env");
        });

        it("should reject request data without host", () => {
            assert.throws(() => toURL(emptyRequestData()), RequestConstructionError);
        });

        it("should reject an invalid host", () => {
            assert.throws(() => toURL(anchored({ host: "exa mple.com" })), RequestConstructionError);
        });
    });

    describe("toRequest()", () => {
        it("should carry method, URL and headers", () => {
            const request = toRequest(withHeader(anchored({ method: "DELETE", path: ["users", "42"] }), "Authorization", ["Bearer T"]));

            assert.strictEqual(request.method, "DELETE");
            assert.strictEqual(request.url, "https://api.example.com/users/42");
            assert.strictEqual(request.headers.get("authorization"), "Bearer T");
        });

        it("should carry the body", async () => {
            const request = toRequest(anchored({ method: "POST", body: new TextEncoder().encode('{"name":"x"}') }));
            assert.strictEqual(await request.text(), '{"name":"x"}');
        });

        it("should reject header values with line breaks", () => {
            const data = withHeader(anchored(), "Authorization", ["Bearer a\nb"]);

            assert.throws(
                () => toRequest(data),
                (err: unknown) => {
                    assert.ok(err instanceof RequestConstructionError);
                    assert.ok(err.cause instanceof TypeError);
                    return true;
                },
            );
        });

        it("should reject a body on GET", () => {
            assert.throws(() => toRequest(anchored({ body: new Uint8Array([1]) })), RequestConstructionError);
        });
    });

    describe("toRequestData()", () => {
        it("should split URL, query and headers", () => {
            const data = toRequestData({
                method: "get",
                url: "https://api.example.com/v1/users/42?expand=profile&expand=teams",
                headers: new Headers({ Authorization: "Bearer T" }),
            });

            assert.strictEqual(data.method, "GET");
            assert.strictEqual(data.scheme, "https");
            assert.strictEqual(data.host, "api.example.com");
            assert.strictEqual(data.port, undefined);
            assert.deepStrictEqual(data.path, ["v1", "users", "42"]);
            assert.deepStrictEqual(data.query, { expand: ["profile", "teams"] });
            assert.deepStrictEqual(data.headers, { authorization: ["Bearer T"] });
            assert.strictEqual(data.body, undefined);
        });

        it("should decode escaped path segments", () => {
            const data = toRequestData({ method: "GET", url: "https://api.example.com/files/a%20b%2Fc" });
            assert.deepStrictEqual(data.path, ["files", "a b/c"]);
        });

        it("should reject a relative URL", () => {
            assert.throws(() => toRequestData({ method: "GET", url: "/users" }), RequestConstructionError);
        });
    });

    describe("fromRequest()", () => {
        it("should read the body", async () => {
            const request = new Request("https://api.example.com/items", {
                method: "POST",
                body: "hello",
                headers: { "content-type": "text/plain" },
            });

            const data = await fromRequest(request);

            assert.strictEqual(data.method, "POST");
            assert.deepStrictEqual(data.path, ["items"]);
            assert.deepStrictEqual(getHeaderValues(data, "Content-Type"), ["text/plain"]);
            assert.ok(data.body);
            assert.strictEqual(new TextDecoder().decode(data.body), "hello");
        });

        it("should leave body undefined for GET", async () => {
            const data = await fromRequest(new Request("https://api.example.com/"));
            assert.strictEqual(data.body, undefined);
        });

        it("should round-trip with toRequest", async () => {
            const original = withHeader(anchored({ method: "PUT", path: ["a", "b c"], query: { k: ["v"] }, body: new Uint8Array([1, 2, 3]) }), "x-trace", ["abc"]);

            const restored = await fromRequest(toRequest(original));

            assert.deepStrictEqual(restored.path, original.path);
            assert.deepStrictEqual(restored.query, original.query);
            assert.deepStrictEqual(getHeaderValues(restored, "X-Trace"), ["abc"]);
            assert.deepStrictEqual(restored.body, new Uint8Array([1, 2, 3]));
        });
    });

    describe("requestFor()", () => {
        const apiKeyCodec: RequestCodec<string> = {
            encode: (key, into = emptyRequestData()) => withHeader(into, "X-Api-Key", [key]),
            decode: (data) => getHeaderValues(data, "X-Api-Key")[0] ?? "",
        };

        it("should anchor the value at the base URL", () => {
            const request = requestFor(apiKeyCodec, "key-1", "https://api.example.com/v1/");

            assert.strictEqual(request.url, "https://api.example.com/v1");
            assert.strictEqual(request.headers.get("x-api-key"), "key-1");
        });

        it("should wrap codec failures in EncodeError", () => {
            const failing: RequestCodec<string> = {
                encode: () => {
                    throw new Error("cannot print");
                },
                decode: () => "",
            };

            assert.throws(() => requestFor(failing, "x", "https://api.example.com"), EncodeError);
        });
    });
});
