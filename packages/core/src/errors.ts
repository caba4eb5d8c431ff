/**
 * Keyway error taxonomy
 *
 * Every failure is a ConnectError so it maps onto an RPC status code when
 * it crosses a service boundary, and implements the SanitizableError
 * protocol so only a safe message reaches remote callers.
 *
 * @module errors
 */

import { Code, ConnectError } from "@connectrpc/connect";

/**
 * Sanitizable error interface.
 *
 * Errors implementing this protocol carry rich server-side details
 * but expose only a safe message to clients.
 */
export interface SanitizableError {
    readonly clientMessage: string;
    readonly serverDetails: Readonly<Record<string, unknown>>;
}

/**
 * Type guard for SanitizableError.
 *
 * Checks if the value is an object with clientMessage (string) and
 * serverDetails (non-null object) properties, plus a numeric code.
 */
export function isSanitizableError(err: unknown): err is Error & SanitizableError & { code: number } {
    if (err == null || typeof err !== "object") return false;
    const candidate = err as Record<string, unknown>;
    return typeof candidate.clientMessage === "string" && typeof candidate.serverDetails === "object" && candidate.serverDetails !== null && typeof candidate.code === "number";
}

/**
 * Reasons a credential is rejected at construction time
 */
export const ValidationFailure = {
    EMPTY_TOKEN: "emptyToken",
    EMPTY_USERNAME: "emptyUsername",
    EMPTY_PASSWORD: "emptyPassword",
    INVALID_USERNAME: "invalidUsername",
    INVALID_PASSWORD: "invalidPassword",
    INVALID_EMAIL_ADDRESS: "invalidEmailAddress",
} as const;

export type ValidationFailure = (typeof ValidationFailure)[keyof typeof ValidationFailure];

/**
 * Reasons request data fails to decode
 */
export const DecodeFailure = {
    MISSING_HEADER: "missingHeader",
    PREFIX_MISMATCH: "prefixMismatch",
    MALFORMED_PAYLOAD: "malformedPayload",
    AUTHENTICATION_FAILED: "authenticationFailed",
    ROUTE_NOT_MATCHED: "routeNotMatched",
} as const;

export type DecodeFailure = (typeof DecodeFailure)[keyof typeof DecodeFailure];

/**
 * Message of an arbitrary thrown value, without the ConnectError code prefix.
 */
export function describeError(err: unknown): string {
    if (err instanceof ConnectError || err instanceof KeywayConnectError) return err.rawMessage;
    if (err instanceof Error) return err.message;
    return String(err);
}

/**
 * Base of the Keyway errors.
 *
 * `ConnectError` recognizes instances through `Symbol.hasInstance` by
 * prototype or by `name === "ConnectError"`, and subclasses inherit that
 * check. The name is left as "ConnectError" so `ConnectError.from()` and
 * `instanceof ConnectError` keep the code; `instanceof` on the subclasses
 * goes back to the prototype chain, and `kind` tells them apart.
 */
export abstract class KeywayConnectError extends ConnectError {
    abstract readonly kind: string;

    static override [Symbol.hasInstance](value: unknown): boolean {
        return Function.prototype[Symbol.hasInstance].call(this, value);
    }
}

/**
 * Credential rejected by a validating constructor.
 *
 * Never retried: the caller has to supply different input.
 */
export class CredentialValidationError extends KeywayConnectError implements SanitizableError {
    readonly kind = "validation";
    readonly clientMessage = "Invalid credentials";
    readonly reason: ValidationFailure;

    get serverDetails(): Readonly<Record<string, unknown>> {
        return { reason: this.reason };
    }

    constructor(reason: ValidationFailure, message: string) {
        super(message, Code.InvalidArgument);
        this.reason = reason;
    }
}

/**
 * Request data could not be decoded into a credential or route.
 *
 * Route mismatches map to Code.NotFound; every other reason is an
 * authentication failure (Code.Unauthenticated).
 */
export class DecodeError extends KeywayConnectError implements SanitizableError {
    readonly kind = "decode";
    readonly reason: DecodeFailure;

    get clientMessage(): string {
        return this.reason === DecodeFailure.ROUTE_NOT_MATCHED ? "Not found" : "Authentication required";
    }

    get serverDetails(): Readonly<Record<string, unknown>> {
        return {
            reason: this.reason,
            cause: this.cause === undefined ? undefined : describeError(this.cause),
        };
    }

    constructor(reason: DecodeFailure, message: string, cause?: unknown) {
        super(message, reason === DecodeFailure.ROUTE_NOT_MATCHED ? Code.NotFound : Code.Unauthenticated, undefined, undefined, cause);
        this.reason = reason;
    }
}

/**
 * A value could not be printed into request data.
 */
export class EncodeError extends KeywayConnectError implements SanitizableError {
    readonly kind = "encode";
    readonly clientMessage = "Request could not be encoded";

    get serverDetails(): Readonly<Record<string, unknown>> {
        return { cause: describeError(this.cause) };
    }

    constructor(message: string, cause: unknown) {
        super(message, Code.Internal, undefined, undefined, cause);
    }

    /**
     * Wrap a sub-encoder failure. An EncodeError passes through unchanged.
     */
    static wrap(err: unknown): EncodeError {
        if (err instanceof EncodeError) return err;
        return new EncodeError(`Encoding failed: ${describeError(err)}`, err);
    }
}

/**
 * Abstract request data could not be turned into a transport request
 * (missing host, invalid URL or header value, body on GET/HEAD).
 */
export class RequestConstructionError extends KeywayConnectError implements SanitizableError {
    readonly kind = "requestConstruction";
    readonly clientMessage = "Request could not be constructed";

    get serverDetails(): Readonly<Record<string, unknown>> {
        return { cause: this.cause === undefined ? undefined : describeError(this.cause) };
    }

    constructor(message: string, cause?: unknown) {
        super(message, Code.InvalidArgument, undefined, undefined, cause);
    }
}

export type KeywayError = CredentialValidationError | DecodeError | EncodeError | RequestConstructionError;

export function isKeywayError(err: unknown): err is KeywayError {
    return err instanceof CredentialValidationError || err instanceof DecodeError || err instanceof EncodeError || err instanceof RequestConstructionError;
}
