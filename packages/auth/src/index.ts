/**
 * @keyway/auth
 *
 * Typed HTTP Basic and Bearer credentials and authenticated request routing.
 *
 * Provides:
 * - BasicCredential / BearerCredential: validated, immutable credential values
 * - basicCredentialCodec / bearerCredentialCodec: header value codecs
 * - basicAuthRouter / bearerAuthRouter: Authorization header routers
 * - AuthenticatedCodec: credential + application route in one codec
 * - createCredentialAuthInterceptor(): server-side ConnectRPC authentication
 *
 * @module @keyway/auth
 * @mergeModuleWith <project>
 */

// Credentials
export { BasicCredential, basicCredentialCodec } from "./basic.ts";
export { BearerCredential, bearerCredentialCodec } from "./bearer.ts";
export { EmailAddress, EmailAddressSchema } from "./email.ts";
export { createSchemeCodec, stripSchemePrefix } from "./scheme.ts";

// Routing
export { AUTHORIZATION_HEADER, basicAuthRouter, bearerAuthRouter, createAuthorizationRouter } from "./header-router.ts";
export { authenticatedRoute, bearerAuthenticatedRoute, isSameAuthenticatedRoute } from "./authenticated-route.ts";
export { AuthenticatedCodec, createAuthenticatedCodec } from "./authenticated-codec.ts";

// Server-side authentication
export { createCredentialAuthInterceptor } from "./auth-interceptor.ts";
// Context management
export { credentialStorage, getCredential, requireCredential } from "./context.ts";

// Types and constants
export type { AuthenticatedCodecOptions, AuthenticatedRoute, Credential, CredentialAuthInterceptorOptions } from "./types.ts";

export { AuthScheme } from "./types.ts";
