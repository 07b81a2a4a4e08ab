/**
 * gcp-auth-core - Google Cloud credential discovery and shared bearer tokens
 *
 * Detects credentials (emulator, service account key, metadata server, gcloud
 * CLI, application-default credentials), keeps one always-valid token per
 * handle and injects it into outgoing requests.
 */

export { Auth, AuthBuilder, type AuthOptions, type ScopesInput } from './auth.ts';
export { type DetectedProvider, type DetectOptions, detectProvider } from './detect.ts';
export { AuthError, type AuthErrorKind, type AuthErrorOptions, extractErrorMessage, isFatal, isFatalStatus, ServiceError } from './lib/errors.ts';
export { computeBackoff, type RetryPolicy, refreshWithRetries, type TokenAttempt } from './lib/refresh-driver.ts';
export { Scope, type ScopeUri, Scopes } from './lib/scopes.ts';
export { EMULATOR_TOKEN, REFRESH_SKEW_MS, Token } from './lib/token.ts';
export { TokenCache, type TokenCacheOptions, type TokenCacheState } from './lib/token-cache.ts';
export { ApplicationDefaultProvider, type ApplicationDefaultOptions, AuthorizedUserCredentials, ImpersonatedCredentials } from './providers/application-default.ts';
export { EmulatorProvider } from './providers/emulator.ts';
export { execFileRunner, GCloudProvider, type GCloudOptions } from './providers/gcloud.ts';
export { MetadataServerProvider, type MetadataServerOptions, type PendingToken } from './providers/metadata.ts';
export { getProviderToken, type Provider, type ProviderKind, requiresScopes } from './providers/provider.ts';
export { ScopedProvider } from './providers/scoped.ts';
export { type ServiceAccountOptions, ServiceAccountProvider } from './providers/service-account.ts';
export * as schemas from './schemas/index.ts';
export { AuthService, type AuthServiceOptions, authLayer } from './service/auth-service.ts';
export { type AuthorizedFetchOptions, type AuthServiceStackOptions, attachHeaders, authorizedFetch, buildAuthService, composeLayers, googRequestParams, type HeaderValue, userAgent, userProject } from './service/headers.ts';
export { type AuthConfig, parseConfig } from './setup/config.ts';
export * from './types.ts';
