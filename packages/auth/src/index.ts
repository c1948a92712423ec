export * from '#oauth/index';

export { AuthCache } from '#auth-cache';
export {
  authorizeHost,
  canonicalHost,
  createAuthConfig,
  DEFAULT_SERVICE_ID,
  ENV_VARIABLES,
  loadAuthConfig,
} from '#config';
export {
  AssertionSigningError,
  AuthError,
  BrowserLaunchFailedError,
  CallbackMalformedError,
  CallbackProviderError,
  CallbackTimeoutError,
  ConfigIncompleteError,
  ReauthenticationRequiredError,
  TokenExchangeHTTPError,
  TokenExchangeNetworkError,
} from '#errors';
export { createLoggerConfig } from '#logging';
export { NonRetryableError, retry } from '#retry';
export { CredentialStore, KEYCHAIN_ACCOUNTS } from '#store/credential-store';
export { loadKeyring } from '#store/keychain';
export {
  EXPIRATION_BUFFER_MS,
  TokenLifecycleManager,
} from '#token-lifecycle-manager';

export type { AuthContext } from '#auth-cache';
export type {
  AuthConfig,
  AuthConfigInput,
  AuthMethod,
  ClientAuth,
  Environment,
} from '#config';
export type {
  AuthErrorKind,
  AuthFailure,
  AuthorizationFailure,
} from '#errors';
export type { RetryOptions } from '#retry';
export type {
  CredentialSource,
  CredentialStoreOptions,
} from '#store/credential-store';
export type { KeychainAdapter, KeychainLoader } from '#store/keychain';
export type {
  AssertionFactory,
  Authorizer,
  TokenChangeListener,
  TokenLifecycleManagerOptions,
  TokenStore,
  ValidTokenResult,
} from '#token-lifecycle-manager';
