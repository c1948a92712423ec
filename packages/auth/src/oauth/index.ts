export {
  authorizeWithBrowser,
  beginAuthorization,
  buildAuthorizationUrl,
} from './authorization-flow';
export { CallbackListener } from './callback-listener';
export { escapeHtml, renderCallbackPage } from './callback-pages';
export { getTokenErrorHint, isKnownTokenErrorCode } from './error-hints';
export { createJwtAssertion, signAssertion } from './jwt-signer';
export {
  consumePKCEAttempt,
  createPKCEAttempt,
  generateCodeVerifier,
  verifyPKCEChallenge,
} from './pkce';
export { encodeGrant, TokenExchanger, tokenEndpoint } from './token-exchanger';
export { JWT_BEARER_GRANT_TYPE } from './types';

export type {
  AuthorizationRequest,
  BrowserAuthorizationOptions,
  BrowserOpener,
} from './authorization-flow';
export type {
  CallbackFailure,
  CallbackListenerOptions,
  CallbackParams,
  CallbackResult,
  ListenerState,
} from './callback-listener';
export type { CallbackPage } from './callback-pages';
export type { KnownTokenErrorCode } from './error-hints';
export type { AssertionOptions } from './jwt-signer';
export type { PKCEAttemptOptions } from './pkce';
export type { TokenExchangerOptions } from './token-exchanger';
export type {
  AuthorizationCodeGrant,
  ExchangedToken,
  JwtBearerGrant,
  OAuthErrorResponse,
  OAuthTokenResponse,
  PKCEAttempt,
  RefreshTokenGrant,
  TokenExchangeFailure,
  TokenGrant,
  TokenRecord,
  TokenResult,
} from './types';
