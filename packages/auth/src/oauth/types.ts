import type { TokenExchangeHTTPError, TokenExchangeNetworkError } from '#errors';

import type { Result } from '@forcelink/core';

/** grant type identifier of the jwt bearer flow per RFC 7523 */
export const JWT_BEARER_GRANT_TYPE =
  'urn:ietf:params:oauth:grant-type:jwt-bearer';

/**
 * token endpoint response per RFC 6749 section 5.1 plus the provider's
 * `instance_url` extension
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface OAuthTokenResponse {
  /** access token issued by the authorization server */
  access_token: string;

  /** token type, normally "Bearer" */
  token_type?: string;

  /** lifetime in seconds of the access token */
  expires_in?: number;

  /** refresh token, absent for the jwt bearer grant */
  refresh_token?: string;

  /** base url of the instance the token is bound to */
  instance_url?: string;

  /** space separated scopes granted */
  scope?: string;

  /** identity url of the authenticated user */
  id?: string;

  /** issue time in epoch milliseconds as a string */
  issued_at?: string;
}

/** error response per RFC 6749 section 5.2 */
export interface OAuthErrorResponse {
  /** error code */
  error: string;

  /** human readable description */
  error_description?: string;
}
/* eslint-enable @typescript-eslint/naming-convention */

/** authorization code grant form parameters */
export interface AuthorizationCodeGrant {
  grantType: 'authorization_code';
  clientId: string;
  code: string;
  redirectUri: string;
  codeVerifier: string;
  /** only sent when the client authenticates with a secret */
  clientSecret?: string;
}

/** refresh token grant form parameters */
export interface RefreshTokenGrant {
  grantType: 'refresh_token';
  clientId: string;
  refreshToken: string;
  clientSecret?: string;
}

/** jwt bearer grant form parameters */
export interface JwtBearerGrant {
  grantType: typeof JWT_BEARER_GRANT_TYPE;
  /** freshly minted signed assertion, never reused */
  assertion: string;
}

/** any grant the token exchanger can perform */
export type TokenGrant =
  | AuthorizationCodeGrant
  | RefreshTokenGrant
  | JwtBearerGrant;

/** normalized outcome of a successful token exchange */
export interface ExchangedToken {
  accessToken: string;
  refreshToken?: string;
  /** absent when the provider omits it, e.g. on some refresh responses */
  instanceUrl?: string;
  /** epoch milliseconds */
  issuedAt: number;
  /** epoch milliseconds, always after issuedAt */
  expiresAt: number;
  tokenType?: string;
  scope?: string;
}

/** failure reported by a token exchange */
export type TokenExchangeFailure =
  | TokenExchangeHTTPError
  | TokenExchangeNetworkError;

/** reported outcome of a token exchange */
export type TokenResult = Result<ExchangedToken, TokenExchangeFailure>;

/**
 * persisted credential record
 *
 * created on a successful exchange, updated in place on refresh and cleared on
 * logout or irrecoverable expiry
 */
export interface TokenRecord {
  accessToken: string;
  refreshToken?: string;
  instanceUrl: string;
  /** epoch milliseconds */
  issuedAt: number;
  /** epoch milliseconds */
  expiresAt: number;
}

/** single-use state of one browser authorization attempt */
export interface PKCEAttempt {
  codeVerifier: string;
  codeChallenge: string;
  stateNonce: string;
  redirectUri: string;
  port: number;
  /** epoch milliseconds after which the attempt can no longer be used */
  deadline: number;
  consumed: boolean;
}
