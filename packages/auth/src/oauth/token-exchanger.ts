/**
 * @file grant exchanges against the token endpoint
 *
 * the endpoint always lives on the canonical login host of the environment,
 * custom domains used for authorization frequently refuse token requests;
 * every outcome is reported as a Result and nothing is thrown
 */

import { Ajv } from 'ajv';
import { fetch } from 'undici';

import {
  describeSecret,
  err,
  jsonifyError,
  MS_PER_SECOND,
  ok,
} from '@forcelink/core';

import { canonicalHost } from '#config';
import { HTTP_STATUS_OK, TOKEN_REQUEST_TIMEOUT_MS } from '#constants/http';
import { DEFAULT_EXPIRES_IN_SECONDS, TOKEN_PATH } from '#constants/oauth';
import { TokenExchangeHTTPError, TokenExchangeNetworkError } from '#errors';
import { DEFAULT_MAX_RETRIES, retry } from '#retry';

import { getTokenErrorHint } from './error-hints';
import { JWT_BEARER_GRANT_TYPE } from './types';

import type { Log } from '@forcelink/core';
import type { SchemaObject } from 'ajv';
import type { Dispatcher } from 'undici';

import type { AuthConfig, Environment } from '#config';
import type { RetryOptions } from '#retry';

import type {
  AuthorizationCodeGrant,
  ExchangedToken,
  JwtBearerGrant,
  OAuthErrorResponse,
  OAuthTokenResponse,
  RefreshTokenGrant,
  TokenGrant,
  TokenResult,
} from './types';

/** options for the token exchanger */
export interface TokenExchangerOptions {
  /** credential configuration selecting client and environment */
  config: AuthConfig;
  /** per request timeout in milliseconds, defaults to 30 seconds */
  timeoutMs?: number;
  /** retries of network failures for replayable grants */
  maxRetries?: number;
  /** delay between retries */
  retryDelay?: RetryOptions['retryDelay'];
  /** undici dispatcher, defaults to the global one */
  dispatcher?: Dispatcher;
  /** clock in epoch milliseconds */
  now?: () => number;
  /** optional logging function */
  log?: Log;
}

/** raw response read from the token endpoint */
interface RawResponse {
  status: number;
  body: string;
}

const ajv = new Ajv();

const validateTokenResponse = ajv.compile<OAuthTokenResponse>({
  type: 'object',
  properties: {
    access_token: { type: 'string', minLength: 1 },
    token_type: { type: 'string' },
    expires_in: { type: 'number' },
    refresh_token: { type: 'string' },
    instance_url: { type: 'string' },
    scope: { type: 'string' },
    id: { type: 'string' },
    issued_at: { type: 'string' },
  },
  required: ['access_token'],
} satisfies SchemaObject);

const validateErrorResponse = ajv.compile<OAuthErrorResponse>({
  type: 'object',
  properties: {
    error: { type: 'string', minLength: 1 },
    error_description: { type: 'string' },
  },
  required: ['error'],
} satisfies SchemaObject);

/**
 * resolves the token endpoint of an environment
 * @param environment production or sandbox
 * @returns token endpoint url on the canonical host
 */
export function tokenEndpoint(environment: Environment): string {
  return `${canonicalHost(environment)}${TOKEN_PATH}`;
}

/**
 * encodes a grant as a form body
 * @param grant grant to encode
 * @returns form parameters in the provider's field names
 */
export function encodeGrant(grant: TokenGrant): URLSearchParams {
  const params = new URLSearchParams({ grant_type: grant.grantType });

  switch (grant.grantType) {
    case 'authorization_code':
      params.set('client_id', grant.clientId);
      params.set('code', grant.code);
      params.set('redirect_uri', grant.redirectUri);
      params.set('code_verifier', grant.codeVerifier);
      break;
    case 'refresh_token':
      params.set('client_id', grant.clientId);
      params.set('refresh_token', grant.refreshToken);
      break;
    case JWT_BEARER_GRANT_TYPE:
      params.set('assertion', grant.assertion);
      break;
  }

  if ('clientSecret' in grant && grant.clientSecret) {
    params.set('client_secret', grant.clientSecret);
  }

  return params;
}

/**
 * names a grant for log messages
 * @param grant grant being exchanged
 * @returns short label
 */
function grantLabel(grant: TokenGrant): string {
  return grant.grantType === JWT_BEARER_GRANT_TYPE
    ? 'jwt_bearer'
    : grant.grantType;
}

/**
 * parses json without throwing
 * @param text raw body
 * @returns parsed value, undefined when the body is not json
 */
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // non-json bodies are classified by the caller
    return undefined;
  }
}

/**
 * performs grant exchanges against the canonical token endpoint
 * @example
 * ```typescript
 * const exchanger = new TokenExchanger({ config, log });
 * const result = await exchanger.exchange(
 *   exchanger.refreshTokenGrant(record.refreshToken),
 * );
 *
 * if (!result.success) {
 *   console.error(result.error.message);
 * }
 * ```
 */
export class TokenExchanger {
  #config: AuthConfig;
  #endpoint: string;
  #timeoutMs: number;
  #maxRetries: number;
  #retryDelay?: RetryOptions['retryDelay'];
  #dispatcher?: Dispatcher;
  #now: () => number;
  #log?: Log;

  /**
   * creates a token exchanger
   * @param options exchanger configuration
   */
  constructor(options: TokenExchangerOptions) {
    this.#config = options.config;
    this.#endpoint = tokenEndpoint(options.config.environment);
    this.#timeoutMs = options.timeoutMs ?? TOKEN_REQUEST_TIMEOUT_MS;
    this.#maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.#retryDelay = options.retryDelay;
    this.#dispatcher = options.dispatcher;
    this.#now = options.now ?? Date.now;
    this.#log = options.log;
  }

  /** token endpoint every grant is posted to */
  public get endpoint(): string {
    return this.#endpoint;
  }

  /**
   * builds the authorization code grant of a completed browser redirect
   * @param code authorization code from the redirect
   * @param redirectUri redirect uri sent with the authorization request
   * @param codeVerifier verifier of the consumed pkce attempt
   * @returns grant, with the consumer secret when the client authenticates with one
   */
  public authorizationCodeGrant(
    code: string,
    redirectUri: string,
    codeVerifier: string,
  ): AuthorizationCodeGrant {
    return {
      grantType: 'authorization_code',
      clientId: this.#config.consumerKey,
      code,
      redirectUri,
      codeVerifier,
      ...this.#clientSecret(),
    };
  }

  /**
   * builds a refresh token grant
   * @param refreshToken stored refresh token
   * @returns grant, with the consumer secret when the client authenticates with one
   */
  public refreshTokenGrant(refreshToken: string): RefreshTokenGrant {
    return {
      grantType: 'refresh_token',
      clientId: this.#config.consumerKey,
      refreshToken,
      ...this.#clientSecret(),
    };
  }

  /**
   * builds a jwt bearer grant
   * @param assertion freshly signed assertion
   * @returns grant
   */
  public jwtBearerGrant(assertion: string): JwtBearerGrant {
    return { grantType: JWT_BEARER_GRANT_TYPE, assertion };
  }

  /**
   * exchanges a grant for tokens
   *
   * network failures of refresh and jwt bearer grants are retried, an
   * authorization code is single use and is sent once
   * @param grant grant to exchange
   * @returns the exchanged token or a classified failure
   */
  public async exchange(grant: TokenGrant): Promise<TokenResult> {
    const label = grantLabel(grant);
    const body = encodeGrant(grant).toString();

    this.#log?.('debug', 'exchanging grant at token endpoint', {
      grantType: label,
      endpoint: this.#endpoint,
      clientSecret: describeSecret(
        'clientSecret' in grant ? grant.clientSecret : undefined,
      ),
    });

    let response: RawResponse;

    try {
      response = await retry(
        async ({ abortSignal }) => this.#post(body, abortSignal),
        {
          name: `${label} exchange`,
          maxRetries:
            grant.grantType === 'authorization_code' ? 0 : this.#maxRetries,
          timeout: this.#timeoutMs,
          retryDelay: this.#retryDelay,
          log: this.#log,
        },
      );
    } catch (exception) {
      this.#log?.('error', 'token endpoint unreachable', {
        grantType: label,
        endpoint: this.#endpoint,
        error: jsonifyError(exception),
      });

      return err(new TokenExchangeNetworkError(this.#endpoint, exception));
    }

    return response.status === HTTP_STATUS_OK
      ? this.#parseSuccess(label, response)
      : err(this.#classifyFailure(label, response));
  }

  /**
   * posts a form body to the token endpoint
   * @param body encoded form
   * @param signal abort signal of the attempt
   * @returns status and raw body
   */
  async #post(body: string, signal: AbortSignal): Promise<RawResponse> {
    const response = await fetch(this.#endpoint, {
      method: 'POST',
      headers: {
        'content-type': 'application/x-www-form-urlencoded',
        accept: 'application/json',
      },
      body,
      signal,
      ...(this.#dispatcher ? { dispatcher: this.#dispatcher } : {}),
    });

    return { status: response.status, body: await response.text() };
  }

  /**
   * normalizes a successful response
   * @param label grant label for logging
   * @param response raw response
   * @returns exchanged token, or an invalid_response failure
   */
  #parseSuccess(label: string, response: RawResponse): TokenResult {
    const payload = parseJson(response.body);

    if (!validateTokenResponse(payload)) {
      return err(
        this.#classifyFailure(label, response, {
          code: 'invalid_response',
          description: 'The token endpoint returned no access token',
        }),
      );
    }

    const expiresIn = payload.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;

    if (expiresIn <= 0) {
      return err(
        this.#classifyFailure(label, response, {
          code: 'invalid_response',
          description: `The token endpoint returned a non-positive expires_in of ${expiresIn}`,
        }),
      );
    }

    const issuedAt = this.#now();
    const token: ExchangedToken = {
      accessToken: payload.access_token,
      ...(payload.refresh_token ? { refreshToken: payload.refresh_token } : {}),
      ...(payload.instance_url ? { instanceUrl: payload.instance_url } : {}),
      issuedAt,
      expiresAt: issuedAt + expiresIn * MS_PER_SECOND,
      ...(payload.token_type ? { tokenType: payload.token_type } : {}),
      ...(payload.scope ? { scope: payload.scope } : {}),
    };

    this.#log?.('info', 'token exchange succeeded', {
      grantType: label,
      hasRefreshToken: !!token.refreshToken,
      instanceUrl: token.instanceUrl,
      expiresAt: new Date(token.expiresAt).toISOString(),
    });

    return ok(token);
  }

  /**
   * classifies a failed response
   * @param label grant label for logging
   * @param response raw response
   * @param fallback code and description used when the body carries no error
   * @param fallback.code provider style error code
   * @param fallback.description description of the problem
   * @returns http error with the remediation hint of the code
   */
  #classifyFailure(
    label: string,
    response: RawResponse,
    fallback?: { code: string; description: string },
  ): TokenExchangeHTTPError {
    const payload = parseJson(response.body);
    const parsed = validateErrorResponse(payload) ? payload : undefined;

    const code = fallback?.code ?? parsed?.error ?? 'unknown_error';
    const description = fallback?.description ?? parsed?.error_description;

    const error = new TokenExchangeHTTPError({
      status: response.status,
      body: response.body,
      code,
      description,
      hint: getTokenErrorHint(code),
    });

    this.#log?.('warn', 'token exchange failed', {
      grantType: label,
      status: response.status,
      code,
      description,
    });

    return error;
  }

  /**
   * resolves the secret sent along with client credentials
   * @returns the consumer secret when the client authenticates with one
   */
  #clientSecret(): { clientSecret?: string } {
    const { clientAuth, consumerSecret } = this.#config;

    return clientAuth === 'client_secret' && consumerSecret
      ? { clientSecret: consumerSecret }
      : {};
  }
}
