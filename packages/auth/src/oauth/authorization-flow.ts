/**
 * @file interactive authorization code flow with PKCE
 *
 * binds the loopback listener, sends the browser to the authorize host and
 * exchanges the returned code at the canonical token endpoint
 */

import open from 'open';

import { err, jsonifyError } from '@forcelink/core';

import { authorizeHost } from '#config';
import { AUTHORIZE_PATH } from '#constants/oauth';
import { BrowserLaunchFailedError, CallbackMalformedError } from '#errors';

import { CallbackListener } from './callback-listener';
import { consumePKCEAttempt, createPKCEAttempt } from './pkce';

import type { Log, Result } from '@forcelink/core';

import type { AuthConfig } from '#config';
import type { AuthorizationFailure } from '#errors';

import type { CallbackListenerOptions } from './callback-listener';
import type { TokenExchanger } from './token-exchanger';
import type { ExchangedToken, PKCEAttempt } from './types';

/** a prepared authorization: the url to visit and the state to complete it */
export interface AuthorizationRequest {
  authorizationUrl: string;
  attempt: PKCEAttempt;
  /** bound listener, owned by the caller until closed */
  listener: CallbackListener;
}

/** opens a url in the user's browser */
export type BrowserOpener = (url: string) => Promise<unknown>;

/** options for the browser flow */
export interface BrowserAuthorizationOptions extends CallbackListenerOptions {
  /** exchanger performing the authorization code grant */
  exchanger: TokenExchanger;
  /** defaults to the system browser through `open` */
  openBrowser?: BrowserOpener;
  log?: Log;
}

/**
 * builds the authorization url of an attempt
 * @param config credential configuration
 * @param attempt pkce attempt carrying challenge, state and redirect uri
 * @returns url on the authorize host
 */
export function buildAuthorizationUrl(
  config: AuthConfig,
  attempt: PKCEAttempt,
): string {
  const url = new URL(AUTHORIZE_PATH, authorizeHost(config));

  url.searchParams.set('response_type', 'code');
  url.searchParams.set('client_id', config.consumerKey);
  url.searchParams.set('redirect_uri', attempt.redirectUri);
  url.searchParams.set('scope', config.scope);
  url.searchParams.set('state', attempt.stateNonce);
  url.searchParams.set('code_challenge', attempt.codeChallenge);
  url.searchParams.set('code_challenge_method', 'S256');

  return url.toString();
}

/**
 * binds a listener and prepares a pkce attempt for it
 * @param config credential configuration
 * @param options listener options
 * @returns authorization url, attempt and bound listener
 * @throws {Error} when no callback port is free
 */
export async function beginAuthorization(
  config: AuthConfig,
  options: CallbackListenerOptions = {},
): Promise<AuthorizationRequest> {
  const listener = await CallbackListener.bind(options);
  const attempt = await createPKCEAttempt({
    redirectUri: listener.redirectUri,
    port: listener.port,
    lifetimeMs: options.timeoutMs,
  });

  return {
    authorizationUrl: buildAuthorizationUrl(config, attempt),
    attempt,
    listener,
  };
}

/**
 * runs the full browser flow and exchanges the resulting code
 * @param config credential configuration
 * @param options exchanger, browser launcher and listener options
 * @returns exchanged token, or the failure of whichever step stopped the flow
 * @throws {Error} when no callback port is free
 * @example
 * ```typescript
 * const result = await authorizeWithBrowser(config, {
 *   exchanger: new TokenExchanger({ config }),
 * });
 *
 * if (!result.success) {
 *   console.error(result.error.message);
 * }
 * ```
 */
export async function authorizeWithBrowser(
  config: AuthConfig,
  options: BrowserAuthorizationOptions,
): Promise<Result<ExchangedToken, AuthorizationFailure>> {
  const { exchanger, openBrowser = async (url) => open(url), log } = options;
  const { authorizationUrl, attempt, listener } = await beginAuthorization(
    config,
    options,
  );

  try {
    log?.('info', 'opening browser for authorization', {
      authorizeHost: authorizeHost(config),
      redirectUri: attempt.redirectUri,
    });

    try {
      await openBrowser(authorizationUrl);
    } catch (exception) {
      log?.('error', 'failed to open browser', {
        error: jsonifyError(exception),
      });

      return err(new BrowserLaunchFailedError(authorizationUrl, exception));
    }

    listener.markBrowserOpened();

    const callback = await listener.waitForCallback();

    if (!callback.success) {
      return callback;
    }

    const { code, state } = callback.value;

    if (state !== attempt.stateNonce) {
      log?.('warn', 'authorization callback state mismatch', {
        hasState: !!state,
      });

      return err(
        new CallbackMalformedError(
          'The authorization redirect carried an unexpected state. Restart sign-in from this application',
        ),
      );
    }

    let codeVerifier: string;

    try {
      codeVerifier = consumePKCEAttempt(attempt);
    } catch (exception) {
      return err(
        new CallbackMalformedError(
          exception instanceof Error ? exception.message : String(exception),
          { cause: exception },
        ),
      );
    }

    return await exchanger.exchange(
      exchanger.authorizationCodeGrant(code, attempt.redirectUri, codeVerifier),
    );
  } finally {
    await listener.close();
  }
}
