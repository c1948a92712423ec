/**
 * @file proof key for code exchange per RFC 7636
 *
 * one attempt holds the verifier, its S256 challenge and the state nonce of a
 * single browser authorization; it can be consumed exactly once
 */

import { randomBytes, timingSafeEqual } from 'node:crypto';

import { CALLBACK_TIMEOUT_MS } from '#constants/oauth';

import type { PKCEAttempt } from './types';

/** random bytes behind each verifier, encoding to 128 base64url characters */
export const CODE_VERIFIER_BYTES = 96;

/** verifier length bounds per RFC 7636 section 4.1 */
const MIN_VERIFIER_LENGTH = 43;
const MAX_VERIFIER_LENGTH = 128;

/** options for a new authorization attempt */
export interface PKCEAttemptOptions {
  /** redirect uri registered with the listener */
  redirectUri: string;
  /** port the listener is bound to */
  port: number;
  /** how long the attempt stays usable in milliseconds */
  lifetimeMs?: number;
  /** current time in epoch milliseconds */
  now?: number;
}

/**
 * generates a high entropy url-safe code verifier
 * @returns base64url encoded verifier
 */
export function generateCodeVerifier(): string {
  return randomBytes(CODE_VERIFIER_BYTES).toString('base64url');
}

/**
 * creates the single-use state of one browser authorization
 * @param options redirect target and timing of the attempt
 * @returns a fresh, unconsumed attempt
 * @example
 * ```typescript
 * const attempt = await createPKCEAttempt({
 *   redirectUri: 'http://localhost:8080/callback',
 *   port: 8080,
 * });
 * ```
 */
export async function createPKCEAttempt(
  options: PKCEAttemptOptions,
): Promise<PKCEAttempt> {
  const { calculatePKCECodeChallenge, randomState } = await import(
    'openid-client'
  );

  const {
    redirectUri,
    port,
    lifetimeMs = CALLBACK_TIMEOUT_MS,
    now = Date.now(),
  } = options;

  const codeVerifier = generateCodeVerifier();

  return {
    codeVerifier,
    codeChallenge: await calculatePKCECodeChallenge(codeVerifier),
    stateNonce: randomState(),
    redirectUri,
    port,
    deadline: now + lifetimeMs,
    consumed: false,
  };
}

/**
 * recomputes the S256 challenge of a verifier and compares it in constant time
 * @param codeVerifier verifier presented at the token endpoint
 * @param codeChallenge challenge sent with the authorization request
 * @returns true when the verifier produces the challenge
 */
export async function verifyPKCEChallenge(
  codeVerifier: string,
  codeChallenge: string,
): Promise<boolean> {
  if (
    codeVerifier.length < MIN_VERIFIER_LENGTH ||
    codeVerifier.length > MAX_VERIFIER_LENGTH
  ) {
    return false;
  }

  const { calculatePKCECodeChallenge } = await import('openid-client');

  const expected = Buffer.from(await calculatePKCECodeChallenge(codeVerifier));
  const actual = Buffer.from(codeChallenge);

  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

/**
 * marks an attempt as used and hands out its verifier
 * @param attempt attempt to consume
 * @param now current time in epoch milliseconds
 * @returns the code verifier for the token exchange
 * @throws {Error} when the attempt was already consumed or has expired
 */
export function consumePKCEAttempt(
  attempt: PKCEAttempt,
  now: number = Date.now(),
): string {
  if (attempt.consumed) {
    throw new Error('PKCE attempt has already been used for a token exchange');
  }

  // consumed either way, an expired attempt is never retried
  attempt.consumed = true;

  if (now >= attempt.deadline) {
    throw new Error(
      `PKCE attempt expired at ${new Date(attempt.deadline).toISOString()}`,
    );
  }

  return attempt.codeVerifier;
}
