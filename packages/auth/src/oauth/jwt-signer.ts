/**
 * @file RS256 bearer assertions per RFC 7523
 *
 * an assertion is minted for every exchange and never cached; any failure to
 * sign is a configuration defect and is thrown rather than reported
 */

import { createPrivateKey } from 'node:crypto';
import { readFile } from 'node:fs/promises';

import { SignJWT } from 'jose';

import { MS_PER_SECOND } from '@forcelink/core';

import { canonicalHost, ENV_VARIABLES } from '#config';
import {
  DEFAULT_ASSERTION_LIFETIME_SECONDS,
  MAX_ASSERTION_LIFETIME_SECONDS,
} from '#constants/oauth';
import { AssertionSigningError, ConfigIncompleteError } from '#errors';

import type { KeyObject } from 'node:crypto';

import type { Log } from '@forcelink/core';

import type { AuthConfig } from '#config';

/** inputs of a single assertion */
export interface AssertionOptions {
  /** consumer key of the connected app */
  issuer: string;
  /** username the token is issued for */
  subject: string;
  /** canonical login host */
  audience: string;
  /** path of a PKCS#1 or PKCS#8 PEM private key */
  privateKeyPath: string;
  keyId?: string;
  /** defaults to 180 seconds, at most 300 */
  lifetimeSeconds?: number;
  /** current time in epoch milliseconds */
  now?: number;
}

/**
 * reads and parses a PEM private key
 * @param privateKeyPath path of the key file
 * @returns parsed key
 * @throws {AssertionSigningError} when the file is unreadable or not a private key
 */
async function readPrivateKey(privateKeyPath: string): Promise<KeyObject> {
  let pem: string;

  try {
    pem = await readFile(privateKeyPath, 'utf-8');
  } catch (exception) {
    throw new AssertionSigningError(
      `Cannot read the JWT private key at ${privateKeyPath}. Check ${ENV_VARIABLES.privateKeyPath}`,
      { cause: exception },
    );
  }

  try {
    return createPrivateKey(pem);
  } catch (exception) {
    throw new AssertionSigningError(
      `The file at ${privateKeyPath} is not a valid PEM private key`,
      { cause: exception },
    );
  }
}

/**
 * signs a short-lived bearer assertion
 * @param options claims, key location and lifetime
 * @returns compact serialized assertion
 * @throws {AssertionSigningError} when the key cannot be used or the lifetime is out of range
 * @example
 * ```typescript
 * const assertion = await signAssertion({
 *   issuer: config.consumerKey,
 *   subject: 'integration@example.com',
 *   audience: 'https://login.salesforce.com',
 *   privateKeyPath: '/etc/forcelink/server.key',
 * });
 * ```
 */
export async function signAssertion(options: AssertionOptions): Promise<string> {
  const {
    issuer,
    subject,
    audience,
    privateKeyPath,
    keyId,
    lifetimeSeconds = DEFAULT_ASSERTION_LIFETIME_SECONDS,
    now = Date.now(),
  } = options;

  if (
    !Number.isInteger(lifetimeSeconds) ||
    lifetimeSeconds < 1 ||
    lifetimeSeconds > MAX_ASSERTION_LIFETIME_SECONDS
  ) {
    throw new AssertionSigningError(
      `JWT assertion lifetime must be between 1 and ${MAX_ASSERTION_LIFETIME_SECONDS} seconds, got ${lifetimeSeconds}`,
    );
  }

  const key = await readPrivateKey(privateKeyPath);

  if (key.asymmetricKeyType !== 'rsa') {
    throw new AssertionSigningError(
      `The key at ${privateKeyPath} is a ${key.asymmetricKeyType ?? 'non-asymmetric'} key, RS256 requires an RSA key`,
    );
  }

  const issuedAt = Math.floor(now / MS_PER_SECOND);

  try {
    return await new SignJWT(keyId ? { kid: keyId } : {})
      .setProtectedHeader({
        alg: 'RS256',
        typ: 'JWT',
        ...(keyId ? { kid: keyId } : {}),
      })
      .setIssuer(issuer)
      .setSubject(subject)
      .setAudience(audience)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + lifetimeSeconds)
      .sign(key);
  } catch (exception) {
    throw new AssertionSigningError(
      `Failed to sign the JWT assertion with the key at ${privateKeyPath}`,
      { cause: exception },
    );
  }
}

/**
 * mints an assertion for the configured account, audience is the canonical host
 * @param config credential configuration
 * @param options extra signing options
 * @param options.lifetimeSeconds assertion lifetime
 * @param options.now current time in epoch milliseconds
 * @param options.log optional logging function
 * @returns compact serialized assertion
 * @throws {ConfigIncompleteError} when the subject or key path is missing
 * @throws {AssertionSigningError} when signing fails
 */
export async function createJwtAssertion(
  config: AuthConfig,
  options: { lifetimeSeconds?: number; now?: number; log?: Log } = {},
): Promise<string> {
  const { jwtSubject, privateKeyPath } = config;

  if (!jwtSubject || !privateKeyPath) {
    throw new ConfigIncompleteError([
      ...(jwtSubject ? [] : [ENV_VARIABLES.jwtSubject]),
      ...(privateKeyPath ? [] : [ENV_VARIABLES.privateKeyPath]),
    ]);
  }

  const audience = canonicalHost(config.environment);
  const assertion = await signAssertion({
    issuer: config.consumerKey,
    subject: jwtSubject,
    audience,
    privateKeyPath,
    keyId: config.keyId,
    lifetimeSeconds: options.lifetimeSeconds,
    now: options.now,
  });

  options.log?.('debug', 'signed jwt assertion', {
    subject: jwtSubject,
    audience,
    hasKeyId: !!config.keyId,
  });

  return assertion;
}
