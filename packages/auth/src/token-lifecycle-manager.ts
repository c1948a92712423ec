/**
 * @file token lifecycle of one logical account
 *
 * hands out access tokens that stay valid for at least the expiration
 * buffer, renewing them through refresh, the browser flow or the jwt bearer
 * flow; concurrent callers share a single renewal
 */

import { err, jsonifyError, MINUTES_TO_MS, ok } from '@forcelink/core';

import { canonicalHost } from '#config';
import { ReauthenticationRequiredError } from '#errors';
import { authorizeWithBrowser } from '#oauth/authorization-flow';
import { createJwtAssertion } from '#oauth/jwt-signer';

import type { Log, Result } from '@forcelink/core';

import type { AuthConfig } from '#config';
import type { AuthFailure, AuthorizationFailure } from '#errors';
import type { TokenExchanger } from '#oauth/token-exchanger';
import type { ExchangedToken, TokenRecord, TokenResult } from '#oauth/types';
import type { CredentialStore } from '#store/credential-store';

/** number of minutes before expiry a token stops being handed out */
const EXPIRATION_BUFFER_MINUTES = 5;

/** margin before expiry in milliseconds */
export const EXPIRATION_BUFFER_MS = EXPIRATION_BUFFER_MINUTES * MINUTES_TO_MS;

/** durable storage the manager persists through */
export type TokenStore = Pick<CredentialStore, 'load' | 'save' | 'clear'>;

/** runs the interactive sign-in */
export type Authorizer = (
  config: AuthConfig,
) => Promise<Result<ExchangedToken, AuthorizationFailure>>;

/** mints a fresh jwt bearer assertion */
export type AssertionFactory = (config: AuthConfig) => Promise<string>;

/** receives the record after every mutation, null once cleared */
export type TokenChangeListener = (record: TokenRecord | null) => void;

/** outcome of a token request */
export type ValidTokenResult = Result<TokenRecord, AuthFailure>;

/** options for the token lifecycle manager */
export interface TokenLifecycleManagerOptions {
  config: AuthConfig;
  store: TokenStore;
  exchanger: TokenExchanger;
  /** interactive sign-in, defaults to the browser flow */
  authorize?: Authorizer;
  /** assertion minting, defaults to signing with the configured key */
  createAssertion?: AssertionFactory;
  /** clock in epoch milliseconds */
  now?: () => number;
  log?: Log;
}

/**
 * keeps the access token of one account usable
 * @example
 * ```typescript
 * const manager = new TokenLifecycleManager({ config, store, exchanger, log });
 * const result = await manager.getValidToken();
 *
 * if (result.success) {
 *   console.log(result.value.instanceUrl);
 * }
 * ```
 */
export class TokenLifecycleManager {
  #config: AuthConfig;
  #store: TokenStore;
  #exchanger: TokenExchanger;
  #authorize: Authorizer;
  #createAssertion: AssertionFactory;
  #now: () => number;
  #log?: Log;

  #record: TokenRecord | null = null;
  /** set when the server rejected the current access token */
  #revoked = false;
  #loaded?: Promise<void>;
  #renewal?: Promise<ValidTokenResult>;
  #listeners = new Set<TokenChangeListener>();

  /**
   * creates a manager for one account
   * @param options manager configuration
   */
  constructor(options: TokenLifecycleManagerOptions) {
    this.#config = options.config;
    this.#store = options.store;
    this.#exchanger = options.exchanger;
    this.#log = options.log;
    this.#now = options.now ?? Date.now;
    this.#authorize =
      options.authorize ??
      (async (config) =>
        authorizeWithBrowser(config, {
          exchanger: this.#exchanger,
          log: this.#log,
        }));
    this.#createAssertion =
      options.createAssertion ??
      (async (config) => createJwtAssertion(config, { log: this.#log }));
  }

  /** record held in memory, null before loading or after clearing */
  public get current(): TokenRecord | null {
    return this.#record;
  }

  /** base url api calls go to */
  public get instanceUrl(): string {
    return (
      this.#record?.instanceUrl ??
      this.#config.instanceUrl ??
      canonicalHost(this.#config.environment)
    );
  }

  /**
   * checks whether the access token in memory can be handed out
   * @returns true when a token is present and outside the expiration buffer
   */
  public isValid(): boolean {
    return (
      !!this.#record?.accessToken &&
      !this.#revoked &&
      this.#now() < this.#record.expiresAt - EXPIRATION_BUFFER_MS
    );
  }

  /**
   * returns a usable token, renewing it when needed
   *
   * a failed refresh drops the refresh token and reports that a new sign-in
   * is required; the next call then runs the configured flow
   * @returns current or renewed record, or the failure that stopped renewal
   * @throws {AssertionSigningError} when the jwt key cannot be used
   * @throws {ConfigIncompleteError} when the jwt settings are missing
   */
  public async getValidToken(): Promise<ValidTokenResult> {
    await this.#ensureLoaded();

    if (this.#record && this.isValid()) {
      return ok(this.#record);
    }

    this.#renewal ??= this.#renew().finally(() => {
      this.#renewal = undefined;
    });

    return this.#renewal;
  }

  /**
   * marks the access token as rejected while keeping the refresh token
   *
   * a rejection of a token that was already replaced is ignored, so late
   * 401s of a storm never discard the renewed token
   * @param rejected access token the server refused
   */
  public invalidateAccessToken(rejected: string): void {
    if (
      !this.#record ||
      this.#revoked ||
      this.#record.accessToken !== rejected
    ) {
      return;
    }

    this.#revoked = true;
    this.#log?.('info', 'access token invalidated');
    this.#notify();
  }

  /** wipes the record from memory and from the store */
  public async clearCredentials(): Promise<void> {
    this.#record = null;
    this.#revoked = false;
    this.#loaded = Promise.resolve();

    await this.#store.clear();

    this.#notify();
  }

  /**
   * subscribes to record changes
   * @param listener receives every new record
   * @returns unsubscribe function
   */
  public onChange(listener: TokenChangeListener): () => void {
    this.#listeners.add(listener);

    return () => {
      this.#listeners.delete(listener);
    };
  }

  /** loads the stored record once, continuing without one when the store fails */
  async #ensureLoaded(): Promise<void> {
    this.#loaded ??= this.#store.load().then(
      (record) => {
        // a renewal may have finished while the store was read
        if (!this.#record && record) {
          this.#record = record;
          this.#log?.('debug', 'loaded stored credentials', {
            hasRefreshToken: !!record.refreshToken,
            expiresAt: new Date(record.expiresAt).toISOString(),
          });
        }
      },
      (exception: unknown) => {
        this.#log?.('warn', 'failed to load stored credentials', {
          error: jsonifyError(exception),
        });
      },
    );

    await this.#loaded;
  }

  /**
   * picks the renewal path for the record in memory
   * @returns renewed record or failure
   */
  async #renew(): Promise<ValidTokenResult> {
    const previous = this.#record;

    if (previous?.refreshToken) {
      return this.#refresh(previous, previous.refreshToken);
    }

    this.#log?.('info', 'no refresh token, starting sign-in', {
      authMethod: this.#config.authMethod,
    });

    const result =
      this.#config.authMethod === 'jwt'
        ? await this.#exchangeAssertion()
        : await this.#authorize(this.#config);

    if (!result.success) {
      return result;
    }

    return ok(await this.#accept(result.value, previous));
  }

  /**
   * exchanges a refresh token
   * @param previous record being renewed
   * @param refreshToken its refresh token
   * @returns merged record, or a request to sign in again
   */
  async #refresh(
    previous: TokenRecord,
    refreshToken: string,
  ): Promise<ValidTokenResult> {
    const result = await this.#exchanger.exchange(
      this.#exchanger.refreshTokenGrant(refreshToken),
    );

    if (!result.success) {
      this.#log?.('warn', 'token refresh failed, sign-in required', {
        error: jsonifyError(result.error),
      });

      const { accessToken, instanceUrl, issuedAt, expiresAt } = previous;
      const record: TokenRecord = {
        accessToken,
        instanceUrl,
        issuedAt,
        expiresAt,
      };

      this.#record = record;
      this.#revoked = true;
      await this.#persist(record);
      this.#notify();

      return err(new ReauthenticationRequiredError(result.error));
    }

    return ok(await this.#accept(result.value, previous));
  }

  /**
   * signs a fresh assertion and exchanges it
   * @returns exchange outcome
   */
  async #exchangeAssertion(): Promise<TokenResult> {
    const assertion = await this.#createAssertion(this.#config);

    return this.#exchanger.exchange(this.#exchanger.jwtBearerGrant(assertion));
  }

  /**
   * merges an exchanged token into a record, persists and publishes it
   * @param token exchange outcome
   * @param previous record it replaces
   * @returns new record
   */
  async #accept(
    token: ExchangedToken,
    previous: TokenRecord | null,
  ): Promise<TokenRecord> {
    const refreshToken = token.refreshToken ?? previous?.refreshToken;
    const record: TokenRecord = {
      accessToken: token.accessToken,
      ...(refreshToken ? { refreshToken } : {}),
      instanceUrl:
        token.instanceUrl ??
        previous?.instanceUrl ??
        this.#config.instanceUrl ??
        canonicalHost(this.#config.environment),
      issuedAt: token.issuedAt,
      expiresAt: token.expiresAt,
    };

    this.#record = record;
    this.#revoked = false;
    await this.#persist(record);
    this.#notify();

    return record;
  }

  /**
   * writes a record to the store, keeping the in-memory copy on failure
   * @param record record to persist
   */
  async #persist(record: TokenRecord): Promise<void> {
    try {
      await this.#store.save(record);
    } catch (exception) {
      this.#log?.('error', 'failed to persist credentials', {
        error: jsonifyError(exception),
      });
    }
  }

  /** informs every listener of the current record */
  #notify(): void {
    for (const listener of this.#listeners) {
      try {
        listener(this.#record);
      } catch (exception) {
        this.#log?.('warn', 'token change listener failed', {
          error: jsonifyError(exception),
        });
      }
    }
  }
}
