/**
 * @file memoized access token and base url of a token lifecycle manager
 *
 * every read re-confirms the token with the manager; any record change
 * published by the manager drops the memo before the next read
 */

import { ok } from '@forcelink/core';

import type { Log, Result } from '@forcelink/core';

import type { AuthFailure } from '#errors';
import type { TokenLifecycleManager } from '#token-lifecycle-manager';

/** what an api call needs to authenticate */
export interface AuthContext {
  accessToken: string;
  /** instance url api paths are resolved against */
  baseUrl: string;
}

/**
 * short-term memo in front of a token lifecycle manager
 * @example
 * ```typescript
 * const cache = new AuthCache(manager);
 * const auth = await cache.resolve();
 *
 * if (auth.success) {
 *   headers.authorization = `Bearer ${auth.value.accessToken}`;
 * }
 * ```
 */
export class AuthCache {
  #manager: TokenLifecycleManager;
  #context: AuthContext | null = null;
  #log?: Log;

  /**
   * creates a cache subscribed to the manager's record changes
   * @param manager manager owning the token
   * @param log optional logging function
   */
  constructor(manager: TokenLifecycleManager, log?: Log) {
    this.#manager = manager;
    this.#log = log;
    manager.onChange(() => this.invalidate());
  }

  /**
   * reads the memoized context
   * @returns context while the manager still considers its token valid
   */
  public get(): AuthContext | null {
    if (this.#context && !this.#manager.isValid()) {
      this.#log?.('debug', 'cached access token no longer valid');
      this.#context = null;
    }

    return this.#context;
  }

  /** drops the memoized context */
  public invalidate(): void {
    this.#context = null;
  }

  /**
   * returns the memoized context or asks the manager for a valid token
   * @returns context, or the failure reported by the manager
   */
  public async resolve(): Promise<Result<AuthContext, AuthFailure>> {
    const cached = this.get();

    if (cached) {
      return ok(cached);
    }

    const result = await this.#manager.getValidToken();

    if (!result.success) {
      return result;
    }

    const context: AuthContext = {
      accessToken: result.value.accessToken,
      baseUrl: result.value.instanceUrl,
    };
    this.#context = context;

    return ok(context);
  }
}
