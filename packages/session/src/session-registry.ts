/**
 * @file http sessions bound to the execution context that created them
 *
 * a session owns an undici dispatcher; handing one to another context
 * leaves that context issuing requests through a pool whose owner may
 * already have torn it down, so every session refuses foreign callers
 */

import { Agent, fetch, Headers, interceptors } from 'undici';

import { jsonifyError, Mutex } from '@forcelink/core';

import { SessionBindingError } from '#errors';
import { currentContextId } from '#execution-context';
import { resolvePoolConfig, toAgentOptions } from '#pool-config';

import type { Log } from '@forcelink/core';
import type { Dispatcher, RequestInfo, RequestInit, Response } from 'undici';

import type { PoolConfig, PoolConfigInput } from '#pool-config';

/** headers sent with every request of a session */
export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'user-agent': 'forcelink/0.1.0',
  accept: 'application/json',
};

/** builds the dispatcher of a new session */
export type DispatcherFactory = (config: PoolConfig) => Dispatcher;

/** options for a session handle */
export interface SessionHandleOptions {
  contextId: string;
  poolConfig: PoolConfig;
  dispatcher: Dispatcher;
  headers: Record<string, string>;
  createdAt: number;
  log?: Log;
}

/** point-in-time description of a session */
export interface SessionStats {
  closed: boolean;
  createdAt: number;
  requests: number;
  maxConnections: number;
  maxConnectionsPerHost: number;
}

/** options for the session registry */
export interface SessionRegistryOptions {
  /** pool used when ensureSession is not given one, defaults to the `default` profile */
  poolConfig?: PoolConfigInput;
  /** extra headers merged over the defaults */
  headers?: Record<string, string>;
  /** defaults to an undici agent with a dns cache */
  createDispatcher?: DispatcherFactory;
  /** clock in epoch milliseconds */
  now?: () => number;
  log?: Log;
}

/**
 * builds a pooled undici dispatcher with cached dns lookups
 * @param config pool config
 * @returns dispatcher honoring the limits and timeouts of the config
 */
export function createPoolDispatcher(config: PoolConfig): Dispatcher {
  return new Agent(toAgentOptions(config)).compose(
    interceptors.dns({ maxTTL: config.dnsCacheTtlMs }),
  );
}

/** an http client owned by one execution context */
export class SessionHandle {
  public readonly contextId: string;
  public readonly poolConfig: PoolConfig;
  public readonly createdAt: number;
  #dispatcher: Dispatcher;
  #headers: Record<string, string>;
  #closed = false;
  #requests = 0;
  #log?: Log;

  /**
   * creates a session handle
   * @param options identity, pool and dispatcher of the session
   */
  constructor(options: SessionHandleOptions) {
    this.contextId = options.contextId;
    this.poolConfig = options.poolConfig;
    this.createdAt = options.createdAt;
    this.#dispatcher = options.dispatcher;
    this.#headers = options.headers;
    this.#log = options.log;
  }

  /** true once the session has been closed */
  public get closed(): boolean {
    return this.#closed;
  }

  /** number of requests sent through the session */
  public get requests(): number {
    return this.#requests;
  }

  /**
   * sends a request through the session's pool
   * @param input url or request
   * @param init request options; headers are merged over the session's defaults
   * @returns response
   * @throws {SessionBindingError} when called from another context or after closing
   */
  public async request(
    input: RequestInfo,
    init: RequestInit = {},
  ): Promise<Response> {
    this.assertOwner();

    const headers = new Headers(this.#headers);
    new Headers(init.headers).forEach((value, key) => {
      headers.set(key, value);
    });

    const timeout = AbortSignal.timeout(this.poolConfig.totalTimeoutMs);

    this.#requests++;

    return fetch(input, {
      ...init,
      headers,
      signal: init.signal ? AbortSignal.any([init.signal, timeout]) : timeout,
      dispatcher: this.#dispatcher,
    });
  }

  /**
   * confirms the caller runs in the context that owns the session
   * @throws {SessionBindingError} when the session is closed or foreign
   */
  public assertOwner(): void {
    const actual = currentContextId();

    if (this.#closed) {
      throw new SessionBindingError(this.contextId, actual, true);
    }

    if (actual !== this.contextId) {
      throw new SessionBindingError(this.contextId, actual);
    }
  }

  /** closes the pool; later calls do nothing */
  public async close(): Promise<void> {
    if (this.#closed) {
      return;
    }

    this.#closed = true;
    await this.#dispatcher.close();

    this.#log?.('debug', 'session closed', {
      contextId: this.contextId,
      requests: this.#requests,
    });
  }

  /**
   * describes the session
   * @returns counters and limits
   */
  public stats(): SessionStats {
    return {
      closed: this.#closed,
      createdAt: this.createdAt,
      requests: this.#requests,
      maxConnections: this.poolConfig.maxConnections,
      maxConnectionsPerHost: this.poolConfig.maxConnectionsPerHost,
    };
  }
}

/**
 * tracks one live session per execution context
 * @example
 * ```typescript
 * const registry = new SessionRegistry({ poolConfig: 'api', log });
 *
 * await withExecutionContext('worker-1', async () => {
 *   const session = await registry.ensureSession();
 *   await session.request('https://acme.my.salesforce.com/services/data');
 * });
 *
 * await registry.closeAll();
 * ```
 */
export class SessionRegistry {
  #sessions = new Map<string, SessionHandle>();
  #mutex = new Mutex();
  #poolConfig: PoolConfigInput;
  #headers: Record<string, string>;
  #createDispatcher: DispatcherFactory;
  #now: () => number;
  #log?: Log;

  /**
   * creates an empty registry
   * @param options defaults applied to every new session
   */
  constructor(options: SessionRegistryOptions = {}) {
    this.#poolConfig = options.poolConfig ?? 'default';
    this.#headers = { ...DEFAULT_HEADERS, ...options.headers };
    this.#createDispatcher = options.createDispatcher ?? createPoolDispatcher;
    this.#now = options.now ?? Date.now;
    this.#log = options.log;
  }

  /** number of tracked sessions, closed ones included */
  public get size(): number {
    return this.#sessions.size;
  }

  /**
   * returns the live session of a context, replacing a stale one
   * @param contextId context the session is for, defaults to the caller's
   * @param poolConfig pool of a newly created session
   * @returns session owned by the context
   */
  public async ensureSession(
    contextId: string = currentContextId(),
    poolConfig?: PoolConfigInput,
  ): Promise<SessionHandle> {
    return this.#mutex.runExclusive(async () => {
      const existing = this.#sessions.get(contextId);

      if (existing && !existing.closed) {
        return existing;
      }

      if (existing) {
        this.#log?.('info', 'replacing closed session', { contextId });
      }

      const config = resolvePoolConfig(poolConfig ?? this.#poolConfig);
      const handle = new SessionHandle({
        contextId,
        poolConfig: config,
        dispatcher: this.#createDispatcher(config),
        headers: this.#headers,
        createdAt: this.#now(),
        log: this.#log,
      });

      this.#sessions.set(contextId, handle);
      this.#log?.('info', 'session created', {
        contextId,
        maxConnections: config.maxConnections,
        maxConnectionsPerHost: config.maxConnectionsPerHost,
      });

      return handle;
    });
  }

  /**
   * closes and forgets the session of a context
   * @param contextId context whose session is closed
   */
  public async closeSession(contextId: string): Promise<void> {
    await this.#mutex.runExclusive(async () => {
      const handle = this.#sessions.get(contextId);

      if (!handle) {
        return;
      }

      this.#sessions.delete(contextId);
      await handle.close();
    });
  }

  /**
   * closes every session, continuing past failures
   * @throws {AggregateError} carrying every close failure
   */
  public async closeAll(): Promise<void> {
    await this.#mutex.runExclusive(async () => {
      const handles = [...this.#sessions.values()];
      this.#sessions.clear();

      const outcomes = await Promise.allSettled(
        handles.map(async (handle) => {
          try {
            await handle.close();
          } catch (exception) {
            this.#log?.('warn', 'failed to close session', {
              contextId: handle.contextId,
              error: jsonifyError(exception),
            });

            throw exception;
          }
        }),
      );
      const errors: unknown[] = outcomes.flatMap((outcome) =>
        outcome.status === 'rejected' ? [outcome.reason] : [],
      );

      if (errors.length) {
        throw new AggregateError(
          errors,
          `Failed to close ${errors.length} of ${handles.length} sessions`,
        );
      }
    });
  }

  /**
   * describes every tracked session
   * @returns stats keyed by context
   */
  public stats(): Record<string, SessionStats> {
    return Object.fromEntries(
      [...this.#sessions].map(([contextId, handle]) => [
        contextId,
        handle.stats(),
      ]),
    );
  }

  /**
   * reports which tracked sessions are usable
   * @returns open state keyed by context
   */
  public async healthCheck(): Promise<Record<string, boolean>> {
    return this.#mutex.runExclusive(() =>
      Object.fromEntries(
        [...this.#sessions].map(([contextId, handle]) => [
          contextId,
          !handle.closed,
        ]),
      ),
    );
  }

  /**
   * forgets sessions that were closed outside the registry
   * @returns number of sessions removed
   */
  public async pruneClosed(): Promise<number> {
    return this.#mutex.runExclusive(() => {
      let removed = 0;

      for (const [contextId, handle] of this.#sessions) {
        if (handle.closed) {
          this.#sessions.delete(contextId);
          removed++;
          this.#log?.('debug', 'removed closed session', { contextId });
        }
      }

      return removed;
    });
  }
}
