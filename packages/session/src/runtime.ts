/**
 * @file composition root wiring credential issuance to api sessions
 *
 * every component is an explicit instance owned by the runtime; nothing is
 * shared through module state
 */

import {
  AuthCache,
  CredentialStore,
  loadAuthConfig,
  TokenExchanger,
  TokenLifecycleManager,
} from '@forcelink/auth';

import { ApiClient } from '#api-client';
import { SessionRegistry } from '#session-registry';

import type {
  AuthConfig,
  Authorizer,
  KeychainLoader,
  TokenStore,
} from '@forcelink/auth';
import type { Log } from '@forcelink/core';
import type { Dispatcher } from 'undici';

import type { PoolConfigInput } from '#pool-config';
import type { DispatcherFactory } from '#session-registry';

/** options for the runtime */
export interface RuntimeOptions {
  /** defaults to the configuration read from the environment */
  config?: AuthConfig;
  /** defaults to the keychain backed credential store */
  store?: TokenStore;
  /** base directory of the fallback token file */
  configDirectory?: string;
  /** keychain resolver of the default store */
  keychainLoader?: KeychainLoader | null;
  /** interactive sign-in, defaults to the browser flow */
  authorize?: Authorizer;
  /** pool of api sessions, defaults to the `api` profile */
  poolConfig?: PoolConfigInput;
  /** dispatcher of token requests, defaults to the global one */
  tokenDispatcher?: Dispatcher;
  /** dispatcher factory of api sessions */
  createDispatcher?: DispatcherFactory;
  now?: () => number;
  log?: Log;
}

/** the wired components */
export interface Runtime {
  config: AuthConfig;
  store: TokenStore;
  exchanger: TokenExchanger;
  manager: TokenLifecycleManager;
  cache: AuthCache;
  registry: SessionRegistry;
  client: ApiClient;
  /** closes every api session */
  dispose: () => Promise<void>;
}

/**
 * wires store, exchanger, manager, cache, registry and client
 * @param options overrides of the default components
 * @returns the wired runtime
 * @throws {ConfigIncompleteError} when no config is given and the environment lacks settings
 * @example
 * ```typescript
 * const runtime = createRuntime({ log });
 * const status = await runtime.client.testConnection();
 *
 * await runtime.dispose();
 * ```
 */
export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const { log, now } = options;
  const config = options.config ?? loadAuthConfig();

  const store =
    options.store ??
    new CredentialStore({
      serviceId: config.serviceId,
      configDirectory: options.configDirectory,
      keychainLoader: options.keychainLoader,
      log,
    });
  const exchanger = new TokenExchanger({
    config,
    dispatcher: options.tokenDispatcher,
    now,
    log,
  });
  const manager = new TokenLifecycleManager({
    config,
    store,
    exchanger,
    authorize: options.authorize,
    now,
    log,
  });
  const cache = new AuthCache(manager, log);
  const registry = new SessionRegistry({
    poolConfig: options.poolConfig ?? 'api',
    createDispatcher: options.createDispatcher,
    now,
    log,
  });
  const client = new ApiClient({ manager, cache, registry, log });

  return {
    config,
    store,
    exchanger,
    manager,
    cache,
    registry,
    client,
    dispose: async () => registry.closeAll(),
  };
}
