import { describe, expect, it, vi } from 'vitest';

import { AuthCache } from '#auth-cache';
import { createAuthConfig } from '#config';
import { TokenExchanger } from '#oauth/token-exchanger';
import { TokenLifecycleManager } from '#token-lifecycle-manager';

import type { TokenRecord } from '#oauth/types';
import type { Authorizer, TokenStore } from '#token-lifecycle-manager';

const NOW = 1_700_000_000_000;
const HOUR = 3_600_000;

const config = createAuthConfig({ consumerKey: 'test-consumer-key' });

const record: TokenRecord = {
  accessToken: 'test-access-token',
  refreshToken: 'test-refresh-token',
  instanceUrl: 'https://acme.my.salesforce.com',
  issuedAt: NOW,
  expiresAt: NOW + HOUR,
};

/**
 * creates a manager over a stored record with a movable clock
 * @param clock returns the current time
 * @returns manager and its store
 */
function createManager(clock: () => number): {
  manager: TokenLifecycleManager;
  store: TokenStore;
} {
  const store: TokenStore = {
    load: vi.fn<TokenStore['load']>(async () => record),
    save: vi.fn<TokenStore['save']>(async () => 'keychain'),
    clear: vi.fn<TokenStore['clear']>(async () => undefined),
  };

  return {
    store,
    manager: new TokenLifecycleManager({
      config,
      store,
      exchanger: new TokenExchanger({ config, now: clock }),
      authorize: vi.fn<Authorizer>(),
      now: clock,
    }),
  };
}

describe('cl:AuthCache', () => {
  describe('mt:resolve', () => {
    it('should resolve the token and base url of the manager', async () => {
      const { manager } = createManager(() => NOW);
      const cache = new AuthCache(manager);

      const result = await cache.resolve();

      expect(result).toEqual({
        success: true,
        value: {
          accessToken: 'test-access-token',
          baseUrl: 'https://acme.my.salesforce.com',
        },
      });
    });

    it('should serve repeated reads from the memo', async () => {
      const { manager } = createManager(() => NOW);
      const cache = new AuthCache(manager);
      const getValidToken = vi.spyOn(manager, 'getValidToken');

      await cache.resolve();
      await cache.resolve();

      expect(getValidToken).toHaveBeenCalledTimes(1);
    });
  });

  describe('mt:get', () => {
    it('should be empty before the first resolution', () => {
      const { manager } = createManager(() => NOW);

      expect(new AuthCache(manager).get()).toBeNull();
    });

    it('should re-confirm validity on every read', async () => {
      let clock = NOW;
      const { manager } = createManager(() => clock);
      const cache = new AuthCache(manager);
      await cache.resolve();

      expect(cache.get()).toEqual({
        accessToken: 'test-access-token',
        baseUrl: 'https://acme.my.salesforce.com',
      });

      clock = NOW + HOUR;

      expect(cache.get()).toBeNull();
    });

    it('should drop the memo when the manager changes its record', async () => {
      const { manager } = createManager(() => NOW);
      const cache = new AuthCache(manager);
      await cache.resolve();

      manager.invalidateAccessToken('test-access-token');

      expect(cache.get()).toBeNull();
    });

    it('should drop the memo when credentials are cleared', async () => {
      const { manager } = createManager(() => NOW);
      const cache = new AuthCache(manager);
      await cache.resolve();

      await manager.clearCredentials();

      expect(cache.get()).toBeNull();
    });
  });

  describe('mt:invalidate', () => {
    it('should force the next resolution through the manager', async () => {
      const { manager } = createManager(() => NOW);
      const cache = new AuthCache(manager);
      const getValidToken = vi.spyOn(manager, 'getValidToken');
      await cache.resolve();

      cache.invalidate();
      await cache.resolve();

      expect(getValidToken).toHaveBeenCalledTimes(2);
    });
  });
});
