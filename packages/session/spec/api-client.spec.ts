import { describe, expect, it, vi } from 'vitest';

import {
  AuthCache,
  CallbackProviderError,
  createAuthConfig,
  TokenExchanger,
  TokenLifecycleManager,
} from '@forcelink/auth';
import { err } from '@forcelink/core';

import { ApiClient } from '#api-client';
import { ApiHTTPError, SessionBindingError } from '#errors';
import { withExecutionContext } from '#execution-context';
import { SessionRegistry } from '#session-registry';

import { createMockAgent, headerOf } from './mocks/agent';

import type { Authorizer, TokenRecord, TokenStore } from '@forcelink/auth';
import type { MockAgent } from 'undici';

const INSTANCE = 'https://acme.my.salesforce.com';
const NOW = 1_700_000_000_000;
const HOUR = 3_600_000;
const QUERY_PATH =
  '/services/data/v63.0/query?q=SELECT+Id%2C+Name+FROM+Organization+LIMIT+1';
const JSON_HEADERS = { 'content-type': 'application/json' };

const config = createAuthConfig({ consumerKey: 'test-consumer-key' });

const stored: TokenRecord = {
  accessToken: 'test-access-token',
  refreshToken: 'test-refresh-token',
  instanceUrl: INSTANCE,
  issuedAt: NOW,
  expiresAt: NOW + HOUR,
};

/**
 * wires a client whose token and api traffic both go to a mock agent
 * @param record record held by the store
 * @param authorize interactive sign-in
 * @returns client and the mock agent
 */
function createClient(
  record: TokenRecord | null = stored,
  authorize: Authorizer = vi.fn<Authorizer>(),
): { client: ApiClient; agent: MockAgent; registry: SessionRegistry } {
  const agent = createMockAgent();
  const store: TokenStore = {
    load: vi.fn<TokenStore['load']>(async () => record),
    save: vi.fn<TokenStore['save']>(async () => 'keychain'),
    clear: vi.fn<TokenStore['clear']>(async () => undefined),
  };
  const manager = new TokenLifecycleManager({
    config,
    store,
    exchanger: new TokenExchanger({
      config,
      dispatcher: agent,
      now: () => NOW,
      retryDelay: 0,
    }),
    authorize,
    now: () => NOW,
  });
  const registry = new SessionRegistry({ createDispatcher: () => agent });

  return {
    agent,
    registry,
    client: new ApiClient({
      manager,
      cache: new AuthCache(manager),
      registry,
    }),
  };
}

describe('cl:ApiClient', () => {
  describe('mt:request', () => {
    it('should resolve the path against the instance and parse json', async () => {
      const { client, agent } = createClient();
      agent
        .get(INSTANCE)
        .intercept({ path: '/services/data/v63.0/limits', method: 'GET' })
        .reply(200, JSON.stringify({ DailyApiRequests: { Max: 15000 } }), {
          headers: JSON_HEADERS,
        });

      const result = await client.request('/services/data/v63.0/limits');

      expect(result).toEqual({
        success: true,
        value: {
          status: 200,
          headers: expect.objectContaining({
            'content-type': 'application/json',
          }),
          body: { DailyApiRequests: { Max: 15000 } },
        },
      });
    });

    it('should re-authenticate exactly once after a 401', async () => {
      const { client, agent } = createClient();
      const authorizations: Array<string | undefined> = [];
      const limits = agent.get(INSTANCE);
      limits
        .intercept({ path: '/services/data/v63.0/limits', method: 'GET' })
        .reply(401, (context) => {
          authorizations.push(headerOf(context, 'authorization'));

          return '[{"errorCode":"INVALID_SESSION_ID"}]';
        });
      limits
        .intercept({ path: '/services/data/v63.0/limits', method: 'GET' })
        .reply(200, (context) => {
          authorizations.push(headerOf(context, 'authorization'));

          return '{}';
        }, { headers: JSON_HEADERS });
      agent
        .get('https://login.salesforce.com')
        .intercept({ path: '/services/oauth2/token', method: 'POST' })
        .reply(200, JSON.stringify({ access_token: 'test-access-token-2' }), {
          headers: JSON_HEADERS,
        });

      const result = await withExecutionContext('worker-1', async () =>
        client.request('/services/data/v63.0/limits'),
      );

      expect(result.success).toBe(true);
      expect(authorizations).toEqual([
        'Bearer test-access-token',
        'Bearer test-access-token-2',
      ]);
    });

    it('should refresh once when several callers see the same token rejected', async () => {
      const { client, agent } = createClient();
      let refreshes = 0;
      agent
        .get(INSTANCE)
        .intercept({ path: '/services/data/v63.0/limits', method: 'GET' })
        .reply((context) =>
          headerOf(context, 'authorization') === 'Bearer test-access-token'
            ? { statusCode: 401, data: 'expired' }
            : {
                statusCode: 200,
                data: '{}',
                responseOptions: { headers: JSON_HEADERS },
              },
        )
        .persist();
      agent
        .get('https://login.salesforce.com')
        .intercept({ path: '/services/oauth2/token', method: 'POST' })
        .reply(() => {
          refreshes++;

          return {
            statusCode: 200,
            data: JSON.stringify({
              access_token: `test-access-token-${refreshes + 1}`,
            }),
            responseOptions: { headers: JSON_HEADERS },
          };
        })
        .persist();

      const results = await Promise.all(
        ['worker-1', 'worker-2', 'worker-3'].map(async (worker) =>
          withExecutionContext(worker, async () =>
            client.request('/services/data/v63.0/limits'),
          ),
        ),
      );

      expect(results.map((result) => result.success)).toEqual([true, true, true]);
      expect(refreshes).toBe(1);
    });

    it('should report a second 401 instead of retrying again', async () => {
      const { client, agent } = createClient();
      agent
        .get(INSTANCE)
        .intercept({ path: '/services/data/v63.0/limits', method: 'GET' })
        .reply(401, 'expired')
        .times(2);
      agent
        .get('https://login.salesforce.com')
        .intercept({ path: '/services/oauth2/token', method: 'POST' })
        .reply(200, JSON.stringify({ access_token: 'test-access-token-2' }), {
          headers: JSON_HEADERS,
        });

      const result = await client.request('/services/data/v63.0/limits');

      expect(result.success).toBe(false);
      expect(!result.success && result.error).toBeInstanceOf(ApiHTTPError);
      expect(!result.success && result.error).toMatchObject({
        status: 401,
        body: 'expired',
      });
    });

    it('should surface a session used from the wrong context', async () => {
      const { client, registry } = createClient();
      const foreign = await registry.ensureSession('worker-2');
      vi.spyOn(registry, 'ensureSession').mockResolvedValue(foreign);

      await expect(
        withExecutionContext('worker-1', async () =>
          client.request('/services/data/v63.0/limits'),
        ),
      ).rejects.toBeInstanceOf(SessionBindingError);
    });
  });

  describe('mt:testConnection', () => {
    it('should report the organization of the instance', async () => {
      const { client, agent } = createClient();
      agent
        .get(INSTANCE)
        .intercept({ path: QUERY_PATH, method: 'GET' })
        .reply(
          200,
          JSON.stringify({ totalSize: 1, records: [{ Id: '00D000', Name: 'Acme' }] }),
          { headers: JSON_HEADERS },
        );

      const result = await client.testConnection();

      expect(result).toEqual({
        success: true,
        organization: 'Acme',
        instanceUrl: INSTANCE,
        details: 'Connection successful. Organization: Acme',
      });
    });

    it('should name an unknown organization when the query returns none', async () => {
      const { client, agent } = createClient();
      agent
        .get(INSTANCE)
        .intercept({ path: QUERY_PATH, method: 'GET' })
        .reply(200, JSON.stringify({ totalSize: 0, records: [] }), {
          headers: JSON_HEADERS,
        });

      const result = await client.testConnection();

      expect(result).toEqual({
        success: true,
        organization: 'Unknown Organization',
        instanceUrl: INSTANCE,
        details: 'Connection successful. Organization: Unknown Organization',
      });
    });

    it('should report the status and body of a rejected query', async () => {
      const { client, agent } = createClient();
      agent
        .get(INSTANCE)
        .intercept({ path: QUERY_PATH, method: 'GET' })
        .reply(500, 'boom');

      const result = await client.testConnection();

      expect(result).toEqual({
        success: false,
        error: 'HTTP 500',
        details: 'boom',
      });
    });

    it('should report a failed sign-in', async () => {
      const authorize = vi.fn<Authorizer>(async () =>
        err(new CallbackProviderError('access_denied', 'end-user denied authorization')),
      );
      const { client } = createClient(null, authorize);

      const result = await client.testConnection();

      expect(result).toEqual({
        success: false,
        error: 'Authorization was rejected: access_denied - end-user denied authorization',
        details: 'Connection test failed',
      });
    });
  });
});
