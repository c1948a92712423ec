/**
 * @file authenticated api calls through the caller's session
 */

import { Ajv } from 'ajv';
import { Headers } from 'undici';

import { err, jsonifyError, ok } from '@forcelink/core';

import { ApiHTTPError, ApiNetworkError, SessionBindingError } from '#errors';
import { currentContextId } from '#execution-context';

import type {
  AuthCache,
  AuthContext,
  AuthFailure,
  TokenLifecycleManager,
} from '@forcelink/auth';
import type { Log, Result } from '@forcelink/core';
import type { SchemaObject } from 'ajv';
import type { RequestInit, Response } from 'undici';

import type { SessionRegistry } from '#session-registry';

/** api version every data path is addressed under */
export const API_VERSION = 'v63.0';

/** query issued by the connection test */
export const CONNECTION_TEST_QUERY = 'SELECT Id, Name FROM Organization LIMIT 1';

const HTTP_STATUS_UNAUTHORIZED = 401;

/** a successful api response */
export interface ApiResponse {
  status: number;
  headers: Record<string, string>;
  /** parsed json when the response declares it, the raw text otherwise */
  body: unknown;
}

/** every failure an api call reports */
export type ApiFailure = AuthFailure | ApiHTTPError | ApiNetworkError;

/** outcome of an api call */
export type ApiResult = Result<ApiResponse, ApiFailure>;

/** outcome of the connection test */
export type ConnectionTestResult =
  | {
      success: true;
      organization: string;
      instanceUrl: string;
      details: string;
    }
  | { success: false; error: string; details: string };

/** options for the api client */
export interface ApiClientOptions {
  manager: TokenLifecycleManager;
  cache: AuthCache;
  registry: SessionRegistry;
  log?: Log;
}

/* eslint-disable @typescript-eslint/naming-convention */
interface QueryResponse {
  totalSize?: number;
  records: Array<{ Id?: string; Name?: string }>;
}
/* eslint-enable @typescript-eslint/naming-convention */

const validateQueryResponse = new Ajv().compile<QueryResponse>({
  type: 'object',
  properties: {
    totalSize: { type: 'number' },
    records: {
      type: 'array',
      items: {
        type: 'object',
        properties: { Id: { type: 'string' }, Name: { type: 'string' } },
      },
    },
  },
  required: ['records'],
} satisfies SchemaObject);

/**
 * reads a response body
 * @param response fetched response
 * @returns parsed json or raw text
 */
async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  const isJson =
    response.headers.get('content-type')?.includes('application/json') ?? false;

  if (!isJson || !text) {
    return text;
  }

  try {
    return JSON.parse(text);
  } catch {
    // a mislabeled body is still useful as text
    return text;
  }
}

/**
 * describes a response header set
 * @param response fetched response
 * @returns headers as a plain object
 */
function toHeaderRecord(response: Response): Record<string, string> {
  const headers: Record<string, string> = {};

  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  return headers;
}

/**
 * issues api calls with the current access token, re-authenticating once on 401
 * @example
 * ```typescript
 * const client = new ApiClient({ manager, cache, registry, log });
 * const result = await client.request('/services/data/v63.0/limits');
 *
 * if (!result.success) {
 *   console.error(result.error.message);
 * }
 * ```
 */
export class ApiClient {
  #manager: TokenLifecycleManager;
  #cache: AuthCache;
  #registry: SessionRegistry;
  #log?: Log;

  /**
   * creates an api client
   * @param options token source, cache and session registry
   */
  constructor(options: ApiClientOptions) {
    this.#manager = options.manager;
    this.#cache = options.cache;
    this.#registry = options.registry;
    this.#log = options.log;
  }

  /**
   * sends a request to the instance of the current token
   * @param path path and query relative to the instance url
   * @param init request options
   * @returns response, or the auth, http or network failure
   * @throws {SessionBindingError} when a session is used outside its context
   */
  public async request(path: string, init: RequestInit = {}): Promise<ApiResult> {
    const auth = await this.#cache.resolve();

    if (!auth.success) {
      return auth;
    }

    const first = await this.#send(path, init, auth.value);

    if (!first.success || first.value.status !== HTTP_STATUS_UNAUTHORIZED) {
      return this.#complete(first);
    }

    this.#log?.('info', 'access token rejected, re-authenticating once', {
      path,
    });
    await first.value.text();
    this.#manager.invalidateAccessToken(auth.value.accessToken);

    const retryAuth = await this.#cache.resolve();

    if (!retryAuth.success) {
      return retryAuth;
    }

    return this.#complete(await this.#send(path, init, retryAuth.value));
  }

  /**
   * queries the organization to confirm the credentials work end to end
   * @returns organization and instance on success, the reason otherwise
   */
  public async testConnection(): Promise<ConnectionTestResult> {
    const query = new URLSearchParams({ q: CONNECTION_TEST_QUERY });

    try {
      const result = await this.request(
        `/services/data/${API_VERSION}/query?${query.toString()}`,
      );

      if (!result.success) {
        const { error } = result;

        return {
          success: false,
          error:
            error instanceof ApiHTTPError ? `HTTP ${error.status}` : error.message,
          details:
            error instanceof ApiHTTPError ? error.body : 'Connection test failed',
        };
      }

      const [record] = validateQueryResponse(result.value.body)
        ? result.value.body.records
        : [];
      const organization = record?.Name ?? 'Unknown Organization';

      return {
        success: true,
        organization,
        instanceUrl: this.#manager.instanceUrl,
        details: `Connection successful. Organization: ${organization}`,
      };
    } catch (exception) {
      this.#log?.('error', 'connection test failed', {
        error: jsonifyError(exception),
      });

      return {
        success: false,
        error: exception instanceof Error ? exception.message : String(exception),
        details: 'Connection test failed',
      };
    }
  }

  /**
   * sends one authenticated request through the caller's session
   * @param path path relative to the instance url
   * @param init request options
   * @param auth token and base url
   * @returns raw response or the network failure
   */
  async #send(
    path: string,
    init: RequestInit,
    auth: AuthContext,
  ): Promise<Result<Response, ApiNetworkError>> {
    const url = new URL(path, auth.baseUrl).toString();
    const session = await this.#registry.ensureSession(currentContextId());
    const headers = new Headers(init.headers);

    headers.set('authorization', `Bearer ${auth.accessToken}`);

    try {
      return ok(await session.request(url, { ...init, headers }));
    } catch (exception) {
      if (exception instanceof SessionBindingError) {
        throw exception;
      }

      this.#log?.('warn', 'api request failed', {
        url,
        error: jsonifyError(exception),
      });

      return err(new ApiNetworkError(url, exception));
    }
  }

  /**
   * turns a raw response into the client's result
   * @param sent outcome of sending
   * @returns parsed response or failure
   */
  async #complete(sent: Result<Response, ApiNetworkError>): Promise<ApiResult> {
    if (!sent.success) {
      return sent;
    }

    const response = sent.value;

    if (!response.ok) {
      const body = await response.text();

      this.#log?.('warn', 'api request rejected', { status: response.status });

      return err(new ApiHTTPError(response.status, body));
    }

    return ok({
      status: response.status,
      headers: toHeaderRecord(response),
      body: await readBody(response),
    });
  }
}
