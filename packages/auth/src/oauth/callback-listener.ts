/**
 * @file one-shot loopback listener capturing the authorization redirect
 *
 * the listener publishes exactly one outcome; `waitForCallback` races that
 * outcome against a timer and always tears the socket down afterwards
 */

import { setTimeout as sleep } from 'node:timers/promises';

import fastify from 'fastify';

import { err, jsonifyError, ok } from '@forcelink/core';

import {
  HTTP_STATUS_BAD_REQUEST,
  HTTP_STATUS_INTERNAL_SERVER_ERROR,
  HTTP_STATUS_NOT_FOUND,
  HTTP_STATUS_OK,
} from '#constants/http';
import {
  CALLBACK_PATH,
  CALLBACK_TIMEOUT_MS,
  DEFAULT_CALLBACK_PORT,
  DEFAULT_CALLBACK_PORT_COUNT,
} from '#constants/oauth';
import {
  CallbackMalformedError,
  CallbackProviderError,
  CallbackTimeoutError,
} from '#errors';
import { createLoggerConfig } from '#logging';

import { renderCallbackPage } from './callback-pages';

import type { Log, Result } from '@forcelink/core';
import type { FastifyInstance } from 'fastify';

import type { CallbackPage } from './callback-pages';

/** lifecycle of a listener */
export type ListenerState =
  | 'IDLE'
  | 'PORT_BOUND'
  | 'BROWSER_OPENED'
  | 'AWAITING_CALLBACK'
  | 'CODE_RECEIVED'
  | 'ERROR_RECEIVED'
  | 'MALFORMED'
  | 'FAILED'
  | 'TIMEOUT';

/** parameters of a successful redirect */
export interface CallbackParams {
  code: string;
  /** echoed state nonce, compared by the caller */
  state?: string;
}

/** failure reported by the listener */
export type CallbackFailure =
  | CallbackProviderError
  | CallbackMalformedError
  | CallbackTimeoutError;

/** outcome of one authorization redirect */
export type CallbackResult = Result<CallbackParams, CallbackFailure>;

/** options for binding a listener */
export interface CallbackListenerOptions {
  /** interface to bind, defaults to 127.0.0.1 */
  host?: string;
  /** first port tried */
  startPort?: number;
  /** number of consecutive ports tried */
  portCount?: number;
  /** path the redirect arrives on */
  path?: string;
  /** how long to wait for the redirect in milliseconds */
  timeoutMs?: number;
  /** renders the page returned to the browser */
  renderPage?: (page: CallbackPage) => string;
  /** optional logging function */
  log?: Log;
}

type CallbackQuery = Record<string, string | string[] | undefined>;

/**
 * picks the first value of a query parameter
 * @param value raw parameter, repeated keys arrive as arrays
 * @returns the first non-empty value
 */
function first(value: string | string[] | undefined): string | undefined {
  const candidate = Array.isArray(value) ? value[0] : value;

  return candidate ? candidate : undefined;
}

/**
 * local http listener accepting exactly one authorization redirect
 * @example
 * ```typescript
 * const listener = await CallbackListener.bind({ log });
 *
 * await open(authorizationUrl);
 * listener.markBrowserOpened();
 *
 * const result = await listener.waitForCallback();
 * ```
 */
export class CallbackListener {
  #server: FastifyInstance;
  #port: number;
  #path: string;
  #timeoutMs: number;
  #renderPage: (page: CallbackPage) => string;
  #log?: Log;
  #state: ListenerState = 'PORT_BOUND';
  #closed = false;
  #outcome?: CallbackResult;
  #publish: (result: CallbackResult) => void = () => undefined;
  #published: Promise<CallbackResult>;

  /**
   * wires a bound server, use `CallbackListener.bind` instead
   * @param server server already listening on the port
   * @param port bound port
   * @param options listener options
   */
  private constructor(
    server: FastifyInstance,
    port: number,
    options: CallbackListenerOptions,
  ) {
    this.#server = server;
    this.#port = port;
    this.#path = options.path ?? CALLBACK_PATH;
    this.#timeoutMs = options.timeoutMs ?? CALLBACK_TIMEOUT_MS;
    this.#renderPage = options.renderPage ?? renderCallbackPage;
    this.#log = options.log;
    this.#published = new Promise<CallbackResult>((resolve) => {
      this.#publish = resolve;
    });
  }

  /**
   * binds a listener on the first free port of the configured range
   * @param options listener options
   * @returns a listener in the PORT_BOUND state
   * @throws {Error} when every port of the range is taken
   */
  public static async bind(
    options: CallbackListenerOptions = {},
  ): Promise<CallbackListener> {
    const {
      host = '127.0.0.1',
      startPort = DEFAULT_CALLBACK_PORT,
      portCount = DEFAULT_CALLBACK_PORT_COUNT,
      log,
    } = options;
    const lastPort = startPort + portCount - 1;

    let lastError: unknown;

    for (let port = startPort; port <= lastPort; port++) {
      const server = fastify({ logger: createLoggerConfig(log) });
      // the route must be registered before listen
      const slot: { listener?: CallbackListener } = {};

      server.get<{ Querystring: CallbackQuery }>(
        options.path ?? CALLBACK_PATH,
        async (request, reply) => {
          if (!slot.listener) {
            return reply.code(HTTP_STATUS_NOT_FOUND).send();
          }

          const { statusCode, html } = slot.listener.#handle(request.query);

          return reply
            .code(statusCode)
            .type('text/html; charset=utf-8')
            .send(html);
        },
      );
      server.setNotFoundHandler(async (_request, reply) =>
        reply.code(HTTP_STATUS_NOT_FOUND).type('text/plain').send('Not Found'),
      );

      try {
        await server.listen({ port, host });
      } catch (exception) {
        lastError = exception;
        log?.('debug', 'callback port unavailable', {
          port,
          error: jsonifyError(exception),
        });
        await server.close();

        continue;
      }

      const listener = new CallbackListener(server, port, options);
      slot.listener = listener;

      log?.('info', 'callback listener bound', {
        port,
        redirectUri: listener.redirectUri,
      });

      return listener;
    }

    throw new Error(
      `No free port for the authorization callback between ${startPort} and ${lastPort} on ${host}. Free one of these ports and try again`,
      { cause: lastError },
    );
  }

  /** bound port */
  public get port(): number {
    return this.#port;
  }

  /** redirect uri registered with the authorization request */
  public get redirectUri(): string {
    return `http://localhost:${this.#port}${this.#path}`;
  }

  /** current lifecycle state */
  public get state(): ListenerState {
    return this.#state;
  }

  /** whether the socket has been released */
  public get closed(): boolean {
    return this.#closed;
  }

  /** records that the browser has been sent to the authorization url */
  public markBrowserOpened(): void {
    if (this.#state === 'PORT_BOUND') {
      this.#state = 'BROWSER_OPENED';
    }
  }

  /**
   * waits for the redirect or the deadline, whichever comes first, then closes
   * @returns the redirect outcome, a timeout failure when none arrived
   */
  public async waitForCallback(): Promise<CallbackResult> {
    if (!this.#outcome) {
      this.#state = 'AWAITING_CALLBACK';
    }

    const timer = new AbortController();

    try {
      return await Promise.race([
        this.#published,
        sleep(this.#timeoutMs, undefined, { signal: timer.signal }).then(
          () => {
            this.#settle(
              'TIMEOUT',
              err(new CallbackTimeoutError(this.#timeoutMs)),
            );
            this.#log?.('warn', 'timed out waiting for authorization callback', {
              port: this.#port,
              timeoutMs: this.#timeoutMs,
            });

            return this.#published;
          },
          // aborted once the redirect won the race
          () => this.#published,
        ),
      ]);
    } finally {
      timer.abort();
      await this.close();
    }
  }

  /** releases the socket, repeated calls are no-ops */
  public async close(): Promise<void> {
    if (this.#closed) {
      return;
    }

    this.#closed = true;
    await this.#server.close();
    this.#log?.('debug', 'callback listener closed', { port: this.#port });
  }

  /**
   * turns the redirect query into a page and publishes the outcome
   * @param query parsed query string
   * @returns status and html of the response
   */
  #handle(query: CallbackQuery): { statusCode: number; html: string } {
    if (this.#outcome) {
      return {
        statusCode: HTTP_STATUS_BAD_REQUEST,
        html: this.#renderPage({ kind: 'malformed' }),
      };
    }

    try {
      const code = first(query['code']);
      const error = first(query['error']);

      if (code) {
        const html = this.#renderPage({ kind: 'success' });

        this.#settle('CODE_RECEIVED', ok({ code, state: first(query['state']) }));
        this.#log?.('info', 'received authorization code');

        return { statusCode: HTTP_STATUS_OK, html };
      }

      if (error) {
        const description =
          first(query['error_description']) ?? 'Unknown error';
        const html = this.#renderPage({
          kind: 'provider-error',
          code: error,
          description,
        });

        this.#settle(
          'ERROR_RECEIVED',
          err(new CallbackProviderError(error, description)),
        );
        this.#log?.('warn', 'authorization server returned an error', {
          error,
          description,
        });

        return { statusCode: HTTP_STATUS_BAD_REQUEST, html };
      }

      const html = this.#renderPage({ kind: 'malformed' });

      this.#settle(
        'MALFORMED',
        err(
          new CallbackMalformedError(
            'The authorization redirect carried neither a code nor an error',
          ),
        ),
      );

      return { statusCode: HTTP_STATUS_BAD_REQUEST, html };
    } catch (exception) {
      this.#log?.('error', 'failed to handle authorization callback', {
        error: jsonifyError(exception),
      });
      this.#settle(
        'FAILED',
        err(
          new CallbackMalformedError(
            'Failed to handle the authorization redirect',
            { cause: exception },
          ),
        ),
      );

      return {
        statusCode: HTTP_STATUS_INTERNAL_SERVER_ERROR,
        html: renderCallbackPage({ kind: 'failure' }),
      };
    }
  }

  /**
   * publishes the single outcome, later outcomes are ignored
   * @param state terminal state
   * @param result outcome to publish
   */
  #settle(state: ListenerState, result: CallbackResult): void {
    if (this.#outcome) {
      return;
    }

    this.#outcome = result;
    this.#state = state;
    this.#publish(result);
  }
}
