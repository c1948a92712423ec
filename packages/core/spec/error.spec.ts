import { describe, expect, it } from 'vitest';

import { jsonifyError } from '#error';

class RefreshRejectedError extends Error {
  public readonly kind = 'TokenExchangeHTTPError';
  public readonly status = 400;
  public readonly hint = undefined;
  public readonly response = { error: 'invalid_grant' };

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RefreshRejectedError';
  }
}

describe('fn:jsonifyError', () => {
  it('should keep the name, message and stack of an error', () => {
    const result = jsonifyError(new TypeError('token record is malformed'));

    expect(result).toEqual({
      type: 'Error',
      name: 'TypeError',
      message: 'token record is malformed',
      stack: expect.stringContaining('TypeError: token record is malformed'),
    });
  });

  it('should carry primitive diagnostics and drop the rest', () => {
    const result = jsonifyError(new RefreshRejectedError('refresh rejected'));

    expect(result).toEqual({
      type: 'Error',
      name: 'RefreshRejectedError',
      message: 'refresh rejected',
      stack: expect.stringContaining('RefreshRejectedError: refresh rejected'),
      kind: 'TokenExchangeHTTPError',
      status: 400,
    });
  });

  it('should follow the cause chain', () => {
    const socket = new Error('connect ECONNREFUSED 127.0.0.1:443');
    const error = new RefreshRejectedError('refresh failed', { cause: socket });

    const result = jsonifyError(error);

    expect(result).toMatchObject({
      name: 'RefreshRejectedError',
      cause: {
        type: 'Error',
        name: 'Error',
        message: 'connect ECONNREFUSED 127.0.0.1:443',
      },
    });
  });

  it('should list every member of an aggregate failure', () => {
    const error = new AggregateError(
      [new Error('socket busy'), 'pool stuck'],
      'Failed to close 2 of 3 sessions',
    );

    const result = jsonifyError(error);

    expect(result).toMatchObject({
      name: 'AggregateError',
      message: 'Failed to close 2 of 3 sessions',
      errors: [
        { type: 'Error', message: 'socket busy' },
        { type: 'string', value: 'pool stuck' },
      ],
    });
  });

  describe.each([
    ['string', 'invalid_grant', { type: 'string', value: 'invalid_grant' }],
    ['number', 401, { type: 'number', value: 401 }],
    ['boolean', false, { type: 'boolean', value: false }],
    ['null', null, { type: 'null', value: null }],
    ['undefined', undefined, { type: 'undefined', value: undefined }],
    ['bigint', BigInt(42), { type: 'bigint', value: '42' }],
    ['symbol', Symbol('keychain'), { type: 'symbol', description: 'keychain' }],
  ])('with a thrown %s', (_name, input, expected) => {
    it('should describe its type and value', () => {
      expect(jsonifyError(input)).toEqual(expected);
    });
  });

  it('should name a thrown function', () => {
    const openBrowser = (): void => undefined;

    expect(jsonifyError(openBrowser)).toEqual({
      type: 'function',
      name: 'openBrowser',
    });
  });

  it('should copy a plain object without its functions', () => {
    const body = { error: 'invalid_client', retry: () => undefined };

    expect(jsonifyError(body)).toEqual({
      type: 'object',
      value: { error: 'invalid_client' },
    });
  });

  it('should copy an array', () => {
    expect(jsonifyError(['invalid_scope', 'invalid_request'])).toEqual({
      type: 'array',
      value: ['invalid_scope', 'invalid_request'],
    });
  });

  it('should replace circular references', () => {
    interface Attempt {
      state: string;
      previous?: Attempt;
    }
    const attempt: Attempt = { state: 'test-state' };
    attempt.previous = attempt;

    expect(jsonifyError(attempt)).toEqual({
      type: 'object',
      value: { state: 'test-state', previous: '[Circular]' },
    });
  });

  it('should not serialize collections', () => {
    expect(jsonifyError(new Map([['token', 'test-token']]))).toEqual({
      type: 'unknown',
      toString: '[object Map]',
    });
  });
});
