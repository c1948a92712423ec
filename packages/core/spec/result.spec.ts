import { describe, expect, it } from 'vitest';

import { err, ok } from '#result';

describe('fn:ok', () => {
  it('should tag the value as a success', () => {
    expect(ok('token')).toEqual({ success: true, value: 'token' });
  });
});

describe('fn:err', () => {
  it('should tag the error as a failure', () => {
    const error = new Error('invalid_grant');

    expect(err(error)).toEqual({ success: false, error });
  });
});
