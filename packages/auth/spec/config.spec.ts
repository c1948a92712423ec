import { describe, expect, it } from 'vitest';

import {
  authorizeHost,
  canonicalHost,
  createAuthConfig,
  loadAuthConfig,
} from '#config';
import { ConfigIncompleteError } from '#errors';

/**
 * runs a configuration build that is expected to fail
 * @param build builds a configuration
 * @returns the configuration error raised by the build
 */
function captureConfigError(build: () => unknown): ConfigIncompleteError {
  try {
    build();
  } catch (exception) {
    if (exception instanceof ConfigIncompleteError) {
      return exception;
    }

    throw exception;
  }

  throw new Error('the configuration was accepted');
}

describe('fn:loadAuthConfig', () => {
  it('should map every variable to its setting', () => {
    const config = loadAuthConfig({
      SF_SERVICE_ID: 'forcelink-test',
      SF_CONSUMER_KEY: 'test-consumer-key',
      SF_CONSUMER_SECRET: 'test-secret',
      SF_CLIENT_AUTH: 'client_secret',
      SF_AUTH_METHOD: 'jwt',
      SF_JWT_SUBJECT: 'integration@example.com',
      SF_JWT_KEY_PATH: '/keys/server.key',
      SF_JWT_KEY_ID: 'test-key-id',
      SF_ENVIRONMENT: 'sandbox',
      SF_INSTANCE_URL: 'https://acme--dev.sandbox.my.salesforce.com',
      SF_SCOPE: 'api refresh_token',
    });

    expect(config).toEqual({
      serviceId: 'forcelink-test',
      consumerKey: 'test-consumer-key',
      consumerSecret: 'test-secret',
      clientAuth: 'client_secret',
      authMethod: 'jwt',
      jwtSubject: 'integration@example.com',
      privateKeyPath: '/keys/server.key',
      keyId: 'test-key-id',
      environment: 'sandbox',
      instanceUrl: 'https://acme--dev.sandbox.my.salesforce.com',
      scope: 'api refresh_token',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should apply the defaults of unset variables', () => {
    const config = loadAuthConfig({ SF_CONSUMER_KEY: 'test-consumer-key' });

    expect(config).toEqual({
      serviceId: 'forcelink',
      consumerKey: 'test-consumer-key',
      clientAuth: 'none',
      authMethod: 'pkce',
      environment: 'production',
      scope: 'full refresh_token',
    });
  });

  it('should treat blank variables as unset', () => {
    const config = loadAuthConfig({
      SF_CONSUMER_KEY: ' test-consumer-key ',
      SF_SCOPE: '   ',
      SF_INSTANCE_URL: '',
    });

    expect(config.consumerKey).toBe('test-consumer-key');
    expect(config.scope).toBe('full refresh_token');
    expect(config.instanceUrl).toBeUndefined();
  });

  it('should name a blank consumer key as missing', () => {
    const error = captureConfigError(() =>
      loadAuthConfig({ SF_CONSUMER_KEY: '  ' }),
    );

    expect(error.missing).toEqual(['SF_CONSUMER_KEY']);
    expect(error.message).toBe('Missing required configuration: SF_CONSUMER_KEY');
  });

  it('should name every missing variable of the jwt flow at once', () => {
    const error = captureConfigError(() =>
      loadAuthConfig({ SF_AUTH_METHOD: 'jwt' }),
    );

    expect([...error.missing].sort()).toEqual([
      'SF_CONSUMER_KEY',
      'SF_JWT_KEY_PATH',
      'SF_JWT_SUBJECT',
    ]);
    expect(error.message).toMatch(/^Missing required configuration: /);
    expect(error.message).toContain('SF_CONSUMER_KEY');
    expect(error.message).toContain('SF_JWT_SUBJECT');
    expect(error.message).toContain('SF_JWT_KEY_PATH');
  });

  it('should describe a value outside the allowed choices', () => {
    const error = captureConfigError(() =>
      loadAuthConfig({
        SF_CONSUMER_KEY: 'test-consumer-key',
        SF_AUTH_METHOD: 'saml',
      }),
    );

    expect(error.missing).toEqual([]);
    expect(error.message).toBe(
      'Invalid configuration. SF_AUTH_METHOD must be equal to one of the allowed values',
    );
  });
});

describe('fn:createAuthConfig', () => {
  it('should reject client_secret authentication without a secret', () => {
    const error = captureConfigError(() =>
      createAuthConfig({
        consumerKey: 'test-consumer-key',
        clientAuth: 'client_secret',
      }),
    );

    expect(error.missing).toEqual(['SF_CONSUMER_SECRET']);
    expect(error.message).toBe(
      'Missing required configuration: SF_CONSUMER_SECRET',
    );
  });

  it('should require an explicit client authentication alongside a secret', () => {
    const error = captureConfigError(() =>
      createAuthConfig({
        consumerKey: 'test-consumer-key',
        consumerSecret: 'test-secret',
      }),
    );

    expect(error.missing).toEqual(['SF_CLIENT_AUTH']);
    expect(error.message).toBe('Missing required configuration: SF_CLIENT_AUTH');
  });

  it('should keep a secret of a client that authenticates as public', () => {
    const config = createAuthConfig({
      consumerKey: 'test-consumer-key',
      consumerSecret: 'test-secret',
      clientAuth: 'none',
    });

    expect(config.clientAuth).toBe('none');
    expect(config.consumerSecret).toBe('test-secret');
  });

  it('should switch to the sandbox for a test instance url', () => {
    const config = createAuthConfig({
      consumerKey: 'test-consumer-key',
      instanceUrl: 'https://test.salesforce.com',
    });

    expect(config.environment).toBe('sandbox');
  });

  it('should strip trailing slashes from the instance url', () => {
    const config = createAuthConfig({
      consumerKey: 'test-consumer-key',
      instanceUrl: 'https://acme.my.salesforce.com//',
    });

    expect(config.instanceUrl).toBe('https://acme.my.salesforce.com');
    expect(config.environment).toBe('production');
  });
});

describe('fn:canonicalHost', () => {
  it('should resolve the login host of each environment', () => {
    expect(canonicalHost('production')).toBe('https://login.salesforce.com');
    expect(canonicalHost('sandbox')).toBe('https://test.salesforce.com');
  });
});

describe('fn:authorizeHost', () => {
  it('should prefer the custom domain for authorization', () => {
    expect(
      authorizeHost(
        createAuthConfig({
          consumerKey: 'test-consumer-key',
          instanceUrl: 'https://acme.my.salesforce.com',
        }),
      ),
    ).toBe('https://acme.my.salesforce.com');
    expect(
      authorizeHost(createAuthConfig({ consumerKey: 'test-consumer-key' })),
    ).toBe('https://login.salesforce.com');
  });
});
