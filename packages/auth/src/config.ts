/**
 * @file immutable credential configuration
 *
 * the configuration is validated once, frozen, and handed to every component
 * at construction so no component keeps mutable credential state of its own
 */

import { Ajv } from 'ajv';

import {
  DEFAULT_SCOPE,
  PRODUCTION_LOGIN_HOST,
  SANDBOX_HOST_MARKER,
  SANDBOX_LOGIN_HOST,
} from '#constants/oauth';
import { ConfigIncompleteError } from '#errors';

import type { ErrorObject, SchemaObject } from 'ajv';

// TYPES //

/** how the manager obtains a token when no refresh token is available */
export type AuthMethod = 'pkce' | 'jwt';

/**
 * how the browser flow authenticates the client at the token endpoint
 *
 * `none` is a public pkce client; `client_secret` sends the consumer secret
 * along with the verifier
 */
export type ClientAuth = 'none' | 'client_secret';

/** which canonical login host the org lives behind */
export type Environment = 'production' | 'sandbox';

/** credential configuration of one logical account */
export interface AuthConfig {
  /** namespace of persisted secrets */
  readonly serviceId: string;
  readonly consumerKey: string;
  readonly consumerSecret?: string;
  readonly clientAuth: ClientAuth;
  readonly authMethod: AuthMethod;
  readonly jwtSubject?: string;
  readonly privateKeyPath?: string;
  readonly keyId?: string;
  readonly environment: Environment;
  /** custom or vanity domain used for authorization, never for token exchange */
  readonly instanceUrl?: string;
  readonly scope: string;
}

/** unvalidated configuration values */
export type AuthConfigInput = {
  -readonly [Key in keyof AuthConfig]?: AuthConfig[Key];
};

// CONSTANTS //

/** default namespace of persisted secrets */
export const DEFAULT_SERVICE_ID = 'forcelink';

/** environment variable backing each configuration field */
export const ENV_VARIABLES = {
  serviceId: 'SF_SERVICE_ID',
  consumerKey: 'SF_CONSUMER_KEY',
  consumerSecret: 'SF_CONSUMER_SECRET',
  clientAuth: 'SF_CLIENT_AUTH',
  authMethod: 'SF_AUTH_METHOD',
  jwtSubject: 'SF_JWT_SUBJECT',
  privateKeyPath: 'SF_JWT_KEY_PATH',
  keyId: 'SF_JWT_KEY_ID',
  environment: 'SF_ENVIRONMENT',
  instanceUrl: 'SF_INSTANCE_URL',
  scope: 'SF_SCOPE',
} as const satisfies Record<keyof AuthConfig, string>;

const CONFIG_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    serviceId: { type: 'string', pattern: '^[A-Za-z0-9._-]+$' },
    consumerKey: { type: 'string', minLength: 1 },
    consumerSecret: { type: 'string', minLength: 1 },
    clientAuth: { type: 'string', enum: ['none', 'client_secret'] },
    authMethod: { type: 'string', enum: ['pkce', 'jwt'] },
    jwtSubject: { type: 'string', minLength: 1 },
    privateKeyPath: { type: 'string', minLength: 1 },
    keyId: { type: 'string', minLength: 1 },
    environment: { type: 'string', enum: ['production', 'sandbox'] },
    instanceUrl: { type: 'string', pattern: '^https?://[^\\s/]+' },
    scope: { type: 'string', minLength: 1 },
  },
  required: ['consumerKey'],
  additionalProperties: false,
  allOf: [
    {
      if: {
        type: 'object',
        properties: { authMethod: { const: 'jwt' } },
        required: ['authMethod'],
      },
      then: { type: 'object', required: ['jwtSubject', 'privateKeyPath'] },
    },
    {
      if: {
        type: 'object',
        properties: { clientAuth: { const: 'client_secret' } },
        required: ['clientAuth'],
      },
      then: { type: 'object', required: ['consumerSecret'] },
    },
    {
      if: { type: 'object', required: ['consumerSecret'] },
      then: { type: 'object', required: ['clientAuth'] },
    },
  ],
};

const validateConfig = new Ajv({ allErrors: true }).compile<AuthConfigInput>(
  CONFIG_SCHEMA,
);

// HELPERS //

/**
 * checks whether a string names a configuration field
 * @param key candidate field name
 * @returns true for keys of the configuration
 */
function isConfigKey(key: string): key is keyof AuthConfig {
  return Object.keys(ENV_VARIABLES).includes(key);
}

/**
 * names the setting an ajv error refers to
 * @param key configuration field
 * @returns the environment variable backing the field
 */
function settingName(key: string): string {
  return isConfigKey(key) ? ENV_VARIABLES[key] : key;
}

/**
 * splits ajv errors into missing settings and other problems
 * @param errors errors reported by ajv
 * @returns missing setting names and readable problem descriptions
 */
function describeErrors(errors: ErrorObject[]): {
  missing: string[];
  problems: string[];
} {
  const missing = new Set<string>();
  const problems = new Set<string>();

  for (const error of errors) {
    const missingProperty: unknown = error.params['missingProperty'];

    if (error.keyword === 'required' && typeof missingProperty === 'string') {
      missing.add(settingName(missingProperty));
    } else if (error.keyword === 'additionalProperties') {
      const extra: unknown = error.params['additionalProperty'];
      problems.add(`Unknown setting ${String(extra)}`);
    } else if (error.keyword !== 'if') {
      const key = error.instancePath.replace(/^\//, '');
      problems.add(`${settingName(key)} ${error.message ?? 'is invalid'}`);
    }
  }

  return { missing: [...missing], problems: [...problems] };
}

/**
 * drops non-string and blank values so that empty variables count as unset
 * @param input raw configuration values
 * @returns values that were actually provided
 */
function compact(input: Record<string, unknown>): Record<string, string> {
  const provided: Record<string, string> = {};

  for (const [key, value] of Object.entries(input)) {
    if (typeof value === 'string' && value.trim() !== '') {
      provided[key] = value.trim();
    }
  }

  return provided;
}

/**
 * validates raw values and freezes them into an AuthConfig
 * @param input raw configuration values keyed by field
 * @returns frozen configuration
 * @throws {ConfigIncompleteError} listing every missing or invalid setting
 */
function buildConfig(input: Record<string, unknown>): AuthConfig {
  const candidate: Record<string, unknown> = compact(input);

  if (!validateConfig(candidate)) {
    const { missing, problems } = describeErrors(validateConfig.errors ?? []);

    throw new ConfigIncompleteError(missing, problems);
  }

  const {
    serviceId = DEFAULT_SERVICE_ID,
    consumerKey,
    clientAuth = 'none',
    authMethod = 'pkce',
    scope = DEFAULT_SCOPE,
  } = candidate;

  if (!consumerKey) {
    throw new ConfigIncompleteError([ENV_VARIABLES.consumerKey]);
  }

  const instanceUrl = candidate.instanceUrl?.replace(/\/+$/, '');
  const environment: Environment =
    candidate.environment === 'sandbox' ||
    !!instanceUrl?.includes(SANDBOX_HOST_MARKER)
      ? 'sandbox'
      : 'production';

  return Object.freeze({
    serviceId,
    consumerKey,
    consumerSecret: candidate.consumerSecret,
    clientAuth,
    authMethod,
    jwtSubject: candidate.jwtSubject,
    privateKeyPath: candidate.privateKeyPath,
    keyId: candidate.keyId,
    environment,
    instanceUrl,
    scope,
  });
}

// CONFIGURATION //

/**
 * validates configuration values and freezes them into an AuthConfig
 *
 * a consumer secret must come with an explicit `clientAuth`, which defaults
 * to `none` only when no secret is given; `client_secret` without a secret
 * is rejected
 * @param input raw configuration values
 * @returns frozen configuration
 * @throws {ConfigIncompleteError} listing every missing or invalid setting
 * @example
 * ```typescript
 * const config = createAuthConfig({
 *   consumerKey: 'connected-app-key',
 *   authMethod: 'pkce',
 * });
 * ```
 */
export function createAuthConfig(input: AuthConfigInput): AuthConfig {
  return buildConfig({ ...input });
}

/**
 * reads and validates the configuration from environment variables
 * @param env environment to read, defaults to the process environment
 * @returns frozen configuration
 * @throws {ConfigIncompleteError} listing every missing or invalid variable
 */
export function loadAuthConfig(env: NodeJS.ProcessEnv = process.env): AuthConfig {
  const input: Record<string, unknown> = {};

  for (const [key, variable] of Object.entries(ENV_VARIABLES)) {
    input[key] = env[variable];
  }

  return buildConfig(input);
}

/**
 * resolves the canonical login host of an environment
 *
 * the token endpoint is always reached through this host, even when
 * authorization happened on a custom domain
 * @param environment production or sandbox
 * @returns origin of the login host
 */
export function canonicalHost(environment: Environment): string {
  return environment === 'sandbox' ? SANDBOX_LOGIN_HOST : PRODUCTION_LOGIN_HOST;
}

/**
 * resolves the host the browser is sent to for authorization
 * @param config credential configuration
 * @returns custom instance url when configured, the canonical host otherwise
 */
export function authorizeHost(config: AuthConfig): string {
  return config.instanceUrl ?? canonicalHost(config.environment);
}
