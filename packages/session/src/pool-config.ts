/**
 * @file connection pool profiles of api sessions
 */

import { MS_PER_SECOND } from '@forcelink/core';

import type { Agent } from 'undici';

/** connection pool and timeout settings of one session */
export interface PoolConfig {
  /** cap on open connections across every host */
  maxConnections: number;
  /** cap on open connections to a single host */
  maxConnectionsPerHost: number;
  /** how long resolved addresses are reused */
  dnsCacheTtlMs: number;
  /** idle time before a kept-alive socket is closed */
  keepAliveTimeoutMs: number;
  /** deadline of a whole request including the body */
  totalTimeoutMs: number;
  connectTimeoutMs: number;
  /** longest silence while waiting for headers or body data */
  readTimeoutMs: number;
}

/** named pool profiles */
export const POOL_PROFILES = {
  default: {
    maxConnections: 100,
    maxConnectionsPerHost: 30,
    dnsCacheTtlMs: 300 * MS_PER_SECOND,
    keepAliveTimeoutMs: 60 * MS_PER_SECOND,
    totalTimeoutMs: 90 * MS_PER_SECOND,
    connectTimeoutMs: 10 * MS_PER_SECOND,
    readTimeoutMs: 60 * MS_PER_SECOND,
  },
  api: {
    maxConnections: 50,
    maxConnectionsPerHost: 20,
    dnsCacheTtlMs: 300 * MS_PER_SECOND,
    keepAliveTimeoutMs: 90 * MS_PER_SECOND,
    totalTimeoutMs: 120 * MS_PER_SECOND,
    connectTimeoutMs: 15 * MS_PER_SECOND,
    readTimeoutMs: 90 * MS_PER_SECOND,
  },
} as const satisfies Record<string, PoolConfig>;

/** name of a pool profile */
export type PoolProfile = keyof typeof POOL_PROFILES;

/** a profile name, or overrides applied on top of the default profile */
export type PoolConfigInput = PoolProfile | Partial<PoolConfig>;

/**
 * resolves a profile name or overrides to a complete pool config
 * @param input profile name or overrides of the default profile
 * @returns complete pool config
 * @throws {RangeError} when a limit or timeout is not a positive number
 */
export function resolvePoolConfig(input: PoolConfigInput = 'default'): PoolConfig {
  const config: PoolConfig =
    typeof input === 'string'
      ? { ...POOL_PROFILES[input] }
      : { ...POOL_PROFILES.default, ...input };

  const settings: Array<[string, number]> = Object.entries(config);

  for (const [key, value] of settings) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new RangeError(
        `Pool setting ${key} must be a positive number, got ${value}`,
      );
    }
  }

  return config;
}

/**
 * maps a pool config onto undici agent options
 *
 * undici pools per origin, so the per-host cap bounds every pool and the
 * total cap can only narrow it further
 * @param config pool config
 * @returns agent options
 */
export function toAgentOptions(config: PoolConfig): Agent.Options {
  return {
    connections: Math.min(config.maxConnections, config.maxConnectionsPerHost),
    keepAliveTimeout: config.keepAliveTimeoutMs,
    connectTimeout: config.connectTimeoutMs,
    headersTimeout: config.readTimeoutMs,
    bodyTimeout: config.readTimeoutMs,
  };
}
