export {
  API_VERSION,
  ApiClient,
  CONNECTION_TEST_QUERY,
} from '#api-client';
export {
  ApiHTTPError,
  ApiNetworkError,
  SessionBindingError,
  SessionError,
} from '#errors';
export {
  currentContextId,
  withExecutionContext,
} from '#execution-context';
export {
  POOL_PROFILES,
  resolvePoolConfig,
  toAgentOptions,
} from '#pool-config';
export { createRuntime } from '#runtime';
export {
  createPoolDispatcher,
  DEFAULT_HEADERS,
  SessionHandle,
  SessionRegistry,
} from '#session-registry';

export type {
  ApiClientOptions,
  ApiFailure,
  ApiResponse,
  ApiResult,
  ConnectionTestResult,
} from '#api-client';
export type { SessionErrorKind } from '#errors';
export type { PoolConfig, PoolConfigInput, PoolProfile } from '#pool-config';
export type { Runtime, RuntimeOptions } from '#runtime';
export type {
  DispatcherFactory,
  SessionHandleOptions,
  SessionRegistryOptions,
  SessionStats,
} from '#session-registry';
