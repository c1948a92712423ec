/**
 * @file identity of the execution context a caller runs in
 *
 * an execution context is an async call tree entered through
 * `withExecutionContext`; code outside any such tree belongs to the context
 * of its thread
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { threadId } from 'node:worker_threads';

const storage = new AsyncLocalStorage<string>();

/**
 * runs a function inside a named execution context
 * @param contextId identity of the context
 * @param fn work to run; everything it awaits inherits the context
 * @returns the function's result
 * @example
 * ```typescript
 * await withExecutionContext('report-worker-1', async () => client.testConnection());
 * ```
 */
export function withExecutionContext<T>(contextId: string, fn: () => T): T {
  return storage.run(contextId, fn);
}

/**
 * identifies the execution context of the caller
 * @returns the enclosing context id, or `thread-<threadId>` outside of one
 */
export function currentContextId(): string {
  return storage.getStore() ?? `thread-${threadId}`;
}
