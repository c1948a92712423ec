/** successful outcome carrying a value */
export interface Success<T> {
  success: true;
  value: T;
}

/** failed outcome carrying a structured error */
export interface Failure<E> {
  success: false;
  error: E;
}

/**
 * tagged outcome of an operation whose failures are reported rather than thrown
 *
 * network and HTTP level failures travel through this type so that callers
 * can branch on `success` without try/catch boilerplate
 */
export type Result<T, E> = Success<T> | Failure<E>;

/**
 * wraps a value into a successful result
 * @param value payload of the result
 * @returns success result
 */
export function ok<T>(value: T): Success<T> {
  return { success: true, value };
}

/**
 * wraps an error into a failed result
 * @param error structured failure
 * @returns failure result
 */
export function err<E>(error: E): Failure<E> {
  return { success: false, error };
}
