/**
 * @file failures of sessions and api calls
 */

/** discriminants of session failures */
export type SessionErrorKind = 'SessionBinding' | 'ApiHTTPError' | 'ApiNetworkError';

/** base of every session failure */
export abstract class SessionError extends Error {
  public abstract readonly kind: SessionErrorKind;

  /**
   * @param message actionable description
   * @param options standard error options carrying the cause
   */
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** a session was used outside the execution context it belongs to, or after closing */
export class SessionBindingError extends SessionError {
  public readonly kind = 'SessionBinding';

  /**
   * @param expected context the session belongs to
   * @param actual context of the caller
   * @param closed whether the session had already been closed
   */
  constructor(
    public readonly expected: string,
    public readonly actual: string,
    closed = false,
  ) {
    super(
      closed
        ? `The session of ${expected} is closed. Request a new one from the session registry`
        : `The session of ${expected} was used from ${actual}. Request a session from the registry inside the calling context`,
    );
  }
}

/** the api answered with an error status */
export class ApiHTTPError extends SessionError {
  public readonly kind = 'ApiHTTPError';

  /**
   * @param status http status
   * @param body raw response body
   */
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`The API request failed with HTTP ${status}`);
  }
}

/** the api could not be reached */
export class ApiNetworkError extends SessionError {
  public readonly kind = 'ApiNetworkError';

  /**
   * @param url requested url
   * @param cause underlying failure
   */
  constructor(
    public readonly url: string,
    cause: unknown,
  ) {
    super(
      `Network error while requesting ${url}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}
