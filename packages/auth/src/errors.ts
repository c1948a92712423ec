/**
 * @file error taxonomy of credential issuance
 *
 * every class carries a literal `kind` so that reported failures can be
 * matched exhaustively; transient failures travel inside a `Result`, local
 * misconfiguration is thrown
 */

/** discriminant of every auth failure */
export type AuthErrorKind =
  | 'ConfigIncomplete'
  | 'BrowserLaunchFailed'
  | 'CallbackTimeout'
  | 'CallbackProviderError'
  | 'CallbackMalformed'
  | 'TokenExchangeHTTPError'
  | 'TokenExchangeNetworkError'
  | 'AssertionSigningError'
  | 'ReauthenticationRequired';

/** base class of all credential issuance errors */
export abstract class AuthError extends Error {
  public abstract readonly kind: AuthErrorKind;

  /**
   * creates new auth error
   * @param message actionable description of the failure
   * @param options standard error options carrying the cause
   */
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** required configuration values are missing or invalid */
export class ConfigIncompleteError extends AuthError {
  public readonly kind = 'ConfigIncomplete';

  /**
   * @param missing names of the missing settings, e.g. `SF_CONSUMER_KEY`
   * @param problems additional validation messages
   */
  constructor(
    public readonly missing: readonly string[],
    problems: readonly string[] = [],
  ) {
    super(
      [
        missing.length > 0
          ? `Missing required configuration: ${missing.join(', ')}`
          : 'Invalid configuration',
        ...problems,
      ].join('. '),
    );
  }
}

/** the system browser could not be opened for the authorization url */
export class BrowserLaunchFailedError extends AuthError {
  public readonly kind = 'BrowserLaunchFailed';

  /**
   * @param authorizationUrl url the browser was asked to open
   * @param cause error raised by the launcher
   */
  constructor(
    public readonly authorizationUrl: string,
    cause?: unknown,
  ) {
    super(
      'Failed to open a browser for sign-in and the callback listener is closed. Make a browser available and restart sign-in',
      { cause },
    );
  }
}

/** no redirect reached the local listener before its deadline */
export class CallbackTimeoutError extends AuthError {
  public readonly kind = 'CallbackTimeout';

  /**
   * @param timeoutMs how long the listener waited
   */
  constructor(public readonly timeoutMs: number) {
    super(
      `Timed out after ${timeoutMs}ms waiting for the authorization redirect. Restart sign-in and complete it in the browser`,
    );
  }
}

/** the authorization server redirected back with an error */
export class CallbackProviderError extends AuthError {
  public readonly kind = 'CallbackProviderError';

  /**
   * @param code oauth error code, e.g. `access_denied`
   * @param description provider supplied description
   */
  constructor(
    public readonly code: string,
    public readonly description: string,
  ) {
    super(`Authorization was rejected: ${code} - ${description}`);
  }
}

/** the redirect carried neither a code nor an error, or could not be handled */
export class CallbackMalformedError extends AuthError {
  public readonly kind = 'CallbackMalformed';
}

/** the token endpoint answered with a non-success response */
export class TokenExchangeHTTPError extends AuthError {
  public readonly kind = 'TokenExchangeHTTPError';

  /** HTTP status of the response */
  public readonly status: number;
  /** raw response body, kept for diagnostics */
  public readonly body: string;
  /** provider error code, `unknown_error` when none could be parsed */
  public readonly code: string;
  /** provider description of the error */
  public readonly description?: string;
  /** remediation checklist for recognized error codes */
  public readonly hint?: string;

  /**
   * @param details classified response
   * @param details.status HTTP status
   * @param details.body raw body
   * @param details.code provider error code
   * @param details.description provider description
   * @param details.hint remediation for the code
   */
  constructor(details: {
    status: number;
    body: string;
    code: string;
    description?: string;
    hint?: string;
  }) {
    super(
      [
        `Token exchange failed with HTTP ${details.status}: ${details.code}${details.description ? ` - ${details.description}` : ''}`,
        details.hint,
      ]
        .filter((part): part is string => !!part)
        .join('. '),
    );

    this.status = details.status;
    this.body = details.body;
    this.code = details.code;
    this.description = details.description;
    this.hint = details.hint;
  }
}

/** the token endpoint could not be reached */
export class TokenExchangeNetworkError extends AuthError {
  public readonly kind = 'TokenExchangeNetworkError';

  /**
   * @param endpoint token endpoint url
   * @param cause underlying network error
   */
  constructor(
    public readonly endpoint: string,
    cause: unknown,
  ) {
    super(
      `Network error while contacting ${endpoint}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

/** the jwt assertion could not be signed, always a configuration defect */
export class AssertionSigningError extends AuthError {
  public readonly kind = 'AssertionSigningError';
}

/** the refresh token was rejected and an interactive sign-in is required */
export class ReauthenticationRequiredError extends AuthError {
  public readonly kind = 'ReauthenticationRequired';

  /**
   * @param cause failure of the refresh attempt
   */
  constructor(cause: unknown) {
    super(
      'The refresh token is no longer accepted. Sign in again to obtain new credentials',
      { cause },
    );
  }
}

/** failures produced by the browser authorization flow */
export type AuthorizationFailure =
  | BrowserLaunchFailedError
  | CallbackTimeoutError
  | CallbackProviderError
  | CallbackMalformedError
  | TokenExchangeHTTPError
  | TokenExchangeNetworkError;

/** every failure reported by the token lifecycle */
export type AuthFailure =
  | AuthorizationFailure
  | ReauthenticationRequiredError;
