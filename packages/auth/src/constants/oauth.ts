// HOSTS //

/** canonical login host of production orgs */
export const PRODUCTION_LOGIN_HOST = 'https://login.salesforce.com';
/** canonical login host of sandbox orgs */
export const SANDBOX_LOGIN_HOST = 'https://test.salesforce.com';
/** hostname fragment that marks an instance url as a sandbox */
export const SANDBOX_HOST_MARKER = 'test.salesforce.com';

// PATHS //

/** authorization endpoint path on the authorize host */
export const AUTHORIZE_PATH = '/services/oauth2/authorize';
/** token endpoint path on the canonical host */
export const TOKEN_PATH = '/services/oauth2/token';

// CALLBACK LISTENER //

/** first port tried by the callback listener */
export const DEFAULT_CALLBACK_PORT = 8080;
/** number of consecutive ports scanned by the callback listener */
export const DEFAULT_CALLBACK_PORT_COUNT = 10;
/** path the authorization server redirects to */
export const CALLBACK_PATH = '/callback';
/** how long a browser authorization attempt may take in milliseconds */
export const CALLBACK_TIMEOUT_MS = 300_000;

// TOKENS //

/** lifetime assumed when the provider omits expires_in, in seconds */
export const DEFAULT_EXPIRES_IN_SECONDS = 3600;
/** default lifetime of a jwt assertion in seconds */
export const DEFAULT_ASSERTION_LIFETIME_SECONDS = 180;
/** longest lifetime the provider accepts for a jwt assertion in seconds */
export const MAX_ASSERTION_LIFETIME_SECONDS = 300;
/** scope requested by the browser flow when none is configured */
export const DEFAULT_SCOPE = 'full refresh_token';
