// HTTP STATUS CODES //

/** HTTP 200 OK status code for a successful token or api response */
export const HTTP_STATUS_OK = 200;
/** HTTP 400 Bad Request status code for rejected callbacks */
export const HTTP_STATUS_BAD_REQUEST = 400;
/** HTTP 401 Unauthorized status code for expired or revoked tokens */
export const HTTP_STATUS_UNAUTHORIZED = 401;
/** HTTP 404 Not Found status code for unknown listener paths */
export const HTTP_STATUS_NOT_FOUND = 404;
/** HTTP 500 Internal Server Error status code for failed callback handling */
export const HTTP_STATUS_INTERNAL_SERVER_ERROR = 500;

// TIMEOUTS //

/** timeout in milliseconds of a single token endpoint request */
export const TOKEN_REQUEST_TIMEOUT_MS = 30_000;
