import { ENV_VARIABLES } from '#config';
import {
  CALLBACK_PATH,
  DEFAULT_CALLBACK_PORT,
  PRODUCTION_LOGIN_HOST,
  SANDBOX_LOGIN_HOST,
} from '#constants/oauth';

/** provider error codes that carry a remediation checklist */
export type KnownTokenErrorCode =
  | 'invalid_client'
  | 'invalid_grant'
  | 'oauth_flow_disabled';

/**
 * joins checklist items into one readable hint
 * @param heading sentence introducing the checklist
 * @param items likely causes, most common first
 * @returns hint text
 */
function checklist(heading: string, items: string[]): string {
  return `${heading}: ${items.map((item, index) => `(${index + 1}) ${item}`).join('; ')}`;
}

/* eslint-disable @typescript-eslint/naming-convention */
const HINTS: Record<KnownTokenErrorCode, string> = {
  invalid_client: checklist('Check the connected app configuration', [
    `the consumer key in ${ENV_VARIABLES.consumerKey} matches the connected app`,
    'the connected app has finished deploying, which can take up to 10 minutes after a change',
    `"Require Secret for Web Server Flow" is only enabled when ${ENV_VARIABLES.consumerSecret} is set and ${ENV_VARIABLES.clientAuth} is client_secret`,
    `the callback URL list contains http://localhost:${DEFAULT_CALLBACK_PORT}${CALLBACK_PATH}`,
    'the selected OAuth scopes include api and refresh_token',
    `tokens are exchanged through ${PRODUCTION_LOGIN_HOST} or ${SANDBOX_LOGIN_HOST}, not a custom domain`,
  ]),
  invalid_grant: checklist('The grant was rejected', [
    'authorization codes are single use and expire after a few minutes, so sign in again',
    'the refresh token may have been revoked or expired under the connected app refresh policy',
    'for the JWT flow the certificate must be uploaded to the connected app and the user pre-authorized',
    `the environment in ${ENV_VARIABLES.environment} must match the org, production or sandbox`,
  ]),
  oauth_flow_disabled: checklist('The OAuth flow is disabled', [
    'enable the flow in the OAuth policies of the connected app',
    'ask an administrator to allow it under OAuth and OpenID Connect Settings of the org',
  ]),
};
/* eslint-enable @typescript-eslint/naming-convention */

/**
 * looks up the remediation checklist of a provider error code
 * @param code provider error code
 * @returns hint for known codes, undefined otherwise
 */
export function getTokenErrorHint(code: string): string | undefined {
  return isKnownTokenErrorCode(code) ? HINTS[code] : undefined;
}

/**
 * checks whether a provider error code has a checklist
 * @param code provider error code
 * @returns true for recognized codes
 */
export function isKnownTokenErrorCode(
  code: string,
): code is KnownTokenErrorCode {
  return Object.keys(HINTS).includes(code);
}
