import { chmod, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import type { TokenRecord } from '#oauth/types';

/** file name of the fallback token file */
export const TOKEN_FILE_NAME = 'oauth_tokens.txt';

/** owner read/write only */
const TOKEN_FILE_MODE = 0o600;
/** owner only */
const TOKEN_DIRECTORY_MODE = 0o700;

/** raw text fields of a stored record, in file line order */
export interface StoredTokenFields {
  accessToken: string | null;
  refreshToken: string | null;
  instanceUrl: string | null;
  expiresAt: string | null;
  issuedAt: string | null;
}

/**
 * gets the path of the fallback token file
 * @param configDirectory base configuration directory, e.g. ~/.config
 * @param serviceId namespaced service identifier
 * @returns absolute file path
 */
export function getTokenFilePath(
  configDirectory: string,
  serviceId: string,
): string {
  return join(configDirectory, serviceId, TOKEN_FILE_NAME);
}

/**
 * serializes a record as newline-delimited access token, refresh token,
 * instance url, expiry and issue time
 * @param record record to serialize
 * @returns file content
 */
export function serializeTokenFile(record: TokenRecord): string {
  return [
    record.accessToken,
    record.refreshToken ?? '',
    record.instanceUrl,
    String(record.expiresAt),
    String(record.issuedAt),
  ].join('\n');
}

/**
 * splits file content into its raw fields
 * @param content file content
 * @returns raw fields, null where a line is missing or blank
 */
export function parseTokenFile(content: string): StoredTokenFields {
  const [accessToken, refreshToken, instanceUrl, expiresAt, issuedAt] = content
    .split(/\r?\n/)
    .map((line) => line.trim());

  const orNull = (value: string | undefined): string | null =>
    value ? value : null;

  return {
    accessToken: orNull(accessToken),
    refreshToken: orNull(refreshToken),
    instanceUrl: orNull(instanceUrl),
    expiresAt: orNull(expiresAt),
    issuedAt: orNull(issuedAt),
  };
}

/**
 * loads the raw fields of the token file
 * @param filePath path of the token file
 * @returns raw fields or null if the file doesn't exist
 */
export async function loadTokenFile(
  filePath: string,
): Promise<StoredTokenFields | null> {
  try {
    return parseTokenFile(await readFile(filePath, 'utf-8'));
  } catch (exception) {
    if (isMissingFileError(exception)) {
      return null;
    }

    throw exception;
  }
}

/**
 * writes the token file readable by its owner only
 * @param filePath path of the token file
 * @param record record to persist
 */
export async function saveTokenFile(
  filePath: string,
  record: TokenRecord,
): Promise<void> {
  await mkdir(dirname(filePath), {
    recursive: true,
    mode: TOKEN_DIRECTORY_MODE,
  });
  await writeFile(filePath, serializeTokenFile(record), {
    encoding: 'utf-8',
    mode: TOKEN_FILE_MODE,
  });
  // mode only applies on creation, tighten a pre-existing file too
  await chmod(filePath, TOKEN_FILE_MODE);
}

/**
 * deletes the token file, a missing file is not an error
 * @param filePath path of the token file
 */
export async function deleteTokenFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * checks whether an fs error means the file is absent
 * @param exception caught value
 * @returns true for ENOENT
 */
function isMissingFileError(exception: unknown): boolean {
  return (
    exception instanceof Error &&
    'code' in exception &&
    exception.code === 'ENOENT'
  );
}
