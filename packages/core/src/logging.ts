import type { JsonifibleObject } from '#json';

/** logging levels in order of severity from lowest to highest */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** formats log messages */
export type Log = (
  level: LogLevel,
  message: string,
  meta?: JsonifibleObject,
) => void;

/** all log levels ordered by severity */
export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
];

/**
 * checks whether a value names a known log level
 * @param value candidate level, e.g. a parsed pino label
 * @returns true when value is one of the supported levels
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * redacts a secret for log output, keeping only its presence and length
 * @param secret token, code or key material
 * @returns a description safe to log
 */
export function describeSecret(secret: string | undefined | null): string {
  return secret ? `present (length: ${secret.length})` : 'missing';
}
