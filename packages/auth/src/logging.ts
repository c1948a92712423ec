import { isLogLevel } from '@forcelink/core';

import type { JsonifibleObject, JsonValue, Log } from '@forcelink/core';
import type { FastifyServerOptions } from 'fastify';

/**
 * converts a parsed json value into a loggable value
 * @param value value produced by JSON.parse
 * @returns the same value typed as json
 */
function toJsonValue(value: unknown): JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }

  if (typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, toJsonValue(entry)]),
    );
  }

  return String(value);
}

/**
 * creates fastify logger configuration that bridges to a custom log function
 * when no log function is provided, logging is disabled
 * @param log optional custom logging function
 * @returns fastify logger configuration object
 * @example
 * ```typescript
 * const server = fastify({
 *   logger: createLoggerConfig((level, message, data) => {
 *     console.log(`[${level}] ${message}`, data);
 *   }),
 * });
 * ```
 */
export function createLoggerConfig(log?: Log): FastifyServerOptions['logger'] {
  if (!log) {
    return false;
  }

  return {
    level: 'trace',
    messageKey: 'message',
    errorKey: 'error',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    // bridge fastify's pino logger to our custom Log function
    stream: {
      write: (msg: string) => {
        let parsed: unknown;

        try {
          parsed = JSON.parse(msg);
        } catch {
          // fallback for non-JSON log messages
          log('info', msg.trim());

          return;
        }

        if (typeof parsed !== 'object' || parsed === null) {
          log('info', msg.trim());

          return;
        }

        const { level, message, ...rawMeta } = Object.fromEntries(
          Object.entries(parsed).map(([key, value]) => [
            key,
            toJsonValue(value),
          ]),
        );

        const meta: JsonifibleObject = rawMeta;
        const logLevel = isLogLevel(level) ? level : 'info';
        const text = typeof message === 'string' ? message : '';

        if (Object.keys(meta).length > 0) {
          log(logLevel, text, meta);
        } else {
          log(logLevel, text);
        }
      },
    },
  };
}
