import type {
  JsonifibleObject,
  JsonObject,
  JsonPrimitive,
} from '#json';

/** own properties never copied from an error into its json form */
const RESERVED_ERROR_KEYS = new Set(['name', 'message', 'stack', 'cause']);

/**
 * converts any error caught in a try-catch block to a json-compatible format
 *
 * primitive own properties of an error (e.g. `kind`, `status`, `code`) are
 * carried over so that structured auth failures keep their diagnostics
 * @param error any value that was thrown/caught
 * @returns a json-serializable representation of the error
 */
export function jsonifyError(error: unknown): JsonifibleObject {
  switch (typeof error) {
    case 'object':
      if (error instanceof Error) {
        return jsonifyErrorInstance(error);
      }

      if (error === null) {
        return { type: 'null', value: error };
      }

      return jsonifyObject(error);
    case 'boolean':
    case 'number':
    case 'string':
    case 'undefined':
      return { type: typeof error, value: error };
    case 'function':
      return { type: 'function', name: error.name || 'anonymous' };
    case 'bigint':
      return { type: 'bigint', value: String(error) };
    case 'symbol':
      return { type: 'symbol', description: error.description };
    default:
      return { type: 'unknown' };
  }
}

/**
 * serializes an Error, its primitive own properties, aggregated errors and cause
 * @param error error instance
 * @returns json form of the error
 */
function jsonifyErrorInstance(error: Error): JsonifibleObject {
  const details: Record<string, JsonPrimitive> = {};

  for (const [key, value] of Object.entries(error)) {
    if (!RESERVED_ERROR_KEYS.has(key) && isJsonPrimitive(value)) {
      details[key] = value;
    }
  }

  return {
    type: 'Error',
    name: error.name,
    message: error.message,
    stack: error.stack,
    ...details,
    ...(error instanceof AggregateError && {
      errors: error.errors.map(jsonifyError),
    }),
    ...(error.cause !== undefined && { cause: jsonifyError(error.cause) }),
  };
}

/**
 * serializes a plain object or array, replacing circular references
 * @param value non-null object
 * @returns json form of the object
 */
function jsonifyObject(value: object): JsonifibleObject {
  const tag = Object.prototype.toString.call(value);

  if (
    tag === '[object WeakMap]' ||
    tag === '[object WeakSet]' ||
    tag === '[object Map]' ||
    tag === '[object Set]'
  ) {
    return { type: 'unknown', toString: tag };
  }

  const serialized: JsonObject = JSON.parse(
    JSON.stringify(value, getCircularReplacer()),
  );

  return { type: Array.isArray(value) ? 'array' : 'object', value: serialized };
}

/**
 * checks whether a value can be logged as-is
 * @param value candidate value
 * @returns true for strings, finite numbers, booleans and null
 */
function isJsonPrimitive(value: unknown): value is JsonPrimitive {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

/**
 * creates a replacer function that handles circular references
 * @returns function that replaces circular references for json.stringify
 */
function getCircularReplacer(): (key: string, value: unknown) => unknown {
  const seen = new WeakSet<object>();

  return (_key: string, value: unknown) => {
    if (typeof value === 'function') {
      return undefined;
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };
}
