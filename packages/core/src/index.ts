export type { Log, LogLevel } from '#logging';
export type {
  JsonArray,
  JsonifibleObject,
  JsonifibleValue,
  JsonObject,
  JsonPrimitive,
  JsonValue,
} from '#json';
export type { Failure, Result, Success } from '#result';

export { jsonifyError } from '#error';
export {
  describeSecret,
  isLogLevel,
  LOG_LEVELS,
} from '#logging';
export { err, ok } from '#result';
export { Mutex } from '#mutex';
export {
  MINUTES_TO_MS,
  MS_PER_SECOND,
} from '#constants/time';
