/**
 * milliseconds per second conversion constant
 * @description used for converting timestamps between seconds and milliseconds
 */
export const MS_PER_SECOND = 1000;

/**
 * seconds per minute
 * @description standard time conversion constant
 */
export const SECONDS_PER_MINUTE = 60;

/** minutes to milliseconds conversion */
export const MINUTES_TO_MS = SECONDS_PER_MINUTE * MS_PER_SECOND;
