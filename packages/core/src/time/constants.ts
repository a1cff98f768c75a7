/**
 * Time constants in milliseconds.
 */

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;

/**
 * Epoch values below this are read as seconds rather than milliseconds
 * (1e11 ms is early March 1973, 1e11 s is far in the future).
 */
export const EPOCH_SECONDS_THRESHOLD = 100_000_000_000;
