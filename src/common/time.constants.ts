/**
 * Time constants in milliseconds for consistent usage across the application
 */
export const ONE_SECOND_IN_MILLISECONDS = 1000;
export const ONE_MINUTE_IN_MILLISECONDS = 60 * ONE_SECOND_IN_MILLISECONDS;
export const ONE_HOUR_IN_MILLISECONDS = 60 * ONE_MINUTE_IN_MILLISECONDS;
export const ONE_DAY_IN_MILLISECONDS = 24 * ONE_HOUR_IN_MILLISECONDS;

/**
 * Histogram buckets (seconds) for chat command latency
 */
export const COMMAND_LATENCY_BUCKETS_SECONDS = [0.1, 0.5, 1.0, 2.0, 5.0, 10.0];
