/**
 * Injection token for VelocityCounter configuration
 */
export const VELOCITY_COUNTER_CONFIG = 'VELOCITY_COUNTER_CONFIG';

/**
 * Injection token for the atomic counter store
 */
export const VELOCITY_COUNTER_STORE = 'VELOCITY_COUNTER_STORE';

/**
 * Injection token for the metrics sink
 */
export const VELOCITY_COUNTER_METRICS = 'VELOCITY_COUNTER_METRICS';

/**
 * Injection token for the wall clock (epoch milliseconds)
 */
export const VELOCITY_COUNTER_CLOCK = 'VELOCITY_COUNTER_CLOCK';

export const DEFAULT_OPERATION_TIMEOUT_MS = 250;

// TTL helpers, in seconds
export const SECOND = 1;
export const MINUTE = SECOND * 60;
export const FIVE_MINUTES = MINUTE * 5;
export const TEN_MINUTES = MINUTE * 10;
export const THIRTY_MINUTES = MINUTE * 30;
export const HOUR = MINUTE * 60;
export const DAY = HOUR * 24;
export const WEEK = DAY * 7;
