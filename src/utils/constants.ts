/**
 * Injection token for the rate limit configuration
 */
export const RATE_LIMIT_CONFIG = 'RATE_LIMIT_CONFIG';

/**
 * Injection token for the bucket store backing the rate limiter
 */
export const RATE_LIMIT_BUCKET_STORE = 'RATE_LIMIT_BUCKET_STORE';

/**
 * Name of the interval registered with the SchedulerRegistry for idle bucket sweeps
 */
export const RATE_LIMIT_SWEEP_INTERVAL = 'rate-limit:sweep';

/**
 * Key shared by all traffic when no key function is configured
 */
export const GLOBAL_KEY = 'global';

export const DEFAULT_KEY_PREFIX = 'ratelimit:';
export const DEFAULT_TTL_SECONDS = 60;
export const DEFAULT_TIMEOUT_MS = 100;
export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;
