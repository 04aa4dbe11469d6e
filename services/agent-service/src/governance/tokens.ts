/**
 * RATE_LIMITER
 *
 * Injection token for the process-wide TokenBucket.
 */
export const RATE_LIMITER = 'RATE_LIMITER';
