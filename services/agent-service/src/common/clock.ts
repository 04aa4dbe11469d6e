/**
 * Clock
 *
 * Time source shared by every component that waits or stamps records.
 * Injected so tests can advance time without real sleeping.
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;

  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) =>
    new Promise<void>((resolve) => {
      setTimeout(resolve, Math.max(0, ms));
    }),
};

/**
 * Injection token for an optional Clock override.
 * Providers fall back to systemClock when nothing is bound.
 */
export const CLOCK = 'CLOCK';

/**
 * UTC calendar day (YYYY-MM-DD) for an epoch timestamp
 */
export function utcDay(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}
