import { Clock, systemClock } from '../common/clock';
import { InferenceProviderException } from '../errors/inference-provider.exception';
import { isRecord } from '../common/records';

/**
 * Provider error codes that mean "slow down" rather than "broken".
 * Bedrock-style exception names and the Anthropic / OpenAI error types.
 */
export const THROTTLING_ERROR_CODES: ReadonlySet<string> = new Set([
  'ThrottlingException',
  'TooManyRequestsException',
  'ProvisionedThroughputExceededException',
  'rate_limit_error',
  'overloaded_error',
  'rate_limit_exceeded',
]);

export type InferenceErrorClass = 'throttling' | 'other';

export interface BackoffPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface BackoffOptions {
  clock?: Clock;
  /** Uniform [0, 1) source for jitter */
  random?: () => number;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

/**
 * Provider error code carried by an error, if any.
 * Adapters normalize to InferenceProviderException; raw SDK errors expose
 * `code` or, for AWS-style clients, the exception `name`.
 */
export function readProviderErrorCode(error: unknown): string | undefined {
  if (error instanceof InferenceProviderException) {
    return error.code;
  }
  if (!isRecord(error)) {
    return undefined;
  }
  if (typeof error.code === 'string') {
    return error.code;
  }
  return typeof error.name === 'string' ? error.name : undefined;
}

export function classifyInferenceError(error: unknown): InferenceErrorClass {
  const code = readProviderErrorCode(error);
  return code !== undefined && THROTTLING_ERROR_CODES.has(code)
    ? 'throttling'
    : 'other';
}

/**
 * min(base × 2^attempt, max) plus up to 50% jitter on top
 */
export function computeBackoffDelay(
  attempt: number,
  policy: Pick<BackoffPolicy, 'baseDelayMs' | 'maxDelayMs'>,
  random: () => number = Math.random,
): number {
  const delay = Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
  return delay + random() * 0.5 * delay;
}

/**
 * Run `operation`, retrying only throttling errors.
 *
 * Other errors are rethrown at once. After `maxRetries` throttled retries the
 * last throttling error is rethrown, so the operation runs at most
 * maxRetries + 1 times.
 */
export async function withThrottleBackoff<T>(
  operation: () => Promise<T>,
  policy: BackoffPolicy,
  options: BackoffOptions = {},
): Promise<T> {
  const clock = options.clock ?? systemClock;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (
        classifyInferenceError(error) !== 'throttling' ||
        attempt >= policy.maxRetries
      ) {
        throw error;
      }

      const delayMs = computeBackoffDelay(attempt, policy, options.random);
      options.onRetry?.(attempt + 1, delayMs, error);
      await clock.sleep(delayMs);
    }
  }
}
