import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { GovernanceConfig } from '../config/governance.config';
import { Clock, CLOCK, systemClock } from '../common/clock';
import { errorMessage } from '../common/records';
import { INFERENCE_ADAPTER } from '../inference/adapters/tokens';
import { InferenceAdapter } from '../inference/adapters/inference-adapter.interface';
import { InferenceRequest, InferenceResult } from '../inference/types';
import { RateLimitTimeoutException } from '../errors/rate-limit-timeout.exception';
import { TokenBucket, TokenBucketState } from './token-bucket';
import {
  BackoffPolicy,
  classifyInferenceError,
  readProviderErrorCode,
  withThrottleBackoff,
} from './throttle-backoff';
import { GovernanceEventsService } from './governance-events.service';
import { RATE_LIMITER } from './tokens';

export const DEGRADED_REPLY =
  "I'm receiving a high volume of requests right now and couldn't complete " +
  'your request. Please try again in a moment.';

/**
 * InferenceGovernorService
 *
 * The only path from the conversation loop to a model provider.
 *
 * Layers, outermost first:
 * 1. TokenBucket: one token per call, bounded wait (RateLimitTimeoutException)
 * 2. withThrottleBackoff: application-level retry for throttling codes only
 * 3. Provider SDK: transport retry configured on the adapter (maxRetries, timeout)
 *
 * Throttling that outlasts every layer yields a degraded reply instead of an
 * error. Any other failure propagates unchanged.
 */
@Injectable()
export class InferenceGovernorService {
  private readonly logger = new Logger(InferenceGovernorService.name);
  private readonly clock: Clock;

  constructor(
    @Inject(INFERENCE_ADAPTER) private readonly adapter: InferenceAdapter,
    @Inject(RATE_LIMITER) private rateLimiter: TokenBucket,
    private readonly config: GovernanceConfig,
    private readonly events: GovernanceEventsService,
    @Optional() @Inject(CLOCK) clock?: Clock,
  ) {
    this.clock = clock ?? systemClock;
  }

  /**
   * @throws RateLimitTimeoutException when no token frees up in time
   * @throws InferenceProviderException for non-throttling provider failures
   */
  async invoke(request: InferenceRequest): Promise<InferenceResult> {
    const timeoutMs = this.config.rateLimitAcquireTimeoutMs;
    const acquired = await this.rateLimiter.acquire(1, timeoutMs);

    if (!acquired) {
      this.events.record('rate_limit_timeout', { timeoutMs });
      throw new RateLimitTimeoutException(timeoutMs);
    }

    const policy: BackoffPolicy = {
      maxRetries: this.config.throttleMaxRetries,
      baseDelayMs: this.config.throttleBaseDelayMs,
      maxDelayMs: this.config.throttleMaxDelayMs,
    };
    const startedAt = this.clock.now();

    try {
      const result = await withThrottleBackoff(
        () => this.adapter.complete(request),
        policy,
        {
          clock: this.clock,
          onRetry: (attempt, delayMs, error) =>
            this.events.record('throttle_retry', {
              attempt,
              delayMs: Math.round(delayMs),
              code: readProviderErrorCode(error),
            }),
        },
      );

      this.events.record('inference_succeeded', {
        model: result.model,
        inputTokens: result.usage?.inputTokens,
        outputTokens: result.usage?.outputTokens,
        durationMs: this.clock.now() - startedAt,
      });

      return result;
    } catch (error) {
      const code = readProviderErrorCode(error);

      if (classifyInferenceError(error) === 'throttling') {
        this.events.record('throttle_exhausted', {
          code,
          retries: policy.maxRetries,
        });
        return this.degradedResult();
      }

      this.events.record('inference_failed', {
        code,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Swap in a fresh bucket at the new rate (starts full)
   */
  setRateLimit(requestsPerMinute: number): void {
    this.rateLimiter = new TokenBucket(requestsPerMinute, this.clock);
    this.logger.log(`Rate limit set to ${requestsPerMinute} requests/minute`);
  }

  getRateLimiterState(): TokenBucketState {
    return this.rateLimiter.getState();
  }

  private degradedResult(): InferenceResult {
    return {
      output: DEGRADED_REPLY,
      toolCalls: [],
      model: this.adapter.model,
      stopReason: 'throttled',
      degraded: true,
    };
  }
}
