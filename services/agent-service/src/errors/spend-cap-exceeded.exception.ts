import { HttpException, HttpStatus } from '@nestjs/common';
import { CostProjection } from '../spend/spend.types';

/**
 * SpendCapExceededException
 * Raised at the HTTP edge when the daily spend cap rejects a turn.
 * Inside the service the cap is a SpendDecision value, never an exception.
 *
 * HTTP 429 Too Many Requests; callers should retry after the UTC day resets
 */
export class SpendCapExceededException extends HttpException {
  static readonly RETRY_AFTER_SECONDS = 86400;

  constructor(
    message: string,
    public readonly cost: CostProjection,
  ) {
    super(
      {
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        error: 'Daily spending limit reached',
        message,
        cost_info: {
          current_cost: cost.currentCost,
          estimated_cost: cost.estimatedCost,
          projected_cost: cost.projectedCost,
          daily_cap: cost.dailyCap,
          remaining_budget: cost.remainingBudget,
          request_count: cost.requestCount,
          reset_time: cost.resetTime,
        },
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}
