import { Controller, Get } from '@nestjs/common';
import { SpendLedgerService } from './spend-ledger.service';
import { SpendUsage } from './spend.types';

export interface SpendUsageResponse {
  date: string;
  total_cost: number;
  daily_cap: number;
  remaining_budget: number;
  percentage_used: number;
  request_count: number;
  input_tokens: number;
  output_tokens: number;
  reset_time: string;
}

export function toSpendUsageResponse(usage: SpendUsage): SpendUsageResponse {
  return {
    date: usage.date,
    total_cost: usage.totalCost,
    daily_cap: usage.dailyCap,
    remaining_budget: usage.remainingBudget,
    percentage_used: usage.percentageUsed,
    request_count: usage.requestCount,
    input_tokens: usage.inputTokens,
    output_tokens: usage.outputTokens,
    reset_time: usage.resetTime,
  };
}

/**
 * SpendController
 * Cost-query surface for operators
 * Routes: /api/spend/* (global prefix 'api' applied in main.ts)
 */
@Controller('spend')
export class SpendController {
  constructor(private readonly spendLedger: SpendLedgerService) {}

  /**
   * Today's spend against the daily cap
   * GET /api/spend/today
   */
  @Get('today')
  async getToday(): Promise<SpendUsageResponse> {
    return toSpendUsageResponse(await this.spendLedger.getUsage());
  }
}
