import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import { AgentService } from './agent.service';
import { ChatRequestDto } from './dto/chat-request.dto';
import { SpendLedgerService } from '../spend/spend-ledger.service';
import {
  SpendUsageResponse,
  toSpendUsageResponse,
} from '../spend/spend.controller';
import { SpendUsage } from '../spend/spend.types';
import { InferenceGovernorService } from '../governance/inference-governor.service';
import {
  GovernanceEventsService,
  GovernanceEventType,
} from '../governance/governance-events.service';
import { TokenBucketState } from '../governance/token-bucket';
import { ResponsePollerService } from '../actions/response-poller.service';
import { SpendCapExceededException } from '../errors/spend-cap-exceeded.exception';

/**
 * Messages answered with today's usage instead of a model call
 */
export const COST_KEYWORDS: ReadonlySet<string> = new Set([
  'cost',
  'usage',
  'spending',
  'budget',
]);

export interface ChatResponse {
  status: 'completed' | 'pending_actions' | 'usage';
  reply: string;
  action_ids: string[];
  pending_action_ids: string[];
  degraded: boolean;
  usage?: SpendUsageResponse;
}

export interface AgentStatusResponse {
  rate_limiter: TokenBucketState;
  events: Partial<Record<GovernanceEventType, number>>;
  queue_depth: number;
}

export function formatUsageReport(usage: SpendUsage): string {
  return (
    'Current model usage today:\n' +
    `- Cost: $${usage.totalCost.toFixed(2)} / $${usage.dailyCap.toFixed(2)}\n` +
    `- Remaining budget: $${usage.remainingBudget.toFixed(2)}\n` +
    `- Requests: ${usage.requestCount}\n` +
    `- Tokens: ${usage.inputTokens} input, ${usage.outputTokens} output\n` +
    `- Resets at: ${usage.resetTime}`
  );
}

/**
 * AgentController
 * Conversational entry point
 * Routes: /api/agent/* (global prefix 'api' applied in main.ts)
 */
@Controller('agent')
export class AgentController {
  constructor(
    private readonly agentService: AgentService,
    private readonly spendLedger: SpendLedgerService,
    private readonly governor: InferenceGovernorService,
    private readonly poller: ResponsePollerService,
    private readonly events: GovernanceEventsService,
  ) {}

  /**
   * Run one conversation turn
   * POST /api/agent/chat
   *
   * 429 + Retry-After when the daily spend cap is reached
   * 429 when the rate limiter stays empty (RateLimitTimeoutException)
   */
  @Post('chat')
  @HttpCode(HttpStatus.OK)
  async chat(
    @Body() dto: ChatRequestDto,
    @Res({ passthrough: true }) res: Pick<Response, 'setHeader'>,
  ): Promise<ChatResponse> {
    if (COST_KEYWORDS.has(dto.message.trim().toLowerCase())) {
      const usage = await this.spendLedger.getUsage();
      return {
        status: 'usage',
        reply: formatUsageReport(usage),
        action_ids: [],
        pending_action_ids: [],
        degraded: false,
        usage: toSpendUsageResponse(usage),
      };
    }

    const result = await this.agentService.runTurn({
      message: dto.message,
      history: dto.history,
    });

    if (result.status === 'spend_cap_exceeded') {
      res.setHeader(
        'Retry-After',
        String(SpendCapExceededException.RETRY_AFTER_SECONDS),
      );
      throw new SpendCapExceededException(result.reply, result.cost);
    }

    return {
      status: result.status,
      reply: result.reply,
      action_ids: result.actionIds,
      pending_action_ids: result.pendingActionIds,
      degraded: result.degraded,
    };
  }

  /**
   * Operational snapshot
   * GET /api/agent/status
   */
  @Get('status')
  async status(): Promise<AgentStatusResponse> {
    return {
      rate_limiter: this.governor.getRateLimiterState(),
      events: this.events.snapshot(),
      queue_depth: await this.poller.getQueueDepth(),
    };
  }
}
