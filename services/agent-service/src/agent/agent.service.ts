import { Injectable, Logger } from '@nestjs/common';
import { GovernanceConfig } from '../config/governance.config';
import {
  ESTIMATED_OUTPUT_TOKENS_PER_CALL,
  estimateInputTokens,
} from '../config/estimates.config';
import { errorMessage } from '../common/records';
import { InferenceGovernorService } from '../governance/inference-governor.service';
import { SpendLedgerService } from '../spend/spend-ledger.service';
import { ActionDispatcherService } from '../actions/action-dispatcher.service';
import { ResponsePollerService } from '../actions/response-poller.service';
import { formatToolResults } from '../actions/response-formatter';
import {
  ConversationMessage,
  InferenceResult,
  ToolCall,
  ToolResult,
} from '../inference/types';
import { AGENT_SYSTEM_PROMPT, AGENT_TOOLS, planToolCall } from './agent-tools';
import { TurnInput, TurnResult } from './agent.types';

export const PENDING_ACTIONS_REPLY =
  "I've submitted your request for processing. " +
  'The results should be available shortly.';

export const ITERATION_LIMIT_REPLY =
  "I couldn't finish this request within the allowed number of steps. " +
  'Please try a narrower request.';

interface DispatchOutcome {
  results: ToolResult[];
  publishedIds: string[];
  awaitedIds: string[];
}

/**
 * AgentService
 *
 * Drives one conversation turn:
 *   awaiting-model → done
 *   awaiting-model → dispatched → awaiting-responses → awaiting-model
 *   awaiting-responses → done-with-pending-notice (timeout)
 *
 * Every model call is preceded by a spend reservation and followed by
 * reconciliation, and goes through InferenceGovernorService.
 */
@Injectable()
export class AgentService {
  private readonly logger = new Logger(AgentService.name);

  constructor(
    private readonly governor: InferenceGovernorService,
    private readonly spendLedger: SpendLedgerService,
    private readonly dispatcher: ActionDispatcherService,
    private readonly poller: ResponsePollerService,
    private readonly config: GovernanceConfig,
  ) {}

  /**
   * @throws RateLimitTimeoutException when the rate limiter stays empty
   * @throws InferenceProviderException for non-throttling provider failures
   */
  async runTurn(input: TurnInput): Promise<TurnResult> {
    const messages: ConversationMessage[] = [
      ...(input.history ?? []).map(
        (turn): ConversationMessage => ({
          role: turn.role,
          content: turn.content,
        }),
      ),
      { role: 'user', content: input.message },
    ];
    const actionIds: string[] = [];
    const pendingActionIds: string[] = [];
    let lastOutput = '';

    const maxIterations = this.config.agentMaxIterations;

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      // Step 1: Reserve the estimated cost of the next model call
      const estimatedInputTokens = estimateInputTokens([
        AGENT_SYSTEM_PROMPT,
        ...messageTexts(messages),
      ]);
      const decision = await this.spendLedger.checkAndReserve(
        estimatedInputTokens,
        ESTIMATED_OUTPUT_TOKENS_PER_CALL,
      );

      if (!decision.allowed) {
        this.logger.warn(`Turn stopped by spend cap: ${decision.message}`);
        return {
          status: 'spend_cap_exceeded',
          reply: decision.message,
          actionIds,
          pendingActionIds,
          cost: decision.cost,
        };
      }

      // Step 2: Call the model (rate limited, throttle retried)
      const result = await this.invokeModel(messages);
      lastOutput = result.output;

      if (result.degraded || result.toolCalls.length === 0) {
        return {
          status: 'completed',
          reply: result.output,
          actionIds,
          pendingActionIds,
          degraded: result.degraded ?? false,
        };
      }

      messages.push({
        role: 'assistant',
        content: result.output,
        toolCalls: result.toolCalls,
      });

      // Step 3: Publish requested actions
      const outcome = await this.dispatchToolCalls(result.toolCalls);
      messages.push({ role: 'tool', results: outcome.results });
      actionIds.push(...outcome.publishedIds);

      if (outcome.awaitedIds.length === 0) {
        continue;
      }

      // Step 4: Wait for the executors' responses
      const responses = await this.poller.drain(undefined, {
        expectedIds: outcome.awaitedIds,
      });
      const answered = new Set(
        responses.map((response) => response.correlationId),
      );
      pendingActionIds.push(
        ...outcome.awaitedIds.filter((id) => !answered.has(id)),
      );

      if (responses.length === 0) {
        this.logger.warn(
          `No responses for ${outcome.awaitedIds.join(', ')} within the poll window`,
        );
        return {
          status: 'pending_actions',
          reply: PENDING_ACTIONS_REPLY,
          actionIds,
          pendingActionIds,
          degraded: false,
        };
      }

      messages.push({ role: 'user', content: formatToolResults(responses) });
    }

    this.logger.warn(`Turn reached the iteration limit (${maxIterations})`);
    return {
      status: 'completed',
      reply: lastOutput || ITERATION_LIMIT_REPLY,
      actionIds,
      pendingActionIds,
      degraded: false,
    };
  }

  /**
   * One governed model call with its spend reconciliation.
   * A failed call reconciles zero usage, releasing the reserved estimate.
   */
  private async invokeModel(
    messages: ConversationMessage[],
  ): Promise<InferenceResult> {
    let result: InferenceResult;
    try {
      result = await this.governor.invoke({
        system: AGENT_SYSTEM_PROMPT,
        messages,
        tools: AGENT_TOOLS,
      });
    } catch (error) {
      await this.spendLedger.reconcile(0, 0);
      throw error;
    }

    await this.spendLedger.reconcile(
      result.usage?.inputTokens ?? 0,
      result.usage?.outputTokens ?? 0,
    );
    return result;
  }

  private async dispatchToolCalls(
    calls: ToolCall[],
  ): Promise<DispatchOutcome> {
    const outcome: DispatchOutcome = {
      results: [],
      publishedIds: [],
      awaitedIds: [],
    };

    for (const call of calls) {
      const plan = planToolCall(call);
      if (!plan.ok) {
        this.logger.warn(`Rejected tool call ${call.name}: ${plan.error}`);
        outcome.results.push({
          toolCallId: call.id,
          content: plan.error,
          isError: true,
        });
        continue;
      }

      try {
        const id = await this.dispatcher.publish(plan.request);
        outcome.publishedIds.push(id);
        if (plan.awaitsResponse) {
          outcome.awaitedIds.push(id);
        }
        outcome.results.push({
          toolCallId: call.id,
          content: plan.awaitsResponse
            ? `Action submitted. Message ID: ${id}. ` +
              'The result will follow as a tool response.'
            : `Notification queued. Message ID: ${id}.`,
        });
      } catch (error) {
        outcome.results.push({
          toolCallId: call.id,
          content: `Action could not be submitted: ${errorMessage(error)}`,
          isError: true,
        });
      }
    }

    return outcome;
  }
}

function messageTexts(messages: ConversationMessage[]): string[] {
  return messages.map((message) => {
    switch (message.role) {
      case 'user':
        return message.content;
      case 'assistant':
        return [
          message.content,
          ...(message.toolCalls ?? []).map((call) =>
            JSON.stringify(call.arguments),
          ),
        ].join(' ');
      case 'tool':
        return message.results.map((result) => result.content).join(' ');
    }
  });
}
