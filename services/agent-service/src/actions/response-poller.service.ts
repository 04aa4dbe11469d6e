import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { GovernanceConfig } from '../config/governance.config';
import { Clock, CLOCK, systemClock } from '../common/clock';
import { errorMessage } from '../common/records';
import { GovernanceEventsService } from '../governance/governance-events.service';
import { ActionResponse, parseActionResponse } from './action-response';
import {
  QueueMessage,
  ResponseQueue,
} from './messaging/response-queue.interface';
import { RESPONSE_QUEUE } from './messaging/tokens';

export interface DrainOptions {
  /** Accept only responses correlated to these action ids; empty means any */
  expectedIds?: readonly string[];
}

/**
 * Pause after a round that yields nothing for this drain, so a zero wait or
 * a queue holding only other turns' responses never spins on the queue
 */
const IDLE_ROUND_PAUSE_MS = 500;

type Delivery =
  | { kind: 'accepted'; response: ActionResponse }
  | { kind: 'malformed' }
  | { kind: 'foreign' };

/**
 * ResponsePollerService
 *
 * Collects executor responses from the response queue.
 *
 * Deletion discipline:
 * - accepted responses are deleted after they are collected
 * - malformed messages are logged and left for the queue's redrive policy
 * - responses for other actions are released back to the queue at once,
 *   so the turn that owns them sees them on its next poll
 */
@Injectable()
export class ResponsePollerService {
  private readonly logger = new Logger(ResponsePollerService.name);
  private readonly clock: Clock;

  constructor(
    @Inject(RESPONSE_QUEUE) private readonly queue: ResponseQueue,
    private readonly config: GovernanceConfig,
    private readonly events: GovernanceEventsService,
    @Optional() @Inject(CLOCK) clock?: Clock,
  ) {
    this.clock = clock ?? systemClock;
  }

  /**
   * Poll until one of:
   * - every expected id has a response
   * - responses were collected and a further round returns no messages
   * - the window elapses
   *
   * A transport failure ends the drain with whatever was collected.
   */
  async drain(
    timeoutMs: number = this.config.responsePollTimeoutMs,
    options: DrainOptions = {},
  ): Promise<ActionResponse[]> {
    const deadline = this.clock.now() + timeoutMs;
    const expected =
      options.expectedIds && options.expectedIds.length > 0
        ? new Set(options.expectedIds)
        : undefined;
    const matched = new Set<string>();
    const responses: ActionResponse[] = [];

    this.logger.debug(
      `Draining responses for up to ${timeoutMs}ms` +
        (expected ? ` (expecting ${[...expected].join(', ')})` : ''),
    );

    for (;;) {
      const remainingMs = deadline - this.clock.now();
      if (remainingMs <= 0) {
        break;
      }

      // Never wait past the end of the window
      const waitTimeSeconds = Math.min(
        this.config.responsePollWaitSeconds,
        Math.floor(remainingMs / 1000),
      );

      let messages: QueueMessage[];
      try {
        messages = await this.queue.receive({
          maxMessages: this.config.responsePollMaxMessages,
          waitTimeSeconds,
        });
      } catch (error) {
        this.logger.error(
          `Failed to receive responses: ${errorMessage(error)}`,
        );
        break;
      }

      // Nothing further on the queue ends a drain that already has results
      if (messages.length === 0 && responses.length > 0) {
        break;
      }

      let accepted = 0;
      for (const message of messages) {
        const delivery = this.classify(message, expected);

        if (delivery.kind === 'foreign') {
          await this.releaseMessage(message);
          continue;
        }
        if (delivery.kind === 'malformed') {
          continue;
        }

        responses.push(delivery.response);
        accepted++;
        if (delivery.response.correlationId) {
          matched.add(delivery.response.correlationId);
        }

        await this.deleteMessage(message);
      }

      if (expected && [...expected].every((id) => matched.has(id))) {
        break;
      }

      if (accepted === 0 && (messages.length > 0 || waitTimeSeconds === 0)) {
        await this.clock.sleep(
          Math.min(IDLE_ROUND_PAUSE_MS, deadline - this.clock.now()),
        );
      }
    }

    this.logger.log(`Collected ${responses.length} action response(s)`);
    return responses;
  }

  /**
   * Approximate backlog; 0 when the queue cannot be asked
   */
  async getQueueDepth(): Promise<number> {
    try {
      return await this.queue.approximateDepth();
    } catch (error) {
      this.logger.error(`Failed to read queue depth: ${errorMessage(error)}`);
      return 0;
    }
  }

  private classify(
    message: QueueMessage,
    expected: ReadonlySet<string> | undefined,
  ): Delivery {
    const parsed = parseActionResponse(message.body);

    if (!parsed.ok) {
      this.logger.warn(
        `Ignoring malformed response ${message.messageId ?? 'unknown'}: ` +
          parsed.reason,
      );
      this.events.record('response_malformed', {
        messageId: message.messageId,
        reason: parsed.reason,
      });
      return { kind: 'malformed' };
    }

    const response = parsed.response;
    const correlated =
      response.correlationId !== undefined &&
      expected?.has(response.correlationId) === true;

    if (expected && !correlated) {
      this.events.record('response_uncorrelated', {
        id: response.id,
        correlationId: response.correlationId,
      });
      return { kind: 'foreign' };
    }

    this.events.record('response_received', {
      id: response.id,
      correlationId: response.correlationId,
      status: response.status,
    });

    return { kind: 'accepted', response };
  }

  private async deleteMessage(message: QueueMessage): Promise<void> {
    try {
      await this.queue.delete(message.receiptHandle);
    } catch (error) {
      this.logger.error(
        `Failed to delete response ${message.messageId ?? message.receiptHandle}; ` +
          `it may be redelivered: ${errorMessage(error)}`,
      );
    }
  }

  private async releaseMessage(message: QueueMessage): Promise<void> {
    try {
      await this.queue.release(message.receiptHandle);
    } catch (error) {
      // Still redelivered once its visibility timeout lapses
      this.logger.warn(
        `Failed to release response ${message.messageId ?? message.receiptHandle}: ` +
          errorMessage(error),
      );
    }
  }
}
