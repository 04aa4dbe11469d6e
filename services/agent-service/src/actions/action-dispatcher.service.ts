import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ulid } from 'ulid';
import { GovernanceConfig } from '../config/governance.config';
import { Clock, CLOCK, systemClock } from '../common/clock';
import { errorMessage } from '../common/records';
import { GovernanceEventsService } from '../governance/governance-events.service';
import { ActionPublishException } from '../errors/action-publish.exception';
import {
  actionAttributes,
  ActionRequest,
  buildActionEnvelope,
} from './action-envelope';
import { ActionPublisher } from './messaging/action-publisher.interface';
import { ACTION_PUBLISHER } from './messaging/tokens';

/**
 * ActionDispatcherService
 *
 * Submits actions to the bus and returns immediately with the action id;
 * executors answer later on the response queue.
 *
 * Ids are `msg_<ULID>`: time-ordered, unique across processes.
 */
@Injectable()
export class ActionDispatcherService {
  private readonly logger = new Logger(ActionDispatcherService.name);
  private readonly clock: Clock;

  constructor(
    @Inject(ACTION_PUBLISHER) private readonly publisher: ActionPublisher,
    private readonly config: GovernanceConfig,
    private readonly events: GovernanceEventsService,
    @Optional() @Inject(CLOCK) clock?: Clock,
  ) {
    this.clock = clock ?? systemClock;
  }

  /**
   * @returns the action id (also the correlation id executors echo)
   * @throws ActionPublishException when the bus rejects the action
   */
  async publish(request: ActionRequest): Promise<string> {
    const now = this.clock.now();
    const id = `msg_${ulid(now)}`;
    const envelope = buildActionEnvelope(
      id,
      request,
      this.config.stage,
      new Date(now),
    );

    try {
      await this.publisher.publish(envelope, actionAttributes(envelope));
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error(
        `Failed to publish ${request.kind} action ${id}: ${reason}`,
      );
      this.events.record('action_publish_failed', {
        id,
        kind: request.kind,
        reason,
      });
      throw new ActionPublishException(id, request.kind, reason);
    }

    this.events.record('action_published', {
      id,
      kind: request.kind,
      target: request.target,
      operation: request.operation,
    });

    return id;
  }
}
