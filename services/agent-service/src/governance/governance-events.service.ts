import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/records';

export type GovernanceEventType =
  | 'rate_limit_timeout'
  | 'throttle_retry'
  | 'throttle_exhausted'
  | 'inference_succeeded'
  | 'inference_failed'
  | 'spend_reserved'
  | 'spend_rejected'
  | 'spend_reconciled'
  | 'spend_store_error'
  | 'action_published'
  | 'action_publish_failed'
  | 'response_received'
  | 'response_malformed'
  | 'response_uncorrelated';

export type GovernanceEventDetail = Record<
  string,
  string | number | boolean | undefined
>;

const WARN_EVENTS: ReadonlySet<GovernanceEventType> = new Set<GovernanceEventType>([
  'rate_limit_timeout',
  'throttle_retry',
  'throttle_exhausted',
  'inference_failed',
  'spend_rejected',
  'spend_store_error',
  'action_publish_failed',
  'response_malformed',
]);

/**
 * GovernanceEventsService
 * Passive recording of governance events for observability
 *
 * CRITICAL CONSTRAINTS:
 * - All recording is best-effort (never throws)
 * - Does NOT change enforcement logic or request flow
 * - Counters are per process and reset on restart
 */
@Injectable()
export class GovernanceEventsService {
  private readonly logger = new Logger(GovernanceEventsService.name);
  private readonly counters = new Map<GovernanceEventType, number>();

  /**
   * Record an event as one structured log line and bump its counter
   */
  record(type: GovernanceEventType, detail: GovernanceEventDetail = {}): void {
    try {
      this.counters.set(type, (this.counters.get(type) ?? 0) + 1);

      const line = JSON.stringify({ event: type, ...detail });
      if (WARN_EVENTS.has(type)) {
        this.logger.warn(line);
      } else {
        this.logger.log(line);
      }
    } catch (error) {
      this.logger.error(
        `Failed to record governance event ${type}: ${errorMessage(error)}`,
      );
    }
  }

  count(type: GovernanceEventType): number {
    return this.counters.get(type) ?? 0;
  }

  snapshot(): Partial<Record<GovernanceEventType, number>> {
    const snapshot: Partial<Record<GovernanceEventType, number>> = {};
    for (const [type, count] of this.counters) {
      snapshot[type] = count;
    }
    return snapshot;
  }
}
