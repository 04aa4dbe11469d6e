import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { GovernanceConfig } from '../config/governance.config';
import { Clock, CLOCK, systemClock, utcDay } from '../common/clock';
import { errorMessage } from '../common/records';
import { GovernanceEventsService } from '../governance/governance-events.service';
import { DailySpendRepository } from './daily-spend.repository';
import {
  CostProjection,
  SpendDecision,
  SpendRecord,
  SpendUsage,
} from './spend.types';

/** Conditional writes before a contended ledger counts as a store failure */
export const MAX_CAS_ATTEMPTS = 5;

/**
 * Round a USD amount to 6 decimal places
 */
export function roundUsd(amount: number): number {
  return Math.round(amount * 1e6) / 1e6;
}

/**
 * SpendLedgerService
 *
 * Daily spend cap shared by every process of a stage.
 *
 * Protocol:
 * 1. checkAndReserve() before each model call adds the estimated cost to the
 *    day's total (rejecting if it would cross the cap)
 * 2. reconcile() after the call adds the actual tokens and recomputes the
 *    total from the cumulative token counters, replacing the estimate
 *
 * Every write is a compare-and-swap on the row version. A lost race reloads
 * and recomputes, up to MAX_CAS_ATTEMPTS.
 *
 * Failure policy:
 * - checkAndReserve: store failure → reject as if the cap were reached
 * - reconcile: store failure → logged, never raised
 */
@Injectable()
export class SpendLedgerService {
  private readonly logger = new Logger(SpendLedgerService.name);
  private readonly clock: Clock;

  constructor(
    private readonly repository: DailySpendRepository,
    private readonly config: GovernanceConfig,
    private readonly events: GovernanceEventsService,
    @Optional() @Inject(CLOCK) clock?: Clock,
  ) {
    this.clock = clock ?? systemClock;
  }

  calculateCost(inputTokens: number, outputTokens: number): number {
    return roundUsd(
      (inputTokens / 1000) * this.config.inputPricePer1kUsd +
        (outputTokens / 1000) * this.config.outputPricePer1kUsd,
    );
  }

  /**
   * Reserve the estimated cost of one model call against today's cap.
   * A rejection leaves the stored record untouched.
   */
  async checkAndReserve(
    estimatedInputTokens: number,
    estimatedOutputTokens: number,
  ): Promise<SpendDecision> {
    const today = utcDay(this.clock.now());
    const dailyCap = this.config.dailySpendCapUsd;
    const estimatedCost = this.calculateCost(
      estimatedInputTokens,
      estimatedOutputTokens,
    );
    const resetTime = resetTimeFor(today);

    try {
      for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt++) {
        const stored = await this.loadOrCreate(today);
        const current = this.forDay(stored, today);
        const projectedCost = roundUsd(current.totalCost + estimatedCost);

        const cost: CostProjection = {
          currentCost: current.totalCost,
          estimatedCost,
          projectedCost,
          dailyCap,
          remainingBudget: roundUsd(Math.max(0, dailyCap - current.totalCost)),
          requestCount: current.requestCount,
          resetTime,
        };

        if (projectedCost > dailyCap) {
          const message =
            `Daily spending cap of $${dailyCap.toFixed(2)} would be exceeded. ` +
            `Current usage: $${current.totalCost.toFixed(2)}, ` +
            `Estimated request cost: $${estimatedCost.toFixed(2)}. ` +
            `Resets at midnight UTC (${resetTime}).`;
          this.events.record('spend_rejected', {
            currentCost: current.totalCost,
            estimatedCost,
            dailyCap,
          });
          return { allowed: false, message, cost };
        }

        const next: SpendRecord = {
          ...current,
          totalCost: projectedCost,
          requestCount: current.requestCount + 1,
          lastUpdated: new Date(this.clock.now()).toISOString(),
          version: stored.version + 1,
        };

        if (await this.repository.compareAndSwap(stored.version, next)) {
          this.events.record('spend_reserved', {
            estimatedCost,
            projectedCost,
            requestCount: next.requestCount,
          });
          return {
            allowed: true,
            message: `Request allowed. Projected cost: $${projectedCost.toFixed(2)} / $${dailyCap.toFixed(2)}`,
            cost,
          };
        }

        this.logger.debug(
          `Spend record changed concurrently, retrying reservation (attempt ${attempt})`,
        );
      }

      throw new Error(
        `spend record still contended after ${MAX_CAS_ATTEMPTS} attempts`,
      );
    } catch (error) {
      this.logger.error(
        `Spend ledger unavailable, rejecting request: ${errorMessage(error)}`,
      );
      this.events.record('spend_store_error', {
        operation: 'checkAndReserve',
        error: errorMessage(error),
      });

      return {
        allowed: false,
        message:
          'Spend tracking is temporarily unavailable; treating the daily cap ' +
          `of $${dailyCap.toFixed(2)} as reached.`,
        cost: {
          currentCost: dailyCap,
          estimatedCost,
          projectedCost: roundUsd(dailyCap + estimatedCost),
          dailyCap,
          remainingBudget: 0,
          requestCount: 0,
          resetTime,
        },
      };
    }
  }

  /**
   * Record actual usage of a finished call. Cost is recomputed from the
   * cumulative token counters, which releases outstanding estimates.
   */
  async reconcile(
    actualInputTokens: number,
    actualOutputTokens: number,
  ): Promise<void> {
    const today = utcDay(this.clock.now());

    try {
      for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt++) {
        const stored = await this.loadOrCreate(today);
        const current = this.forDay(stored, today);
        const inputTokens = current.inputTokens + actualInputTokens;
        const outputTokens = current.outputTokens + actualOutputTokens;

        const next: SpendRecord = {
          ...current,
          inputTokens,
          outputTokens,
          totalCost: this.calculateCost(inputTokens, outputTokens),
          lastUpdated: new Date(this.clock.now()).toISOString(),
          version: stored.version + 1,
        };

        if (await this.repository.compareAndSwap(stored.version, next)) {
          this.events.record('spend_reconciled', {
            inputTokens: actualInputTokens,
            outputTokens: actualOutputTokens,
            totalCost: next.totalCost,
          });
          return;
        }

        this.logger.debug(
          `Spend record changed concurrently, retrying reconcile (attempt ${attempt})`,
        );
      }

      throw new Error(
        `spend record still contended after ${MAX_CAS_ATTEMPTS} attempts`,
      );
    } catch (error) {
      this.logger.error(
        `Failed to reconcile actual spend: ${errorMessage(error)}`,
      );
      this.events.record('spend_store_error', {
        operation: 'reconcile',
        error: errorMessage(error),
      });
    }
  }

  /**
   * Today's figures. Never creates or resets the stored row.
   * An unreadable store reports the day as already at the cap.
   */
  async getUsage(): Promise<SpendUsage> {
    const today = utcDay(this.clock.now());
    const dailyCap = this.config.dailySpendCapUsd;

    let current: SpendRecord;
    try {
      const stored = await this.repository.findById(
        this.config.spendTrackerKey,
      );
      current = stored
        ? this.forDay(stored, today)
        : this.emptyRecord(today, 0);
    } catch (error) {
      this.logger.error(
        `Spend ledger unavailable, reporting the cap as reached: ${errorMessage(error)}`,
      );
      this.events.record('spend_store_error', {
        operation: 'getUsage',
        error: errorMessage(error),
      });
      current = { ...this.emptyRecord(today, 0), totalCost: dailyCap };
    }

    return {
      date: today,
      totalCost: current.totalCost,
      dailyCap,
      remainingBudget: roundUsd(Math.max(0, dailyCap - current.totalCost)),
      percentageUsed:
        dailyCap > 0
          ? Math.round((current.totalCost / dailyCap) * 10000) / 100
          : 100,
      requestCount: current.requestCount,
      inputTokens: current.inputTokens,
      outputTokens: current.outputTokens,
      resetTime: resetTimeFor(today),
    };
  }

  private async loadOrCreate(today: string): Promise<SpendRecord> {
    const key = this.config.spendTrackerKey;
    const existing = await this.repository.findById(key);
    if (existing) {
      return existing;
    }

    await this.repository.insertIfAbsent(this.emptyRecord(today, 0));

    const created = await this.repository.findById(key);
    if (!created) {
      throw new Error(`spend record ${key} missing after insert`);
    }
    return created;
  }

  /**
   * A record from an earlier day counts as zero for today; its version is
   * kept for the swap
   */
  private forDay(record: SpendRecord, today: string): SpendRecord {
    if (record.date === today) {
      return record;
    }
    this.logger.log(
      `Spend record dated ${record.date} is stale; starting ${today} from zero`,
    );
    return this.emptyRecord(today, record.version);
  }

  private emptyRecord(today: string, version: number): SpendRecord {
    return {
      id: this.config.spendTrackerKey,
      date: today,
      totalCost: 0,
      requestCount: 0,
      inputTokens: 0,
      outputTokens: 0,
      lastUpdated: new Date(this.clock.now()).toISOString(),
      version,
    };
  }
}

function resetTimeFor(day: string): string {
  return `${day} 23:59:59 UTC`;
}
