import { Entity, PrimaryColumn, Column } from 'typeorm';

/**
 * DailySpend Entity
 * One row per stage (id = spend_tracker_<stage>), overwritten in place
 * when the UTC day rolls over.
 *
 * Every update is conditional on `version`; see DailySpendRepository.compareAndSwap.
 */
@Entity('daily_spend')
export class DailySpend {
  /**
   * Ledger key (e.g. spend_tracker_prod)
   */
  @PrimaryColumn({ type: 'varchar', length: 64 })
  id!: string;

  /**
   * UTC day (YYYY-MM-DD) the counters belong to
   */
  @Column({ type: 'varchar', length: 10 })
  date!: string;

  /**
   * Accrued cost in USD, stored as a fixed 6-decimal string
   */
  @Column({ type: 'varchar', length: 32, name: 'total_cost', default: '0.000000' })
  totalCost!: string;

  @Column({ type: 'integer', name: 'request_count', default: 0 })
  requestCount!: number;

  @Column({ type: 'integer', name: 'input_tokens', default: 0 })
  inputTokens!: number;

  @Column({ type: 'integer', name: 'output_tokens', default: 0 })
  outputTokens!: number;

  /**
   * ISO 8601 timestamp of the last write
   */
  @Column({ type: 'varchar', length: 32, name: 'last_updated' })
  lastUpdated!: string;

  @Column({ type: 'integer', default: 0 })
  version!: number;
}
