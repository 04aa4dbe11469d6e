import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { DailySpend } from './entities/daily-spend.entity';
import { SpendRecord } from './spend.types';

/**
 * DailySpendRepository
 * Data access layer for the shared spend ledger
 *
 * Writes never overwrite blindly:
 * - insertIfAbsent creates the row only if no process has yet
 * - compareAndSwap updates only if the stored version is the one read
 */
@Injectable()
export class DailySpendRepository {
  constructor(
    @InjectRepository(DailySpend)
    private readonly repository: Repository<DailySpend>,
  ) {}

  async findById(id: string): Promise<SpendRecord | null> {
    const row = await this.repository.findOne({ where: { id } });
    return row ? toRecord(row) : null;
  }

  /**
   * Create the row unless it already exists
   * (INSERT OR IGNORE / ON CONFLICT DO NOTHING)
   */
  async insertIfAbsent(record: SpendRecord): Promise<void> {
    await this.repository
      .createQueryBuilder()
      .insert()
      .into(DailySpend)
      .values(toRow(record))
      .orIgnore()
      .execute();
  }

  /**
   * Write `next` only if the stored row still has `expectedVersion`.
   * @returns false when another writer got there first
   */
  async compareAndSwap(
    expectedVersion: number,
    next: SpendRecord,
  ): Promise<boolean> {
    const { id, ...changes } = toRow(next);
    const result = await this.repository.update(
      { id, version: expectedVersion },
      changes,
    );
    return result.affected === 1;
  }
}

function toRecord(row: DailySpend): SpendRecord {
  return {
    id: row.id,
    date: row.date,
    totalCost: parseFloat(row.totalCost),
    requestCount: row.requestCount,
    inputTokens: row.inputTokens,
    outputTokens: row.outputTokens,
    lastUpdated: row.lastUpdated,
    version: row.version,
  };
}

function toRow(record: SpendRecord): DailySpend {
  const row = new DailySpend();
  row.id = record.id;
  row.date = record.date;
  row.totalCost = record.totalCost.toFixed(6);
  row.requestCount = record.requestCount;
  row.inputTokens = record.inputTokens;
  row.outputTokens = record.outputTokens;
  row.lastUpdated = record.lastUpdated;
  row.version = record.version;
  return row;
}
