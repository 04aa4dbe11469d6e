/**
 * SpendRecord
 * The per-stage ledger row as the service sees it (costs in USD as numbers)
 */
export interface SpendRecord {
  id: string;
  /** UTC day the counters belong to (YYYY-MM-DD) */
  date: string;
  totalCost: number;
  requestCount: number;
  inputTokens: number;
  outputTokens: number;
  /** ISO 8601 */
  lastUpdated: string;
  /** Compare-and-swap guard, bumped on every write */
  version: number;
}

/**
 * CostProjection
 * Figures reported with every reservation decision
 */
export interface CostProjection {
  currentCost: number;
  estimatedCost: number;
  projectedCost: number;
  dailyCap: number;
  remainingBudget: number;
  requestCount: number;
  /** "<date> 23:59:59 UTC" */
  resetTime: string;
}

export interface SpendDecision {
  allowed: boolean;
  message: string;
  cost: CostProjection;
}

/**
 * SpendUsage
 * Read-only cost-query surface for today
 */
export interface SpendUsage {
  date: string;
  totalCost: number;
  dailyCap: number;
  remainingBudget: number;
  percentageUsed: number;
  requestCount: number;
  inputTokens: number;
  outputTokens: number;
  resetTime: string;
}
