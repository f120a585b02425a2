/**
 * Ledger
 * Running total of realized profit in reference units. Never decreases.
 */

import type { LedgerSnapshot } from '../../../shared/schema.js';

export class Ledger {
  private total: bigint = 0n;
  private settledCount: number = 0;
  private lastUpdatedAt: number | null = null;

  get totalProfit(): bigint {
    return this.total;
  }

  /**
   * Record the profit of one committed attempt
   */
  record(profit: bigint): bigint {
    if (profit < 0n) {
      throw new RangeError(`Ledger only records non-negative profit, got ${profit}`);
    }
    this.total += profit;
    this.settledCount++;
    this.lastUpdatedAt = Date.now();
    return this.total;
  }

  snapshot(): LedgerSnapshot {
    return {
      totalProfit: this.total,
      settledCount: this.settledCount,
      lastUpdatedAt: this.lastUpdatedAt,
    };
  }
}
