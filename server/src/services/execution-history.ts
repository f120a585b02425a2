/**
 * Execution History
 * Append-only record of finished attempts, fed from the event bus.
 * Persistence failures are logged and never reach the engine.
 */

import { desc } from 'drizzle-orm';
import type { Address, ExecutionRecord } from '../../../shared/schema.js';
import type { Database } from '../db/index.js';
import { executions, type ExecutionRow } from '../db/schema.js';
import { logger as rootLogger, errorContext, type StructuredLogger } from '../utils/structured-logger.js';
import type { ArbitrageEventBus } from './events.js';

export interface ExecutionStore {
  insert(record: ExecutionRecord): Promise<void>;
  recent(limit: number): Promise<ExecutionRecord[]>;
}

export class InMemoryExecutionStore implements ExecutionStore {
  private records: ExecutionRecord[] = [];

  constructor(private readonly capacity: number = 1000) {}

  async insert(record: ExecutionRecord): Promise<void> {
    this.records.push(record);
    if (this.records.length > this.capacity) {
      this.records.splice(0, this.records.length - this.capacity);
    }
  }

  async recent(limit: number): Promise<ExecutionRecord[]> {
    return this.records.slice(-limit).reverse();
  }
}

function toRecord(row: ExecutionRow): ExecutionRecord {
  return {
    correlationId: row.correlationId,
    strategy: row.strategy,
    outcome: row.outcome,
    tokenIn: row.tokenIn ? toAddress(row.tokenIn) : null,
    tokenOut: row.tokenOut ? toAddress(row.tokenOut) : null,
    amount: row.amount === null ? null : BigInt(row.amount),
    profit: row.profit === null ? null : BigInt(row.profit),
    code: row.code,
    reason: row.reason,
    createdAt: row.createdAt,
  };
}

function toAddress(value: string): Address {
  if (!value.startsWith('0x')) {
    throw new Error(`Stored value ${value} is not an address`);
  }
  return `0x${value.slice(2)}`;
}

export class DrizzleExecutionStore implements ExecutionStore {
  constructor(private readonly db: Database) {}

  async insert(record: ExecutionRecord): Promise<void> {
    await this.db.insert(executions).values({
      correlationId: record.correlationId,
      strategy: record.strategy,
      outcome: record.outcome,
      tokenIn: record.tokenIn,
      tokenOut: record.tokenOut,
      amount: record.amount?.toString() ?? null,
      profit: record.profit?.toString() ?? null,
      code: record.code,
      reason: record.reason,
      createdAt: record.createdAt,
    });
  }

  async recent(limit: number): Promise<ExecutionRecord[]> {
    const rows = await this.db
      .select()
      .from(executions)
      .orderBy(desc(executions.createdAt))
      .limit(limit);
    return rows.map(toRecord);
  }
}

export class ExecutionHistoryService {
  private readonly logger: StructuredLogger;
  private pending: Set<Promise<void>> = new Set();

  constructor(
    private readonly store: ExecutionStore,
    logger: StructuredLogger = rootLogger
  ) {
    this.logger = logger.child('history');
  }

  /**
   * Record every settled and failed attempt. Returns the detach function.
   */
  attach(events: ArbitrageEventBus): () => void {
    const offExecuted = events.on('arbitrageExecuted', (event) => {
      this.write({
        correlationId: event.correlationId,
        strategy: event.strategy,
        outcome: 'settled',
        tokenIn: event.tokenIn,
        tokenOut: event.tokenOut,
        amount: event.amount,
        profit: event.profit,
        code: null,
        reason: null,
        createdAt: new Date(),
      });
    });
    const offFailed = events.on('arbitrageFailed', (event) => {
      this.write({
        correlationId: event.correlationId,
        strategy: event.strategy,
        outcome: 'failed',
        tokenIn: null,
        tokenOut: null,
        amount: null,
        profit: null,
        code: event.code,
        reason: event.reason,
        createdAt: new Date(),
      });
    });

    return () => {
      offExecuted();
      offFailed();
    };
  }

  list(limit: number = 50): Promise<ExecutionRecord[]> {
    return this.store.recent(limit);
  }

  /**
   * Wait for queued writes, used on shutdown and in tests
   */
  async flush(): Promise<void> {
    await Promise.all(this.pending);
  }

  private write(record: ExecutionRecord): void {
    const write = this.store.insert(record).catch((error: unknown) => {
      this.logger.error(
        this.logger.fromCorrelationId(record.correlationId),
        'history_write_failed',
        'Failed to persist execution record',
        errorContext(error)
      );
    });
    this.pending.add(write);
    void write.finally(() => this.pending.delete(write));
  }
}
