/**
 * Continuous Executor Service
 * Triggers the engine on a fixed interval with the operator's chosen strategy
 */

import type { Address, ExecutionResult, ExecutorStatus, Strategy } from '../../../shared/schema.js';
import { AuthorizationError, ConfigurationError } from '../errors.js';
import { logger as rootLogger, errorContext, type StructuredLogger } from '../utils/structured-logger.js';
import type { ArbitrageEngine } from './arbitrage-engine.js';

type ExecutorCallback = (status: ExecutorStatus) => void;

export interface ScheduleRequest {
  strategy: Strategy;
  amount: bigint;
  intervalMs?: number;
}

export class ContinuousExecutorService {
  private isRunning: boolean = false;
  private strategy: Strategy | null = null;
  private amount: bigint | null = null;
  private caller: Address | null = null;
  private intervalMs: number;
  private lastRunAt: Date | null = null;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private sleepTimer: ReturnType<typeof setTimeout> | null = null;

  private metrics = { attempts: 0, settled: 0, failed: 0 };
  private statusCallbacks: Set<ExecutorCallback> = new Set();
  private readonly logger: StructuredLogger;

  constructor(
    private readonly engine: ArbitrageEngine,
    options: { intervalMs: number; logger?: StructuredLogger }
  ) {
    this.intervalMs = options.intervalMs;
    this.logger = (options.logger ?? rootLogger).child('scheduler');
  }

  /**
   * Start the scan loop
   */
  start(caller: Address, request: ScheduleRequest): ExecutorStatus {
    this.assertOperator(caller);

    if (this.isRunning) {
      this.logger.info(this.logger.startOperation('sch', caller), 'already_running', 'Scheduler already running');
      return this.getStatus();
    }
    if (request.amount <= 0n) {
      throw new ConfigurationError('Scheduled amount must be positive');
    }
    if (request.intervalMs !== undefined) {
      if (request.intervalMs <= 0) throw new ConfigurationError('intervalMs must be positive');
      this.intervalMs = request.intervalMs;
    }

    this.isRunning = true;
    this.caller = caller;
    this.strategy = request.strategy;
    this.amount = request.amount;

    this.logger.info(this.logger.startOperation('sch', caller), 'scheduler_started', 'Starting continuous executor', {
      strategy: request.strategy,
      amount: request.amount,
      intervalMs: this.intervalMs,
    });
    this.notifyStatusChange();

    this.loop = this.scanLoop();
    return this.getStatus();
  }

  /**
   * Stop the loop and wait for the in-flight attempt to finish
   */
  async stop(caller: Address): Promise<ExecutorStatus> {
    this.assertOperator(caller);
    if (!this.isRunning) {
      return this.getStatus();
    }

    this.isRunning = false;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wake?.();

    const loop = this.loop;
    this.loop = null;
    if (loop) await loop;

    this.logger.info(this.logger.startOperation('sch', caller), 'scheduler_stopped', 'Stopped');
    this.notifyStatusChange();
    return this.getStatus();
  }

  /**
   * Run a single scheduled attempt now
   */
  async runOnce(): Promise<ExecutionResult | null> {
    if (!this.strategy || this.amount === null || !this.caller) {
      return null;
    }

    this.metrics.attempts++;
    this.lastRunAt = new Date();
    const result = await this.engine.trigger(this.strategy, this.caller, this.amount);
    if (result.status === 'settled') {
      this.metrics.settled++;
    } else {
      this.metrics.failed++;
    }
    this.notifyStatusChange();
    return result;
  }

  getStatus(): ExecutorStatus {
    return {
      isRunning: this.isRunning,
      strategy: this.strategy,
      amount: this.amount,
      intervalMs: this.intervalMs,
      lastRunAt: this.lastRunAt,
      ...this.metrics,
    };
  }

  onStatusChange(callback: ExecutorCallback): () => void {
    this.statusCallbacks.add(callback);
    return () => this.statusCallbacks.delete(callback);
  }

  private async scanLoop(): Promise<void> {
    while (this.isRunning) {
      try {
        await this.runOnce();
      } catch (error) {
        this.logger.error(this.logger.startOperation('sch'), 'scan_cycle_error', 'Scan cycle error', errorContext(error));
      }

      if (this.isRunning) {
        await this.sleep(this.intervalMs);
      }
    }
  }

  private assertOperator(caller: Address): void {
    if (!this.engine.isOperator(caller)) {
      throw new AuthorizationError('Caller is not authorized to control the scheduler', caller);
    }
  }

  private notifyStatusChange(): void {
    const status = this.getStatus();
    for (const callback of this.statusCallbacks) {
      try {
        callback(status);
      } catch (error) {
        this.logger.error(this.logger.startOperation('sch'), 'status_callback_error', 'Status callback error', errorContext(error));
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = () => {
        this.wake = null;
        resolve();
      };
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake?.();
      }, ms);
    });
  }
}
