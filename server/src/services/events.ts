/**
 * Arbitrage Event Bus
 * Typed observability notifications. Listener failures never reach the emitter.
 */

import type {
  Address,
  AttemptStage,
  FailureCode,
  RiskThresholds,
  Strategy,
  TokenRef,
} from '../../../shared/schema.js';
import { logger as rootLogger, errorContext, type StructuredLogger } from '../utils/structured-logger.js';

export interface ArbitrageEventMap {
  arbitrageExecuted: {
    correlationId: string;
    strategy: Strategy;
    profit: bigint;
    tokenIn: Address;
    tokenOut: Address;
    amount: bigint;
  };
  arbitrageFailed: {
    correlationId: string;
    strategy: Strategy;
    stage: AttemptStage;
    code: FailureCode;
    reason: string;
  };
  superProfitConverted: {
    correlationId: string;
    token: Address;
    stableToken: Address;
    amount: bigint;
    amountOut: bigint;
    excessValue: bigint;
  };
  paused: { by: Address };
  unpaused: { by: Address };
  thresholdsUpdated: { by: Address; thresholds: RiskThresholds };
  tokenApproved: { by: Address; token: TokenRef };
  tokenBlacklisted: { by: Address; token: Address };
}

export type ArbitrageEventName = keyof ArbitrageEventMap;

export type ArbitrageEventListener<K extends ArbitrageEventName> = (
  payload: ArbitrageEventMap[K]
) => void;

type ListenerRegistry = {
  [K in ArbitrageEventName]: Set<ArbitrageEventListener<K>>;
};

export class ArbitrageEventBus {
  private listeners: ListenerRegistry = {
    arbitrageExecuted: new Set(),
    arbitrageFailed: new Set(),
    superProfitConverted: new Set(),
    paused: new Set(),
    unpaused: new Set(),
    thresholdsUpdated: new Set(),
    tokenApproved: new Set(),
    tokenBlacklisted: new Set(),
  };

  private logger: StructuredLogger;

  constructor(logger: StructuredLogger = rootLogger) {
    this.logger = logger.child('events');
  }

  /**
   * Subscribe to an event. Returns the unsubscribe function.
   */
  on<K extends ArbitrageEventName>(event: K, listener: ArbitrageEventListener<K>): () => void {
    const listeners: Set<ArbitrageEventListener<K>> = this.listeners[event];
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  emit<K extends ArbitrageEventName>(event: K, payload: ArbitrageEventMap[K]): void {
    const listeners: Set<ArbitrageEventListener<K>> = this.listeners[event];
    for (const listener of listeners) {
      try {
        listener(payload);
      } catch (error) {
        this.logger.error(
          this.logger.startOperation('op'),
          'listener_error',
          `Listener for ${event} threw`,
          errorContext(error)
        );
      }
    }
  }
}
