/**
 * Risk Gate
 * Admission control (pause flag, gas ceiling) and operator-only risk mutations
 */

import type { Address, RiskConfig, RiskThresholds, TokenRecord, TokenRef } from '../../../shared/schema.js';
import { AuthorizationError, ConfigurationError, RiskRejectionError } from '../errors.js';
import { sameAddress } from '../utils/amounts.js';
import { logger as rootLogger, type StructuredLogger } from '../utils/structured-logger.js';
import type { ArbitrageEventBus } from './events.js';
import type { TokenRegistry } from './token-registry.js';

export type AdmissionDecision =
  | { admitted: true }
  | { admitted: false; reason: string };

export interface RiskGateOptions {
  operator: Address;
  thresholds: RiskThresholds;
  registry: TokenRegistry;
  events: ArbitrageEventBus;
  logger?: StructuredLogger;
}

const THRESHOLD_FIELDS: Array<keyof RiskThresholds> = [
  'gasPriceLimit',
  'profitThreshold',
  'superProfitThreshold',
  'liquidityThreshold',
];

export function validateThresholds(thresholds: RiskThresholds): void {
  for (const name of THRESHOLD_FIELDS) {
    if (thresholds[name] < 0n) {
      throw new ConfigurationError(`${name} must not be negative`, { [name]: thresholds[name] });
    }
  }
  if (thresholds.superProfitThreshold < thresholds.profitThreshold) {
    throw new ConfigurationError('superProfitThreshold must be at least profitThreshold', {
      profitThreshold: thresholds.profitThreshold,
      superProfitThreshold: thresholds.superProfitThreshold,
    });
  }
}

export class RiskGate {
  private readonly operator: Address;
  private readonly registry: TokenRegistry;
  private readonly events: ArbitrageEventBus;
  private readonly logger: StructuredLogger;
  private config: RiskConfig;

  constructor(options: RiskGateOptions) {
    validateThresholds(options.thresholds);
    this.operator = options.operator;
    this.registry = options.registry;
    this.events = options.events;
    this.logger = (options.logger ?? rootLogger).child('risk-gate');
    this.config = { ...options.thresholds, isPaused: false };
  }

  /**
   * True when trading is not paused and the gas price is within the ceiling
   */
  admit(candidateGasPrice: bigint): boolean {
    return this.assessAdmission(candidateGasPrice).admitted;
  }

  assessAdmission(candidateGasPrice: bigint): AdmissionDecision {
    if (this.config.isPaused) {
      return { admitted: false, reason: 'Trading is paused' };
    }
    if (candidateGasPrice > this.config.gasPriceLimit) {
      return {
        admitted: false,
        reason: `Gas price ${candidateGasPrice} exceeds limit ${this.config.gasPriceLimit}`,
      };
    }
    return { admitted: true };
  }

  isEligible(token: Address): boolean {
    return this.registry.isEligible(token);
  }

  getConfig(): RiskConfig {
    return { ...this.config };
  }

  isOperator(caller: Address | string): boolean {
    return sameAddress(caller, this.operator);
  }

  /**
   * Throws AuthorizationError unless the caller is the operator
   */
  requireOperator(caller: Address, action: string): void {
    if (!this.isOperator(caller)) {
      const ctx = this.logger.startOperation('op', caller, action);
      this.logger.audit(ctx, 'unauthorized', `Rejected ${action} from non-operator`, 'failure');
      throw new AuthorizationError(`Caller is not authorized to ${action}`, caller);
    }
  }

  pause(caller: Address): void {
    this.requireOperator(caller, 'pause');
    if (this.config.isPaused) {
      throw new RiskRejectionError('Trading is already paused');
    }
    this.config = { ...this.config, isPaused: true };
    this.audit(caller, 'paused', 'Trading paused');
    this.events.emit('paused', { by: caller });
  }

  unpause(caller: Address): void {
    this.requireOperator(caller, 'unpause');
    if (!this.config.isPaused) {
      throw new RiskRejectionError('Trading is not paused');
    }
    this.config = { ...this.config, isPaused: false };
    this.audit(caller, 'unpaused', 'Trading resumed');
    this.events.emit('unpaused', { by: caller });
  }

  setThresholds(caller: Address, thresholds: RiskThresholds): RiskConfig {
    this.requireOperator(caller, 'set thresholds');
    validateThresholds(thresholds);
    this.config = { ...thresholds, isPaused: this.config.isPaused };
    this.audit(caller, 'thresholds_updated', 'Risk thresholds updated', { ...thresholds });
    this.events.emit('thresholdsUpdated', { by: caller, thresholds: { ...thresholds } });
    return this.getConfig();
  }

  approve(caller: Address, token: TokenRef): TokenRecord {
    this.requireOperator(caller, 'approve tokens');
    const record = this.registry.approve(token);
    this.audit(caller, 'token_approved', `Token ${token.symbol} approved`, { token: token.address });
    this.events.emit('tokenApproved', { by: caller, token: { ...token } });
    return record;
  }

  blacklist(caller: Address, token: Address): void {
    this.requireOperator(caller, 'blacklist tokens');
    this.registry.blacklist(token);
    this.audit(caller, 'token_blacklisted', `Token ${token} blacklisted`, { token });
    this.events.emit('tokenBlacklisted', { by: caller, token });
  }

  private audit(caller: Address, eventType: string, message: string, context?: Record<string, unknown>): void {
    const ctx = this.logger.startOperation('op', caller, eventType);
    this.logger.audit(ctx, eventType, message, 'success', context);
  }
}
