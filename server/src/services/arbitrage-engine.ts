/**
 * Arbitrage Engine
 * Owns the risk configuration, monitored set, ledger and vault of one executor and
 * drives every attempt through idle -> scanning -> executing -> settled | failed.
 * One attempt runs at a time; operator mutations wait for it to finish.
 */

import type {
  Address,
  AttemptStage,
  EngineStatus,
  ExecutionResult,
  ExecutionState,
  FailureCode,
  RiskConfig,
  RiskThresholds,
  Settlement,
  Strategy,
  TokenRecord,
  TokenRef,
} from '../../../shared/schema.js';
import { ZERO_ADDRESS } from '../../../shared/schema.js';
import { ArbitrageError, ConfigurationError, RiskRejectionError } from '../errors.js';
import { sameAddress } from '../utils/amounts.js';
import { withTimeout } from '../utils/with-timeout.js';
import {
  logger as rootLogger,
  errorContext,
  type OperationContext,
  type StructuredLogger,
} from '../utils/structured-logger.js';
import { ArbitrageEventBus } from './events.js';
import type { FlashLender } from './flash-loan.js';
import { GasPriceOracle, type GasPriceSource } from './gas-oracle.js';
import { Ledger } from './ledger.js';
import { OpportunityScanner } from './opportunity-scanner.js';
import { PriceFeed, type PriceSource } from './price-feed.js';
import { RiskGate } from './risk-gate.js';
import type { SwapVenue } from './swap-venue.js';
import { TokenRegistry } from './token-registry.js';
import { TradeExecutor } from './trade-executor.js';
import { Vault } from './vault.js';

export const NO_OPPORTUNITY_REASON = 'No profitable opportunity found';
export const ATTEMPT_IN_PROGRESS_REASON = 'Execution already in progress';

export interface EngineSettings {
  operator: Address;
  // Address the executor trades from; the only accepted flash-loan initiator
  executor: Address;
  monitoredTokens: TokenRef[];
  baseToken: TokenRef;
  stableToken: TokenRef;
  thresholds: RiskThresholds;
  oracleMaxAgeSec: number;
  // Reads and quotes
  collaboratorTimeoutMs: number;
  // Each submitted swap transaction
  executionTimeoutMs: number;
  // The whole flash loan, callback included
  flashLoanTimeoutMs: number;
  directGasUnits: bigint;
  flashloanGasUnits: bigint;
  superProfitSlippageBps: number;
}

export interface BalanceReader {
  balanceOf(token: Address, holder: Address): Promise<bigint>;
}

export interface EngineCollaborators {
  venues: SwapVenue[];
  priceSources: PriceSource[];
  gasSource: GasPriceSource;
  lender: FlashLender;
  // On-chain balances of the executor; the vault is re-read from it after a failed execution
  balances?: BalanceReader;
}

export interface EngineOptions {
  vault?: Vault;
  events?: ArbitrageEventBus;
  logger?: StructuredLogger;
  // Unix seconds, for oracle staleness
  now?: () => number;
}

class AttemptFailure extends Error {
  constructor(
    public readonly stage: AttemptStage,
    public readonly error: unknown
  ) {
    super(error instanceof Error ? error.message : String(error));
    this.name = 'AttemptFailure';
  }
}

function requireAddress(name: string, address: Address | undefined): void {
  if (!address || sameAddress(address, ZERO_ADDRESS)) {
    throw new ConfigurationError(`${name} must be a non-zero address`, { [name]: address });
  }
}

/**
 * Reject missing or zero addresses and duplicate tokens before anything is built
 */
export function validateInitialization(settings: EngineSettings, collaborators: EngineCollaborators): void {
  requireAddress('operator', settings.operator);
  requireAddress('executor', settings.executor);
  requireAddress('gasPriceOracle', collaborators.gasSource.address);
  requireAddress('lendingPool', collaborators.lender.address);
  requireAddress('baseToken', settings.baseToken.address);
  requireAddress('stableToken', settings.stableToken.address);

  if (collaborators.venues.length === 0) {
    throw new ConfigurationError('At least one swap venue is required');
  }
  const routers = new Set<string>();
  collaborators.venues.forEach((venue, i) => {
    requireAddress(`routers[${i}]`, venue.address);
    const key = venue.address.toLowerCase();
    if (routers.has(key)) {
      throw new ConfigurationError(`Duplicate swap venue ${venue.address}`, { router: venue.address });
    }
    routers.add(key);
  });

  if (collaborators.priceSources.length === 0) {
    throw new ConfigurationError('At least one price oracle is required');
  }
  collaborators.priceSources.forEach((source, i) => requireAddress(`priceOracles[${i}]`, source.address));

  const seen = new Set<string>();
  settings.monitoredTokens.forEach((token, i) => {
    requireAddress(`monitoredTokens[${i}]`, token.address);
    const key = token.address.toLowerCase();
    if (seen.has(key)) {
      throw new ConfigurationError(`Duplicate monitored token ${token.address}`, { token: token.address });
    }
    seen.add(key);
  });

  for (const key of ['collaboratorTimeoutMs', 'executionTimeoutMs', 'flashLoanTimeoutMs'] as const) {
    if (settings[key] <= 0) {
      throw new ConfigurationError(`${key} must be positive`);
    }
  }
  if (settings.superProfitSlippageBps < 0 || settings.superProfitSlippageBps > 10_000) {
    throw new ConfigurationError('superProfitSlippageBps must be between 0 and 10000');
  }
}

export class ArbitrageEngine {
  readonly events: ArbitrageEventBus;
  readonly vault: Vault;

  private readonly settings: EngineSettings;
  private readonly collaborators: EngineCollaborators;
  private readonly logger: StructuredLogger;
  private readonly registry: TokenRegistry;
  private readonly gate: RiskGate;
  private readonly ledger = new Ledger();
  private readonly gasOracle: GasPriceOracle;
  private readonly scanner: OpportunityScanner;
  private readonly executor: TradeExecutor;

  private state: ExecutionState = 'idle';
  private currentAttempt: Promise<ExecutionResult> | null = null;

  constructor(settings: EngineSettings, collaborators: EngineCollaborators, options: EngineOptions = {}) {
    validateInitialization(settings, collaborators);

    this.settings = settings;
    this.collaborators = collaborators;
    this.logger = (options.logger ?? rootLogger).child('engine');
    this.events = options.events ?? new ArbitrageEventBus(options.logger);
    this.vault = options.vault ?? new Vault();

    this.registry = new TokenRegistry(settings.monitoredTokens);
    this.gate = new RiskGate({
      operator: settings.operator,
      thresholds: settings.thresholds,
      registry: this.registry,
      events: this.events,
      logger: options.logger,
    });

    // Initial tokens plus the base and stable tokens start out approved
    for (const token of [settings.baseToken, settings.stableToken]) {
      if (!this.registry.has(token.address)) this.registry.register(token);
    }
    for (const token of this.registry.all()) {
      this.registry.approve(token);
    }

    const timeoutMs = settings.collaboratorTimeoutMs;
    const priceFeed = new PriceFeed(collaborators.priceSources, {
      maxAgeSec: settings.oracleMaxAgeSec,
      timeoutMs,
      now: options.now,
      logger: options.logger,
    });
    this.gasOracle = new GasPriceOracle(collaborators.gasSource, {
      maxAgeSec: settings.oracleMaxAgeSec,
      timeoutMs,
      now: options.now,
    });
    this.scanner = new OpportunityScanner({
      registry: this.registry,
      gate: this.gate,
      priceFeed,
      venues: collaborators.venues,
      gasToken: settings.baseToken.address,
      timeoutMs,
      logger: options.logger,
    });
    this.executor = new TradeExecutor({
      self: settings.executor,
      gate: this.gate,
      venues: collaborators.venues,
      lender: collaborators.lender,
      baseToken: settings.baseToken,
      stableToken: settings.stableToken,
      superProfitSlippageBps: settings.superProfitSlippageBps,
      timeoutMs,
      executionTimeoutMs: settings.executionTimeoutMs,
      flashLoanTimeoutMs: settings.flashLoanTimeoutMs,
      logger: options.logger,
    });
  }

  // ============================================
  // Operator commands
  // ============================================

  triggerDirect(caller: Address, amount: bigint): Promise<ExecutionResult> {
    return this.trigger('direct', caller, amount);
  }

  triggerFlashloan(caller: Address, amount: bigint): Promise<ExecutionResult> {
    return this.trigger('flashloan', caller, amount);
  }

  /**
   * Run one attempt. Authorization errors are thrown; every other outcome is a result.
   */
  async trigger(strategy: Strategy, caller: Address, amount: bigint): Promise<ExecutionResult> {
    this.gate.requireOperator(caller, `trigger ${strategy} execution`);
    const ctx = this.logger.startOperation(strategy === 'flashloan' ? 'fl' : 'arb', caller, strategy);

    if (this.currentAttempt) {
      return this.fail(ctx, strategy, 'admission', new RiskRejectionError(ATTEMPT_IN_PROGRESS_REASON));
    }
    if (amount <= 0n) {
      return this.fail(ctx, strategy, 'admission', new RiskRejectionError('Trade amount must be positive'));
    }

    const attempt = this.runAttempt(ctx, strategy, amount);
    this.currentAttempt = attempt;
    try {
      return await attempt;
    } finally {
      this.currentAttempt = null;
    }
  }

  async pause(caller: Address): Promise<RiskConfig> {
    this.gate.requireOperator(caller, 'pause');
    await this.whenIdle();
    this.gate.pause(caller);
    return this.gate.getConfig();
  }

  async unpause(caller: Address): Promise<RiskConfig> {
    this.gate.requireOperator(caller, 'unpause');
    await this.whenIdle();
    this.gate.unpause(caller);
    return this.gate.getConfig();
  }

  async setThresholds(caller: Address, thresholds: RiskThresholds): Promise<RiskConfig> {
    this.gate.requireOperator(caller, 'set thresholds');
    await this.whenIdle();
    return this.gate.setThresholds(caller, thresholds);
  }

  async addMonitoredToken(caller: Address, token: TokenRef): Promise<TokenRecord> {
    this.gate.requireOperator(caller, 'approve tokens');
    await this.whenIdle();
    return this.gate.approve(caller, token);
  }

  async blacklistToken(caller: Address, token: Address): Promise<void> {
    this.gate.requireOperator(caller, 'blacklist tokens');
    await this.whenIdle();
    this.gate.blacklist(caller, token);
  }

  /**
   * Replace every monitored balance in the vault with the executor's on-chain balance
   */
  async syncBalances(): Promise<Record<string, bigint>> {
    const reader = this.collaborators.balances;
    if (!reader) {
      throw new ConfigurationError('No balance reader is configured');
    }
    const tokens = this.registry.all();
    const balances = await Promise.all(
      tokens.map((token) =>
        withTimeout(
          reader.balanceOf(token.address, this.settings.executor),
          this.settings.collaboratorTimeoutMs,
          'balances.balanceOf'
        )
      )
    );
    tokens.forEach((token, i) => this.vault.sync(token.address, balances[i] ?? 0n));
    return this.vault.snapshot();
  }

  // ============================================
  // Read surface
  // ============================================

  getGasPrice(): Promise<bigint> {
    return this.gasOracle.getGasPrice();
  }

  getRiskConfig(): RiskConfig {
    return this.gate.getConfig();
  }

  getTotalProfit(): bigint {
    return this.ledger.totalProfit;
  }

  getMonitoredTokens(): TokenRecord[] {
    return this.registry.monitored();
  }

  getBlacklistedTokens(): Address[] {
    return this.registry.blacklistedAddresses();
  }

  getToken(address: Address): TokenRecord | undefined {
    return this.registry.get(address);
  }

  isOperator(caller: Address | string): boolean {
    return this.gate.isOperator(caller);
  }

  get operator(): Address {
    return this.settings.operator;
  }

  getStatus(): EngineStatus {
    return {
      state: this.state,
      busy: this.currentAttempt !== null,
      risk: this.gate.getConfig(),
      ledger: this.ledger.snapshot(),
      balances: this.vault.snapshot(),
    };
  }

  /**
   * Resolves once no attempt is in flight
   */
  async whenIdle(): Promise<void> {
    while (this.currentAttempt) {
      await this.currentAttempt;
    }
  }

  // ============================================
  // Attempt lifecycle
  // ============================================

  private async runAttempt(ctx: OperationContext, strategy: Strategy, amount: bigint): Promise<ExecutionResult> {
    try {
      return await this.execute(ctx, strategy, amount);
    } catch (error) {
      if (error instanceof AttemptFailure) {
        return this.fail(ctx, strategy, error.stage, error.error);
      }
      return this.fail(ctx, strategy, 'executing', error);
    } finally {
      this.state = 'idle';
    }
  }

  private async execute(ctx: OperationContext, strategy: Strategy, amount: bigint): Promise<ExecutionResult> {
    // Admission
    if (this.gate.getConfig().isPaused) {
      throw new AttemptFailure('admission', new RiskRejectionError('Trading is paused'));
    }
    const gasPrice = await this.stage('admission', () => this.gasOracle.getGasPrice());
    const decision = this.gate.assessAdmission(gasPrice);
    if (!decision.admitted) {
      throw new AttemptFailure('admission', new RiskRejectionError(decision.reason, { gasPrice }));
    }

    // Scanning
    this.state = 'scanning';
    const opportunity = await this.stage('scanning', async () => {
      const flash = strategy === 'flashloan';
      const premiumBps = flash
        ? await withTimeout(this.collaborators.lender.premiumBps(), this.settings.collaboratorTimeoutMs, 'lender.premiumBps')
        : 0n;
      return this.scanner.findOpportunity(
        {
          amount,
          gasPrice,
          gasUnits: flash ? this.settings.flashloanGasUnits : this.settings.directGasUnits,
          premiumBps,
          ...(flash && { tokenIn: this.settings.baseToken.address }),
        },
        ctx
      );
    });
    if (!opportunity) {
      return this.report(ctx, strategy, 'scanning', 'NO_OPPORTUNITY', NO_OPPORTUNITY_REASON);
    }

    // Executing
    this.state = 'executing';
    const account = this.vault.begin();
    let settlement: Settlement;
    try {
      settlement = strategy === 'flashloan'
        ? await this.executor.executeFlashloan(opportunity, account, ctx)
        : await this.executor.executeDirect(opportunity, account, ctx);
      account.commit();
    } catch (error) {
      account.rollback();
      await this.reconcile(ctx);
      throw new AttemptFailure('executing', error);
    }

    // Settled: super-profit notice precedes the ledger update
    if (settlement.superProfit) {
      const { token, stableToken, amountIn, amountOut, excessValue } = settlement.superProfit;
      this.events.emit('superProfitConverted', {
        correlationId: ctx.correlation_id,
        token,
        stableToken,
        amount: amountIn,
        amountOut,
        excessValue,
      });
    }

    const totalProfit = this.ledger.record(settlement.profit);
    this.events.emit('arbitrageExecuted', {
      correlationId: ctx.correlation_id,
      strategy,
      profit: settlement.profit,
      tokenIn: opportunity.tokenIn.address,
      tokenOut: opportunity.tokenOut.address,
      amount: opportunity.amount,
    });
    this.logger.audit(ctx, 'arbitrage_settled', `${strategy} arbitrage settled`, 'success', {
      profit: settlement.profit,
      totalProfit,
    });

    return { status: 'settled', correlationId: ctx.correlation_id, strategy, settlement, totalProfit };
  }

  /**
   * Transactions already mined before a failure stay mined; re-read the chain
   */
  private async reconcile(ctx: OperationContext): Promise<void> {
    if (!this.collaborators.balances) return;
    try {
      const balances = await this.syncBalances();
      this.logger.info(ctx, 'balances_synced', 'Vault re-read from chain after failed execution', { balances });
    } catch (error) {
      this.logger.error(ctx, 'balance_sync_failed', 'Could not re-read balances after failed execution', errorContext(error));
    }
  }

  private async stage<T>(stage: AttemptStage, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new AttemptFailure(stage, error);
    }
  }

  private fail(ctx: OperationContext, strategy: Strategy, stage: AttemptStage, error: unknown): ExecutionResult {
    if (error instanceof ArbitrageError) {
      return this.report(ctx, strategy, stage, error.code, error.message, errorContext(error));
    }
    this.logger.error(ctx, 'attempt_error', 'Unexpected error during attempt', errorContext(error));
    const reason = error instanceof Error ? error.message : String(error);
    return this.report(ctx, strategy, stage, 'INTERNAL_ERROR', reason);
  }

  private report(
    ctx: OperationContext,
    strategy: Strategy,
    stage: AttemptStage,
    code: FailureCode,
    reason: string,
    context: Record<string, unknown> = {}
  ): ExecutionResult {
    this.logger.audit(ctx, 'arbitrage_failed', reason, 'failure', { stage, code, ...context });
    this.events.emit('arbitrageFailed', { correlationId: ctx.correlation_id, strategy, stage, code, reason });
    return { status: 'failed', correlationId: ctx.correlation_id, strategy, stage, code, reason };
  }
}
