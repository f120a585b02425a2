/**
 * Shared TypeScript types for the arbitrage executor
 * Used by the server and by API consumers
 */

// Ethereum address type
export type Address = `0x${string}`;
export type Hex = `0x${string}`;

// Chain identifiers. The Chainlink Feed Registry only exists on Ethereum mainnet.
export type ChainId = 'ethereum';

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

// Reference unit: USD with 18 fixed decimals
export const REFERENCE_DECIMALS = 18;

// Token types
export interface TokenRef {
  address: Address;
  symbol: string;
  decimals: number;
}

export interface TokenRecord extends TokenRef {
  approved: boolean;
  blacklisted: boolean;
}

// Risk configuration. Thresholds are reference-unit amounts, gas price is wei.
export interface RiskThresholds {
  gasPriceLimit: bigint;
  profitThreshold: bigint;
  superProfitThreshold: bigint;
  liquidityThreshold: bigint;
}

export interface RiskConfig extends RiskThresholds {
  isPaused: boolean;
}

// Execution types
export type Strategy = 'direct' | 'flashloan';

export type ExecutionState = 'idle' | 'scanning' | 'executing';

export type AttemptStage = 'admission' | 'scanning' | 'executing';

export interface Opportunity {
  tokenIn: TokenRef;
  tokenOut: TokenRef;
  // Router of the tokenIn -> tokenOut leg and of the leg back
  buyVenue: Address;
  sellVenue: Address;
  amount: bigint;
  expectedIntermediate: bigint;
  expectedReturn: bigint;
  // Flash-loan premium in tokenIn units, 0 on the direct path
  fee: bigint;
  // Reference-unit price of one whole tokenIn
  priceIn: bigint;
  gasCost: bigint;
  expectedProfit: bigint;
}

export interface FlashLoanRequest {
  assets: Address[];
  amounts: bigint[];
  modes: bigint[];
}

export interface SuperProfitConversion {
  token: Address;
  stableToken: Address;
  amountIn: bigint;
  amountOut: bigint;
  excessValue: bigint;
}

export interface Settlement {
  strategy: Strategy;
  opportunity: Opportunity;
  amountReturned: bigint;
  fee: bigint;
  profit: bigint;
  superProfit?: SuperProfitConversion;
}

export type FailureCode =
  | 'CONFIGURATION_INVALID'
  | 'UNAUTHORIZED'
  | 'RISK_REJECTED'
  | 'ORACLE_INVALID'
  | 'COLLABORATOR_FAILED'
  | 'SLIPPAGE_EXCEEDED'
  | 'INSUFFICIENT_REPAYMENT'
  | 'COLLABORATOR_TIMEOUT'
  | 'NO_OPPORTUNITY'
  | 'INTERNAL_ERROR';

export type ExecutionResult =
  | {
      status: 'settled';
      correlationId: string;
      strategy: Strategy;
      settlement: Settlement;
      totalProfit: bigint;
    }
  | {
      status: 'failed';
      correlationId: string;
      strategy: Strategy;
      stage: AttemptStage;
      code: FailureCode;
      reason: string;
    };

export interface LedgerSnapshot {
  totalProfit: bigint;
  settledCount: number;
  lastUpdatedAt: number | null;
}

export interface EngineStatus {
  state: ExecutionState;
  busy: boolean;
  risk: RiskConfig;
  ledger: LedgerSnapshot;
  balances: Record<string, bigint>;
}

export interface ExecutorStatus {
  isRunning: boolean;
  strategy: Strategy | null;
  amount: bigint | null;
  intervalMs: number;
  lastRunAt: Date | null;
  attempts: number;
  settled: number;
  failed: number;
}

// Execution history record
export type ExecutionOutcome = 'settled' | 'failed';

export interface ExecutionRecord {
  correlationId: string;
  strategy: Strategy;
  outcome: ExecutionOutcome;
  tokenIn: Address | null;
  tokenOut: Address | null;
  amount: bigint | null;
  profit: bigint | null;
  code: FailureCode | null;
  reason: string | null;
  createdAt: Date;
}

// WebSocket types
export type WSEventType =
  | 'arbitrage:executed'
  | 'arbitrage:failed'
  | 'superprofit:converted'
  | 'risk:paused'
  | 'risk:unpaused'
  | 'risk:thresholds'
  | 'token:approved'
  | 'token:blacklisted'
  | 'executor:status'
  | 'error';

export interface WSEvent<T = unknown> {
  type: WSEventType;
  payload: T;
  timestamp: number;
}
