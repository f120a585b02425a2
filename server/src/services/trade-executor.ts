/**
 * Trade Executor
 * Runs a chosen opportunity as a bounded round trip, either from the executor's
 * own balance or inside a flash loan, then routes super-profit into the stable token.
 */

import type {
  Address,
  Opportunity,
  Settlement,
  Strategy,
  SuperProfitConversion,
  TokenRef,
} from '../../../shared/schema.js';
import {
  AuthorizationError,
  CollaboratorFailureError,
  InsufficientRepaymentError,
  RiskRejectionError,
  SlippageError,
} from '../errors.js';
import {
  calculateMinOutput,
  ceilDiv,
  minBigInt,
  sameAddress,
  tokenAmountCeil,
  tokenAmountFloor,
  valueOf,
} from '../utils/amounts.js';
import { withTimeout } from '../utils/with-timeout.js';
import { logger as rootLogger, type OperationContext, type StructuredLogger } from '../utils/structured-logger.js';
import {
  buildFlashLoanRequest,
  decodeCallbackParams,
  encodeCallbackParams,
  type FlashLender,
  type FlashLoanReceiver,
  type FlashLoanSettlement,
  type LoanReceivedCall,
} from './flash-loan.js';
import type { RiskGate } from './risk-gate.js';
import type { SwapOrder, SwapVenue } from './swap-venue.js';
import type { VaultTransaction } from './vault.js';

export interface ExecutionBounds {
  minIntermediate: bigint;
  minReturn: bigint;
}

export interface TradeExecutorOptions {
  // This executor's own address, the only accepted flash-loan initiator
  self: Address;
  gate: RiskGate;
  venues: SwapVenue[];
  lender: FlashLender;
  baseToken: TokenRef;
  stableToken: TokenRef;
  superProfitSlippageBps: number;
  // Quotes and reads
  timeoutMs: number;
  // Each submitted swap
  executionTimeoutMs: number;
  // The whole flash loan, callback included
  flashLoanTimeoutMs: number;
  logger?: StructuredLogger;
}

interface ActiveLoan {
  opportunity: Opportunity;
  account: VaultTransaction;
  ctx: OperationContext;
}

/**
 * Minimum outputs that still cover principal, fee, gas and the profit threshold
 */
export function computeBounds(opportunity: Opportunity, profitThreshold: bigint): ExecutionBounds {
  const { amount, fee, gasCost, priceIn, tokenIn, expectedIntermediate, expectedReturn } = opportunity;
  const minReturn = amount + fee + tokenAmountCeil(gasCost + profitThreshold, priceIn, tokenIn.decimals);
  const minIntermediate = expectedReturn === 0n
    ? expectedIntermediate
    : ceilDiv(expectedIntermediate * minReturn, expectedReturn);
  return { minIntermediate, minReturn };
}

export class TradeExecutor implements FlashLoanReceiver {
  private readonly logger: StructuredLogger;
  private activeLoan: ActiveLoan | null = null;

  constructor(private readonly options: TradeExecutorOptions) {
    this.logger = (options.logger ?? rootLogger).child('executor');
  }

  /**
   * Direct path: X -> Y -> X from the executor's own balance
   */
  async executeDirect(
    opportunity: Opportunity,
    account: VaultTransaction,
    ctx: OperationContext
  ): Promise<Settlement> {
    this.assertEligible(opportunity);
    const bounds = computeBounds(opportunity, this.options.gate.getConfig().profitThreshold);

    const buyVenue = this.venueAt(opportunity.buyVenue);
    const sellVenue = this.venueAt(opportunity.sellVenue);

    this.logger.info(ctx, 'direct_execution', 'Executing direct round trip', {
      tokenIn: opportunity.tokenIn.symbol,
      tokenOut: opportunity.tokenOut.symbol,
      buyVenue: buyVenue.name,
      sellVenue: sellVenue.name,
      amount: opportunity.amount,
      ...bounds,
    });

    const intermediate = await this.swap(
      buyVenue,
      {
        tokenIn: opportunity.tokenIn.address,
        tokenOut: opportunity.tokenOut.address,
        amountIn: opportunity.amount,
        minAmountOut: bounds.minIntermediate,
      },
      account
    );
    const amountReturned = await this.swap(
      sellVenue,
      {
        tokenIn: opportunity.tokenOut.address,
        tokenOut: opportunity.tokenIn.address,
        amountIn: intermediate,
        minAmountOut: bounds.minReturn,
      },
      account
    );

    return this.settle('direct', opportunity, amountReturned, opportunity.fee, account, ctx);
  }

  /**
   * Flash-loan path: borrow the base token, trade inside the callback, repay
   */
  async executeFlashloan(
    opportunity: Opportunity,
    account: VaultTransaction,
    ctx: OperationContext
  ): Promise<Settlement> {
    this.assertEligible(opportunity);
    if (!sameAddress(opportunity.tokenIn.address, this.options.baseToken.address)) {
      throw new RiskRejectionError('Flash loans only borrow the base token', {
        tokenIn: opportunity.tokenIn.address,
      });
    }
    if (this.activeLoan) {
      throw new RiskRejectionError('A flash loan is already in progress');
    }

    const buyVenue = this.venueAt(opportunity.buyVenue);
    const sellVenue = this.venueAt(opportunity.sellVenue);

    const bounds = computeBounds(opportunity, this.options.gate.getConfig().profitThreshold);
    const request = buildFlashLoanRequest(opportunity.tokenIn.address, opportunity.amount);
    const params = encodeCallbackParams({
      tokenOut: opportunity.tokenOut.address,
      buyVenue: opportunity.buyVenue,
      sellVenue: opportunity.sellVenue,
      ...bounds,
    });

    this.logger.info(ctx, 'flash_loan_requested', `Borrowing ${opportunity.tokenIn.symbol}`, {
      lender: this.options.lender.name,
      buyVenue: buyVenue.name,
      sellVenue: sellVenue.name,
      amount: opportunity.amount,
      ...bounds,
    });

    this.activeLoan = { opportunity, account, ctx };
    let outcome: FlashLoanSettlement;
    try {
      outcome = await withTimeout(
        this.options.lender.flashLoan({
          receiver: this,
          account,
          initiator: this.options.self,
          request,
          params,
        }),
        this.options.flashLoanTimeoutMs,
        'lender.flashLoan'
      );
    } finally {
      this.activeLoan = null;
    }

    const [amountReturned] = outcome.amountsReturned;
    const [premium] = outcome.premiums;
    if (amountReturned === undefined || premium === undefined) {
      throw new CollaboratorFailureError('Flash loan settlement does not cover the borrowed asset');
    }

    return this.settle('flashloan', opportunity, amountReturned, premium, account, ctx);
  }

  /**
   * Called by the lender once the borrowed funds are in the account.
   * Trades first, then checks every asset covers principal + premium.
   */
  async onLoanReceived(call: LoanReceivedCall): Promise<boolean> {
    if (!sameAddress(call.caller, this.options.lender.address)) {
      throw new AuthorizationError('Flash loan callback caller is not the registered lender', call.caller);
    }
    if (!sameAddress(call.initiator, this.options.self)) {
      throw new AuthorizationError('Flash loan was not initiated by this executor', call.initiator);
    }
    const loan = this.activeLoan;
    if (!loan) {
      throw new AuthorizationError('No flash loan is in progress', call.caller);
    }

    const asset = call.assets[0];
    const amount = call.amounts[0];
    const premium = call.premiums[0];
    if (
      asset === undefined || amount === undefined || premium === undefined ||
      call.assets.length !== 1 || call.amounts.length !== 1 || call.premiums.length !== 1
    ) {
      throw new CollaboratorFailureError('Flash loan callback expects exactly one asset');
    }
    if (!sameAddress(asset, loan.opportunity.tokenIn.address) || amount !== loan.opportunity.amount) {
      throw new CollaboratorFailureError('Flash loan callback does not match the requested loan', {
        asset,
        amount,
      });
    }

    const { tokenOut, buyVenue, sellVenue, minIntermediate, minReturn } = decodeCallbackParams(call.params);
    const owed = amount + premium;
    const { account, ctx } = loan;

    this.logger.debug(ctx, 'flash_loan_received', 'Loan received, trading borrowed funds', {
      asset,
      amount,
      premium,
    });

    const seller = this.venueAt(sellVenue);
    const intermediate = await this.swap(
      this.venueAt(buyVenue),
      { tokenIn: asset, tokenOut, amountIn: amount, minAmountOut: minIntermediate },
      account
    );

    // Refuse the second leg when its current quote cannot repay the loan
    const projected = await this.call(seller.quote(tokenOut, asset, intermediate), `${seller.name}.quote`);
    if (projected < owed) {
      throw new InsufficientRepaymentError(asset, owed, projected);
    }

    await this.swap(
      seller,
      { tokenIn: tokenOut, tokenOut: asset, amountIn: intermediate, minAmountOut: minReturn },
      account
    );

    call.assets.forEach((loanAsset, i) => {
      const due = (call.amounts[i] ?? 0n) + (call.premiums[i] ?? 0n);
      const available = account.balanceOf(loanAsset);
      if (available < due) {
        throw new InsufficientRepaymentError(loanAsset, due, available);
      }
    });

    return true;
  }

  private async settle(
    strategy: Strategy,
    opportunity: Opportunity,
    amountReturned: bigint,
    fee: bigint,
    account: VaultTransaction,
    ctx: OperationContext
  ): Promise<Settlement> {
    const { tokenIn, amount, priceIn, gasCost } = opportunity;
    const net = amountReturned - amount - fee;
    const profit = valueOf(net, priceIn, tokenIn.decimals) - gasCost;
    if (profit < 0n) {
      throw new SlippageError(tokenIn.address, amountReturned, amount + fee);
    }

    const superProfit = await this.convertSuperProfit(opportunity, net, profit, account, ctx);

    this.logger.info(ctx, 'trade_settled', `${strategy} round trip settled`, {
      amountReturned,
      fee,
      profit,
      superProfit: superProfit?.amountIn,
    });

    return {
      strategy,
      opportunity,
      amountReturned,
      fee,
      profit,
      ...(superProfit && { superProfit }),
    };
  }

  /**
   * Swap the part of the profit above the super-profit threshold into the stable token
   */
  private async convertSuperProfit(
    opportunity: Opportunity,
    net: bigint,
    profit: bigint,
    account: VaultTransaction,
    ctx: OperationContext
  ): Promise<SuperProfitConversion | undefined> {
    const { superProfitThreshold } = this.options.gate.getConfig();
    if (profit <= superProfitThreshold) return undefined;

    const { tokenIn, priceIn } = opportunity;
    const stable = this.options.stableToken;
    const excessValue = profit - superProfitThreshold;
    const amountIn = minBigInt(tokenAmountFloor(excessValue, priceIn, tokenIn.decimals), net);
    if (amountIn <= 0n) return undefined;

    let amountOut = amountIn;
    if (!sameAddress(tokenIn.address, stable.address)) {
      const { venue, quoted } = await this.bestConversion(tokenIn.address, stable.address, amountIn);
      amountOut = await this.swap(
        venue,
        {
          tokenIn: tokenIn.address,
          tokenOut: stable.address,
          amountIn,
          minAmountOut: calculateMinOutput(quoted, this.options.superProfitSlippageBps),
        },
        account
      );
    }

    this.logger.info(ctx, 'super_profit_converted', `Converted excess profit into ${stable.symbol}`, {
      amountIn,
      amountOut,
      excessValue,
    });

    return { token: tokenIn.address, stableToken: stable.address, amountIn, amountOut, excessValue };
  }

  private async bestConversion(
    tokenIn: Address,
    tokenOut: Address,
    amountIn: bigint
  ): Promise<{ venue: SwapVenue; quoted: bigint }> {
    const quotes = await Promise.all(
      this.options.venues.map(async (venue) => ({
        venue,
        quoted: await this.call(venue.quote(tokenIn, tokenOut, amountIn), `${venue.name}.quote`),
      }))
    );
    const best = quotes.reduce((a, b) => (b.quoted > a.quoted ? b : a));
    if (best.quoted === 0n) {
      throw new CollaboratorFailureError(`No venue quotes ${tokenIn} -> ${tokenOut}`, { tokenIn, tokenOut });
    }
    return best;
  }

  /**
   * Venue swap with our own check of the minimum output
   */
  private async swap(venue: SwapVenue, order: SwapOrder, account: VaultTransaction): Promise<bigint> {
    const amountOut = await withTimeout(
      venue.swap(order, account),
      this.options.executionTimeoutMs,
      `${venue.name}.swap`
    );
    if (amountOut < order.minAmountOut) {
      throw new SlippageError(order.tokenOut, amountOut, order.minAmountOut);
    }
    return amountOut;
  }

  private venueAt(address: Address): SwapVenue {
    const venue = this.options.venues.find((candidate) => sameAddress(candidate.address, address));
    if (!venue) {
      throw new CollaboratorFailureError(`Unknown swap venue ${address}`, { venue: address });
    }
    return venue;
  }

  private assertEligible(opportunity: Opportunity): void {
    for (const token of [opportunity.tokenIn, opportunity.tokenOut]) {
      if (!this.options.gate.isEligible(token.address)) {
        throw new RiskRejectionError(`Token ${token.symbol} is not eligible for trading`, {
          token: token.address,
        });
      }
    }
  }

  private call<T>(promise: Promise<T>, operation: string): Promise<T> {
    return withTimeout(promise, this.options.timeoutMs, operation);
  }
}
