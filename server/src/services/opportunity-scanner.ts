/**
 * Opportunity Scanner
 * First-match search over the ordered monitored set. The outer loop picks the
 * token traded in, the inner loop the token routed through; the first pair whose
 * round trip clears the profit threshold is returned. Each pair buys on the venue
 * quoting the most tokenOut and sells back on the venue returning the most tokenIn.
 */

import type { Address, Opportunity, TokenRecord } from '../../../shared/schema.js';
import { bpsOf, sameAddress, valueOf } from '../utils/amounts.js';
import { withTimeout } from '../utils/with-timeout.js';
import { logger as rootLogger, type OperationContext, type StructuredLogger } from '../utils/structured-logger.js';
import type { PriceFeed } from './price-feed.js';
import type { RiskGate } from './risk-gate.js';
import type { SwapVenue } from './swap-venue.js';
import type { TokenRegistry } from './token-registry.js';

export interface ScanRequest {
  amount: bigint;
  gasPrice: bigint;
  gasUnits: bigint;
  // Flash-loan premium charged on `amount`; 0 for the direct path
  premiumBps: bigint;
  // Restrict the traded-in token (the flash-loan path borrows only the base token)
  tokenIn?: Address;
}

export interface OpportunityScannerOptions {
  registry: TokenRegistry;
  gate: RiskGate;
  priceFeed: PriceFeed;
  venues: SwapVenue[];
  // Token whose price values gas (wrapped native asset)
  gasToken: Address;
  timeoutMs: number;
  logger?: StructuredLogger;
}

interface VenueQuote {
  venue: SwapVenue;
  amountOut: bigint;
}

export class OpportunityScanner {
  private readonly logger: StructuredLogger;

  constructor(private readonly options: OpportunityScannerOptions) {
    this.logger = (options.logger ?? rootLogger).child('scanner');
  }

  async findOpportunity(request: ScanRequest, ctx?: OperationContext): Promise<Opportunity | null> {
    const { registry, gate } = this.options;
    const scanCtx = ctx ?? this.logger.startOperation('arb');
    const { profitThreshold, liquidityThreshold } = gate.getConfig();
    const prices = new Map<string, bigint>();
    const priceOf = async (token: Address): Promise<bigint> => {
      const key = token.toLowerCase();
      const cached = prices.get(key);
      if (cached !== undefined) return cached;
      const price = await this.options.priceFeed.getPrice(token, scanCtx);
      prices.set(key, price);
      return price;
    };

    const gasPriceInGasToken = request.gasPrice * request.gasUnits;
    const gasCost = gasPriceInGasToken === 0n
      ? 0n
      : valueOf(gasPriceInGasToken, await priceOf(this.options.gasToken), 18);
    const fee = bpsOf(request.amount, request.premiumBps);

    const tokens = registry.all();
    let pairsConsidered = 0;

    for (const tokenIn of tokens) {
      if (request.tokenIn && !sameAddress(tokenIn.address, request.tokenIn)) continue;
      if (!gate.isEligible(tokenIn.address)) continue;

      for (const tokenOut of tokens) {
        if (sameAddress(tokenIn.address, tokenOut.address)) continue;
        if (!gate.isEligible(tokenOut.address)) continue;
        pairsConsidered++;

        const pooled = await this.pooledVenues(tokenIn.address, tokenOut.address);
        if (pooled.length === 0) continue;

        const priceIn = await priceOf(tokenIn.address);
        const priceOut = await priceOf(tokenOut.address);
        const liquid = pooled
          .filter(({ reserveA, reserveB }) =>
            valueOf(reserveA, priceIn, tokenIn.decimals) + valueOf(reserveB, priceOut, tokenOut.decimals) >= liquidityThreshold
          )
          .map(({ venue }) => venue);
        if (liquid.length === 0) {
          this.logger.debug(scanCtx, 'pair_skipped', 'Pair below liquidity threshold on every venue', {
            tokenIn: tokenIn.symbol,
            tokenOut: tokenOut.symbol,
          });
          continue;
        }

        const opportunity = await this.evaluatePair(tokenIn, tokenOut, liquid, request.amount, fee, priceIn, gasCost);
        if (opportunity.expectedProfit > profitThreshold) {
          this.logger.info(scanCtx, 'opportunity_found', `${tokenIn.symbol} -> ${tokenOut.symbol} -> ${tokenIn.symbol}`, {
            buyVenue: opportunity.buyVenue,
            sellVenue: opportunity.sellVenue,
            amount: opportunity.amount,
            expectedProfit: opportunity.expectedProfit,
            pairsConsidered,
          });
          return opportunity;
        }
      }
    }

    this.logger.info(scanCtx, 'no_opportunity', 'Scan finished without a profitable pair', { pairsConsidered });
    return null;
  }

  /**
   * Venues holding both sides of the pair, with reserves ordered tokenIn, tokenOut
   */
  private async pooledVenues(
    tokenIn: Address,
    tokenOut: Address
  ): Promise<Array<{ venue: SwapVenue; reserveA: bigint; reserveB: bigint }>> {
    const reserves = await Promise.all(
      this.options.venues.map(async (venue) => ({
        venue,
        ...(await this.call(venue.getReserves(tokenIn, tokenOut), `${venue.name}.getReserves`)),
      }))
    );
    return reserves.filter(({ reserveA, reserveB }) => reserveA > 0n && reserveB > 0n);
  }

  /**
   * Expected profit of buying tokenOut with `amount` on the best venue and selling
   * it back on the best venue: value(back - amount - fee) - gasCost
   */
  private async evaluatePair(
    tokenIn: TokenRecord,
    tokenOut: TokenRecord,
    venues: SwapVenue[],
    amount: bigint,
    fee: bigint,
    priceIn: bigint,
    gasCost: bigint
  ): Promise<Opportunity> {
    const buy = await this.bestQuote(venues, tokenIn.address, tokenOut.address, amount);
    const sell = buy.amountOut === 0n
      ? { venue: buy.venue, amountOut: 0n }
      : await this.bestQuote(venues, tokenOut.address, tokenIn.address, buy.amountOut);

    const net = sell.amountOut - amount - fee;

    return {
      tokenIn: { address: tokenIn.address, symbol: tokenIn.symbol, decimals: tokenIn.decimals },
      tokenOut: { address: tokenOut.address, symbol: tokenOut.symbol, decimals: tokenOut.decimals },
      buyVenue: buy.venue.address,
      sellVenue: sell.venue.address,
      amount,
      expectedIntermediate: buy.amountOut,
      expectedReturn: sell.amountOut,
      fee,
      priceIn,
      gasCost,
      expectedProfit: valueOf(net, priceIn, tokenIn.decimals) - gasCost,
    };
  }

  /**
   * Highest quote across venues; the earlier venue wins a tie
   */
  private async bestQuote(
    venues: SwapVenue[],
    tokenIn: Address,
    tokenOut: Address,
    amountIn: bigint
  ): Promise<VenueQuote> {
    const quotes = await Promise.all(
      venues.map(async (venue): Promise<VenueQuote> => ({
        venue,
        amountOut: await this.call(venue.quote(tokenIn, tokenOut, amountIn), `${venue.name}.quote`),
      }))
    );
    return quotes.reduce((best, quote) => (quote.amountOut > best.amountOut ? quote : best));
  }

  private call<T>(promise: Promise<T>, operation: string): Promise<T> {
    return withTimeout(promise, this.options.timeoutMs, operation);
  }
}
