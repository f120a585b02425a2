/**
 * Price Feed
 * Validated reference-unit prices from one or more Chainlink-style sources
 */

import type { Address } from '../../../shared/schema.js';
import { OracleInvalidError } from '../errors.js';
import { toReferenceDecimals } from '../utils/amounts.js';
import { withTimeout } from '../utils/with-timeout.js';
import type { ContractReader } from './chain-writer.js';
import { logger as rootLogger, errorContext, type OperationContext, type StructuredLogger } from '../utils/structured-logger.js';

// Chainlink Feed Registry ABI (minimal)
export const FEED_REGISTRY_ABI = [
  {
    inputs: [
      { name: 'base', type: 'address' },
      { name: 'quote', type: 'address' },
    ],
    name: 'latestRoundData',
    outputs: [
      { name: 'roundId', type: 'uint80' },
      { name: 'answer', type: 'int256' },
      { name: 'startedAt', type: 'uint256' },
      { name: 'updatedAt', type: 'uint256' },
      { name: 'answeredInRound', type: 'uint80' },
    ],
    stateMutability: 'view',
    type: 'function',
  },
  {
    inputs: [
      { name: 'base', type: 'address' },
      { name: 'quote', type: 'address' },
    ],
    name: 'decimals',
    outputs: [{ name: '', type: 'uint8' }],
    stateMutability: 'view',
    type: 'function',
  },
] as const;

// Chainlink denomination addresses
export const USD_DENOMINATION: Address = '0x0000000000000000000000000000000000000348';
export const ETH_DENOMINATION: Address = '0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE';
export const BTC_DENOMINATION: Address = '0xbBbBBBBbbBBBbbbBbbBbbbbBBbBbbbbBbBbbBBbB';

// Wrapped tokens the registry lists under their native asset
export const DEFAULT_PRICE_KEYS: Record<Address, Address> = {
  '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2': ETH_DENOMINATION, // WETH
  '0x2260FAC5E5542a773Aa44fBCfeDf7C193bc2C599': BTC_DENOMINATION, // WBTC
};

export interface PriceReading {
  answer: bigint;
  decimals: number;
  // Unix seconds
  updatedAt: number;
}

export interface PriceSource {
  readonly address: Address;
  latestPrice(token: Address): Promise<PriceReading>;
}

/**
 * Chainlink Feed Registry (Ethereum mainnet). Tokens are looked up by their
 * price key, which defaults to the token address.
 */
export class ChainlinkFeedRegistrySource implements PriceSource {
  private decimalsCache: Map<string, number> = new Map();
  private readonly priceKeys: Map<string, Address>;

  constructor(
    private readonly client: ContractReader,
    public readonly address: Address,
    priceKeys: Record<Address, Address> = {}
  ) {
    this.priceKeys = new Map(
      Object.entries({ ...DEFAULT_PRICE_KEYS, ...priceKeys }).map(([token, key]) => [token.toLowerCase(), key])
    );
  }

  priceKeyOf(token: Address): Address {
    return this.priceKeys.get(token.toLowerCase()) ?? token;
  }

  async latestPrice(token: Address): Promise<PriceReading> {
    const key = this.priceKeyOf(token);
    const [, answer, , updatedAt] = await this.client.readContract({
      address: this.address,
      abi: FEED_REGISTRY_ABI,
      functionName: 'latestRoundData',
      args: [key, USD_DENOMINATION],
    });

    return {
      answer,
      decimals: await this.getDecimals(key),
      updatedAt: Number(updatedAt),
    };
  }

  private async getDecimals(key: Address): Promise<number> {
    const cacheKey = key.toLowerCase();
    const cached = this.decimalsCache.get(cacheKey);
    if (cached !== undefined) return cached;

    const decimals = await this.client.readContract({
      address: this.address,
      abi: FEED_REGISTRY_ABI,
      functionName: 'decimals',
      args: [key, USD_DENOMINATION],
    });
    this.decimalsCache.set(cacheKey, decimals);
    return decimals;
  }
}

export interface PriceFeedOptions {
  maxAgeSec: number;
  timeoutMs: number;
  now?: () => number;
  logger?: StructuredLogger;
}

export class PriceFeed {
  private readonly logger: StructuredLogger;
  private readonly now: () => number;

  constructor(
    private readonly sources: PriceSource[],
    private readonly options: PriceFeedOptions
  ) {
    this.logger = (options.logger ?? rootLogger).child('price-feed');
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  get sourceCount(): number {
    return this.sources.length;
  }

  /**
   * Median of the valid source readings, in reference units per whole token.
   * Fails with OracleInvalidError when no source gives a positive, fresh answer.
   */
  async getPrice(token: Address, ctx?: OperationContext): Promise<bigint> {
    const readings = await Promise.allSettled(
      this.sources.map(source =>
        withTimeout(source.latestPrice(token), this.options.timeoutMs, `price source ${source.address}`)
      )
    );

    const valid: bigint[] = [];
    readings.forEach((result, index) => {
      const source = this.sources[index]?.address;
      if (result.status === 'rejected') {
        this.logWarning(ctx, 'price_source_failed', 'Price source call failed', {
          token,
          source,
          ...errorContext(result.reason),
        });
        return;
      }

      const problem = this.validate(result.value);
      if (problem) {
        this.logWarning(ctx, 'price_invalid', problem, { token, source, answer: result.value.answer });
        return;
      }
      valid.push(toReferenceDecimals(result.value.answer, result.value.decimals));
    });

    if (valid.length === 0) {
      throw new OracleInvalidError(`No valid price for ${token}`, { token });
    }

    return median(valid);
  }

  private validate(reading: PriceReading): string | null {
    if (reading.answer <= 0n) return 'Non-positive price answer';
    const age = this.now() - reading.updatedAt;
    if (age > this.options.maxAgeSec) return `Price is stale (${age}s old)`;
    return null;
  }

  private logWarning(
    ctx: OperationContext | undefined,
    eventType: string,
    message: string,
    context: Record<string, unknown>
  ): void {
    this.logger.warn(ctx ?? this.logger.startOperation('op'), eventType, message, context);
  }
}

function median(values: bigint[]): bigint {
  const sorted = [...values].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0n;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? upper;
  return (lower + upper) / 2n;
}
