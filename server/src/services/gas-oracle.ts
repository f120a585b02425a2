/**
 * Gas Price Oracle
 * Current gas price (wei) from a Chainlink fast-gas aggregator
 */

import type { Address } from '../../../shared/schema.js';
import { OracleInvalidError } from '../errors.js';
import { withTimeout } from '../utils/with-timeout.js';
import type { ContractReader } from './chain-writer.js';

// Chainlink Aggregator V3 ABI
const AGGREGATOR_V3_ABI = [
  {
    inputs: [],
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
] as const;

export interface GasPriceReading {
  answer: bigint;
  updatedAt: number;
}

export interface GasPriceSource {
  readonly address: Address;
  latestGasPrice(): Promise<GasPriceReading>;
}

export class ChainlinkGasPriceSource implements GasPriceSource {
  constructor(
    private readonly client: ContractReader,
    public readonly address: Address
  ) {}

  async latestGasPrice(): Promise<GasPriceReading> {
    const [, answer, , updatedAt] = await this.client.readContract({
      address: this.address,
      abi: AGGREGATOR_V3_ABI,
      functionName: 'latestRoundData',
    });
    return { answer, updatedAt: Number(updatedAt) };
  }
}

export class GasPriceOracle {
  private readonly now: () => number;

  constructor(
    private readonly source: GasPriceSource,
    private readonly options: { maxAgeSec: number; timeoutMs: number; now?: () => number }
  ) {
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  get address(): Address {
    return this.source.address;
  }

  /**
   * Current gas price. Non-positive or stale readings are OracleInvalid.
   */
  async getGasPrice(): Promise<bigint> {
    const reading = await withTimeout(
      this.source.latestGasPrice(),
      this.options.timeoutMs,
      'gas price oracle'
    );

    if (reading.answer <= 0n) {
      throw new OracleInvalidError(`Gas price oracle reported non-positive value ${reading.answer}`, {
        answer: reading.answer,
      });
    }

    const age = this.now() - reading.updatedAt;
    if (age > this.options.maxAgeSec) {
      throw new OracleInvalidError(`Gas price is stale (${age}s old)`, { age });
    }

    return reading.answer;
  }
}
