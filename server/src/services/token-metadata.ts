/**
 * ERC20 metadata and balance reads
 */

import { erc20Abi } from 'viem';
import type { Address, TokenRef } from '../../../shared/schema.js';
import { CollaboratorFailureError, toErrorMessage } from '../errors.js';
import { withTimeout } from '../utils/with-timeout.js';
import type { ContractReader } from './chain-writer.js';

export interface TokenMetadataReader {
  describe(address: Address): Promise<TokenRef>;
  balanceOf(token: Address, holder: Address): Promise<bigint>;
}

export class Erc20MetadataReader implements TokenMetadataReader {
  private cache: Map<string, TokenRef> = new Map();

  constructor(
    private readonly client: ContractReader,
    private readonly timeoutMs: number
  ) {}

  async describe(address: Address): Promise<TokenRef> {
    const key = address.toLowerCase();
    const cached = this.cache.get(key);
    if (cached) return cached;

    try {
      const [symbol, decimals] = await withTimeout(
        Promise.all([
          this.client.readContract({ address, abi: erc20Abi, functionName: 'symbol' }),
          this.client.readContract({ address, abi: erc20Abi, functionName: 'decimals' }),
        ]),
        this.timeoutMs,
        'erc20.metadata'
      );
      const token: TokenRef = { address, symbol, decimals };
      this.cache.set(key, token);
      return token;
    } catch (error) {
      throw new CollaboratorFailureError(`Failed to read token metadata for ${address}`, {
        token: address,
        cause: toErrorMessage(error),
      });
    }
  }

  balanceOf(token: Address, holder: Address): Promise<bigint> {
    return withTimeout(
      this.client.readContract({ address: token, abi: erc20Abi, functionName: 'balanceOf', args: [holder] }),
      this.timeoutMs,
      'erc20.balanceOf'
    );
  }
}
