/**
 * Swap Venue
 * Quotes, pair reserves and bounded swaps on a Uniswap V2 style router
 */

import { encodeFunctionData, erc20Abi } from 'viem';
import type { Address } from '../../../shared/schema.js';
import { ZERO_ADDRESS } from '../../../shared/schema.js';
import { CollaboratorFailureError, SlippageError } from '../errors.js';
import { sameAddress } from '../utils/amounts.js';
import type { ChainWriter, ContractReader } from './chain-writer.js';
import type { VaultTransaction } from './vault.js';

// Seconds a submitted swap stays valid
const SWAP_DEADLINE_SEC = 300;
const MAX_APPROVAL = 2n ** 256n - 1n;

// Uniswap V2 Router ABI (minimal)
export const UNISWAP_V2_ROUTER_ABI = [
  {
    inputs: [],
    name: 'factory',
    outputs: [{ name: '', type: 'address' }],
    stateMutability: 'view',
    type: 'function',
  },
  {
    inputs: [
      { name: 'amountIn', type: 'uint256' },
      { name: 'path', type: 'address[]' },
    ],
    name: 'getAmountsOut',
    outputs: [{ name: 'amounts', type: 'uint256[]' }],
    stateMutability: 'view',
    type: 'function',
  },
  {
    inputs: [
      { name: 'amountIn', type: 'uint256' },
      { name: 'amountOutMin', type: 'uint256' },
      { name: 'path', type: 'address[]' },
      { name: 'to', type: 'address' },
      { name: 'deadline', type: 'uint256' },
    ],
    name: 'swapExactTokensForTokens',
    outputs: [{ name: 'amounts', type: 'uint256[]' }],
    stateMutability: 'nonpayable',
    type: 'function',
  },
] as const;

export const UNISWAP_V2_FACTORY_ABI = [
  {
    inputs: [
      { name: 'tokenA', type: 'address' },
      { name: 'tokenB', type: 'address' },
    ],
    name: 'getPair',
    outputs: [{ name: 'pair', type: 'address' }],
    stateMutability: 'view',
    type: 'function',
  },
] as const;

export const UNISWAP_V2_PAIR_ABI = [
  {
    inputs: [],
    name: 'getReserves',
    outputs: [
      { name: 'reserve0', type: 'uint112' },
      { name: 'reserve1', type: 'uint112' },
      { name: 'blockTimestampLast', type: 'uint32' },
    ],
    stateMutability: 'view',
    type: 'function',
  },
  {
    inputs: [],
    name: 'token0',
    outputs: [{ name: '', type: 'address' }],
    stateMutability: 'view',
    type: 'function',
  },
] as const;

export interface SwapOrder {
  tokenIn: Address;
  tokenOut: Address;
  amountIn: bigint;
  minAmountOut: bigint;
}

// Reserves ordered as the tokens were passed in
export interface PairReserves {
  reserveA: bigint;
  reserveB: bigint;
}

export interface SwapVenue {
  readonly name: string;
  readonly address: Address;
  quote(tokenIn: Address, tokenOut: Address, amountIn: bigint): Promise<bigint>;
  getReserves(tokenA: Address, tokenB: Address): Promise<PairReserves>;
  /**
   * Swap from the account's balance and record the fill on it. Rejects below minAmountOut.
   */
  swap(order: SwapOrder, account: VaultTransaction): Promise<bigint>;
}

export interface UniswapV2VenueOptions {
  name?: string;
  // Unix seconds, for swap deadlines
  now?: () => number;
}

export class UniswapV2Venue implements SwapVenue {
  readonly name: string;
  private factoryAddress: Address | null = null;
  private pairCache: Map<string, Address> = new Map();
  private readonly now: () => number;

  constructor(
    private readonly client: ContractReader,
    public readonly address: Address,
    private readonly writer: ChainWriter,
    options: UniswapV2VenueOptions = {}
  ) {
    this.name = options.name ?? 'uniswap-v2';
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  async quote(tokenIn: Address, tokenOut: Address, amountIn: bigint): Promise<bigint> {
    if (amountIn === 0n) return 0n;

    try {
      const amounts = await this.client.readContract({
        address: this.address,
        abi: UNISWAP_V2_ROUTER_ABI,
        functionName: 'getAmountsOut',
        args: [amountIn, [tokenIn, tokenOut]],
      });
      const out = amounts[amounts.length - 1];
      if (out === undefined) {
        throw new CollaboratorFailureError('Router returned an empty amounts array');
      }
      return out;
    } catch (error) {
      if (error instanceof CollaboratorFailureError) throw error;
      throw new CollaboratorFailureError(`Quote ${tokenIn} -> ${tokenOut} failed`, {
        tokenIn,
        tokenOut,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async getReserves(tokenA: Address, tokenB: Address): Promise<PairReserves> {
    const pair = await this.getPair(tokenA, tokenB);
    if (sameAddress(pair, ZERO_ADDRESS)) {
      return { reserveA: 0n, reserveB: 0n };
    }

    const [[reserve0, reserve1], token0] = await Promise.all([
      this.client.readContract({ address: pair, abi: UNISWAP_V2_PAIR_ABI, functionName: 'getReserves' }),
      this.client.readContract({ address: pair, abi: UNISWAP_V2_PAIR_ABI, functionName: 'token0' }),
    ]);

    return sameAddress(token0, tokenA)
      ? { reserveA: reserve0, reserveB: reserve1 }
      : { reserveA: reserve1, reserveB: reserve0 };
  }

  /**
   * Submit swapExactTokensForTokens with minAmountOut as the on-chain bound.
   * The account is debited before sending and credited with the output the
   * executor actually received.
   */
  async swap(order: SwapOrder, account: VaultTransaction): Promise<bigint> {
    const recipient = this.writer.account;
    account.debit(order.tokenIn, order.amountIn);

    await this.ensureApproval(order.tokenIn, order.amountIn);
    const before = await this.balanceOf(order.tokenOut, recipient);

    await this.writer.send(
      {
        address: this.address,
        data: encodeFunctionData({
          abi: UNISWAP_V2_ROUTER_ABI,
          functionName: 'swapExactTokensForTokens',
          args: [
            order.amountIn,
            order.minAmountOut,
            [order.tokenIn, order.tokenOut],
            recipient,
            BigInt(this.now() + SWAP_DEADLINE_SEC),
          ],
        }),
      },
      `${this.name}.swapExactTokensForTokens`
    );

    const amountOut = (await this.balanceOf(order.tokenOut, recipient)) - before;
    if (amountOut < order.minAmountOut) {
      throw new SlippageError(order.tokenOut, amountOut, order.minAmountOut);
    }
    account.credit(order.tokenOut, amountOut);
    return amountOut;
  }

  /**
   * Approve the router once for the maximum amount
   */
  private async ensureApproval(token: Address, amount: bigint): Promise<void> {
    const allowance = await this.client.readContract({
      address: token,
      abi: erc20Abi,
      functionName: 'allowance',
      args: [this.writer.account, this.address],
    });
    if (allowance >= amount) return;

    await this.writer.send(
      {
        address: token,
        data: encodeFunctionData({ abi: erc20Abi, functionName: 'approve', args: [this.address, MAX_APPROVAL] }),
      },
      'erc20.approve'
    );
  }

  private balanceOf(token: Address, holder: Address): Promise<bigint> {
    return this.client.readContract({ address: token, abi: erc20Abi, functionName: 'balanceOf', args: [holder] });
  }

  private async getPair(tokenA: Address, tokenB: Address): Promise<Address> {
    const key = [tokenA.toLowerCase(), tokenB.toLowerCase()].sort().join(':');
    const cached = this.pairCache.get(key);
    if (cached) return cached;

    const factory = await this.getFactory();
    const pair = await this.client.readContract({
      address: factory,
      abi: UNISWAP_V2_FACTORY_ABI,
      functionName: 'getPair',
      args: [tokenA, tokenB],
    });

    if (!sameAddress(pair, ZERO_ADDRESS)) {
      this.pairCache.set(key, pair);
    }
    return pair;
  }

  private async getFactory(): Promise<Address> {
    if (!this.factoryAddress) {
      this.factoryAddress = await this.client.readContract({
        address: this.address,
        abi: UNISWAP_V2_ROUTER_ABI,
        functionName: 'factory',
      });
    }
    return this.factoryAddress;
  }
}
