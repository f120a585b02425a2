/**
 * Flash Loan Service
 * Aave V3 flash loans: request validation, the callback params the receiver
 * trades with, and the lender that submits Pool.flashLoan
 */

import {
  decodeAbiParameters,
  encodeAbiParameters,
  encodeFunctionData,
  erc20Abi,
  parseAbiParameters,
} from 'viem';
import type { Address, FlashLoanRequest, Hex } from '../../../shared/schema.js';
import { AuthorizationError, CollaboratorFailureError } from '../errors.js';
import { bpsOf, sameAddress } from '../utils/amounts.js';
import type { ChainWriter, ContractReader } from './chain-writer.js';
import type { VaultTransaction } from './vault.js';

// Aave V3 Pool ABI (minimal)
export const AAVE_POOL_ABI = [
  {
    inputs: [
      { name: 'receiverAddress', type: 'address' },
      { name: 'assets', type: 'address[]' },
      { name: 'amounts', type: 'uint256[]' },
      { name: 'interestRateModes', type: 'uint256[]' },
      { name: 'onBehalfOf', type: 'address' },
      { name: 'params', type: 'bytes' },
      { name: 'referralCode', type: 'uint16' },
    ],
    name: 'flashLoan',
    outputs: [],
    stateMutability: 'nonpayable',
    type: 'function',
  },
  {
    inputs: [],
    name: 'FLASHLOAN_PREMIUM_TOTAL',
    outputs: [{ name: '', type: 'uint128' }],
    stateMutability: 'view',
    type: 'function',
  },
  {
    inputs: [{ name: 'asset', type: 'address' }],
    name: 'getReserveData',
    outputs: [
      {
        components: [
          { name: 'configuration', type: 'uint256' },
          { name: 'liquidityIndex', type: 'uint128' },
          { name: 'currentLiquidityRate', type: 'uint128' },
          { name: 'variableBorrowIndex', type: 'uint128' },
          { name: 'currentVariableBorrowRate', type: 'uint128' },
          { name: 'currentStableBorrowRate', type: 'uint128' },
          { name: 'lastUpdateTimestamp', type: 'uint40' },
          { name: 'id', type: 'uint16' },
          { name: 'aTokenAddress', type: 'address' },
          { name: 'stableDebtTokenAddress', type: 'address' },
          { name: 'variableDebtTokenAddress', type: 'address' },
          { name: 'interestRateStrategyAddress', type: 'address' },
          { name: 'accruedToTreasury', type: 'uint128' },
          { name: 'unbacked', type: 'uint128' },
          { name: 'isolationModeTotalDebt', type: 'uint128' },
        ],
        name: '',
        type: 'tuple',
      },
    ],
    stateMutability: 'view',
    type: 'function',
  },
] as const;

// Interest rate mode 0: repay inside the same sequence, no debt position opened
export const NO_DEBT_MODE = 0n;

const CALLBACK_PARAMS = parseAbiParameters(
  'address tokenOut, address buyVenue, address sellVenue, uint256 minIntermediate, uint256 minReturn'
);

export interface FlashLoanCallbackParams {
  tokenOut: Address;
  buyVenue: Address;
  sellVenue: Address;
  minIntermediate: bigint;
  minReturn: bigint;
}

export interface LoanReceivedCall {
  caller: Address;
  assets: Address[];
  amounts: bigint[];
  premiums: bigint[];
  initiator: Address;
  params: Hex;
}

export interface FlashLoanReceiver {
  onLoanReceived(call: LoanReceivedCall): Promise<boolean>;
}

export interface FlashLoanExecution {
  // Receives the callback when the lender settles in process
  receiver: FlashLoanReceiver;
  // Executor balances; the lender records the loan's net effect on them
  account: VaultTransaction;
  initiator: Address;
  request: FlashLoanRequest;
  params: Hex;
}

// Per requested asset, in request order
export interface FlashLoanSettlement {
  premiums: bigint[];
  // Borrowed asset held once the callback finished, before repayment
  amountsReturned: bigint[];
}

export interface FlashLender {
  readonly name: string;
  readonly address: Address;
  /**
   * Premium charged on every flash loan, in basis points
   */
  premiumBps(): Promise<bigint>;
  availableLiquidity(asset: Address): Promise<bigint>;
  /**
   * Lend, have the receiver trade once, and pull principal + premium for every asset.
   * Anything short of full repayment fails the whole loan.
   */
  flashLoan(execution: FlashLoanExecution): Promise<FlashLoanSettlement>;
}

export function premiumFor(amount: bigint, premiumBps: bigint): bigint {
  return bpsOf(amount, premiumBps);
}

export function buildFlashLoanRequest(asset: Address, amount: bigint): FlashLoanRequest {
  return { assets: [asset], amounts: [amount], modes: [NO_DEBT_MODE] };
}

export function encodeCallbackParams(params: FlashLoanCallbackParams): Hex {
  return encodeAbiParameters(CALLBACK_PARAMS, [
    params.tokenOut,
    params.buyVenue,
    params.sellVenue,
    params.minIntermediate,
    params.minReturn,
  ]);
}

export function decodeCallbackParams(data: Hex): FlashLoanCallbackParams {
  const [tokenOut, buyVenue, sellVenue, minIntermediate, minReturn] = decodeAbiParameters(CALLBACK_PARAMS, data);
  return { tokenOut, buyVenue, sellVenue, minIntermediate, minReturn };
}

export function validateFlashLoanRequest(request: FlashLoanRequest): void {
  const { assets, amounts, modes } = request;
  if (assets.length === 0) {
    throw new CollaboratorFailureError('Flash loan request has no assets');
  }
  if (assets.length !== amounts.length || assets.length !== modes.length) {
    throw new CollaboratorFailureError('Flash loan assets, amounts and modes must have equal length', {
      assets: assets.length,
      amounts: amounts.length,
      modes: modes.length,
    });
  }
  if (modes.some(mode => mode !== NO_DEBT_MODE)) {
    throw new CollaboratorFailureError('Only mode 0 flash loans are supported');
  }
  if (amounts.some(amount => amount <= 0n)) {
    throw new CollaboratorFailureError('Flash loan amounts must be positive');
  }
}

/**
 * Refuse a loan the lender cannot fund
 */
export async function assertLiquidity(lender: FlashLender, request: FlashLoanRequest): Promise<void> {
  for (const [i, asset] of request.assets.entries()) {
    const amount = request.amounts[i] ?? 0n;
    const liquidity = await lender.availableLiquidity(asset);
    if (liquidity < amount) {
      throw new CollaboratorFailureError(`Insufficient ${lender.name} liquidity for ${asset}`, {
        asset,
        requested: amount,
        available: liquidity,
      });
    }
  }
}

/**
 * Aave V3 Pool. The loan goes to the deployed receiver contract, which runs the
 * round trip encoded in the params, repays the pool and forwards the surplus to
 * the signing executor. The account mirrors the executor's balance change.
 */
export class AaveV3FlashLender implements FlashLender {
  readonly name = 'aave-v3';

  constructor(
    private readonly client: ContractReader,
    public readonly address: Address,
    private readonly writer: ChainWriter,
    private readonly receiverContract: Address
  ) {}

  async premiumBps(): Promise<bigint> {
    return this.client.readContract({
      address: this.address,
      abi: AAVE_POOL_ABI,
      functionName: 'FLASHLOAN_PREMIUM_TOTAL',
    });
  }

  /**
   * Underlying held by the reserve's aToken
   */
  async availableLiquidity(asset: Address): Promise<bigint> {
    const reserve = await this.client.readContract({
      address: this.address,
      abi: AAVE_POOL_ABI,
      functionName: 'getReserveData',
      args: [asset],
    });

    return this.client.readContract({
      address: asset,
      abi: erc20Abi,
      functionName: 'balanceOf',
      args: [reserve.aTokenAddress],
    });
  }

  async flashLoan(execution: FlashLoanExecution): Promise<FlashLoanSettlement> {
    const { account, initiator, request, params } = execution;
    validateFlashLoanRequest(request);
    // The pool reports msg.sender as the initiator
    if (!sameAddress(initiator, this.writer.account)) {
      throw new AuthorizationError('Flash loans must be initiated by the signing executor', initiator);
    }

    const bps = await this.premiumBps();
    const premiums = request.amounts.map(amount => premiumFor(amount, bps));
    await assertLiquidity(this, request);

    const before = await this.balances(request.assets);
    await this.writer.send(
      {
        address: this.address,
        data: encodeFunctionData({
          abi: AAVE_POOL_ABI,
          functionName: 'flashLoan',
          args: [
            this.receiverContract,
            request.assets,
            request.amounts,
            request.modes,
            this.writer.account,
            params,
            0,
          ],
        }),
      },
      'pool.flashLoan'
    );
    const after = await this.balances(request.assets);

    const amountsReturned = request.assets.map((asset, i) => {
      const surplus = (after[i] ?? 0n) - (before[i] ?? 0n);
      if (surplus >= 0n) {
        account.credit(asset, surplus);
      } else {
        account.debit(asset, -surplus);
      }
      return (request.amounts[i] ?? 0n) + (premiums[i] ?? 0n) + surplus;
    });

    return { premiums, amountsReturned };
  }

  private balances(assets: Address[]): Promise<bigint[]> {
    return Promise.all(
      assets.map(asset =>
        this.client.readContract({
          address: asset,
          abi: erc20Abi,
          functionName: 'balanceOf',
          args: [this.writer.account],
        })
      )
    );
  }
}
