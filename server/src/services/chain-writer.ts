/**
 * Chain Writer
 * Signs and submits executor transactions, then waits for the receipt
 */

import {
  createWalletClient,
  http,
  type Account,
  type Chain,
  type HttpTransport,
  type PublicClient,
  type WalletClient,
} from 'viem';
import type { Address, Hex } from '../../../shared/schema.js';
import { CollaboratorFailureError, toErrorMessage } from '../errors.js';

// Read access the chain adapters need from a public client
export type ContractReader = Pick<PublicClient, 'readContract'>;

export interface ContractCall {
  address: Address;
  data: Hex;
}

export interface ChainWriter {
  // Account that signs, pays gas and holds the traded balances
  readonly account: Address;
  /**
   * Submit the call and wait until it is mined. A reverted or failed
   * transaction throws CollaboratorFailureError.
   */
  send(call: ContractCall, operation: string): Promise<Hex>;
}

export class WalletChainWriter implements ChainWriter {
  private readonly wallet: WalletClient<HttpTransport, Chain, Account>;

  constructor(
    signer: Account,
    chain: Chain,
    rpcUrl: string,
    private readonly receipts: Pick<PublicClient, 'waitForTransactionReceipt'>,
    timeoutMs: number
  ) {
    this.wallet = createWalletClient({
      account: signer,
      chain,
      transport: http(rpcUrl, { timeout: timeoutMs }),
    });
  }

  get account(): Address {
    return this.wallet.account.address;
  }

  async send(call: ContractCall, operation: string): Promise<Hex> {
    let txHash: Hex;
    try {
      txHash = await this.wallet.sendTransaction({ to: call.address, data: call.data });
    } catch (error) {
      throw new CollaboratorFailureError(`${operation} could not be submitted`, {
        to: call.address,
        cause: toErrorMessage(error),
      });
    }

    // Wait for confirmation
    const receipt = await this.receipts.waitForTransactionReceipt({ hash: txHash });
    if (receipt.status === 'reverted') {
      throw new CollaboratorFailureError(`${operation} reverted`, {
        txHash,
        gasUsed: receipt.gasUsed,
      });
    }
    return txHash;
  }
}
