/**
 * Chain Writer Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createWalletClient, type Account } from 'viem';
import { mainnet } from 'viem/chains';
import { CollaboratorFailureError } from '../errors.js';
import { WalletChainWriter } from '../services/chain-writer.js';
import { EXECUTOR, LENDING_POOL } from './helpers/fakes.js';

const mockWalletClient = vi.hoisted(() => ({
  account: { address: '0x1000000000000000000000000000000000000003', type: 'json-rpc' },
  sendTransaction: vi.fn(),
}));

vi.mock('viem', async () => {
  const actual = await vi.importActual('viem');
  return {
    ...actual,
    createWalletClient: vi.fn().mockReturnValue(mockWalletClient),
  };
});

const signer: Account = { address: EXECUTOR, type: 'json-rpc' };
const call = { address: LENDING_POOL, data: '0xab12' as const };

describe('WalletChainWriter', () => {
  const receipts = { waitForTransactionReceipt: vi.fn() };
  let writer: WalletChainWriter;

  beforeEach(() => {
    vi.clearAllMocks();
    writer = new WalletChainWriter(signer, mainnet, 'http://localhost:8545', receipts, 5000);
  });

  it('builds a wallet client for the signer on the configured chain', () => {
    expect(createWalletClient).toHaveBeenCalledWith(expect.objectContaining({ account: signer, chain: mainnet }));
    expect(writer.account).toBe(EXECUTOR);
  });

  it('sends the call and waits for a successful receipt', async () => {
    mockWalletClient.sendTransaction.mockResolvedValue('0xfeed');
    receipts.waitForTransactionReceipt.mockResolvedValue({ status: 'success', gasUsed: 21000n });

    expect(await writer.send(call, 'pool.flashLoan')).toBe('0xfeed');
    expect(mockWalletClient.sendTransaction).toHaveBeenCalledWith({ to: LENDING_POOL, data: '0xab12' });
    expect(receipts.waitForTransactionReceipt).toHaveBeenCalledWith({ hash: '0xfeed' });
  });

  it('fails on a reverted receipt', async () => {
    mockWalletClient.sendTransaction.mockResolvedValue('0xfeed');
    receipts.waitForTransactionReceipt.mockResolvedValue({ status: 'reverted', gasUsed: 90000n });

    const sent = writer.send(call, 'pool.flashLoan');

    await expect(sent).rejects.toBeInstanceOf(CollaboratorFailureError);
    await expect(sent).rejects.toThrow('pool.flashLoan reverted');
  });

  it('fails without waiting when the transaction cannot be submitted', async () => {
    mockWalletClient.sendTransaction.mockRejectedValue(new Error('nonce too low'));

    await expect(writer.send(call, 'erc20.approve')).rejects.toThrow('erc20.approve could not be submitted');
    expect(receipts.waitForTransactionReceipt).not.toHaveBeenCalled();
  });
});
