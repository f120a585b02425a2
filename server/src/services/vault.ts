/**
 * Vault
 * The executor's token balances. Every attempt works in a transaction that
 * either commits all of its balance changes or none of them.
 */

import type { Address } from '../../../shared/schema.js';
import { CollaboratorFailureError } from '../errors.js';

export class Vault {
  private balances: Map<string, bigint> = new Map();
  private active: VaultTransaction | null = null;

  balanceOf(token: Address): bigint {
    return this.balances.get(token.toLowerCase()) ?? 0n;
  }

  /**
   * Seed or top up a balance outside of any attempt
   */
  deposit(token: Address, amount: bigint): void {
    if (amount < 0n) throw new RangeError('Deposit amount must not be negative');
    if (this.active) throw new Error('Cannot deposit while a transaction is open');
    this.balances.set(token.toLowerCase(), this.balanceOf(token) + amount);
  }

  /**
   * Overwrite a balance with the amount the chain reports
   */
  sync(token: Address, amount: bigint): void {
    if (amount < 0n) throw new RangeError('Balance must not be negative');
    if (this.active) throw new Error('Cannot sync while a transaction is open');
    this.balances.set(token.toLowerCase(), amount);
  }

  snapshot(): Record<string, bigint> {
    return Object.fromEntries(this.balances);
  }

  get inTransaction(): boolean {
    return this.active !== null;
  }

  begin(): VaultTransaction {
    if (this.active) {
      throw new Error('A vault transaction is already open');
    }
    const tx = new VaultTransaction(this, (deltas) => this.apply(deltas), () => this.release(tx));
    this.active = tx;
    return tx;
  }

  private apply(deltas: Map<string, bigint>): void {
    for (const [key, delta] of deltas) {
      this.balances.set(key, (this.balances.get(key) ?? 0n) + delta);
    }
  }

  private release(tx: VaultTransaction): void {
    if (this.active === tx) this.active = null;
  }
}

export class VaultTransaction {
  private deltas: Map<string, bigint> = new Map();
  private closed = false;

  constructor(
    private readonly vault: Vault,
    private readonly onCommit: (deltas: Map<string, bigint>) => void,
    private readonly onClose: () => void
  ) {}

  get isOpen(): boolean {
    return !this.closed;
  }

  balanceOf(token: Address): bigint {
    return this.vault.balanceOf(token) + (this.deltas.get(token.toLowerCase()) ?? 0n);
  }

  credit(token: Address, amount: bigint): void {
    this.assertOpen();
    if (amount < 0n) throw new RangeError('Credit amount must not be negative');
    this.adjust(token, amount);
  }

  debit(token: Address, amount: bigint): void {
    this.assertOpen();
    if (amount < 0n) throw new RangeError('Debit amount must not be negative');
    const available = this.balanceOf(token);
    if (available < amount) {
      throw new CollaboratorFailureError(`Insufficient ${token} balance: need ${amount}, have ${available}`, {
        token,
        amount,
        available,
      });
    }
    this.adjust(token, -amount);
  }

  /**
   * Net balance change per token within this transaction
   */
  changes(): Record<string, bigint> {
    return Object.fromEntries(this.deltas);
  }

  commit(): void {
    this.assertOpen();
    this.closed = true;
    this.onCommit(this.deltas);
    this.onClose();
  }

  rollback(): void {
    if (this.closed) return;
    this.closed = true;
    this.deltas.clear();
    this.onClose();
  }

  private adjust(token: Address, delta: bigint): void {
    const key = token.toLowerCase();
    this.deltas.set(key, (this.deltas.get(key) ?? 0n) + delta);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new CollaboratorFailureError('Vault transaction is already closed');
    }
  }
}
