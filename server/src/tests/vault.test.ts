import { describe, it, expect } from 'vitest';
import { CollaboratorFailureError } from '../errors.js';
import { Ledger } from '../services/ledger.js';
import { Vault } from '../services/vault.js';
import { ONE, T1, T2 } from './helpers/fakes.js';

describe('Vault', () => {
  it('applies every change on commit', () => {
    const vault = new Vault();
    vault.deposit(T1.address, 10n * ONE);

    const tx = vault.begin();
    tx.debit(T1.address, 4n * ONE);
    tx.credit(T2.address, 7n * ONE);
    expect(tx.changes()).toEqual({ [T1.address]: -4n * ONE, [T2.address]: 7n * ONE });
    tx.commit();

    expect(vault.balanceOf(T1.address)).toBe(6n * ONE);
    expect(vault.balanceOf(T2.address)).toBe(7n * ONE);
    expect(vault.inTransaction).toBe(false);
  });

  it('discards every change on rollback', () => {
    const vault = new Vault();
    vault.deposit(T1.address, 10n * ONE);

    const tx = vault.begin();
    tx.debit(T1.address, 10n * ONE);
    tx.credit(T2.address, ONE);
    tx.rollback();

    expect(vault.snapshot()).toEqual({ [T1.address]: 10n * ONE });
  });

  it('refuses to overdraw', () => {
    const vault = new Vault();
    const tx = vault.begin();

    expect(() => tx.debit(T1.address, 1n)).toThrow(CollaboratorFailureError);
  });

  it('allows one open transaction at a time', () => {
    const vault = new Vault();
    const tx = vault.begin();

    expect(() => vault.begin()).toThrow('A vault transaction is already open');
    expect(() => vault.deposit(T1.address, 1n)).toThrow('Cannot deposit while a transaction is open');
    tx.rollback();
    expect(() => vault.begin()).not.toThrow();
  });

  it('overwrites a balance with the synced amount', () => {
    const vault = new Vault();
    vault.deposit(T1.address, 10n * ONE);

    vault.sync(T1.address, 3n * ONE);
    expect(vault.balanceOf(T1.address)).toBe(3n * ONE);

    vault.begin();
    expect(() => vault.sync(T1.address, ONE)).toThrow('Cannot sync while a transaction is open');
    expect(() => new Vault().sync(T1.address, -1n)).toThrow(RangeError);
  });

  it('rejects use after close', () => {
    const vault = new Vault();
    const tx = vault.begin();
    tx.commit();

    expect(() => tx.credit(T1.address, 1n)).toThrow('Vault transaction is already closed');
    expect(() => tx.rollback()).not.toThrow();
  });
});

describe('Ledger', () => {
  it('accumulates profit and counts settlements', () => {
    const ledger = new Ledger();

    expect(ledger.record(2n * ONE)).toBe(2n * ONE);
    expect(ledger.record(0n)).toBe(2n * ONE);
    expect(ledger.snapshot()).toMatchObject({ totalProfit: 2n * ONE, settledCount: 2 });
  });

  it('never decreases', () => {
    const ledger = new Ledger();
    ledger.record(ONE);

    expect(() => ledger.record(-1n)).toThrow(RangeError);
    expect(ledger.totalProfit).toBe(ONE);
  });
});
