/**
 * Token Registry
 * Insertion-ordered monitored set with approval and blacklist flags.
 * Blacklisting is a logical removal and always overrides approval.
 */

import type { Address, TokenRecord, TokenRef } from '../../../shared/schema.js';
import { ZERO_ADDRESS } from '../../../shared/schema.js';
import { ConfigurationError, RiskRejectionError } from '../errors.js';
import { sameAddress } from '../utils/amounts.js';

export class TokenRegistry {
  private tokens: TokenRef[] = [];
  private approved: Set<string> = new Set();
  private blacklisted: Map<string, Address> = new Map();

  constructor(initial: TokenRef[] = []) {
    for (const token of initial) {
      this.register(token);
    }
  }

  /**
   * Add a token to the monitored set without approving it
   */
  register(token: TokenRef): void {
    if (sameAddress(token.address, ZERO_ADDRESS)) {
      throw new ConfigurationError('Token address must not be zero');
    }
    if (this.has(token.address)) {
      throw new ConfigurationError(`Token ${token.address} is already monitored`, {
        token: token.address,
      });
    }
    this.tokens.push({ ...token });
  }

  has(address: Address): boolean {
    return this.tokens.some(token => sameAddress(token.address, address));
  }

  get(address: Address): TokenRecord | undefined {
    const token = this.tokens.find(t => sameAddress(t.address, address));
    return token ? this.toRecord(token) : undefined;
  }

  /**
   * Every monitored token in insertion order, blacklisted ones included
   */
  all(): TokenRecord[] {
    return this.tokens.map(token => this.toRecord(token));
  }

  /**
   * Monitored tokens that have not been blacklisted
   */
  monitored(): TokenRecord[] {
    return this.all().filter(token => !token.blacklisted);
  }

  /**
   * Blacklisted addresses in the order they were blacklisted
   */
  blacklistedAddresses(): Address[] {
    return [...this.blacklisted.values()];
  }

  isEligible(address: Address): boolean {
    const key = address.toLowerCase();
    return this.approved.has(key) && !this.blacklisted.has(key);
  }

  isBlacklisted(address: Address): boolean {
    return this.blacklisted.has(address.toLowerCase());
  }

  /**
   * Approve a token for trading, adding it to the monitored set when new
   */
  approve(token: TokenRef): TokenRecord {
    if (sameAddress(token.address, ZERO_ADDRESS)) {
      throw new ConfigurationError('Token address must not be zero');
    }

    const key = token.address.toLowerCase();
    if (this.blacklisted.has(key)) {
      throw new RiskRejectionError(`Token ${token.address} is blacklisted`, { token: token.address });
    }
    if (this.approved.has(key)) {
      throw new RiskRejectionError(`Token ${token.address} is already approved`, { token: token.address });
    }

    if (!this.has(token.address)) {
      this.tokens.push({ ...token });
    }
    this.approved.add(key);

    const record = this.get(token.address);
    if (!record) throw new Error(`Token ${token.address} missing after approval`);
    return record;
  }

  /**
   * Blacklist a token and clear its approval. Unmonitored tokens may be blacklisted pre-emptively.
   */
  blacklist(address: Address): void {
    if (sameAddress(address, ZERO_ADDRESS)) {
      throw new ConfigurationError('Token address must not be zero');
    }

    const key = address.toLowerCase();
    if (this.blacklisted.has(key)) {
      throw new RiskRejectionError(`Token ${address} is already blacklisted`, { token: address });
    }

    this.blacklisted.set(key, address);
    this.approved.delete(key);
  }

  private toRecord(token: TokenRef): TokenRecord {
    const key = token.address.toLowerCase();
    return {
      ...token,
      approved: this.approved.has(key),
      blacklisted: this.blacklisted.has(key),
    };
  }
}
