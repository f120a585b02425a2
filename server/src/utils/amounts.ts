/**
 * BigInt amount helpers
 * Reference-unit values carry REFERENCE_DECIMALS fixed decimals.
 */

import { REFERENCE_DECIMALS, type Address } from '../../../shared/schema.js';

const BPS_DENOMINATOR = 10_000n;

export function pow10(decimals: number): bigint {
  return 10n ** BigInt(decimals);
}

export function ceilDiv(numerator: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) throw new RangeError('Denominator must be positive');
  if (numerator <= 0n) return numerator / denominator;
  return (numerator + denominator - 1n) / denominator;
}

/**
 * Rescale a fixed-point value to the reference precision
 */
export function toReferenceDecimals(value: bigint, decimals: number): bigint {
  if (decimals === REFERENCE_DECIMALS) return value;
  if (decimals < REFERENCE_DECIMALS) return value * pow10(REFERENCE_DECIMALS - decimals);
  return value / pow10(decimals - REFERENCE_DECIMALS);
}

/**
 * Reference-unit value of a token amount. Negative amounts keep their sign.
 */
export function valueOf(amount: bigint, price: bigint, decimals: number): bigint {
  if (amount < 0n) return -valueOf(-amount, price, decimals);
  return (amount * price) / pow10(decimals);
}

/**
 * Smallest token amount worth at least `value` reference units
 */
export function tokenAmountCeil(value: bigint, price: bigint, decimals: number): bigint {
  if (value <= 0n) return 0n;
  return ceilDiv(value * pow10(decimals), price);
}

export function tokenAmountFloor(value: bigint, price: bigint, decimals: number): bigint {
  if (value <= 0n) return 0n;
  return (value * pow10(decimals)) / price;
}

/**
 * Calculate minimum output with slippage protection
 */
export function calculateMinOutput(expectedOutput: bigint, slippageBps: number): bigint {
  return (expectedOutput * (BPS_DENOMINATOR - BigInt(slippageBps))) / BPS_DENOMINATOR;
}

export function bpsOf(amount: bigint, bps: bigint): bigint {
  return (amount * bps) / BPS_DENOMINATOR;
}

export function sameAddress(a: Address | string, b: Address | string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
