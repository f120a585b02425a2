/**
 * Error taxonomy for the arbitrage executor
 *
 * Configuration and Authorization errors surface to the caller.
 * Everything raised inside an attempt is reported through the failure event.
 */

import type { Address, FailureCode } from '../../shared/schema.js';

export class ArbitrageError extends Error {
  constructor(
    message: string,
    public readonly code: FailureCode,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'ArbitrageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Bad setup or command parameters. Fatal at initialization.
 */
export class ConfigurationError extends ArbitrageError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'CONFIGURATION_INVALID', details);
    this.name = 'ConfigurationError';
  }
}

export class AuthorizationError extends ArbitrageError {
  constructor(message: string, public readonly caller?: string) {
    super(message, 'UNAUTHORIZED', caller ? { caller } : {});
    this.name = 'AuthorizationError';
  }
}

/**
 * Paused gate, gas ceiling, ineligible token, or a rejected registry change
 */
export class RiskRejectionError extends ArbitrageError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'RISK_REJECTED', details);
    this.name = 'RiskRejectionError';
  }
}

/**
 * Non-positive or stale price / gas reading
 */
export class OracleInvalidError extends ArbitrageError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'ORACLE_INVALID', details);
    this.name = 'OracleInvalidError';
  }
}

/**
 * Venue or lender call failed, reverted or returned unacceptable output
 */
export class CollaboratorFailureError extends ArbitrageError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    code: FailureCode = 'COLLABORATOR_FAILED'
  ) {
    super(message, code, details);
    this.name = 'CollaboratorFailureError';
  }
}

export class SlippageError extends CollaboratorFailureError {
  constructor(
    public readonly tokenOut: Address,
    public readonly actual: bigint,
    public readonly minimum: bigint
  ) {
    super(
      `Output ${actual} of ${tokenOut} below minimum ${minimum}`,
      { tokenOut, actual, minimum },
      'SLIPPAGE_EXCEEDED'
    );
    this.name = 'SlippageError';
  }
}

export class InsufficientRepaymentError extends CollaboratorFailureError {
  constructor(
    public readonly asset: Address,
    public readonly owed: bigint,
    public readonly available: bigint
  ) {
    super(
      `Insufficient repayment for ${asset}: owed ${owed}, available ${available}`,
      { asset, owed, available },
      'INSUFFICIENT_REPAYMENT'
    );
    this.name = 'InsufficientRepaymentError';
  }
}

export class CollaboratorTimeoutError extends CollaboratorFailureError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(
      `Timeout: ${operation} exceeded ${timeoutMs}ms`,
      { operation, timeoutMs },
      'COLLABORATOR_TIMEOUT'
    );
    this.name = 'CollaboratorTimeoutError';
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * HTTP status for an error raised by an operator command
 */
export function httpStatusFor(error: unknown): number {
  if (error instanceof AuthorizationError) return 403;
  if (error instanceof ConfigurationError) return 400;
  if (error instanceof RiskRejectionError) return 409;
  if (error instanceof OracleInvalidError) return 503;
  if (error instanceof CollaboratorFailureError) return 502;
  return 500;
}
