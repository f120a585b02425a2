/**
 * Shared response helpers for the API routes
 */

import type { Request, Response } from 'express';
import type { Address } from '../../../shared/schema.js';
import { ArbitrageError, AuthorizationError, httpStatusFor, toErrorMessage } from '../errors.js';
import { errorContext, type StructuredLogger } from '../utils/structured-logger.js';

export function sendData<T>(res: Response, data: T, status: number = 200): void {
  res.status(status).json({
    success: true,
    data,
    timestamp: Date.now(),
  });
}

/**
 * Map a command error onto the envelope. Unknown errors become a 500 without detail.
 */
export function sendError(req: Request, res: Response, error: unknown, logger: StructuredLogger): void {
  const status = httpStatusFor(error);
  const ctx = logger.fromCorrelationId(req.correlationId, req.operator);

  if (status >= 500 && !(error instanceof ArbitrageError)) {
    logger.error(ctx, 'request_failed', `${req.method} ${req.path} failed`, errorContext(error));
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      timestamp: Date.now(),
    });
    return;
  }

  logger.warn(ctx, 'command_rejected', toErrorMessage(error), {
    path: req.path,
    status,
    ...errorContext(error),
  });
  res.status(status).json({
    success: false,
    error: toErrorMessage(error),
    ...(error instanceof ArbitrageError && { code: error.code }),
    timestamp: Date.now(),
  });
}

/**
 * Operator resolved by the auth middleware
 */
export function operatorOf(req: Request): Address {
  if (!req.operator) {
    throw new AuthorizationError('Request is not authenticated');
  }
  return req.operator;
}
