/**
 * Authentication Middleware
 * Bearer operator API key, checked in constant time
 */

import crypto from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import type { Address } from '../../../shared/schema.js';
import { logger as rootLogger, type StructuredLogger } from '../utils/structured-logger.js';

export interface OperatorAuthOptions {
  apiKey: string;
  operator: Address;
  logger?: StructuredLogger;
}

/**
 * Constant-time string comparison
 */
export function safeEqual(provided: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(provided).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

export function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) return null;
  const token = header.slice('Bearer '.length).trim();
  return token || null;
}

/**
 * Resolve the operator from the API key. Requests without a valid key stop here.
 */
export function createOperatorAuth(options: OperatorAuthOptions) {
  const logger = (options.logger ?? rootLogger).child('auth');

  return (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req);

    if (!token) {
      return res.status(401).json({
        success: false,
        error: 'Authentication required',
        timestamp: Date.now(),
      });
    }

    if (!safeEqual(token, options.apiKey)) {
      logger.warn(logger.fromCorrelationId(req.correlationId), 'auth_rejected', 'Invalid operator API key', {
        path: req.path,
        method: req.method,
      });
      return res.status(401).json({
        success: false,
        error: 'Invalid API key',
        timestamp: Date.now(),
      });
    }

    req.operator = options.operator;
    next();
  };
}
