/**
 * Rate Limiting Middleware
 * In-process rate limiting for the single executor instance
 */

import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';
import { logger as rootLogger } from '../utils/structured-logger.js';

const logger = rootLogger.child('rate-limit');

/**
 * Operator address once authenticated, otherwise IP
 */
function keyGenerator(req: Request): string {
  if (req.operator) {
    return `operator:${req.operator.toLowerCase()}`;
  }
  return `ip:${req.ip || req.socket.remoteAddress || 'unknown'}`;
}

export function createLimiter(options: {
  windowMs: number;
  limit: number;
  message: string;
}): ReturnType<typeof rateLimit> {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.limit,
    keyGenerator,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      logger.warn(logger.fromCorrelationId(req.correlationId), 'rate_limited', 'Rate limit exceeded', {
        key: keyGenerator(req),
        path: req.path,
        method: req.method,
      });

      res.status(429).json({
        success: false,
        error: options.message,
        timestamp: Date.now(),
        retryAfter: Math.ceil(options.windowMs / 1000),
      });
    },
  });
}

/**
 * Standard rate limiter for reads and configuration
 * 100 requests per minute
 */
export const standardLimiter = createLimiter({
  windowMs: 60 * 1000,
  limit: 100,
  message: 'Too many requests, please try again later',
});

/**
 * Trade trigger rate limiter
 * 20 requests per minute
 */
export const tradeLimiter = createLimiter({
  windowMs: 60 * 1000,
  limit: 20,
  message: 'Too many trade requests, please try again later',
});
