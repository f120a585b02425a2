/**
 * Token Routes
 * Monitored set and blacklist
 */

import { Router } from 'express';
import {
  addTokenSchema,
  addressParamSchema,
  parseInput,
  validateBody,
  validateParams,
} from '../middleware/validation.js';
import { standardLimiter } from '../middleware/rate-limit.js';
import type { ArbitrageEngine } from '../services/arbitrage-engine.js';
import type { TokenMetadataReader } from '../services/token-metadata.js';
import type { StructuredLogger } from '../utils/structured-logger.js';
import { operatorOf, sendData, sendError } from './respond.js';

export function createTokenRoutes(deps: {
  engine: ArbitrageEngine;
  metadata: TokenMetadataReader;
  logger: StructuredLogger;
}): Router {
  const { engine, metadata, logger } = deps;
  const router = Router();

  router.use(standardLimiter);

  /**
   * GET /api/tokens
   */
  router.get('/', (req, res) => {
    sendData(res, {
      monitored: engine.getMonitoredTokens(),
      blacklisted: engine.getBlacklistedTokens(),
    });
  });

  /**
   * POST /api/tokens
   * Approve a token for monitoring; symbol and decimals come from the chain
   */
  router.post('/', validateBody(addTokenSchema), async (req, res) => {
    try {
      const caller = operatorOf(req);
      const { address } = parseInput(addTokenSchema, req.body);
      const known = engine.getToken(address);
      const token = known ?? await metadata.describe(address);
      const record = await engine.addMonitoredToken(caller, {
        address: token.address,
        symbol: token.symbol,
        decimals: token.decimals,
      });
      sendData(res, record, 201);
    } catch (error) {
      sendError(req, res, error, logger);
    }
  });

  /**
   * POST /api/tokens/:address/blacklist
   */
  router.post('/:address/blacklist', validateParams(addressParamSchema), async (req, res) => {
    try {
      const caller = operatorOf(req);
      const { address } = parseInput(addressParamSchema, req.params);
      await engine.blacklistToken(caller, address);
      sendData(res, { address, blacklisted: true });
    } catch (error) {
      sendError(req, res, error, logger);
    }
  });

  return router;
}
