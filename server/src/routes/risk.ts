/**
 * Risk Routes
 * Kill switch, thresholds and gas price
 */

import { Router } from 'express';
import { parseInput, thresholdsSchema, validateBody } from '../middleware/validation.js';
import { standardLimiter } from '../middleware/rate-limit.js';
import type { ArbitrageEngine } from '../services/arbitrage-engine.js';
import type { StructuredLogger } from '../utils/structured-logger.js';
import { operatorOf, sendData, sendError } from './respond.js';

export function createRiskRoutes(deps: { engine: ArbitrageEngine; logger: StructuredLogger }): Router {
  const { engine, logger } = deps;
  const router = Router();

  router.use(standardLimiter);

  router.post('/pause', async (req, res) => {
    try {
      sendData(res, await engine.pause(operatorOf(req)));
    } catch (error) {
      sendError(req, res, error, logger);
    }
  });

  router.post('/unpause', async (req, res) => {
    try {
      sendData(res, await engine.unpause(operatorOf(req)));
    } catch (error) {
      sendError(req, res, error, logger);
    }
  });

  router.get('/config', (req, res) => {
    sendData(res, engine.getRiskConfig());
  });

  /**
   * PUT /api/risk/thresholds
   * Gas limit in gwei, the others in USD
   */
  router.put('/thresholds', validateBody(thresholdsSchema), async (req, res) => {
    try {
      const input = parseInput(thresholdsSchema, req.body);
      const config = await engine.setThresholds(operatorOf(req), {
        gasPriceLimit: input.gasPriceLimitGwei,
        profitThreshold: input.profitThresholdUsd,
        superProfitThreshold: input.superProfitThresholdUsd,
        liquidityThreshold: input.liquidityThresholdUsd,
      });
      sendData(res, config);
    } catch (error) {
      sendError(req, res, error, logger);
    }
  });

  router.get('/gas-price', async (req, res) => {
    try {
      sendData(res, { gasPrice: await engine.getGasPrice() });
    } catch (error) {
      sendError(req, res, error, logger);
    }
  });

  return router;
}
