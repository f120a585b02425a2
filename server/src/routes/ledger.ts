/**
 * Ledger Routes
 */

import { Router } from 'express';
import { historyQuerySchema } from '../middleware/validation.js';
import { standardLimiter } from '../middleware/rate-limit.js';
import type { ArbitrageEngine } from '../services/arbitrage-engine.js';
import type { ExecutionHistoryService } from '../services/execution-history.js';
import type { StructuredLogger } from '../utils/structured-logger.js';
import { sendData, sendError } from './respond.js';

export function createLedgerRoutes(deps: {
  engine: ArbitrageEngine;
  history: ExecutionHistoryService;
  logger: StructuredLogger;
}): Router {
  const { engine, history, logger } = deps;
  const router = Router();

  router.use(standardLimiter);

  /**
   * GET /api/ledger
   */
  router.get('/', (req, res) => {
    sendData(res, engine.getStatus().ledger);
  });

  /**
   * GET /api/ledger/history?limit=50
   * Most recent attempts first
   */
  router.get('/history', async (req, res) => {
    const query = historyQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid query parameters',
        details: query.error.flatten().fieldErrors,
        timestamp: Date.now(),
      });
    }

    try {
      sendData(res, await history.list(query.data.limit));
    } catch (error) {
      sendError(req, res, error, logger);
    }
  });

  return router;
}
