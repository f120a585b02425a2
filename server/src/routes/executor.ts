/**
 * Executor Routes
 * Trigger attempts and manage the continuous executor
 */

import { Router } from 'express';
import {
  parseInput,
  scheduleSchema,
  triggerSchema,
  validateBody,
} from '../middleware/validation.js';
import { standardLimiter, tradeLimiter } from '../middleware/rate-limit.js';
import type { ArbitrageEngine } from '../services/arbitrage-engine.js';
import type { ContinuousExecutorService } from '../services/continuous-executor.js';
import type { StructuredLogger } from '../utils/structured-logger.js';
import { operatorOf, sendData, sendError } from './respond.js';

export function createExecutorRoutes(deps: {
  engine: ArbitrageEngine;
  scheduler: ContinuousExecutorService;
  logger: StructuredLogger;
}): Router {
  const { engine, scheduler, logger } = deps;
  const router = Router();

  /**
   * POST /api/executor/direct
   * Run one direct attempt. Failed attempts are results, not errors.
   */
  router.post('/direct', tradeLimiter, validateBody(triggerSchema), async (req, res) => {
    try {
      const { amount } = parseInput(triggerSchema, req.body);
      const result = await engine.triggerDirect(operatorOf(req), amount);
      sendData(res, result);
    } catch (error) {
      sendError(req, res, error, logger);
    }
  });

  /**
   * POST /api/executor/flashloan
   * Run one flash-loan attempt
   */
  router.post('/flashloan', tradeLimiter, validateBody(triggerSchema), async (req, res) => {
    try {
      const { amount } = parseInput(triggerSchema, req.body);
      const result = await engine.triggerFlashloan(operatorOf(req), amount);
      sendData(res, result);
    } catch (error) {
      sendError(req, res, error, logger);
    }
  });

  /**
   * POST /api/executor/start
   * Start the continuous executor
   */
  router.post('/start', standardLimiter, validateBody(scheduleSchema), (req, res) => {
    try {
      const input = parseInput(scheduleSchema, req.body);
      sendData(res, scheduler.start(operatorOf(req), input));
    } catch (error) {
      sendError(req, res, error, logger);
    }
  });

  /**
   * POST /api/executor/stop
   * Stop the continuous executor after its current attempt
   */
  router.post('/stop', standardLimiter, async (req, res) => {
    try {
      sendData(res, await scheduler.stop(operatorOf(req)));
    } catch (error) {
      sendError(req, res, error, logger);
    }
  });

  /**
   * GET /api/executor/status
   */
  router.get('/status', standardLimiter, (req, res) => {
    sendData(res, {
      engine: engine.getStatus(),
      scheduler: scheduler.getStatus(),
    });
  });

  return router;
}
