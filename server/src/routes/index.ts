/**
 * API router: every route requires the operator API key
 */

import { Router } from 'express';
import type { Address } from '../../../shared/schema.js';
import { createOperatorAuth } from '../middleware/auth.js';
import type { ArbitrageEngine } from '../services/arbitrage-engine.js';
import type { ContinuousExecutorService } from '../services/continuous-executor.js';
import type { ExecutionHistoryService } from '../services/execution-history.js';
import type { TokenMetadataReader } from '../services/token-metadata.js';
import type { StructuredLogger } from '../utils/structured-logger.js';
import { createExecutorRoutes } from './executor.js';
import { createLedgerRoutes } from './ledger.js';
import { createRiskRoutes } from './risk.js';
import { createTokenRoutes } from './tokens.js';

export interface ApiDependencies {
  engine: ArbitrageEngine;
  scheduler: ContinuousExecutorService;
  history: ExecutionHistoryService;
  metadata: TokenMetadataReader;
  apiKey: string;
  operator: Address;
  logger: StructuredLogger;
}

export function createApiRouter(deps: ApiDependencies): Router {
  const logger = deps.logger.child('api');
  const router = Router();

  router.use(createOperatorAuth({ apiKey: deps.apiKey, operator: deps.operator, logger: deps.logger }));

  router.use('/executor', createExecutorRoutes({ engine: deps.engine, scheduler: deps.scheduler, logger }));
  router.use('/tokens', createTokenRoutes({ engine: deps.engine, metadata: deps.metadata, logger }));
  router.use('/risk', createRiskRoutes({ engine: deps.engine, logger }));
  router.use('/ledger', createLedgerRoutes({ engine: deps.engine, history: deps.history, logger }));

  return router;
}
