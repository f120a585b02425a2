/**
 * Express application
 */

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { createApiRouter, type ApiDependencies } from './routes/index.js';
import type { DatabaseConnection } from './db/index.js';
import type { EventStreamService } from './services/websocket.js';
import {
  CORRELATION_HEADER,
  StructuredLogger,
  errorContext,
  getCorrelationId,
} from './utils/structured-logger.js';

export interface AppDependencies extends ApiDependencies {
  nodeEnv: 'development' | 'production' | 'test';
  corsOrigin: string;
  database?: DatabaseConnection;
  stream?: EventStreamService;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const logger = deps.logger.child('http');

  // Amounts are uint256; JSON carries them as decimal strings
  app.set('json replacer', (_key: string, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: deps.nodeEnv === 'production' ? undefined : false,
  }));
  app.use(compression());
  app.use(cors({
    origin: deps.corsOrigin,
    credentials: true,
  }));
  app.use(express.json({ limit: '100kb' }));

  // Request correlation ID middleware
  app.use((req, res, next) => {
    const correlationId = getCorrelationId(req.headers) ??
      StructuredLogger.generateCorrelationId('api');

    res.setHeader(CORRELATION_HEADER, correlationId);
    req.correlationId = correlationId;
    next();
  });

  // Request logging middleware
  app.use((req, res, next) => {
    const ctx = logger.fromCorrelationId(req.correlationId);

    res.on('finish', () => {
      logger.info(ctx, 'http_request', `${req.method} ${req.path} ${res.statusCode}`, {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - ctx.started_at.getTime(),
      });
    });

    next();
  });

  // Health check endpoint (no auth required)
  app.get('/health', async (req, res) => {
    const database = deps.database ? await deps.database.check() : null;
    const engine = deps.engine.getStatus();
    const status = database === false ? 'degraded' : 'healthy';

    res.status(status === 'healthy' ? 200 : 503).json({
      status,
      timestamp: Date.now(),
      environment: deps.nodeEnv,
      services: {
        database,
        engine: { state: engine.state, paused: engine.risk.isPaused },
        websocket: { clients: deps.stream?.getClientCount() ?? 0 },
      },
    });
  });

  // API routes
  app.use('/api', createApiRouter(deps));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: 'Not found',
      timestamp: Date.now(),
    });
  });

  // Error handling middleware
  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // Malformed JSON bodies
    if ('type' in err && err.type === 'entity.parse.failed') {
      res.status(400).json({
        success: false,
        error: 'Malformed JSON body',
        timestamp: Date.now(),
      });
      return;
    }

    logger.error(logger.fromCorrelationId(req.correlationId), 'unhandled_error', 'Unhandled error', {
      ...errorContext(err),
      path: req.path,
      method: req.method,
    });

    res.status(500).json({
      success: false,
      error: deps.nodeEnv === 'production' ? 'Internal server error' : err.message,
      correlationId: req.correlationId,
      timestamp: Date.now(),
    });
  });

  return app;
}
