/**
 * Arbitrage Executor Server Entry Point
 */

import { createServer } from 'http';
import * as dotenv from 'dotenv';
import { createApp } from './app.js';
import { bootstrap } from './bootstrap.js';
import { loadConfig, type AppConfig } from './config/env.js';
import { createDatabase, type DatabaseConnection } from './db/index.js';
import { ConfigurationError } from './errors.js';
import { ContinuousExecutorService } from './services/continuous-executor.js';
import {
  DrizzleExecutionStore,
  ExecutionHistoryService,
  InMemoryExecutionStore,
} from './services/execution-history.js';
import { EventStreamService } from './services/websocket.js';
import { logger, errorContext } from './utils/structured-logger.js';

// Load environment variables
dotenv.config();

const systemCtx = () => logger.startOperation('op', undefined, 'system');

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(systemCtx(), 'config_invalid', error.message, error.details);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const { engine, metadata } = await bootstrap(config, logger);

  let database: DatabaseConnection | undefined;
  if (config.databaseUrl) {
    database = createDatabase(config.databaseUrl);
    if (await database.check()) {
      logger.info(systemCtx(), 'database_connected', 'Database connected');
    } else {
      logger.error(systemCtx(), 'database_unavailable', 'Database connection failed');
    }
  }

  const history = new ExecutionHistoryService(
    database ? new DrizzleExecutionStore(database.db) : new InMemoryExecutionStore(),
    logger
  );
  const detachHistory = history.attach(engine.events);

  const scheduler = new ContinuousExecutorService(engine, {
    intervalMs: config.executor.scanIntervalMs,
    logger,
  });
  const stream = new EventStreamService({ apiKey: config.operator.apiKey, logger });

  const app = createApp({
    engine,
    scheduler,
    history,
    metadata,
    apiKey: config.operator.apiKey,
    operator: config.operator.address,
    logger,
    nodeEnv: config.server.nodeEnv,
    corsOrigin: config.server.corsOrigin,
    database,
    stream,
  });
  const httpServer = createServer(app);

  stream.initialize(httpServer, engine.events);
  stream.forwardExecutorStatus((callback) => scheduler.onStatusChange(callback));

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(systemCtx(), 'shutdown', `Received ${signal}, shutting down...`);

    httpServer.close();
    if (scheduler.getStatus().isRunning) {
      await scheduler.stop(engine.operator);
    }
    await engine.whenIdle();
    stream.shutdown();
    detachHistory();
    await history.flush();
    await database?.close();

    logger.info(systemCtx(), 'shutdown_complete', 'Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  httpServer.listen(config.server.port, () => {
    logger.info(systemCtx(), 'server_started', `Server started on port ${config.server.port}`, {
      environment: config.server.nodeEnv,
      chain: config.chain.id,
      corsOrigin: config.server.corsOrigin,
    });
  });
}

// Unhandled rejection handler
process.on('unhandledRejection', (reason) => {
  logger.error(systemCtx(), 'unhandled_rejection', 'Unhandled rejection', { reason: String(reason) });
});

// Uncaught exception handler
process.on('uncaughtException', (error) => {
  logger.error(systemCtx(), 'uncaught_exception', 'Uncaught exception', errorContext(error));
  // Give time for logs to flush
  setTimeout(() => process.exit(1), 1000);
});

main().catch((error: unknown) => {
  logger.error(systemCtx(), 'startup_failed', 'Failed to start server', errorContext(error));
  process.exit(1);
});
