/**
 * WebSocket Service
 * Streams engine and scheduler events to authenticated operator sockets
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { Server, IncomingMessage } from 'http';
import type { ExecutorStatus, WSEvent, WSEventType } from '../../../shared/schema.js';
import { logger as rootLogger, errorContext, type OperationContext, type StructuredLogger } from '../utils/structured-logger.js';
import { safeEqual } from '../middleware/auth.js';
import type { ArbitrageEventBus, ArbitrageEventName } from './events.js';

interface OperatorSocket extends WebSocket {
  isAlive: boolean;
  ctx: OperationContext;
}

export interface EventStreamOptions {
  apiKey: string;
  path?: string;
  pingIntervalMs?: number;
  logger?: StructuredLogger;
}

const EVENT_TYPES: Record<ArbitrageEventName, WSEventType> = {
  arbitrageExecuted: 'arbitrage:executed',
  arbitrageFailed: 'arbitrage:failed',
  superProfitConverted: 'superprofit:converted',
  paused: 'risk:paused',
  unpaused: 'risk:unpaused',
  thresholdsUpdated: 'risk:thresholds',
  tokenApproved: 'token:approved',
  tokenBlacklisted: 'token:blacklisted',
};

// Close code for a rejected handshake token
export const WS_UNAUTHORIZED = 4401;

/**
 * JSON with bigints as decimal strings
 */
export function serializeEvent<T>(event: WSEvent<T>): string {
  return JSON.stringify(event, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

export function tokenFromRequest(req: IncomingMessage): string | null {
  const url = new URL(req.url ?? '', `http://${req.headers.host ?? 'localhost'}`);
  return url.searchParams.get('token');
}

export class EventStreamService {
  private wss: WebSocketServer | null = null;
  private clients: Set<OperatorSocket> = new Set();
  private pingInterval: ReturnType<typeof setInterval> | null = null;
  private unsubscribers: Array<() => void> = [];
  private readonly logger: StructuredLogger;

  constructor(private readonly options: EventStreamOptions) {
    this.logger = (options.logger ?? rootLogger).child('ws');
  }

  /**
   * Attach to the HTTP server and start forwarding events
   */
  initialize(server: Server, events: ArbitrageEventBus): void {
    this.wss = new WebSocketServer({ server, path: this.options.path ?? '/ws' });

    this.wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      const ctx = this.logger.startOperation('ws');
      const token = tokenFromRequest(req);
      if (!token || !safeEqual(token, this.options.apiKey)) {
        this.logger.warn(ctx, 'ws_unauthorized', 'Rejected socket without a valid operator token');
        ws.close(WS_UNAUTHORIZED, 'Unauthorized');
        return;
      }

      const client = Object.assign(ws, { isAlive: true, ctx });
      this.clients.add(client);
      this.logger.info(ctx, 'ws_connected', 'Operator socket connected', { clients: this.clients.size });

      client.on('pong', () => {
        client.isAlive = true;
      });

      client.on('close', () => {
        this.clients.delete(client);
      });

      client.on('error', (error) => {
        this.logger.error(ctx, 'ws_error', 'Socket error', errorContext(error));
        this.clients.delete(client);
      });

      this.send(client, {
        type: 'executor:status',
        payload: { connected: true },
        timestamp: Date.now(),
      });
    });

    this.pingInterval = setInterval(() => {
      this.clients.forEach((client) => {
        if (!client.isAlive) {
          client.terminate();
          this.clients.delete(client);
          return;
        }

        client.isAlive = false;
        client.ping();
      });
    }, this.options.pingIntervalMs ?? 30000);

    this.subscribe(events);
    this.logger.info(this.logger.startOperation('ws'), 'ws_initialized', 'WebSocket server initialized');
  }

  /**
   * Forward scheduler status changes
   */
  forwardExecutorStatus(onStatusChange: (callback: (status: ExecutorStatus) => void) => () => void): void {
    this.unsubscribers.push(onStatusChange((status) => this.broadcast('executor:status', status)));
  }

  broadcast<T>(type: WSEventType, payload: T): void {
    const message = serializeEvent({ type, payload, timestamp: Date.now() });

    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    });
  }

  getClientCount(): number {
    return this.clients.size;
  }

  shutdown(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    this.unsubscribers.forEach((unsubscribe) => unsubscribe());
    this.unsubscribers = [];

    this.clients.forEach((client) => {
      client.close();
    });
    this.clients.clear();

    if (this.wss) {
      this.wss.close();
      this.wss = null;
    }

    this.logger.info(this.logger.startOperation('ws'), 'ws_shutdown', 'WebSocket server shutdown');
  }

  private subscribe(events: ArbitrageEventBus): void {
    this.unsubscribers.push(
      events.on('arbitrageExecuted', (payload) => this.broadcast(EVENT_TYPES.arbitrageExecuted, payload)),
      events.on('arbitrageFailed', (payload) => this.broadcast(EVENT_TYPES.arbitrageFailed, payload)),
      events.on('superProfitConverted', (payload) => this.broadcast(EVENT_TYPES.superProfitConverted, payload)),
      events.on('paused', (payload) => this.broadcast(EVENT_TYPES.paused, payload)),
      events.on('unpaused', (payload) => this.broadcast(EVENT_TYPES.unpaused, payload)),
      events.on('thresholdsUpdated', (payload) => this.broadcast(EVENT_TYPES.thresholdsUpdated, payload)),
      events.on('tokenApproved', (payload) => this.broadcast(EVENT_TYPES.tokenApproved, payload)),
      events.on('tokenBlacklisted', (payload) => this.broadcast(EVENT_TYPES.tokenBlacklisted, payload))
    );
  }

  private send<T>(client: OperatorSocket, event: WSEvent<T>): void {
    if (client.readyState === WebSocket.OPEN) {
      client.send(serializeEvent(event));
    }
  }
}
