/**
 * Structured Logger with Correlation ID Support
 *
 * - One JSON line per entry
 * - Correlation IDs per attempt, request and socket
 * - Sensitive field redaction
 * - BigInt-safe serialization
 */

import crypto from 'crypto';

// Correlation ID prefixes for different operation types
export type CorrelationPrefix = 'arb' | 'fl' | 'op' | 'api' | 'ws' | 'sch';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVELS: LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

export interface OperationContext {
  correlation_id: string;
  started_at: Date;
  user_id?: string;
  action?: string;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  correlation_id: string;
  service: string;
  component?: string;
  event_type: string;
  message: string;
  user_id?: string;
  action_outcome?: 'success' | 'failure' | 'pending';
  duration_ms?: number;
  context: Record<string, unknown>;
}

const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /api[_-]?key["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'api_key: "[REDACTED]"' },
  { pattern: /private[_-]?key["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'private_key: "[REDACTED]"' },
  { pattern: /bearer\s+[a-zA-Z0-9._-]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /0x[a-fA-F0-9]{64}/g, replacement: '[PRIVATE_KEY_REDACTED]' },
];

const SENSITIVE_FIELDS = new Set([
  'apikey',
  'api_key',
  'operatorapikey',
  'privatekey',
  'private_key',
  'secret',
  'password',
  'accesstoken',
  'authorization',
  'cookie',
]);

const CORRELATION_ID_PATTERN = /^[a-z]{2,4}_[a-f0-9]{8}_[a-f0-9]{4}$/;
const MAX_CORRELATION_ID_LENGTH = 24;

export const CORRELATION_HEADER = 'X-Correlation-ID';

/**
 * Validate a correlation ID from an external source
 */
export function validateCorrelationId(id: string | undefined): string | undefined {
  if (!id || id.length > MAX_CORRELATION_ID_LENGTH) return undefined;
  return CORRELATION_ID_PATTERN.test(id) ? id : undefined;
}

/**
 * Extract correlation ID from HTTP headers with validation
 */
export function getCorrelationId(
  headers: Record<string, string | string[] | undefined>
): string | undefined {
  const key = Object.keys(headers).find(
    k => k.toLowerCase() === CORRELATION_HEADER.toLowerCase()
  );
  if (!key) return undefined;

  const value = headers[key];
  return validateCorrelationId(Array.isArray(value) ? value[0] : value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  const upper = value?.toUpperCase();
  return LEVELS.find(level => level === upper) ?? fallback;
}

/**
 * Flatten an unknown thrown value into log context
 */
export function errorContext(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined;
    return {
      error: error.message,
      error_name: error.name,
      ...(code !== undefined && { error_code: code }),
    };
  }
  return { error: String(error) };
}

export class StructuredLogger {
  private service: string;
  private component?: string;
  private minLevel: LogLevel;
  private output: (message: string) => void;

  constructor(options: {
    service: string;
    component?: string;
    minLevel?: LogLevel;
    output?: (message: string) => void;
  }) {
    this.service = options.service;
    this.component = options.component;
    this.minLevel = options.minLevel || 'INFO';
    this.output = options.output || console.log;
  }

  static generateCorrelationId(prefix: CorrelationPrefix): string {
    const timestampHex = Math.floor(Date.now() / 1000).toString(16).padStart(8, '0');
    const random = crypto.randomBytes(2).toString('hex');
    return `${prefix}_${timestampHex}_${random}`;
  }

  /**
   * Start a new operation with a fresh correlation ID
   */
  startOperation(prefix: CorrelationPrefix, userId?: string, action?: string): OperationContext {
    return {
      correlation_id: StructuredLogger.generateCorrelationId(prefix),
      started_at: new Date(),
      user_id: userId,
      action,
    };
  }

  /**
   * Continue an operation from an inbound correlation ID, or start one
   */
  fromCorrelationId(correlationId?: string, userId?: string): OperationContext {
    return {
      correlation_id: validateCorrelationId(correlationId) || StructuredLogger.generateCorrelationId('op'),
      started_at: new Date(),
      user_id: userId,
    };
  }

  private redact(value: unknown, depth: number): unknown {
    if (depth > 6) return '[Truncated]';

    if (typeof value === 'string') {
      return SENSITIVE_PATTERNS.reduce(
        (sanitized, { pattern, replacement }) => sanitized.replace(pattern, replacement),
        value
      );
    }
    if (Array.isArray(value)) {
      return value.map(item => this.redact(item, depth + 1));
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (value && typeof value === 'object') {
      const redacted: Record<string, unknown> = {};
      for (const [key, nested] of Object.entries(value)) {
        redacted[key] = SENSITIVE_FIELDS.has(key.toLowerCase())
          ? '[REDACTED]'
          : this.redact(nested, depth + 1);
      }
      return redacted;
    }
    return value;
  }

  private stringify(entry: LogEntry): string {
    try {
      return JSON.stringify(entry, (_key, value: unknown) =>
        typeof value === 'bigint' ? value.toString() : value
      );
    } catch {
      return JSON.stringify({ ...entry, context: { error: 'Failed to stringify context' } });
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private log(
    level: LogLevel,
    ctx: OperationContext,
    eventType: string,
    message: string,
    context: Record<string, unknown> = {},
    outcome?: 'success' | 'failure' | 'pending'
  ): void {
    if (!this.shouldLog(level)) return;

    const redacted = this.redact(context, 0);
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      correlation_id: ctx.correlation_id,
      service: this.service,
      ...(this.component && { component: this.component }),
      event_type: eventType,
      message,
      ...(ctx.user_id && { user_id: ctx.user_id }),
      ...(outcome && { action_outcome: outcome }),
      ...(outcome && { duration_ms: Date.now() - ctx.started_at.getTime() }),
      context: redacted && typeof redacted === 'object' && !Array.isArray(redacted)
        ? { ...redacted }
        : {},
    };

    this.output(this.stringify(entry));
  }

  debug(ctx: OperationContext, eventType: string, message: string, context?: Record<string, unknown>): void {
    this.log('DEBUG', ctx, eventType, message, context);
  }

  info(ctx: OperationContext, eventType: string, message: string, context?: Record<string, unknown>): void {
    this.log('INFO', ctx, eventType, message, context);
  }

  warn(ctx: OperationContext, eventType: string, message: string, context?: Record<string, unknown>): void {
    this.log('WARN', ctx, eventType, message, context);
  }

  error(ctx: OperationContext, eventType: string, message: string, context?: Record<string, unknown>): void {
    this.log('ERROR', ctx, eventType, message, context, 'failure');
  }

  /**
   * Log with explicit outcome for the audit trail
   */
  audit(
    ctx: OperationContext,
    eventType: string,
    message: string,
    outcome: 'success' | 'failure',
    context?: Record<string, unknown>
  ): void {
    this.log(outcome === 'success' ? 'INFO' : 'WARN', ctx, eventType, message, context, outcome);
  }

  child(component: string): StructuredLogger {
    return new StructuredLogger({
      service: this.service,
      component,
      minLevel: this.minLevel,
      output: this.output,
    });
  }
}

export const logger = new StructuredLogger({
  service: 'arbitrage-executor',
  minLevel: parseLogLevel(
    process.env.LOG_LEVEL,
    process.env.NODE_ENV === 'production' ? 'INFO' : 'DEBUG'
  ),
});
