/**
 * Express Request Type Extensions
 * Extends Express Request to include custom properties
 */

declare global {
  namespace Express {
    interface Request {
      /**
       * Correlation ID for request tracing
       * Added by middleware in app.ts
       */
      correlationId: string;

      /**
       * Operator address resolved from the API key
       * Added by auth middleware
       */
      operator?: `0x${string}`;
    }
  }
}

export {};
