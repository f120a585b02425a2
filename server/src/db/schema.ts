/**
 * Database Schema - Drizzle ORM
 * PostgreSQL schema for the execution history
 */

import { pgTable, uuid, varchar, timestamp, text, index } from 'drizzle-orm/pg-core';
import type { ExecutionOutcome, FailureCode, Strategy } from '../../../shared/schema.js';

// One row per finished attempt, settled or failed
export const executions = pgTable('executions', {
  id: uuid('id').primaryKey().defaultRandom(),
  correlationId: varchar('correlation_id', { length: 24 }).notNull().unique(),
  strategy: varchar('strategy', { length: 20 }).notNull().$type<Strategy>(),
  outcome: varchar('outcome', { length: 20 }).notNull().$type<ExecutionOutcome>(),
  tokenIn: varchar('token_in', { length: 42 }),
  tokenOut: varchar('token_out', { length: 42 }),
  // uint256 amounts as decimal strings
  amount: varchar('amount', { length: 78 }),
  profit: varchar('profit', { length: 78 }),
  code: varchar('code', { length: 40 }).$type<FailureCode>(),
  reason: text('reason'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
}, (table) => ({
  createdAtIdx: index('executions_created_at_idx').on(table.createdAt),
  outcomeIdx: index('executions_outcome_idx').on(table.outcome),
}));

export type ExecutionRow = typeof executions.$inferSelect;
export type NewExecutionRow = typeof executions.$inferInsert;
