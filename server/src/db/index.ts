/**
 * Database Connection - Drizzle ORM with PostgreSQL
 */

import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
  db: Database;
  check(): Promise<boolean>;
  close(): Promise<void>;
}

export function createDatabase(connectionString: string): DatabaseConnection {
  const client = postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  return {
    db: drizzle(client, { schema }),
    async check(): Promise<boolean> {
      try {
        await client`SELECT 1`;
        return true;
      } catch {
        return false;
      }
    },
    async close(): Promise<void> {
      await client.end();
    },
  };
}

export * from './schema.js';
