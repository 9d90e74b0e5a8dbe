import postgres from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from '../db/schema.js';
import { ConfigError } from './errors.js';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
  db: Database;
  queryClient: postgres.Sql;
}

export function createDatabase(connectionString: string | undefined): DatabaseConnection {
  if (!connectionString) {
    throw new ConfigError('DATABASE_URL environment variable is not set');
  }

  const queryClient = postgres(connectionString);
  const db = drizzle(queryClient, { schema });

  return { db, queryClient };
}
