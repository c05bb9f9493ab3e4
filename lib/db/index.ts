/**
 * Database Client Factory
 *
 * Returns the appropriate database client based on configuration
 */

import { getConfig, type AppConfig } from '../config';
import type { DatabaseClient } from './types';
import { SupabaseDatabaseClient } from './supabase-db';
import { PostgresDatabaseClient } from './postgres-db';

let databaseClientInstance: DatabaseClient | null = null;

/**
 * Create a new database client instance (not singleton)
 */
export function createDatabaseClient(database: AppConfig['database'] = getConfig().database): DatabaseClient {
  if (database.mode === 'postgres') {
    console.log('[Database] Using direct PostgreSQL connection');
    return new PostgresDatabaseClient(database.url);
  }

  console.log('[Database] Using Supabase client');
  return new SupabaseDatabaseClient(database);
}

/**
 * Get the database client singleton
 */
export function getDatabaseClient(): DatabaseClient {
  if (!databaseClientInstance) {
    databaseClientInstance = createDatabaseClient();
  }
  return databaseClientInstance;
}

export type { DatabaseClient, TableClient, SelectBuilder, QueryResult, Row, FilterValue, DatabaseMode } from './types';
export { SupabaseDatabaseClient } from './supabase-db';
export { PostgresDatabaseClient } from './postgres-db';
export { QueryCache } from './query-cache';
