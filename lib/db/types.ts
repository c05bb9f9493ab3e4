/**
 * Database Client Interface
 *
 * Read-only view of the data store, implemented on Supabase (cloud)
 * and on direct PostgreSQL. Rows come back untyped; callers validate them.
 */

export type Row = Record<string, unknown>;

export type FilterValue = string | number | boolean;

export interface QueryResult<T> {
  data: T | null;
  error: Error | null;
  count?: number;
}

export interface SelectBuilder {
  eq(column: string, value: FilterValue): SelectBuilder;
  gte(column: string, value: FilterValue): SelectBuilder;
  lte(column: string, value: FilterValue): SelectBuilder;
  in(column: string, values: readonly FilterValue[]): SelectBuilder;
  order(column: string, options?: { ascending?: boolean }): SelectBuilder;
  limit(count: number): SelectBuilder;
  single(): Promise<QueryResult<Row>>;
  execute(): Promise<QueryResult<Row[]>>;
}

export interface TableClient {
  select(columns?: string): SelectBuilder;
}

export interface DatabaseClient {
  from(table: string): TableClient;

  /**
   * Check if the database connection is healthy
   */
  healthCheck(): Promise<boolean>;
}

export type { DatabaseMode } from '../config';
