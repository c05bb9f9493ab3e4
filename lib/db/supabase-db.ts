/**
 * Supabase Database Client
 *
 * Wraps a service-key Supabase client to implement the DatabaseClient interface
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { DataSourceError } from '../errors';
import type { DatabaseClient, FilterValue, QueryResult, Row, SelectBuilder, TableClient } from './types';

type Filter =
  | { op: 'eq' | 'gte' | 'lte'; column: string; value: FilterValue }
  | { op: 'in'; column: string; values: readonly FilterValue[] };

class SupabaseSelectBuilder implements SelectBuilder {
  private filters: Filter[] = [];
  private ordering?: { column: string; ascending: boolean };
  private maxRows?: number;

  constructor(
    private client: SupabaseClient,
    private tableName: string,
    private columns: string
  ) {}

  eq(column: string, value: FilterValue): SelectBuilder {
    this.filters.push({ op: 'eq', column, value });
    return this;
  }

  gte(column: string, value: FilterValue): SelectBuilder {
    this.filters.push({ op: 'gte', column, value });
    return this;
  }

  lte(column: string, value: FilterValue): SelectBuilder {
    this.filters.push({ op: 'lte', column, value });
    return this;
  }

  in(column: string, values: readonly FilterValue[]): SelectBuilder {
    this.filters.push({ op: 'in', column, values });
    return this;
  }

  order(column: string, options?: { ascending?: boolean }): SelectBuilder {
    this.ordering = { column, ascending: options?.ascending !== false };
    return this;
  }

  limit(count: number): SelectBuilder {
    this.maxRows = count;
    return this;
  }

  private buildQuery() {
    let query = this.client.from(this.tableName).select<string, Row>(this.columns);

    for (const filter of this.filters) {
      switch (filter.op) {
        case 'eq':
          query = query.eq(filter.column, filter.value);
          break;
        case 'gte':
          query = query.gte(filter.column, filter.value);
          break;
        case 'lte':
          query = query.lte(filter.column, filter.value);
          break;
        case 'in':
          query = query.in(filter.column, filter.values);
          break;
      }
    }

    if (this.ordering) {
      query = query.order(this.ordering.column, { ascending: this.ordering.ascending });
    }
    if (this.maxRows !== undefined) {
      query = query.limit(this.maxRows);
    }
    return query;
  }

  async single(): Promise<QueryResult<Row>> {
    const { data, error } = await this.buildQuery().limit(1).maybeSingle();
    if (error) {
      return { data: null, error: new Error(error.message) };
    }
    if (!data) {
      return { data: null, error: new Error('No rows returned') };
    }
    return { data, error: null };
  }

  async execute(): Promise<QueryResult<Row[]>> {
    const { data, error, count } = await this.buildQuery();
    return {
      data: data ?? null,
      error: error ? new Error(error.message) : null,
      count: count ?? undefined,
    };
  }
}

class SupabaseTableClient implements TableClient {
  constructor(
    private client: SupabaseClient,
    private tableName: string
  ) {}

  select(columns: string = '*'): SelectBuilder {
    return new SupabaseSelectBuilder(this.client, this.tableName, columns);
  }
}

export interface SupabaseSettings {
  supabaseUrl?: string;
  supabaseKey?: string;
}

export class SupabaseDatabaseClient implements DatabaseClient {
  private client: SupabaseClient;

  constructor({ supabaseUrl, supabaseKey }: SupabaseSettings) {
    if (!supabaseUrl || !supabaseKey) {
      throw new DataSourceError('supabase', new Error('SUPABASE_URL and SUPABASE_SECRET_KEY must be set'));
    }
    this.client = createClient(supabaseUrl, supabaseKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }

  from(table: string): TableClient {
    return new SupabaseTableClient(this.client, table);
  }

  async healthCheck(): Promise<boolean> {
    const { error } = await this.client.from('patient_profiles').select('id').limit(1);
    if (error) {
      console.error('[Database] Supabase health check failed:', error.message);
      return false;
    }
    return true;
  }
}
