/**
 * Direct PostgreSQL Database Client
 *
 * Implements DatabaseClient interface using the pg package for self-hosted mode
 */

import pg from 'pg';
import type { DatabaseClient, FilterValue, QueryResult, Row, SelectBuilder, TableClient } from './types';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

class PostgresSelectBuilder implements SelectBuilder {
  private whereConditions: string[] = [];
  private params: unknown[] = [];
  private orderByClause = '';
  private limitClause = '';

  constructor(
    private pool: pg.Pool,
    private tableName: string,
    private columns: string = '*'
  ) {}

  private addCondition(column: string, operator: string, value: unknown): this {
    const paramIndex = this.params.length + 1;
    this.whereConditions.push(`"${column}" ${operator} $${paramIndex}`);
    this.params.push(value);
    return this;
  }

  eq(column: string, value: FilterValue): SelectBuilder {
    return this.addCondition(column, '=', value);
  }

  gte(column: string, value: FilterValue): SelectBuilder {
    return this.addCondition(column, '>=', value);
  }

  lte(column: string, value: FilterValue): SelectBuilder {
    return this.addCondition(column, '<=', value);
  }

  in(column: string, values: readonly FilterValue[]): SelectBuilder {
    const paramIndex = this.params.length + 1;
    this.whereConditions.push(`"${column}" = ANY($${paramIndex})`);
    this.params.push([...values]);
    return this;
  }

  order(column: string, options?: { ascending?: boolean }): SelectBuilder {
    const direction = options?.ascending === false ? 'DESC' : 'ASC';
    this.orderByClause = ` ORDER BY "${column}" ${direction}`;
    return this;
  }

  limit(count: number): SelectBuilder {
    this.limitClause = ` LIMIT ${Math.floor(count)}`;
    return this;
  }

  buildQuery(): { sql: string; params: unknown[] } {
    let sql = `SELECT ${this.columns} FROM "${this.tableName}"`;

    if (this.whereConditions.length > 0) {
      sql += ` WHERE ${this.whereConditions.join(' AND ')}`;
    }

    sql += this.orderByClause;
    sql += this.limitClause;

    return { sql, params: this.params };
  }

  async single(): Promise<QueryResult<Row>> {
    this.limitClause = ' LIMIT 1';
    const { data, error } = await this.execute();
    if (error) {
      return { data: null, error };
    }
    const first = data?.[0];
    if (!first) {
      return { data: null, error: new Error('No rows returned') };
    }
    return { data: first, error: null };
  }

  async execute(): Promise<QueryResult<Row[]>> {
    try {
      const { sql, params } = this.buildQuery();
      const result = await this.pool.query(sql, params);

      return {
        data: result.rows,
        error: null,
        count: result.rowCount ?? undefined,
      };
    } catch (error) {
      return {
        data: null,
        error: toError(error),
      };
    }
  }
}

class PostgresTableClient implements TableClient {
  constructor(
    private pool: pg.Pool,
    private tableName: string
  ) {}

  select(columns: string = '*'): SelectBuilder {
    return new PostgresSelectBuilder(this.pool, this.tableName, columns);
  }
}

export class PostgresDatabaseClient implements DatabaseClient {
  private pool: pg.Pool;

  constructor(connectionString?: string) {
    this.pool = new pg.Pool({ connectionString });
  }

  from(table: string): TableClient {
    return new PostgresTableClient(this.pool, table);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      console.error('[Database] PostgreSQL health check failed:', toError(error).message);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
