/**
 * Database client seam. The executor only needs `query` and `end`; `connect`
 * backs it with a single `pg` connection.
 *
 * @module
 */

import pg from 'pg';
import type { QueryResult as PgQueryResult } from 'pg';

export type Row = Record<string, unknown>;

export interface QueryResult {
  rows: Row[];
  /** Rows affected by the last statement; null when the driver reports none */
  rowCount: number | null;
}

export interface DatabaseClient {
  /** Run SQL; several `;`-separated statements are allowed when `params` is omitted */
  query(sql: string, params?: readonly unknown[]): Promise<QueryResult>;
  end(): Promise<void>;
}

/** Open one connection for a whole run */
export async function connect(connectionString: string): Promise<DatabaseClient> {
  const client = new pg.Client({ connectionString });
  await client.connect();

  return {
    async query(sql, params) {
      // A multi-statement batch resolves to one result per statement
      const result: PgQueryResult | PgQueryResult[] = await client.query(sql, params ? [...params] : undefined);
      const last = Array.isArray(result) ? result[result.length - 1] : result;
      return { rows: last?.rows ?? [], rowCount: last?.rowCount ?? null };
    },
    end: () => client.end(),
  };
}

// ============ ROW ACCESS ============

/** First column of the first row, or undefined */
export function firstValue(result: QueryResult): unknown {
  const row = result.rows[0];
  if (!row) return undefined;
  const key = Object.keys(row)[0];
  return key === undefined ? undefined : row[key];
}

/** Integer from a driver value (`pg` returns bigint counts as strings) */
export function toCount(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number(value);
  return 0;
}

/** Boolean from a driver value */
export function toBool(value: unknown): boolean {
  return value === true || value === 't' || value === 'true';
}
