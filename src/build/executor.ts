/**
 * Model Executor
 * ==============
 *
 * Materializes one model against the database.
 *
 * - `view` / `table`: drop whichever object holds the name (a view or a
 *   table), then create. PostgreSQL rejects `DROP VIEW` on a table even with
 *   `IF EXISTS`, so only the existing kind is dropped.
 * - `incremental`: create on first run or full refresh, otherwise merge
 *   into the existing table using its live column list.
 *
 * A failing statement becomes a `ModelExecutionError` naming the model,
 * the driver's SQLSTATE and position, and a preview of the statement.
 *
 * @module
 */

import { ModelExecutionError } from '../core/errors';
import { quoteIdent, quoteRelation, relationKey } from '../core/relation';
import { firstRunSql, normalizeBody } from '../core/model';
import type { Materialized, Model, Relation } from '../core/types';
import { firstValue, toBool, toCount } from './client';
import type { DatabaseClient, QueryResult } from './client';
import { generateCreateSql } from './compiler';
import {
  MERGE_MIN_VERSION,
  generateFirstRunSql,
  generateMergeSql,
  generateUpsertSql,
  incrementalBody,
} from './incremental';

export const SQL_PREVIEW_CHARS = 600;

export type IncrementalAction = 'created_table' | 'merged' | 'upserted';

export interface IncrementalSummary {
  action: IncrementalAction;
  /** Rows in the new table, or rows merged/upserted */
  rows: number;
}

export interface ExecuteResult {
  model: Relation;
  materialized: Materialized;
  incremental?: IncrementalSummary;
}

export interface ExecuteOptions {
  /** Rebuild incremental models from their base SQL */
  fullRefresh?: boolean;
}

// ============ ERRORS ============

/** Trimmed statement, cut to `max` characters with `...` appended */
export function sqlPreview(sql: string, max = SQL_PREVIEW_CHARS): string {
  const s = sql.trim();
  return s.length <= max ? s : `${s.slice(0, max)}...`;
}

interface DriverErrorFields {
  message: string;
  sqlstate?: string;
  position?: number;
}

function driverErrorFields(err: unknown): DriverErrorFields {
  if (!(err instanceof Error)) {
    return { message: String(err) };
  }
  const fields: DriverErrorFields = { message: err.message };
  if ('code' in err && typeof err.code === 'string' && /^[0-9A-Z]{5}$/.test(err.code)) {
    fields.sqlstate = err.code;
  }
  if ('position' in err && typeof err.position === 'string' && /^\d+$/.test(err.position)) {
    fields.position = Number(err.position);
  }
  return fields;
}

const UNDEFINED_TABLE = '42P01';

/** Tables with the missing name in other schemas, `public` first */
async function suggestRelations(client: DatabaseClient, message: string): Promise<string[]> {
  const match = /relation "([^"]+)" does not exist/.exec(message);
  if (!match) return [];
  const missing = match[1];
  const result = await client.query(
    `SELECT table_schema FROM information_schema.tables
     WHERE table_name = $1
       AND table_schema NOT LIKE 'pg_%'
       AND table_schema <> 'information_schema'
     ORDER BY (table_schema = 'public') DESC, table_schema ASC
     LIMIT 3`,
    [missing],
  );
  return result.rows
    .map((row) => row.table_schema)
    .filter((schema): schema is string => typeof schema === 'string')
    .map((schema) => `${schema}.${missing}`);
}

async function buildExecutionError(
  client: DatabaseClient,
  model: Model,
  sql: string,
  err: unknown,
): Promise<ModelExecutionError> {
  const fields = driverErrorFields(err);

  let suggestions: string[] = [];
  if (fields.sqlstate === UNDEFINED_TABLE) {
    try {
      suggestions = await suggestRelations(client, fields.message);
    } catch (lookupError) {
      console.warn(`[model] Could not look up similar relations for ${relationKey(model.id)}:`, lookupError);
    }
  }

  return new ModelExecutionError(
    fields.message,
    {
      model: relationKey(model.id),
      sqlPreview: sqlPreview(sql),
      sqlstate: fields.sqlstate,
      position: fields.position,
      hints: [`Edit: ${model.path}`, `Rerun: pgmodel run -s ${relationKey(model.id)}`],
      suggestions,
    },
    { path: model.path, cause: err },
  );
}

/** Run one statement (or batch) for `model`; failures carry the model's identity */
async function runStatement(
  client: DatabaseClient,
  model: Model,
  sql: string,
  params?: readonly unknown[],
): Promise<QueryResult> {
  try {
    return await client.query(sql, params);
  } catch (e) {
    throw await buildExecutionError(client, model, sql, e);
  }
}

// ============ INTROSPECTION ============

/** Create the schema when missing; true when it was created */
export async function ensureSchema(client: DatabaseClient, schema: string): Promise<boolean> {
  const result = await client.query(
    'SELECT EXISTS(SELECT 1 FROM information_schema.schemata WHERE schema_name = $1) AS exists',
    [schema],
  );
  if (toBool(firstValue(result))) {
    return false;
  }
  await client.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdent(schema)}`);
  return true;
}

async function tableExists(client: DatabaseClient, model: Model): Promise<boolean> {
  const result = await runStatement(
    client,
    model,
    `SELECT EXISTS (
       SELECT 1 FROM information_schema.tables
       WHERE table_schema = $1 AND table_name = $2 AND table_type = 'BASE TABLE'
     ) AS exists`,
    [model.id.schema, model.id.name],
  );
  return toBool(firstValue(result));
}

async function viewExists(client: DatabaseClient, model: Model): Promise<boolean> {
  const result = await runStatement(
    client,
    model,
    `SELECT EXISTS (
       SELECT 1 FROM information_schema.views
       WHERE table_schema = $1 AND table_name = $2
     ) AS exists`,
    [model.id.schema, model.id.name],
  );
  return toBool(firstValue(result));
}

async function tableColumns(client: DatabaseClient, model: Model): Promise<string[]> {
  const result = await runStatement(
    client,
    model,
    `SELECT column_name FROM information_schema.columns
     WHERE table_schema = $1 AND table_name = $2
     ORDER BY ordinal_position`,
    [model.id.schema, model.id.name],
  );
  return result.rows
    .map((row) => row.column_name)
    .filter((name): name is string => typeof name === 'string');
}

/** Major version from `server_version_num` (`150004` → 15) */
export async function serverMajorVersion(client: DatabaseClient): Promise<number> {
  const result = await client.query('SHOW server_version_num');
  return Math.floor(toCount(firstValue(result)) / 10000);
}

// ============ EXECUTION ============

interface ExistingObjects {
  table: boolean;
  view: boolean;
}

async function existingObjects(client: DatabaseClient, model: Model): Promise<ExistingObjects> {
  const table = await tableExists(client, model);
  const view = await viewExists(client, model);
  return { table, view };
}

/** Drop the view or table currently holding the model's name */
async function dropExisting(client: DatabaseClient, model: Model, existing: ExistingObjects): Promise<void> {
  const target = quoteRelation(model.id);
  if (existing.view) {
    await runStatement(client, model, `DROP VIEW ${target} CASCADE`);
  }
  if (existing.table) {
    await runStatement(client, model, `DROP TABLE ${target} CASCADE`);
  }
}

async function executeIncremental(
  client: DatabaseClient,
  model: Model,
  fullRefresh: boolean,
): Promise<IncrementalSummary> {
  const existing = await existingObjects(client, model);
  const target = quoteRelation(model.id);

  if (!existing.table || fullRefresh) {
    await dropExisting(client, model, existing);
    await runStatement(client, model, generateFirstRunSql(model, normalizeBody(firstRunSql(model))));
    const count = await runStatement(client, model, `SELECT COUNT(*) AS count FROM ${target}`);
    return { action: 'created_table', rows: toCount(firstValue(count)) };
  }

  const body = incrementalBody(model);
  const columns = await tableColumns(client, model);
  const version = await serverMajorVersion(client);

  if (version >= MERGE_MIN_VERSION) {
    const merged = await runStatement(client, model, generateMergeSql(model, columns, body));
    return { action: 'merged', rows: merged.rowCount ?? 0 };
  }
  const upserted = await runStatement(client, model, generateUpsertSql(model, columns, body));
  return { action: 'upserted', rows: toCount(firstValue(upserted)) };
}

export async function executeModel(
  client: DatabaseClient,
  model: Model,
  options: ExecuteOptions = {},
): Promise<ExecuteResult> {
  const { materialized } = model.header;
  if (materialized === 'incremental') {
    const incremental = await executeIncremental(client, model, options.fullRefresh ?? false);
    return { model: model.id, materialized, incremental };
  }
  await dropExisting(client, model, await existingObjects(client, model));
  await runStatement(client, model, generateCreateSql(model));
  return { model: model.id, materialized };
}
