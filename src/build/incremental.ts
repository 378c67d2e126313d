/**
 * Incremental Materialization
 * ===========================
 *
 * An incremental model is a table with a primary key on its `unique_key`.
 * The first run (or a full refresh) creates it from the `@base` SQL; later
 * runs merge new rows into it.
 *
 * ```
 * first run:   CREATE TABLE "s"."n" AS <base>;  ALTER TABLE ... PRIMARY KEY (key)
 * merge run:   MERGE INTO "s"."n" AS t USING (<incremental body>) AS s ON t.key = s.key ...
 * before 15:   INSERT INTO "s"."n" ... ON CONFLICT (key) DO UPDATE SET ...
 * ```
 *
 * The merge body is chosen in this order:
 *
 * 1. `@incremental` section, `${this}` replaced by the target
 * 2. watermark: base SQL filtered to rows past the target's current maximum
 * 3. `incremental_filter`: base SQL filtered by the custom predicate
 * 4. `@base` section, or the whole body
 *
 * Key columns are never updated by a merge.
 *
 * @module
 */

import { firstRunSql, incrementalRunSql, normalizeBody, watermarkFilterSql } from '../core/model';
import { quoteIdent, quoteRelation } from '../core/relation';
import type { Model } from '../core/types';

/** Servers from this major version on support MERGE */
export const MERGE_MIN_VERSION = 15;

export function generateFirstRunSql(model: Model, body: string): string {
  const table = quoteRelation(model.id);
  const pk = model.header.uniqueKey.map(quoteIdent).join(', ');
  return (
    `CREATE TABLE ${table} AS\n${body};\n` +
    `ALTER TABLE ${table} ADD CONSTRAINT ${quoteIdent(`${model.id.name}_pkey`)} PRIMARY KEY (${pk});`
  );
}

function updateColumns(model: Model, columns: readonly string[]): string[] {
  return columns.filter((c) => !model.header.uniqueKey.includes(c));
}

export function generateMergeSql(model: Model, columns: readonly string[], body: string): string {
  const on = model.header.uniqueKey.map((k) => `t.${quoteIdent(k)} = s.${quoteIdent(k)}`).join(' AND ');
  const updates = updateColumns(model, columns).map((c) => `${quoteIdent(c)} = s.${quoteIdent(c)}`);
  const insertCols = columns.map(quoteIdent).join(', ');
  const insertVals = columns.map((c) => `s.${quoteIdent(c)}`).join(', ');

  let sql = `MERGE INTO ${quoteRelation(model.id)} AS t\nUSING (\n${body}\n) AS s\nON ${on}\n`;
  if (updates.length > 0) {
    sql += `WHEN MATCHED THEN UPDATE SET ${updates.join(', ')}\n`;
  }
  sql += `WHEN NOT MATCHED THEN INSERT (${insertCols}) VALUES (${insertVals})`;
  return sql;
}

/** `INSERT ... ON CONFLICT` equivalent of the merge; selects the affected row count */
export function generateUpsertSql(model: Model, columns: readonly string[], body: string): string {
  const cols = columns.map(quoteIdent).join(', ');
  const conflict = model.header.uniqueKey.map(quoteIdent).join(', ');
  const updates = updateColumns(model, columns).map((c) => `${quoteIdent(c)} = EXCLUDED.${quoteIdent(c)}`);
  const action = updates.length > 0 ? `DO UPDATE SET ${updates.join(', ')}` : 'DO NOTHING';

  return (
    `WITH source AS (\n${body}\n),\n` +
    `upserted AS (\n` +
    `  INSERT INTO ${quoteRelation(model.id)} (${cols})\n` +
    `  SELECT ${cols} FROM source\n` +
    `  ON CONFLICT (${conflict}) ${action}\n` +
    `  RETURNING 1\n` +
    `)\n` +
    `SELECT COUNT(*)::bigint AS affected FROM upserted`
  );
}

/** Body feeding a merge run, without a trailing semicolon */
export function incrementalBody(model: Model): string {
  if (model.incrementalSql !== undefined) {
    return normalizeBody(incrementalRunSql(model));
  }

  const base = normalizeBody(firstRunSql(model));
  const watermark = watermarkFilterSql(model);
  if (watermark !== undefined) {
    return `SELECT * FROM (${base}) AS __watermark_source WHERE ${watermark}`;
  }
  if (model.header.incrementalFilter !== undefined) {
    return `SELECT * FROM (${base}) AS __filter_source WHERE ${model.header.incrementalFilter}`;
  }
  return base;
}
