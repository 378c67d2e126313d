/**
 * Model SQL accessors: which SQL a model runs in each phase.
 *
 * @module
 */

import { quoteIdent, relationKey } from './relation';
import type { Model } from './types';

/** Placeholder for the model's own table inside `@incremental` sections */
export const THIS_PLACEHOLDER = '${this}';

/** Strip surrounding whitespace and trailing semicolons */
export function normalizeBody(sql: string): string {
  return sql.trim().replace(/[;\s]+$/, '').trim();
}

/** SQL for the first run (or a full refresh) */
export function firstRunSql(model: Model): string {
  return model.baseSql ?? model.bodySql;
}

/** SQL for merge runs, with `${this}` replaced by the model's relation */
export function incrementalRunSql(model: Model): string {
  const sql = model.incrementalSql ?? model.baseSql ?? model.bodySql;
  return sql.split(THIS_PLACEHOLDER).join(relationKey(model.id));
}

/**
 * Watermark predicate for merge runs, or undefined without a watermark.
 *
 * A compound watermark uses row comparison so trailing columns act as
 * tie-breakers; the lookback applies to the first column only.
 */
export function watermarkFilterSql(model: Model): string | undefined {
  const watermark = model.header.watermark;
  if (!watermark || watermark.length === 0) {
    return undefined;
  }

  const target = relationKey(model.id);
  const lookback = model.header.lookback;
  const maxOf = (col: string, withLookback: boolean): string =>
    withLookback && lookback !== undefined
      ? `MAX(${quoteIdent(col)}) - interval '${lookback}'`
      : `MAX(${quoteIdent(col)})`;

  if (watermark.length === 1) {
    const col = watermark[0];
    return `${quoteIdent(col)} > (SELECT ${maxOf(col, true)} FROM ${target})`;
  }

  const cols = watermark.map(quoteIdent).join(', ');
  const maxes = watermark.map((col, i) => maxOf(col, i === 0)).join(', ');
  return `(${cols}) > (SELECT ${maxes} FROM ${target})`;
}

/**
 * The statements dependency analysis looks at: the sections when the model
 * has them, otherwise the body. `${this}` becomes the model's own relation,
 * which classification then ignores.
 */
export function analysisQueries(model: Model): string[] {
  const sections = [model.baseSql, model.incrementalSql].filter(
    (s): s is string => s !== undefined,
  );
  const queries = sections.length > 0 ? sections : [model.bodySql];
  return queries.map((sql) => sql.split(THIS_PLACEHOLDER).join(relationKey(model.id)));
}
