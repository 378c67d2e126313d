/**
 * Model Compiler
 * ==============
 *
 * Renders the SQL that materializes a model.
 *
 * | Materialized  | Create SQL                                   |
 * |---------------|----------------------------------------------|
 * | `view`        | `CREATE OR REPLACE VIEW s.n AS <body>`       |
 * | `table`       | `CREATE TABLE s.n AS <body>`                 |
 * | `incremental` | first-run `CREATE TABLE` + primary key       |
 *
 * Run SQL, as compiled and shown by dry runs, drops both a view and a table
 * of the model's name before creating. The executor looks up which of the
 * two exists and drops only that one.
 *
 * @module
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { resolveConfig } from '../core/config';
import type { ProjectConfig } from '../core/config';
import { withContext } from '../core/errors';
import { firstRunSql, normalizeBody } from '../core/model';
import { relationKey } from '../core/relation';
import type { Model, Project } from '../core/types';
import { generateFirstRunSql, incrementalBody } from './incremental';

export function generateCreateSql(model: Model): string {
  const id = relationKey(model.id);
  switch (model.header.materialized) {
    case 'view':
      return `CREATE OR REPLACE VIEW ${id} AS\n${normalizeBody(model.bodySql)}`;
    case 'table':
      return `CREATE TABLE ${id} AS\n${normalizeBody(model.bodySql)}`;
    case 'incremental':
      return generateFirstRunSql(model, normalizeBody(firstRunSql(model)));
  }
}

/** Drop-then-create batch shown by `run --dry-run` */
export function generateRunSql(model: Model): string {
  const id = relationKey(model.id);
  return `DROP VIEW IF EXISTS ${id} CASCADE;\nDROP TABLE IF EXISTS ${id} CASCADE;\n${generateCreateSql(model)}`;
}

/** File contents written by `compile` */
export function compiledSql(model: Model): string {
  if (model.header.materialized !== 'incremental') {
    return `${generateCreateSql(model)};\n`;
  }
  return (
    `-- incremental model: ${relationKey(model.id)} (unique_key: ${model.header.uniqueKey.join(', ')})\n` +
    `-- merge statements are generated at run time from the target's columns\n` +
    `${normalizeBody(model.bodySql)};\n`
  );
}

/** Write `<targetDir>/compiled/<schema>/<name>.sql`; returns the path */
export async function compileModel(
  project: Project,
  model: Model,
  options: Partial<ProjectConfig> = {},
): Promise<string> {
  const { targetDir } = resolveConfig(options);
  const outDir = join(project.root, targetDir, 'compiled', model.id.schema);
  const outPath = join(outDir, `${model.id.name}.sql`);
  try {
    await mkdir(outDir, { recursive: true });
    await writeFile(outPath, compiledSql(model), 'utf8');
  } catch (e) {
    throw withContext(e, `write compiled SQL: ${outPath}`, model.path);
  }
  return outPath;
}

/**
 * The SQL a run would execute, for `run --dry-run`. Incremental merge
 * runs show the body that feeds the merge, since the MERGE itself depends
 * on the live table's columns.
 */
export function dryRunSql(model: Model, fullRefresh = false): string {
  if (model.header.materialized === 'incremental' && !fullRefresh) {
    return (
      `-- first run:\n${generateFirstRunSql(model, normalizeBody(firstRunSql(model)))}\n\n` +
      `-- incremental runs merge on (${model.header.uniqueKey.join(', ')}) from:\n${incrementalBody(model)};`
    );
  }
  const sql = generateRunSql(model);
  return sql.endsWith(';') ? sql : `${sql};`;
}
