/**
 * `compile`, `run`, `test` and `status`.
 *
 * @module
 */

import { quoteRelation, relationKey } from '../core/relation';
import type { Materialized, Model } from '../core/types';
import { firstValue, toCount } from '../build/client';
import type { DatabaseClient } from '../build/client';
import { compileModel, dryRunSql } from '../build/compiler';
import type { ExecuteResult } from '../build/executor';
import { runModelTests, runModels } from '../build/runner';
import type { TestResult } from '../build/runner';
import { CommandLog, EXIT_ISSUES, EXIT_OK, guard, loadSelection, withClient } from './context';
import type { CommandOptions, DatabaseCommandOptions, ExitCode } from './context';

/** Write compiled SQL for every selected model */
export function compileCommand(options: CommandOptions): Promise<ExitCode> {
  const log = new CommandLog('model', options.quiet ?? false);
  return guard(log, async () => {
    const { project, models } = await loadSelection(options);
    if (models.length === 0) {
      log.info('No models found');
      return EXIT_OK;
    }
    for (const model of models) {
      const path = await compileModel(project, model, options.config);
      log.info(`Compiled ${relationKey(model.id)} -> ${path}`);
    }
    return EXIT_OK;
  });
}

export interface RunCommandOptions extends DatabaseCommandOptions {
  /** Recreate incremental models from their base SQL */
  fullRefresh?: boolean;
  /** Print the SQL instead of executing it */
  dryRun?: boolean;
  signal?: AbortSignal;
}

function describeResult(result: ExecuteResult): string {
  const id = relationKey(result.model);
  const inc = result.incremental;
  if (!inc) {
    return `${id} (${result.materialized})`;
  }
  switch (inc.action) {
    case 'created_table':
      return `${id} (incremental: created table, ${inc.rows} rows)`;
    case 'merged':
      return `${id} (incremental: merged ${inc.rows} rows)`;
    case 'upserted':
      return `${id} (incremental: upserted ${inc.rows} rows)`;
  }
}

/** Materialize the selected models in execution order */
export function runCommand(options: RunCommandOptions): Promise<ExitCode> {
  const log = new CommandLog('model', options.quiet ?? false);
  return guard(log, async () => {
    const { project, relations, models } = await loadSelection(options);
    if (models.length === 0) {
      log.info('No models found');
      return EXIT_OK;
    }

    if (options.dryRun) {
      for (const model of models) {
        log.info(`-- ${relationKey(model.id)}`);
        if (!options.quiet) console.log(dryRunSql(model, options.fullRefresh));
      }
      return EXIT_OK;
    }

    const summary = await withClient(options, (client) =>
      runModels(client, project, relations, {
        fullRefresh: options.fullRefresh,
        signal: options.signal,
        onSchemaCreated: (schema) => log.info(`Created schema ${schema}`),
        onModelStart: (model) => log.info(`Running ${relationKey(model.id)}...`),
        onModelDone: (result) => log.info(`Done ${describeResult(result)}`),
      }),
    );
    log.info(`Completed ${summary.results.length} model(s)`);
    return EXIT_OK;
  });
}

function describeTestResult(result: TestResult): string {
  switch (result.status) {
    case 'pass':
      return `${result.description}     PASS`;
    case 'fail':
      return `${result.description}     FAIL`;
    case 'error':
      return `${result.description}     ERROR (${result.message ?? 'unknown error'})`;
  }
}

/** Run header data tests; any failure or query error gives exit code 1 */
export function testCommand(options: DatabaseCommandOptions): Promise<ExitCode> {
  const log = new CommandLog('model', options.quiet ?? false);
  return guard(log, async () => {
    const { project, models } = await loadSelection(options);
    const withTests = models.filter((m) => m.header.tests.length > 0);
    if (withTests.length === 0) {
      log.info('No tests found');
      return EXIT_OK;
    }

    let current = '';
    const results = await withClient(options, (client) =>
      runModelTests(
        client,
        project,
        withTests.map((m) => m.id),
        (result) => {
          const id = relationKey(result.model);
          if (id !== current) {
            current = id;
            log.info(`Testing ${id}...`);
          }
          log.detail(describeTestResult(result));
        },
      ),
    );

    const passed = results.filter((r) => r.status === 'pass').length;
    const failed = results.length - passed;
    log.info(`Results: ${passed} passed, ${failed} failed`);
    return failed > 0 ? EXIT_ISSUES : EXIT_OK;
  });
}

// ============ STATUS ============

export type SyncStatus = 'synced' | 'missing' | 'type_mismatch';

export interface ModelStatus {
  relation: string;
  materialized: Materialized;
  status: SyncStatus;
  expectedType: string;
  actualType?: string;
  rowCount?: number;
}

function expectedTableType(materialized: Materialized): string {
  return materialized === 'view' ? 'VIEW' : 'BASE TABLE';
}

async function objectType(client: DatabaseClient, schema: string, name: string): Promise<string | undefined> {
  const result = await client.query(
    `SELECT table_type FROM information_schema.tables
     WHERE table_schema = $1 AND table_name = $2`,
    [schema, name],
  );
  const type = firstValue(result);
  return typeof type === 'string' ? type : undefined;
}

/** Compare each selected model with the object currently in the database */
export async function modelStatuses(
  client: DatabaseClient,
  models: readonly Model[],
): Promise<ModelStatus[]> {
  const out: ModelStatus[] = [];
  for (const model of models) {
    const expectedType = expectedTableType(model.header.materialized);
    const base = { relation: relationKey(model.id), materialized: model.header.materialized, expectedType };
    const actualType = await objectType(client, model.id.schema, model.id.name);
    if (actualType === undefined) {
      out.push({ ...base, status: 'missing' });
      continue;
    }
    const count = await client.query(`SELECT COUNT(*)::bigint AS count FROM ${quoteRelation(model.id)}`);
    out.push({
      ...base,
      status: actualType === expectedType ? 'synced' : 'type_mismatch',
      actualType,
      rowCount: toCount(firstValue(count)),
    });
  }
  return out;
}

/** Exit code 1 when any selected model is missing or has the wrong object type */
export function statusCommand(options: DatabaseCommandOptions): Promise<ExitCode> {
  const log = new CommandLog('model', options.quiet ?? false);
  return guard(log, async () => {
    const { models } = await loadSelection(options);
    if (models.length === 0) {
      log.info('No models found');
      return EXIT_OK;
    }

    const statuses = await withClient(options, (client) => modelStatuses(client, models));
    const width = Math.max(...statuses.map((s) => s.relation.length));
    log.info(`Models (${statuses.length} total):`);
    for (const s of statuses) {
      const name = s.relation.padEnd(width);
      const mat = s.materialized.padEnd(12);
      switch (s.status) {
        case 'synced':
          log.detail(`${name}  ${mat}  exists (${s.rowCount ?? 0} rows)`);
          break;
        case 'missing':
          log.detail(`${name}  ${mat}  missing`);
          break;
        case 'type_mismatch':
          log.detail(`${name}  ${mat}  type mismatch (expected ${s.expectedType}, found ${s.actualType ?? '?'})`);
          break;
      }
    }

    const count = (status: SyncStatus): number => statuses.filter((s) => s.status === status).length;
    log.info(
      `Summary: ${count('synced')} synced, ${count('missing')} missing, ${count('type_mismatch')} type mismatched`,
    );
    return statuses.every((s) => s.status === 'synced') ? EXIT_OK : EXIT_ISSUES;
  });
}
