/**
 * Sequential model runs and data tests over one client.
 *
 * Models run strictly in the order given (callers pass `applySelectors`
 * output, which is execution order). The abort signal is checked between
 * models; a statement already sent is never interrupted.
 *
 * @module
 */

import { describeTest, isCountTest, testToSql } from '../core/data-tests';
import { ModelError, formatError } from '../core/errors';
import { relationKey } from '../core/relation';
import type { Model, ModelTest, Project, Relation } from '../core/types';
import { toCount } from './client';
import type { DatabaseClient } from './client';
import { ensureSchema, executeModel } from './executor';
import type { ExecuteResult } from './executor';

export interface RunOptions {
  fullRefresh?: boolean;
  signal?: AbortSignal;
  onSchemaCreated?: (schema: string) => void;
  onModelStart?: (model: Model) => void;
  onModelDone?: (result: ExecuteResult) => void;
}

export interface RunSummary {
  results: ExecuteResult[];
  createdSchemas: string[];
}

function lookupModel(project: Project, rel: Relation): Model {
  const model = project.models.get(relationKey(rel));
  if (!model) {
    throw new ModelError(`unknown model: ${relationKey(rel)}`);
  }
  return model;
}

/** Execute `models` in order; the first failure ends the run */
export async function runModels(
  client: DatabaseClient,
  project: Project,
  models: readonly Relation[],
  options: RunOptions = {},
): Promise<RunSummary> {
  const results: ExecuteResult[] = [];
  const createdSchemas: string[] = [];
  const checkedSchemas = new Set<string>();

  for (const rel of models) {
    if (options.signal?.aborted) {
      throw new ModelError(`run aborted before ${relationKey(rel)}`, { cause: options.signal.reason });
    }
    const model = lookupModel(project, rel);

    if (!checkedSchemas.has(model.id.schema)) {
      checkedSchemas.add(model.id.schema);
      if (await ensureSchema(client, model.id.schema)) {
        createdSchemas.push(model.id.schema);
        options.onSchemaCreated?.(model.id.schema);
      }
    }

    options.onModelStart?.(model);
    const result = await executeModel(client, model, { fullRefresh: options.fullRefresh });
    results.push(result);
    options.onModelDone?.(result);
  }

  return { results, createdSchemas };
}

// ============ DATA TESTS ============

export type TestStatus = 'pass' | 'fail' | 'error';

export interface TestResult {
  model: Relation;
  test: ModelTest;
  description: string;
  status: TestStatus;
  /** Query error text when `status` is `error` */
  message?: string;
}

async function runTest(client: DatabaseClient, model: Model, test: ModelTest): Promise<TestResult> {
  const base = { model: model.id, test, description: describeTest(test) };
  try {
    const result = await client.query(testToSql(test, model.id));
    const passed = isCountTest(test)
      ? toCount(result.rows[0]?.violations) === 0
      : result.rows.length === 0;
    return { ...base, status: passed ? 'pass' : 'fail' };
  } catch (e) {
    return { ...base, status: 'error', message: formatError(e) };
  }
}

/** Run every header test of `models`; query errors count as failures */
export async function runModelTests(
  client: DatabaseClient,
  project: Project,
  models: readonly Relation[],
  onResult?: (result: TestResult) => void,
): Promise<TestResult[]> {
  const results: TestResult[] = [];
  for (const rel of models) {
    const model = lookupModel(project, rel);
    for (const test of model.header.tests) {
      const result = await runTest(client, model, test);
      results.push(result);
      onResult?.(result);
    }
  }
  return results;
}
