/**
 * pgmodel: dependency-aware SQL models for PostgreSQL
 * ====================================================
 *
 * Models are `models/<schema>/<name>.sql` files with a comment header. The
 * engine checks their declared dependencies against their SQL, orders them
 * into a DAG and materializes them as views, tables or incrementally merged
 * tables.
 *
 * ## Quick Start
 *
 * ```ts
 * import { loadProject, applySelectors, connect, runModels } from 'pgmodel';
 *
 * const project = await loadProject(process.cwd(), { sources: ['public.users'] });
 * const order = applySelectors(project, ['deps:marts.revenue']);
 *
 * const client = await connect(process.env.DATABASE_URL ?? '');
 * try {
 *   await runModels(client, project, order);
 * } finally {
 *   await client.end();
 * }
 * ```
 *
 * @module
 */

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  AcceptedValuesTest,
  Materialized,
  Model,
  ModelHeader,
  ModelTest,
  NotNullTest,
  Project,
  Relation,
  RelationshipsTest,
  UniqueTest,
} from './core/types';
export { MATERIALIZATIONS } from './core/types';
export {
  BodyParseError,
  DependencyError,
  GraphError,
  HeaderParseError,
  ModelError,
  ModelExecutionError,
  RelationParseError,
  formatError,
  withContext,
  type ExecutionDetails,
  type ModelErrorOptions,
} from './core/errors';
export { DEFAULT_CONFIG, resolveConfig, type ProjectConfig } from './core/config';
export {
  compareRelations,
  parseRelation,
  quoteIdent,
  quoteRelation,
  relationEquals,
  relationKey,
  sortRelations,
} from './core/relation';
export {
  THIS_PLACEHOLDER,
  firstRunSql,
  incrementalRunSql,
  normalizeBody,
  watermarkFilterSql,
} from './core/model';
export { describeTest, testToSql } from './core/data-tests';

// ═══════════════════════════════════════════════════════════════════════════════
// HEADER PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export { parseHeaderBlock, parseMaterialized, validateHeader } from './header/header';
export { parseModelFile, parseModelText, splitSections, type ParsedModelText } from './header/model-file';
export { parseTests } from './header/test-syntax';

// ═══════════════════════════════════════════════════════════════════════════════
// ANALYSIS & LINT
// ═══════════════════════════════════════════════════════════════════════════════

export { collectRelations, inferRelationsFromSql, sqlParser } from './sql';
export {
  classifyReference,
  declaredModelDeps,
  diffDeps,
  lintDeps,
  type Classification,
  type DepsDiff,
  type LintDepsResult,
} from './lint/lint-deps';
export { qualifyModelSql, type QualifyOutput, type QualifyResult } from './lint/qualify';
export { formatDepsLine, rewriteDepsLine, rewriteModelBody } from './lint/rewrite';

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH
// ═══════════════════════════════════════════════════════════════════════════════

export { loadProject } from './graph/project';
export { getDownstreamOrder, getUpstreamOrder, topoSort, topoSortLayers } from './graph/dag';
export { applySelectors, parseSelector, resolveSelector, type Selector } from './graph/selectors';
export { renderGraph, type GraphFormat } from './graph/render';

// ═══════════════════════════════════════════════════════════════════════════════
// BUILD
// ═══════════════════════════════════════════════════════════════════════════════

export { connect, type DatabaseClient, type QueryResult } from './build/client';
export { compileModel, dryRunSql, generateCreateSql, generateRunSql } from './build/compiler';
export { generateFirstRunSql, generateMergeSql, generateUpsertSql, incrementalBody } from './build/incremental';
export { ensureSchema, executeModel, type ExecuteResult, type IncrementalAction } from './build/executor';
export { runModelTests, runModels, type RunOptions, type TestResult } from './build/runner';
export { generateDocs } from './docs/docs';

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

export * from './commands';
