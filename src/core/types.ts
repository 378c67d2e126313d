/**
 * Model Core Types
 * ================
 *
 * Shared vocabulary for the model build engine: relations, materializations,
 * data tests, headers, models and projects.
 *
 * A model file looks like:
 *
 * ```sql
 * -- materialized: incremental
 * -- deps: staging.orders
 * -- unique_key: order_id
 * -- tests: not_null(order_id), accepted_values(status, ['open', 'closed'])
 * -- tags: finance
 *
 * SELECT order_id, status, amount FROM staging.orders
 * ```
 *
 * @module
 */

// ═══════════════════════════════════════════════════════════════════════════════
// RELATIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A schema-qualified relation (`schema.name`).
 * Use `relationKey()` when a relation keys a Map or Set.
 */
export interface Relation {
  readonly schema: string;
  readonly name: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HEADER
// ═══════════════════════════════════════════════════════════════════════════════

/** How a model is materialized in the database */
export type Materialized = 'view' | 'table' | 'incremental';

export const MATERIALIZATIONS: readonly Materialized[] = ['view', 'table', 'incremental'];

export interface NotNullTest {
  kind: 'not_null';
  column: string;
}

export interface UniqueTest {
  kind: 'unique';
  columns: string[];
}

export interface AcceptedValuesTest {
  kind: 'accepted_values';
  column: string;
  values: string[];
}

export interface RelationshipsTest {
  kind: 'relationships';
  column: string;
  targetTable: Relation;
  targetColumn: string;
}

/** A data test declared in a model header */
export type ModelTest = NotNullTest | UniqueTest | AcceptedValuesTest | RelationshipsTest;

export interface ModelHeader {
  materialized: Materialized;
  deps: Relation[];
  /** Required (non-empty) for incremental models only */
  uniqueKey: string[];
  tests: ModelTest[];
  /** Lowercase, `[a-z0-9_-]+` */
  tags: string[];
  /** Incremental only: column(s) bounding the next run by their current maximum */
  watermark?: string[];
  /** Incremental only, requires watermark: interval to reprocess, e.g. `2 days` */
  lookback?: string;
  /** Incremental only, exclusive with watermark: custom predicate for merge runs */
  incrementalFilter?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODELS & PROJECTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface Model {
  id: Relation;
  path: string;
  header: ModelHeader;
  /** Everything after the header, trimmed (section markers included) */
  bodySql: string;
  /** `@base` section: first run and full refresh */
  baseSql?: string;
  /** `@incremental` section: merge runs, may reference `${this}` */
  incrementalSql?: string;
}

export interface Project {
  root: string;
  /** Keyed by `relationKey(model.id)` */
  models: Map<string, Model>;
  /** Externally managed relations, keyed by `relationKey` */
  sources: Map<string, Relation>;
}
