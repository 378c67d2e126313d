/**
 * Reference Qualification
 * =======================
 *
 * Rewrites unqualified table references (`FROM users`) to their
 * schema-qualified form (`FROM app.users`) when exactly one model or source
 * in the project has that name.
 *
 * The parsed tree is never mutated: qualification works on a copy and
 * serializes it with node-sql-parser only when something changed.
 *
 * @module
 */

import { THIS_PLACEHOLDER } from '../core/model';
import { relationEquals, relationKey, sortRelations } from '../core/relation';
import type { Model, Project, Relation } from '../core/types';
import { QueryWalker } from '../sql/analyzer';
import { isSelectNode } from '../sql/ast-types';
import type { NameParts, TableRefNode } from '../sql/ast-types';
import { sqlParser } from '../sql/parser';
import type { ParsedQuery } from '../sql/parser';

/** Stand-in table name for `${this}` while a section is parsed */
const THIS_TABLE = '__this__';

export interface QualifyResult {
  changed: boolean;
  /** Names with no candidate other than the model itself */
  unqualified: string[];
  /** `users (candidates: app.users, staging.users)` */
  ambiguous: string[];
  /** Names no model or source has */
  unknown: string[];
}

export interface QualifyOutput {
  result: QualifyResult;
  /** Rewritten body, present only when `result.changed` */
  sql?: string;
}

export type Qualification =
  | { kind: 'qualified'; relation: Relation }
  | { kind: 'self' }
  | { kind: 'ambiguous'; candidates: Relation[] }
  | { kind: 'unknown' };

/** Every model and source called `name` (case-sensitive), sorted */
export function candidatesByName(project: Project, name: string): Relation[] {
  const out: Relation[] = [];
  for (const model of project.models.values()) {
    if (model.id.name === name) out.push(model.id);
  }
  for (const source of project.sources.values()) {
    if (source.name === name && !project.models.has(relationKey(source))) out.push(source);
  }
  return sortRelations(out);
}

export function uniqueQualification(project: Project, model: Model, name: string): Qualification {
  const all = candidatesByName(project, name);
  if (all.length === 0) {
    return { kind: 'unknown' };
  }
  const candidates = all.filter((rel) => !relationEquals(rel, model.id));
  if (candidates.length === 0) {
    return { kind: 'self' };
  }
  if (candidates.length === 1) {
    return { kind: 'qualified', relation: candidates[0] };
  }
  return { kind: 'ambiguous', candidates };
}

class Qualifier extends QueryWalker {
  changed = false;
  readonly unqualified = new Set<string>();
  readonly ambiguous = new Set<string>();
  readonly unknown = new Set<string>();

  constructor(
    private readonly project: Project,
    private readonly model: Model,
  ) {
    super([THIS_TABLE]);
  }

  protected visitTableRef(node: TableRefNode, parts: NameParts): void {
    if (parts.length !== 1) return;
    const name = parts[0];
    const q = uniqueQualification(this.project, this.model, name);
    switch (q.kind) {
      case 'qualified':
        node.db = q.relation.schema;
        node.table = q.relation.name;
        this.changed = true;
        break;
      case 'self':
        this.unqualified.add(name);
        break;
      case 'ambiguous':
        this.ambiguous.add(`${name} (candidates: ${q.candidates.map(relationKey).join(', ')})`);
        break;
      case 'unknown':
        this.unknown.add(name);
        break;
    }
  }
}

interface SectionOutcome {
  result: QualifyResult;
  sql: string;
}

/** Qualify one parsed query; `parsed` itself is left untouched */
export function qualifyQuery(project: Project, model: Model, parsed: ParsedQuery): SectionOutcome {
  const copy = structuredClone(parsed.ast);
  const qualifier = new Qualifier(project, model);
  if (isSelectNode(copy)) {
    qualifier.walk(copy);
  }
  const result: QualifyResult = {
    changed: qualifier.changed,
    unqualified: [...qualifier.unqualified],
    ambiguous: [...qualifier.ambiguous],
    unknown: [...qualifier.unknown],
  };
  return { result, sql: qualifier.changed ? sqlParser.toSql(copy) : '' };
}

function qualifySection(project: Project, model: Model, sql: string): SectionOutcome {
  const parsed = sqlParser.parseQuery(sql.split(THIS_PLACEHOLDER).join(THIS_TABLE));
  const outcome = qualifyQuery(project, model, parsed);
  if (!outcome.result.changed) {
    return { result: outcome.result, sql };
  }
  return {
    result: outcome.result,
    sql: outcome.sql.replace(new RegExp(`"?${THIS_TABLE}"?`, 'g'), THIS_PLACEHOLDER),
  };
}

function mergeResults(results: QualifyResult[]): QualifyResult {
  const unique = (items: string[]): string[] => [...new Set(items)];
  return {
    changed: results.some((r) => r.changed),
    unqualified: unique(results.flatMap((r) => r.unqualified)),
    ambiguous: unique(results.flatMap((r) => r.ambiguous)),
    unknown: unique(results.flatMap((r) => r.unknown)),
  };
}

/**
 * Qualify a model's unqualified references. Sectioned incremental models
 * are qualified section by section and reassembled with their markers.
 */
export function qualifyModelSql(project: Project, model: Model): QualifyOutput {
  if (model.baseSql === undefined) {
    const outcome = qualifySection(project, model, model.bodySql);
    return outcome.result.changed ? outcome : { result: outcome.result };
  }

  const base = qualifySection(project, model, model.baseSql);
  const incremental =
    model.incrementalSql === undefined ? undefined : qualifySection(project, model, model.incrementalSql);
  const result = mergeResults(incremental ? [base.result, incremental.result] : [base.result]);
  if (!result.changed) {
    return { result };
  }

  let sql = `-- @base\n${base.sql}`;
  if (incremental) {
    sql += `\n\n-- @incremental\n${incremental.sql}`;
  }
  return { result, sql };
}
