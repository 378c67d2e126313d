/**
 * Dependency Lint
 * ===============
 *
 * Compares the `deps:` a model declares with the dependencies its SQL
 * actually has.
 *
 * References are classified as:
 *
 * | Reference              | Result                      |
 * |------------------------|-----------------------------|
 * | `schema.model` (other) | inferred model dependency   |
 * | `schema.source`        | ignored                     |
 * | `schema.self`          | ignored                     |
 * | `schema.missing`       | unknown                     |
 * | `name`                 | unqualified                 |
 * | `db.schema.name`       | unknown (over-qualified)    |
 *
 * @module
 */

import { analysisQueries } from '../core/model';
import { relationEquals, relationKey, sortRelations, uniqueRelations } from '../core/relation';
import type { Model, Project, Relation } from '../core/types';
import { inferRelationsFromSql } from '../sql/analyzer';
import type { NameParts } from '../sql/ast-types';

export type Classification =
  | { kind: 'model'; relation: Relation }
  | { kind: 'source'; relation: Relation }
  | { kind: 'self'; relation: Relation }
  | { kind: 'unknown'; name: string }
  | { kind: 'unqualified'; name: string };

export interface LintDepsResult {
  inferredModelDeps: Relation[];
  unknownRelations: string[];
  unqualifiedRelations: string[];
}

export interface DepsDiff {
  /** Inferred from SQL but not declared */
  missing: Relation[];
  /** Declared but not referenced by the SQL */
  extra: Relation[];
}

export function classifyReference(project: Project, model: Model, parts: NameParts): Classification {
  if (parts.length === 1) {
    return { kind: 'unqualified', name: parts[0] };
  }
  if (parts.length > 2) {
    return { kind: 'unknown', name: parts.join('.') };
  }

  const relation: Relation = { schema: parts[0], name: parts[1] };
  const key = relationKey(relation);
  if (project.models.has(key)) {
    return relationEquals(relation, model.id) ? { kind: 'self', relation } : { kind: 'model', relation };
  }
  if (project.sources.has(key)) {
    return { kind: 'source', relation };
  }
  return { kind: 'unknown', name: key };
}

/** Infer a model's dependencies from its SQL */
export function lintDeps(project: Project, model: Model): LintDepsResult {
  const inferred: Relation[] = [];
  const unknown = new Set<string>();
  const unqualified = new Set<string>();

  for (const sql of analysisQueries(model)) {
    for (const parts of inferRelationsFromSql(sql)) {
      const c = classifyReference(project, model, parts);
      switch (c.kind) {
        case 'model':
          inferred.push(c.relation);
          break;
        case 'unknown':
          unknown.add(c.name);
          break;
        case 'unqualified':
          unqualified.add(c.name);
          break;
        case 'source':
        case 'self':
          break;
      }
    }
  }

  return {
    inferredModelDeps: uniqueRelations(inferred),
    unknownRelations: [...unknown].sort(),
    unqualifiedRelations: [...unqualified].sort(),
  };
}

/** Declared deps that are not sources; those are never tracked as model deps */
export function declaredModelDeps(project: Project, model: Model): Relation[] {
  return uniqueRelations(model.header.deps.filter((dep) => !project.sources.has(relationKey(dep))));
}

export function diffDeps(declared: readonly Relation[], inferred: readonly Relation[]): DepsDiff {
  const declaredKeys = new Set(declared.map(relationKey));
  const inferredKeys = new Set(inferred.map(relationKey));
  return {
    missing: sortRelations(inferred.filter((r) => !declaredKeys.has(relationKey(r)))),
    extra: sortRelations(declared.filter((r) => !inferredKeys.has(relationKey(r)))),
  };
}
