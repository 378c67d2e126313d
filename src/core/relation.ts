/**
 * Relation helpers: parsing, ordering and map keys.
 *
 * @module
 */

import { RelationParseError } from './errors';
import type { Relation } from './types';

export function parseRelation(text: string): Relation {
  const s = text.trim();
  const parts = s.split('.');
  const [schema = '', name = ''] = parts;
  if (schema === '' || name === '' || parts.length > 2) {
    if (!s.includes('.')) {
      throw new RelationParseError(
        `invalid relation '${s}': must include schema (e.g., 'public.${s}' or 'staging.${s}')`,
      );
    }
    throw new RelationParseError(
      `invalid relation '${s}': expected schema.table format (e.g., 'public.users')`,
    );
  }
  return { schema, name };
}

/** Display form, also used as the Map/Set key */
export function relationKey(rel: Relation): string {
  return `${rel.schema}.${rel.name}`;
}

export function relationEquals(a: Relation, b: Relation): boolean {
  return a.schema === b.schema && a.name === b.name;
}

/** Total order: schema, then name */
export function compareRelations(a: Relation, b: Relation): number {
  if (a.schema !== b.schema) return a.schema < b.schema ? -1 : 1;
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  return 0;
}

export function sortRelations(rels: Iterable<Relation>): Relation[] {
  return [...rels].sort(compareRelations);
}

/** De-duplicate by key, keeping first occurrence, then sort */
export function uniqueRelations(rels: Iterable<Relation>): Relation[] {
  const byKey = new Map<string, Relation>();
  for (const rel of rels) {
    if (!byKey.has(relationKey(rel))) {
      byKey.set(relationKey(rel), rel);
    }
  }
  return sortRelations(byKey.values());
}

/** Double-quote an identifier, doubling embedded quotes */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** `"schema"."name"` */
export function quoteRelation(rel: Relation): string {
  return `${quoteIdent(rel.schema)}.${quoteIdent(rel.name)}`;
}
