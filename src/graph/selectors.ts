/**
 * Model selectors, as accepted by `--select` / `--exclude`:
 *
 * | Selector             | Matches                                  |
 * |----------------------|------------------------------------------|
 * | `schema.name`        | that model                               |
 * | `tag:<t>`            | models tagged `t` (none is not an error) |
 * | `deps:schema.name`   | the model and everything upstream        |
 * | `downstream:s.n`     | the model and everything downstream      |
 * | `tree:schema.name`   | upstream and downstream                  |
 *
 * @module
 */

import { GraphError } from '../core/errors';
import { parseRelation, relationKey } from '../core/relation';
import type { Project, Relation } from '../core/types';
import { getDownstreamOrder, getUpstreamOrder, topoSort } from './dag';

export type Selector =
  | { kind: 'exact'; relation: Relation }
  | { kind: 'tag'; tag: string }
  | { kind: 'deps'; relation: Relation }
  | { kind: 'downstream'; relation: Relation }
  | { kind: 'tree'; relation: Relation };

type LineageKind = 'deps' | 'downstream' | 'tree';

const LINEAGE_PREFIXES: readonly LineageKind[] = ['deps', 'downstream', 'tree'];

export function parseSelector(text: string): Selector {
  const s = text.trim();

  if (s.startsWith('tag:')) {
    const tag = s.slice('tag:'.length).trim();
    if (tag === '') {
      throw new GraphError(`empty tag in selector: ${s}`);
    }
    return { kind: 'tag', tag: tag.toLowerCase() };
  }

  for (const kind of LINEAGE_PREFIXES) {
    const prefix = `${kind}:`;
    if (s.startsWith(prefix)) {
      const model = s.slice(prefix.length).trim();
      if (model === '') {
        throw new GraphError(`empty model in selector: ${s}`);
      }
      return { kind, relation: parseRelation(model) };
    }
  }

  if (!s.includes('.')) {
    throw new GraphError(
      `invalid selector '${s}': expected 'schema.name' or prefix like 'tag:', 'deps:', 'downstream:', 'tree:'`,
    );
  }
  return { kind: 'exact', relation: parseRelation(s) };
}

/** Keys of the models a selector matches */
export function resolveSelector(project: Project, selector: Selector): Set<string> {
  if (selector.kind === 'tag') {
    const out = new Set<string>();
    for (const [key, model] of project.models) {
      if (model.header.tags.includes(selector.tag)) out.add(key);
    }
    return out;
  }

  const key = relationKey(selector.relation);
  if (!project.models.has(key)) {
    throw new GraphError(`model not found: ${key}`);
  }

  switch (selector.kind) {
    case 'exact':
      return new Set([key]);
    case 'deps':
      return new Set(getUpstreamOrder(project, selector.relation).map(relationKey));
    case 'downstream':
      return new Set(getDownstreamOrder(project, selector.relation).map(relationKey));
    case 'tree':
      return new Set([
        ...getUpstreamOrder(project, selector.relation).map(relationKey),
        ...getDownstreamOrder(project, selector.relation).map(relationKey),
      ]);
  }
}

/**
 * Union of `selectors` (all models when empty) minus the union of
 * `excludes`, in execution order.
 */
export function applySelectors(
  project: Project,
  selectors: readonly string[] = [],
  excludes: readonly string[] = [],
): Relation[] {
  const parsedSelectors = selectors.map(parseSelector);
  const parsedExcludes = excludes.map(parseSelector);

  const selected = new Set<string>();
  if (parsedSelectors.length === 0) {
    for (const key of project.models.keys()) selected.add(key);
  } else {
    for (const selector of parsedSelectors) {
      for (const key of resolveSelector(project, selector)) selected.add(key);
    }
  }

  for (const exclude of parsedExcludes) {
    for (const key of resolveSelector(project, exclude)) selected.delete(key);
  }

  return topoSort(project).filter((rel) => selected.has(relationKey(rel)));
}
