/**
 * Model DAG
 * =========
 *
 * Execution order over declared `deps:`. Only deps that name models in the
 * project are edges; sources and unknown relations are ignored here (lint
 * reports them).
 *
 * ```
 * staging.orders ──► marts.revenue ──► marts.dashboard
 * staging.users  ──┘
 * ```
 *
 * `topoSortLayers` groups models so each layer depends only on earlier ones:
 * `[[staging.orders, staging.users], [marts.revenue], [marts.dashboard]]`.
 *
 * @module
 */

import { GraphError } from '../core/errors';
import { compareRelations, relationKey } from '../core/relation';
import type { Model, Project, Relation } from '../core/types';

/** Declared deps of `model` that are models in `project` */
export function modelDeps(project: Project, model: Model): Relation[] {
  return model.header.deps.filter((dep) => project.models.has(relationKey(dep)));
}

function requireModel(project: Project, target: Relation): Model {
  const model = project.models.get(relationKey(target));
  if (!model) {
    throw new GraphError(`unknown model: ${relationKey(target)}`);
  }
  return model;
}

/** Kahn's algorithm, one sorted layer at a time */
export function topoSortLayers(project: Project): Relation[][] {
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, Relation[]>();

  for (const key of project.models.keys()) {
    inDegree.set(key, 0);
    dependents.set(key, []);
  }
  for (const [key, model] of project.models) {
    for (const dep of modelDeps(project, model)) {
      inDegree.set(key, (inDegree.get(key) ?? 0) + 1);
      dependents.get(relationKey(dep))?.push(model.id);
    }
  }

  let current: Relation[] = [];
  for (const [key, model] of project.models) {
    if (inDegree.get(key) === 0) current.push(model.id);
  }

  const layers: Relation[][] = [];
  let processed = 0;
  while (current.length > 0) {
    current.sort(compareRelations);
    processed += current.length;

    const next: Relation[] = [];
    for (const rel of current) {
      for (const dependent of dependents.get(relationKey(rel)) ?? []) {
        const key = relationKey(dependent);
        const degree = (inDegree.get(key) ?? 0) - 1;
        inDegree.set(key, degree);
        if (degree === 0) next.push(dependent);
      }
    }

    layers.push(current);
    current = next;
  }

  if (processed !== project.models.size) {
    const inCycle = [...inDegree.entries()]
      .filter(([, degree]) => degree > 0)
      .map(([key]) => key)
      .sort();
    throw new GraphError(`circular dependency: ${inCycle.join(', ')}`);
  }

  return layers;
}

/** All models, dependencies before dependents */
export function topoSort(project: Project): Relation[] {
  return topoSortLayers(project).flat();
}

/** `target` and everything it depends on, in execution order (target last) */
export function getUpstreamOrder(project: Project, target: Relation): Relation[] {
  requireModel(project, target);

  const visited = new Set<string>();
  const onPath = new Set<string>();
  const order: Relation[] = [];

  const visit = (rel: Relation): void => {
    const key = relationKey(rel);
    if (visited.has(key)) return;
    if (onPath.has(key)) {
      throw new GraphError(`circular dependency involving: ${key}`);
    }

    onPath.add(key);
    const model = project.models.get(key);
    if (model) {
      for (const dep of modelDeps(project, model)) visit(dep);
    }
    onPath.delete(key);

    visited.add(key);
    order.push(rel);
  };

  visit(target);
  return order;
}

/** `target` and everything depending on it, in execution order (target first) */
export function getDownstreamOrder(project: Project, target: Relation): Relation[] {
  requireModel(project, target);

  const dependents = new Map<string, Relation[]>();
  for (const model of project.models.values()) {
    for (const dep of model.header.deps) {
      const key = relationKey(dep);
      if (!project.models.has(key)) continue;
      const list = dependents.get(key) ?? [];
      list.push(model.id);
      dependents.set(key, list);
    }
  }

  const reached = new Set<string>([relationKey(target)]);
  const queue: Relation[] = [target];
  for (let rel = queue.shift(); rel !== undefined; rel = queue.shift()) {
    for (const dependent of dependents.get(relationKey(rel)) ?? []) {
      const key = relationKey(dependent);
      if (!reached.has(key)) {
        reached.add(key);
        queue.push(dependent);
      }
    }
  }

  return topoSort(project).filter((rel) => reached.has(relationKey(rel)));
}
