/**
 * Text renderings of the model DAG for `graph`.
 *
 * @module
 */

import { GraphError } from '../core/errors';
import { relationKey } from '../core/relation';
import type { Model, Project, Relation } from '../core/types';
import { topoSortLayers } from './dag';

export type GraphFormat = 'ascii' | 'dot' | 'json' | 'mermaid';

export const GRAPH_FORMATS: readonly GraphFormat[] = ['ascii', 'dot', 'json', 'mermaid'];

export interface GraphJson {
  layers: string[][];
  edges: Array<{ from: string; to: string }>;
}

export function parseGraphFormat(value: string): GraphFormat {
  const format = GRAPH_FORMATS.find((f) => f === value);
  if (!format) {
    throw new GraphError(`Unknown format: ${value}. Use: ${GRAPH_FORMATS.join(', ')}`);
  }
  return format;
}

function modelOf(project: Project, rel: Relation): Model {
  const model = project.models.get(relationKey(rel));
  if (!model) {
    throw new GraphError(`unknown model: ${relationKey(rel)}`);
  }
  return model;
}

/** Execution layers restricted to `models`; layers left empty are dropped */
function selectedLayers(project: Project, models: readonly Relation[]): Relation[][] {
  const keep = new Set(models.map(relationKey));
  return topoSortLayers(project)
    .map((layer) => layer.filter((rel) => keep.has(relationKey(rel))))
    .filter((layer) => layer.length > 0);
}

function renderAscii(project: Project, models: readonly Relation[]): string {
  const lines: string[] = [];
  selectedLayers(project, models).forEach((layer, i) => {
    lines.push(`Layer ${i}:`);
    for (const rel of layer) {
      const deps = modelOf(project, rel).header.deps.map(relationKey);
      lines.push(deps.length === 0 ? `  ${relationKey(rel)}` : `  ${relationKey(rel)} <- [${deps.join(', ')}]`);
    }
  });
  return lines.join('\n');
}

function renderDot(project: Project, models: readonly Relation[]): string {
  const lines = ['digraph models {', '    rankdir=LR;'];
  for (const rel of models) {
    for (const dep of modelOf(project, rel).header.deps) {
      lines.push(`    "${relationKey(dep)}" -> "${relationKey(rel)}";`);
    }
  }
  lines.push('}');
  return lines.join('\n');
}

export function graphJson(project: Project, models: readonly Relation[]): GraphJson {
  const layers = selectedLayers(project, models);
  const edges: GraphJson['edges'] = [];
  for (const rel of layers.flat()) {
    for (const dep of modelOf(project, rel).header.deps) {
      edges.push({ from: relationKey(dep), to: relationKey(rel) });
    }
  }
  return { layers: layers.map((layer) => layer.map(relationKey)), edges };
}

/** Mermaid flowchart body lines (`graph LR` excluded), names only */
export function mermaidLines(project: Project, models: readonly Relation[]): string[] {
  const lines: string[] = [];
  for (const rel of models) {
    const deps = modelOf(project, rel).header.deps;
    if (deps.length === 0) {
      lines.push(`    ${rel.name}`);
    } else {
      for (const dep of deps) lines.push(`    ${dep.name} --> ${rel.name}`);
    }
  }
  return lines;
}

/** Render `models` (in execution order) in the given format */
export function renderGraph(project: Project, models: readonly Relation[], format: GraphFormat): string {
  switch (format) {
    case 'ascii':
      return renderAscii(project, models);
    case 'dot':
      return renderDot(project, models);
    case 'json':
      return JSON.stringify(graphJson(project, models), null, 2);
    case 'mermaid':
      return ['graph LR', ...mermaidLines(project, models)].join('\n');
  }
}
