/**
 * Markdown docs under `<targetDir>/docs`: one page per model and, when
 * every model is documented, an `index.md` with a mermaid DAG.
 *
 * @module
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { resolveConfig } from '../core/config';
import type { ProjectConfig } from '../core/config';
import { withContext } from '../core/errors';
import { describeTest } from '../core/data-tests';
import { relationKey } from '../core/relation';
import type { Model, Project, Relation } from '../core/types';
import { topoSort } from '../graph/dag';
import { mermaidLines } from '../graph/render';

export interface DocsOptions extends Partial<ProjectConfig> {
  /** Also write `index.md` (set when no selector narrowed the run) */
  all?: boolean;
}

export function renderModelDoc(model: Model): string {
  const { header } = model;
  let doc = `# ${relationKey(model.id)}\n\n`;
  doc += `**Materialized as:** ${header.materialized}\n\n`;

  if (header.materialized === 'incremental') {
    doc += `**Unique key:** ${header.uniqueKey.join(', ')}\n\n`;
  }
  if (header.deps.length > 0) {
    doc += '## Dependencies\n\n' + header.deps.map((d) => `- ${relationKey(d)}\n`).join('') + '\n';
  }
  if (header.tags.length > 0) {
    doc += '## Tags\n\n' + header.tags.map((t) => `- ${t}\n`).join('') + '\n';
  }
  if (header.tests.length > 0) {
    doc += '## Tests\n\n' + header.tests.map((t) => `- ${describeTest(t)}\n`).join('') + '\n';
  }

  doc += '## SQL\n\n```sql\n' + model.bodySql + '\n```\n';
  return doc;
}

export function renderIndexDoc(project: Project): string {
  const sorted = topoSort(project);
  let index = '# Models\n\n## Dependency Graph\n\n```mermaid\ngraph LR\n';
  index += mermaidLines(project, sorted).map((line) => `${line}\n`).join('');
  index += '```\n\n## Models\n\n';
  index += sorted.map((rel) => `- [${relationKey(rel)}](${rel.schema}/${rel.name}.md)\n`).join('');
  return index;
}

async function write(path: string, contents: string): Promise<void> {
  try {
    await writeFile(path, contents, 'utf8');
  } catch (e) {
    throw withContext(e, `write docs: ${path}`);
  }
}

/** Write the docs; returns the paths written, index first */
export async function generateDocs(
  project: Project,
  models: readonly Relation[],
  options: DocsOptions = {},
): Promise<string[]> {
  const { targetDir } = resolveConfig(options);
  const docsDir = join(project.root, targetDir, 'docs');
  const written: string[] = [];

  await mkdir(docsDir, { recursive: true });
  if (options.all) {
    const indexPath = join(docsDir, 'index.md');
    await write(indexPath, renderIndexDoc(project));
    written.push(indexPath);
  }

  for (const rel of models) {
    const model = project.models.get(relationKey(rel));
    if (!model) continue;
    const schemaDir = join(docsDir, rel.schema);
    await mkdir(schemaDir, { recursive: true });
    const docPath = join(schemaDir, `${rel.name}.md`);
    await write(docPath, renderModelDoc(model));
    written.push(docPath);
  }

  return written;
}
