/**
 * Project loading: `models/<schema>/<name>.sql` files plus configured sources.
 *
 * @module
 */

import { readdir, stat } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import { resolveConfig } from '../core/config';
import type { ProjectConfig } from '../core/config';
import { GraphError, ModelError, withContext } from '../core/errors';
import { parseRelation, relationKey } from '../core/relation';
import type { Model, Project, Relation } from '../core/types';
import { parseModelFile } from '../header/model-file';

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (e) {
    if (isNotFound(e)) return false;
    throw e;
  }
}

/** Every `.sql` file under `dir`, depth first, sorted per directory */
async function listSqlFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const files: string[] = [];
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listSqlFiles(path)));
    } else if (entry.isFile() && entry.name.endsWith('.sql')) {
      files.push(path);
    }
  }
  return files;
}

/** `models/<schema>/<name>.sql` → `schema.name` */
export function modelIdFromPath(modelsDir: string, path: string): Relation {
  const parts = relative(modelsDir, path).split(sep);
  if (parts.length < 2) {
    throw new GraphError(`model path missing schema directory: ${path}`, {
      path,
      hint: 'expected models/<schema>/<name>.sql, e.g. models/analytics/user_stats.sql',
    });
  }
  if (parts.length > 2) {
    throw new GraphError(`nested paths not supported (expected models/<schema>/<name>.sql): ${path}`, { path });
  }
  const [schema, filename] = parts;
  return { schema, name: filename.slice(0, -'.sql'.length) };
}

/**
 * Load every model under the configured models directory.
 * Non-`.sql` files are ignored; a duplicate id is an error.
 */
export async function loadProject(root: string, options: Partial<ProjectConfig> = {}): Promise<Project> {
  const config = resolveConfig(options);
  const modelsDir = join(root, config.modelsDir);

  if (!(await isDirectory(modelsDir))) {
    throw new ModelError(`models directory not found: ${modelsDir}`, {
      hint: `create ${config.modelsDir}/<schema>/<name>.sql`,
    });
  }

  const sources = new Map<string, Relation>();
  for (const text of config.sources) {
    try {
      const rel = parseRelation(text);
      sources.set(relationKey(rel), rel);
    } catch (e) {
      throw withContext(e, 'parse sources from config');
    }
  }

  const models = new Map<string, Model>();
  for (const path of await listSqlFiles(modelsDir)) {
    const id = modelIdFromPath(modelsDir, path);
    const key = relationKey(id);
    if (models.has(key)) {
      throw new GraphError(`duplicate model: ${key}`, { path });
    }
    const parsed = await parseModelFile(path);
    models.set(key, { id, path, ...parsed });
  }

  return { root, models, sources };
}
