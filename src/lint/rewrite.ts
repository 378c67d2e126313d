/**
 * Model file patching for `lint --fix`.
 *
 * Edits work on the original file text split at the header/body boundary,
 * so nothing outside the edited part is reformatted. Each write goes to a
 * temp file beside the model and is renamed over it.
 *
 * @module
 */

import { randomBytes } from 'node:crypto';
import { readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { DependencyError, withContext } from '../core/errors';
import { relationKey } from '../core/relation';
import type { Relation } from '../core/types';
import { splitHeader } from '../header/model-file';

const DEPS_LINE = /^\s*--\s*deps\s*:/;

export function formatDepsLine(deps: readonly Relation[]): string {
  if (deps.length === 0) return '-- deps:';
  return `-- deps: ${deps.map(relationKey).sort().join(', ')}`;
}

/** Replace the header's `-- deps:` line; the body is kept byte for byte */
export function replaceDepsLine(text: string, deps: readonly Relation[]): string {
  const { headerLines, bodyLines } = splitHeader(text);
  const index = headerLines.findIndex((line) => DEPS_LINE.test(line));
  if (index < 0) {
    throw new DependencyError("missing required '-- deps:' line in header");
  }
  const header = [...headerLines];
  header[index] = formatDepsLine(deps);
  return [...header, ...bodyLines].join('\n');
}

/** Keep the header, replace the body, one blank line between them */
export function replaceBody(text: string, body: string): string {
  const header = [...splitHeader(text).headerLines];
  while (header.length > 0 && header[header.length - 1].trim() === '') {
    header.pop();
  }
  let sql = body.trim();
  if (!sql.endsWith(';')) sql += ';';
  return [...header, '', sql].join('\n') + '\n';
}

/** Write through a temp file in the same directory, then rename over the target */
export async function writeFileAtomic(path: string, contents: string): Promise<void> {
  const temp = join(dirname(path), `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`);
  try {
    await writeFile(temp, contents, 'utf8');
    await rename(temp, path);
  } catch (e) {
    await unlink(temp).catch((cleanupError: unknown) => {
      console.warn(`[lint] Could not remove temp file ${temp}:`, cleanupError);
    });
    throw e;
  }
}

export async function rewriteDepsLine(path: string, deps: readonly Relation[]): Promise<void> {
  try {
    const text = await readFile(path, 'utf8');
    await writeFileAtomic(path, replaceDepsLine(text, deps));
  } catch (e) {
    throw withContext(e, `rewrite deps: ${path}`, path);
  }
}

export async function rewriteModelBody(path: string, body: string): Promise<void> {
  try {
    const text = await readFile(path, 'utf8');
    await writeFileAtomic(path, replaceBody(text, body));
  } catch (e) {
    throw withContext(e, `rewrite model body: ${path}`, path);
  }
}
