/**
 * Model File Parser
 * =================
 *
 * Splits a model file into its header block and body, and splits incremental
 * bodies into `@base` / `@incremental` sections:
 *
 * ```sql
 * -- materialized: incremental
 * -- unique_key: day
 *
 * -- @base
 * SELECT day, count(*) AS n FROM app.events GROUP BY day
 *
 * -- @incremental
 * SELECT day, count(*) AS n FROM app.events
 * WHERE day >= (SELECT max(day) FROM ${this})
 * GROUP BY day
 * ```
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import { BodyParseError, withContext } from '../core/errors';
import { THIS_PLACEHOLDER } from '../core/model';
import type { ModelHeader } from '../core/types';
import { parseHeaderBlock } from './header';

export type SectionMarker = 'base' | 'incremental';

export interface ParsedModelText {
  header: ModelHeader;
  bodySql: string;
  baseSql?: string;
  incrementalSql?: string;
}

export interface BodySections {
  baseSql?: string;
  incrementalSql?: string;
}

/** Recognizes `-- @base` and `-- @incremental` marker lines */
export function sectionMarker(line: string): SectionMarker | undefined {
  const match = /^--\s*@(base|incremental)\s*$/.exec(line.trim());
  if (!match) return undefined;
  return match[1] === 'base' ? 'base' : 'incremental';
}

function isHeaderLine(line: string): boolean {
  const s = line.trim();
  return s === '' || (s.startsWith('--') && sectionMarker(s) === undefined);
}

/** Split raw file text at the first line that is neither blank nor a header comment */
export function splitHeader(text: string): { headerLines: string[]; bodyLines: string[] } {
  const lines = text.split(/\r?\n/);
  let i = 0;
  while (i < lines.length && isHeaderLine(lines[i])) i++;
  return { headerLines: lines.slice(0, i), bodyLines: lines.slice(i) };
}

export function parseModelText(text: string): ParsedModelText {
  const { headerLines, bodyLines } = splitHeader(text);
  const header = parseHeaderBlock(headerLines);

  const bodySql = bodyLines.join('\n').trim();
  if (bodySql === '') {
    throw new BodyParseError('model body is empty');
  }

  const sections = splitSections(bodySql);
  if (header.materialized !== 'incremental' && (sections.baseSql ?? sections.incrementalSql) !== undefined) {
    throw new BodyParseError(
      `@base/@incremental section markers require materialized: incremental (got ${header.materialized})`,
    );
  }

  return { header, bodySql, ...sections };
}

/**
 * Split a body on section markers.
 * No markers: both undefined. `@base` only: base. `@base` + `@incremental`: both.
 */
export function splitSections(bodySql: string): BodySections {
  const lines = bodySql.split('\n');
  const markers = lines
    .map((line, index) => ({ marker: sectionMarker(line), index }))
    .filter((m): m is { marker: SectionMarker; index: number } => m.marker !== undefined);

  if (markers.length === 0) {
    return {};
  }

  const [first, second, ...rest] = markers;
  if (first.marker !== 'base') {
    throw new BodyParseError('@incremental section requires a preceding @base section');
  }
  if (rest.length > 0 || (second !== undefined && second.marker !== 'incremental')) {
    throw new BodyParseError('expected at most one @base section followed by one @incremental section');
  }
  const leading = lines.slice(0, first.index).join('\n').trim();
  if (leading !== '') {
    throw new BodyParseError('SQL before the @base marker; move it into a section');
  }

  const baseEnd = second === undefined ? lines.length : second.index;
  const baseSql = lines.slice(first.index + 1, baseEnd).join('\n').trim();
  if (baseSql === '') {
    throw new BodyParseError('@base section is empty');
  }
  if (baseSql.includes(THIS_PLACEHOLDER)) {
    throw new BodyParseError(
      `@base section cannot reference ${THIS_PLACEHOLDER} (the table does not exist on the first run)`,
    );
  }

  if (second === undefined) {
    return { baseSql };
  }

  const incrementalSql = lines.slice(second.index + 1).join('\n').trim();
  if (incrementalSql === '') {
    throw new BodyParseError('@incremental section is empty');
  }
  return { baseSql, incrementalSql };
}

/** Read and parse a model file; errors carry the file path */
export async function parseModelFile(path: string): Promise<ParsedModelText> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (e) {
    throw withContext(e, `read model: ${path}`, path);
  }
  try {
    return parseModelText(text);
  } catch (e) {
    throw withContext(e, `parse model: ${path}`, path);
  }
}
