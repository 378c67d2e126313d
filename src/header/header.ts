/**
 * Header Parser
 * =============
 *
 * Turns the comment lines at the top of a model file into a `ModelHeader`.
 *
 * ```sql
 * -- materialized: incremental
 * -- deps: staging.events
 * -- unique_key: event_id
 * -- watermark: updated_at
 * -- lookback: 2 days
 * ```
 *
 * Keys are `key: value` pairs; comment lines without a colon are ignored and
 * a repeated key keeps its last value.
 *
 * @module
 */

import { HeaderParseError } from '../core/errors';
import { parseRelation } from '../core/relation';
import { MATERIALIZATIONS } from '../core/types';
import type { Materialized, ModelHeader, Relation } from '../core/types';
import { parseTests } from './test-syntax';

const MATERIALIZED_TYPOS = ['materialize', 'mat', 'material'];

const TAG_PATTERN = /^[a-z0-9_-]+$/;

export function parseMaterialized(value: string): Materialized {
  const trimmed = value.trim();
  const match = MATERIALIZATIONS.find((m) => m === trimmed);
  if (match === undefined) {
    throw new HeaderParseError(
      `invalid materialized value: ${trimmed} (expected one of: ${MATERIALIZATIONS.join(', ')})`,
    );
  }
  return match;
}

/** Collect `key: value` pairs from `--` comment lines */
export function readHeaderPairs(lines: readonly string[]): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const line of lines) {
    const s = line.trim();
    if (!s.startsWith('--')) continue;
    const content = s.replace(/^-+/, '').trim();
    const colon = content.indexOf(':');
    if (colon < 0) continue;
    pairs.set(content.slice(0, colon).trim(), content.slice(colon + 1).trim());
  }
  return pairs;
}

export function parseHeaderBlock(lines: readonly string[]): ModelHeader {
  const pairs = readHeaderPairs(lines);

  const materializedText = pairs.get('materialized');
  if (materializedText === undefined) {
    const typo = MATERIALIZED_TYPOS.find((key) => pairs.has(key));
    throw new HeaderParseError('missing required header key: materialized', {
      hint: typo === undefined ? "add '-- materialized: view|table|incremental'" : `found '${typo}:', did you mean 'materialized'?`,
    });
  }
  const materialized = parseMaterialized(materializedText);

  const header: ModelHeader = {
    materialized,
    deps: parseRelationList(pairs.get('deps') ?? ''),
    uniqueKey: parseIdentList(pairs.get('unique_key') ?? ''),
    tests: parseTests(pairs.get('tests') ?? ''),
    tags: parseTags(pairs.get('tags') ?? ''),
  };

  const watermark = pairs.get('watermark');
  if (watermark !== undefined) {
    const cols = parseIdentList(watermark);
    if (cols.length > 0) header.watermark = cols;
  }
  const lookback = pairs.get('lookback');
  if (lookback) header.lookback = lookback;
  const incrementalFilter = pairs.get('incremental_filter');
  if (incrementalFilter) header.incrementalFilter = incrementalFilter;

  validateHeader(header);
  return header;
}

/** Cross-field rules that only hold once every key is parsed */
export function validateHeader(header: ModelHeader): void {
  const incremental = header.materialized === 'incremental';

  if (incremental && header.uniqueKey.length === 0) {
    throw new HeaderParseError('materialized: incremental requires unique_key');
  }
  if (!incremental) {
    const misplaced = [
      header.uniqueKey.length > 0 ? 'unique_key' : undefined,
      header.watermark ? 'watermark' : undefined,
      header.lookback !== undefined ? 'lookback' : undefined,
      header.incrementalFilter !== undefined ? 'incremental_filter' : undefined,
    ].filter((key): key is string => key !== undefined);
    if (misplaced.length > 0) {
      throw new HeaderParseError(
        `${misplaced.join(', ')} only valid with materialized: incremental (got ${header.materialized})`,
      );
    }
  }
  if (header.lookback !== undefined && !header.watermark) {
    throw new HeaderParseError('lookback requires watermark');
  }
  if (header.watermark && header.incrementalFilter !== undefined) {
    throw new HeaderParseError('watermark and incremental_filter are mutually exclusive');
  }
}

function parseRelationList(text: string): Relation[] {
  const s = text.trim();
  if (s === '') return [];
  try {
    return s.split(',').map(parseRelation);
  } catch (e) {
    throw new HeaderParseError(`invalid deps: ${e instanceof Error ? e.message : String(e)}`, {
      cause: e,
    });
  }
}

function parseIdentList(text: string): string[] {
  return text
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p !== '');
}

function parseTags(text: string): string[] {
  const tags: string[] = [];
  for (const part of text.split(',')) {
    const tag = part.trim().toLowerCase();
    if (tag === '') continue;
    if (!TAG_PATTERN.test(tag)) {
      throw new HeaderParseError(
        `invalid tag '${part.trim()}': tags must contain only lowercase letters, numbers, underscores, and hyphens`,
      );
    }
    tags.push(tag);
  }
  return tags;
}
