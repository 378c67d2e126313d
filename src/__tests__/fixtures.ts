/**
 * Test Fixtures
 * =============
 *
 * In-memory models and projects, a scripted stand-in for the database
 * client, temp-directory projects on disk and console capture.
 */

import { vi } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { parseModelText } from '../header/model-file';
import { parseRelation, relationKey } from '../core/relation';
import type { Model, ModelHeader, Project } from '../core/types';
import type { DatabaseClient, QueryResult, Row } from '../build/client';

// ============ MODELS ============

export function makeModel(id: string, overrides: Partial<ModelHeader> = {}, bodySql = 'SELECT 1'): Model {
  return {
    id: parseRelation(id),
    path: `models/${id.replace('.', '/')}.sql`,
    header: {
      materialized: 'view',
      deps: [],
      uniqueKey: [],
      tests: [],
      tags: [],
      ...overrides,
    },
    bodySql,
  };
}

/** Model from file text, as the loader would build it */
export function modelFromText(id: string, text: string): Model {
  return { id: parseRelation(id), path: `models/${id.replace('.', '/')}.sql`, ...parseModelText(text) };
}

/** `[['a.b', ['a.a']], ...]`: view models with the given deps */
export function makeProject(models: Array<[string, string[]]>, sources: string[] = []): Project {
  return projectOf(
    models.map(([id, deps]) => makeModel(id, { deps: deps.map(parseRelation) })),
    sources,
  );
}

export function projectOf(models: Model[], sources: string[] = []): Project {
  return {
    root: '/project',
    models: new Map(models.map((m) => [relationKey(m.id), m])),
    sources: new Map(sources.map((s) => [s, parseRelation(s)])),
  };
}

// ============ DATABASE ============

type Responder = (params: readonly unknown[]) => QueryResult;

interface Rule {
  match: string | RegExp;
  respond: Responder;
}

export interface RecordedQuery {
  sql: string;
  params: readonly unknown[];
}

/**
 * Scripted `DatabaseClient`: the first rule whose pattern matches a query
 * answers it; unmatched queries return no rows.
 */
export class FakeClient implements DatabaseClient {
  readonly queries: RecordedQuery[] = [];
  ended = false;
  private rules: Rule[] = [];

  on(match: string | RegExp, respond: Responder | Row[]): this {
    this.rules.push({
      match,
      respond: Array.isArray(respond) ? () => ({ rows: respond, rowCount: respond.length }) : respond,
    });
    return this;
  }

  /** Reject queries matching `match` with a driver-style error */
  fail(match: string | RegExp, message: string, fields: { code?: string; position?: string } = {}): this {
    return this.on(match, () => {
      throw Object.assign(new Error(message), fields);
    });
  }

  async query(sql: string, params: readonly unknown[] = []): Promise<QueryResult> {
    this.queries.push({ sql, params });
    const rule = this.rules.find((r) => (typeof r.match === 'string' ? sql.includes(r.match) : r.match.test(sql)));
    return rule ? rule.respond(params) : { rows: [], rowCount: 0 };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  /** SQL of every recorded query */
  get sql(): string[] {
    return this.queries.map((q) => q.sql);
  }
}

// ============ FILES ============

export interface TempProject {
  root: string;
  path(relative: string): string;
  cleanup(): Promise<void>;
}

/** Write `files` (relative path → contents) under a fresh temp directory */
export async function tempProject(files: Record<string, string>): Promise<TempProject> {
  const root = await mkdtemp(join(tmpdir(), 'pgmodel-'));
  for (const [relative, contents] of Object.entries(files)) {
    const path = join(root, relative);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, contents, 'utf8');
  }
  return {
    root,
    path: (relative) => join(root, relative),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

// ============ CONSOLE ============

export interface ConsoleCapture {
  /** `console.log` output, one entry per call */
  out(): string[];
  /** `console.error` output */
  err(): string[];
}

/** Silence the console and record what commands print; undo with `vi.restoreAllMocks()` */
export function captureConsole(): ConsoleCapture {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  const text = (calls: unknown[][]): string[] => calls.map((args) => args.map(String).join(' '));
  return {
    out: () => text(log.mock.calls),
    err: () => text(error.mock.calls),
  };
}
