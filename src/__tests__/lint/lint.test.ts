import { describe, it, expect } from 'vitest';
import { relationKey, parseRelation } from '../../core/relation';
import { classifyReference, declaredModelDeps, diffDeps, lintDeps } from '../../lint/lint-deps';
import { candidatesByName, qualifyModelSql } from '../../lint/qualify';
import { splitSections } from '../../header/model-file';
import { inferRelationsFromSql } from '../../sql/analyzer';
import { makeModel, modelFromText, projectOf } from '../fixtures';

const keys = (rels: ReadonlyArray<{ schema: string; name: string }>) => rels.map(relationKey);
const refs = (sql: string) => inferRelationsFromSql(sql).map((parts) => parts.join('.'));

describe('lintDeps', () => {
  const base = makeModel('a.base');
  const report = makeModel(
    'a.report',
    { deps: [parseRelation('a.base'), parseRelation('a.old'), parseRelation('public.users')] },
    'SELECT * FROM a.base b JOIN public.users u ON u.id = b.user_id JOIN a.report r ON r.id = b.id',
  );
  const project = projectOf([base, report], ['public.users']);

  it('infers model deps, ignoring sources and self', () => {
    expect(lintDeps(project, report)).toEqual({
      inferredModelDeps: [{ schema: 'a', name: 'base' }],
      unknownRelations: [],
      unqualifiedRelations: [],
    });
  });

  it('reports unknown and unqualified references', () => {
    const model = makeModel('a.odd', {}, 'SELECT * FROM a.missing, lonely');
    const result = lintDeps(projectOf([model]), model);
    expect(result.unknownRelations).toEqual(['a.missing']);
    expect(result.unqualifiedRelations).toEqual(['lonely']);
  });

  it('classifies references by part count', () => {
    expect(classifyReference(project, report, ['x', 'y', 'z'])).toEqual({ kind: 'unknown', name: 'x.y.z' });
    expect(classifyReference(project, report, ['users'])).toEqual({ kind: 'unqualified', name: 'users' });
    expect(classifyReference(project, report, ['public', 'users']).kind).toBe('source');
    expect(classifyReference(project, report, ['a', 'report']).kind).toBe('self');
  });

  it('diffs declared model deps against inferred ones', () => {
    const declared = declaredModelDeps(project, report);
    expect(keys(declared)).toEqual(['a.base', 'a.old']);
    const diff = diffDeps(declared, lintDeps(project, report).inferredModelDeps);
    expect(keys(diff.missing)).toEqual([]);
    expect(keys(diff.extra)).toEqual(['a.old']);
  });

  it('analyzes each incremental section with ${this} as the model itself', () => {
    const model = modelFromText(
      'a.events',
      [
        '-- materialized: incremental',
        '-- unique_key: id',
        '-- @base',
        'SELECT * FROM a.base',
        '-- @incremental',
        'SELECT * FROM a.base WHERE id > (SELECT MAX(id) FROM ${this})',
      ].join('\n'),
    );
    expect(keys(lintDeps(projectOf([base, model]), model).inferredModelDeps)).toEqual(['a.base']);
  });
});

describe('qualifyModelSql', () => {
  it('qualifies a reference with exactly one candidate', () => {
    const users = makeModel('app.users');
    const report = makeModel('app.report', {}, 'SELECT id FROM users');
    const { result, sql } = qualifyModelSql(projectOf([users, report]), report);
    expect(result).toEqual({ changed: true, unqualified: [], ambiguous: [], unknown: [] });
    expect(refs(sql ?? '')).toEqual(['app.users']);
  });

  it('finds nothing left to do in its own output', () => {
    const users = makeModel('app.users');
    const report = makeModel(
      'app.report',
      {},
      "SELECT u.id, now() - interval '1 day' AS cutoff FROM users u WHERE u.id::text <> ''",
    );
    const first = qualifyModelSql(projectOf([users, report]), report);
    expect(first.result.changed).toBe(true);

    const rewritten = { ...report, bodySql: first.sql ?? '' };
    expect(refs(rewritten.bodySql)).toEqual(['app.users']);
    expect(qualifyModelSql(projectOf([users, rewritten]), rewritten)).toEqual({
      result: { changed: false, unqualified: [], ambiguous: [], unknown: [] },
    });
  });

  it('leaves the caller model untouched', () => {
    const users = makeModel('app.users');
    const report = makeModel('app.report', {}, 'SELECT id FROM users');
    qualifyModelSql(projectOf([users, report]), report);
    expect(report.bodySql).toBe('SELECT id FROM users');
  });

  it('lists every candidate when ambiguous', () => {
    const report = makeModel('x.report', {}, 'SELECT id FROM users');
    const project = projectOf([makeModel('app.users'), makeModel('staging.users'), report]);
    const { result, sql } = qualifyModelSql(project, report);
    expect(result.ambiguous).toEqual(['users (candidates: app.users, staging.users)']);
    expect(result.changed).toBe(false);
    expect(sql).toBeUndefined();
  });

  it('reports a self-only candidate as unqualified', () => {
    const users = makeModel('app.users', {}, 'SELECT id FROM users');
    expect(qualifyModelSql(projectOf([users]), users).result).toEqual({
      changed: false,
      unqualified: ['users'],
      ambiguous: [],
      unknown: [],
    });
  });

  it('reports names nothing defines', () => {
    const model = makeModel('app.report', {}, 'SELECT id FROM nowhere');
    expect(qualifyModelSql(projectOf([model]), model).result.unknown).toEqual(['nowhere']);
  });

  it('leaves CTE references alone', () => {
    const users = makeModel('app.users');
    const report = makeModel('app.report', {}, 'WITH users AS (SELECT 1 AS id) SELECT id FROM users');
    expect(qualifyModelSql(projectOf([users, report]), report)).toEqual({
      result: { changed: false, unqualified: [], ambiguous: [], unknown: [] },
    });
  });

  it('counts a source once when a model has the same id', () => {
    const project = projectOf([makeModel('app.users')], ['app.users']);
    expect(keys(candidatesByName(project, 'users'))).toEqual(['app.users']);
  });

  it('qualifies sections separately and keeps ${this}', () => {
    const model = modelFromText(
      'analytics.events',
      [
        '-- materialized: incremental',
        '-- unique_key: id',
        '-- @base',
        'SELECT * FROM events_raw',
        '-- @incremental',
        'SELECT * FROM events_raw WHERE id > (SELECT MAX(id) FROM ${this})',
      ].join('\n'),
    );
    const project = projectOf([model], ['raw.events_raw']);
    const { result, sql } = qualifyModelSql(project, model);
    expect(result.changed).toBe(true);

    const text = sql ?? '';
    expect(text.startsWith('-- @base\n')).toBe(true);
    const sections = splitSections(text);
    expect(refs(sections.baseSql ?? '')).toEqual(['raw.events_raw']);
    const incremental = sections.incrementalSql ?? '';
    expect(incremental).toContain('${this}');
    expect(refs(incremental.split('${this}').join('analytics.events'))).toEqual([
      'analytics.events',
      'raw.events_raw',
    ]);
  });
});
