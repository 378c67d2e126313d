import { describe, it, expect, afterEach, vi } from 'vitest';
import { readFile } from 'node:fs/promises';
import {
  EXIT_FATAL,
  EXIT_ISSUES,
  EXIT_OK,
  compileCommand,
  modelStatuses,
  runCommand,
  statusCommand,
  testCommand,
} from '../../commands';
import { dryRunSql } from '../../build/compiler';
import { FakeClient, captureConsole, makeModel, tempProject } from '../fixtures';
import type { TempProject } from '../fixtures';

const FILES = {
  'models/a/base.sql': '-- materialized: view\n-- deps:\n\nSELECT 1 AS id\n',
  'models/a/report.sql': '-- materialized: table\n-- deps: a.base\n-- tests: not_null(id), unique(id)\n\nSELECT * FROM a.base\n',
};

let project: TempProject | undefined;

afterEach(async () => {
  vi.restoreAllMocks();
  await project?.cleanup();
  project = undefined;
});

describe('compileCommand', () => {
  it('writes one file per model', async () => {
    const output = captureConsole();
    project = await tempProject(FILES);

    expect(await compileCommand({ root: project.root, select: ['a.report'] })).toBe(EXIT_OK);
    const path = project.path('target/compiled/a/report.sql');
    expect(output.out()).toEqual([`[model] Compiled a.report -> ${path}`]);
    expect(await readFile(path, 'utf8')).toBe('CREATE TABLE a.report AS\nSELECT * FROM a.base;\n');
  });
});

describe('runCommand', () => {
  it('runs the selection and leaves a passed client open', async () => {
    const output = captureConsole();
    project = await tempProject(FILES);
    const client = new FakeClient();

    expect(await runCommand({ root: project.root, client })).toBe(EXIT_OK);
    expect(output.out()).toEqual([
      '[model] Created schema a',
      '[model] Running a.base...',
      '[model] Done a.base (view)',
      '[model] Running a.report...',
      '[model] Done a.report (table)',
      '[model] Completed 2 model(s)',
    ]);
    expect(client.ended).toBe(false);
  });

  it('prints SQL on a dry run', async () => {
    const output = captureConsole();
    project = await tempProject(FILES);

    expect(await runCommand({ root: project.root, select: ['a.base'], dryRun: true })).toBe(EXIT_OK);
    expect(output.out()).toEqual(['[model] -- a.base', dryRunSql(makeModel('a.base', {}, 'SELECT 1 AS id'))]);
  });

  it('needs a connection', async () => {
    const output = captureConsole();
    project = await tempProject(FILES);

    expect(await runCommand({ root: project.root })).toBe(EXIT_FATAL);
    expect(output.err()).toEqual(['[model] no database connection\n  hint: set a database URL']);
  });

  it('prints the failing statement', async () => {
    const output = captureConsole();
    project = await tempProject(FILES);
    const client = new FakeClient().fail('CREATE TABLE a.report', 'relation "a.base" does not exist', {
      code: '42P01',
    });

    expect(await runCommand({ root: project.root, client })).toBe(EXIT_FATAL);
    const [message] = output.err();
    expect(message.split('\n').slice(0, 4)).toEqual([
      '[model] model a.report failed: relation "a.base" does not exist',
      `  file: ${project.path('models/a/report.sql')}`,
      '  sqlstate: 42P01',
      '  sql:',
    ]);
  });
});

describe('testCommand', () => {
  it('reports each test and fails on any failure', async () => {
    const output = captureConsole();
    project = await tempProject(FILES);
    const client = new FakeClient().on('IS NULL', [{ violations: '1' }]);

    expect(await testCommand({ root: project.root, client })).toBe(EXIT_ISSUES);
    expect(output.out()).toEqual([
      '[model] Testing a.report...',
      '  not_null(id)     FAIL',
      '  unique(id)     PASS',
      '[model] Results: 1 passed, 1 failed',
    ]);
  });

  it('needs no connection without tests', async () => {
    const output = captureConsole();
    project = await tempProject(FILES);

    expect(await testCommand({ root: project.root, select: ['a.base'] })).toBe(EXIT_OK);
    expect(output.out()).toEqual(['[model] No tests found']);
  });
});

describe('status', () => {
  const tableTypes = (types: Record<string, string>) =>
    new FakeClient()
      .on('SELECT table_type', (params) => {
        const type = types[String(params[1])];
        return type === undefined ? { rows: [], rowCount: 0 } : { rows: [{ table_type: type }], rowCount: 1 };
      })
      .on('COUNT(*)::bigint', [{ count: '4' }]);

  it('compares object types', async () => {
    const models = [makeModel('a.v'), makeModel('a.t', { materialized: 'table' }), makeModel('a.gone')];
    const statuses = await modelStatuses(tableTypes({ v: 'VIEW', t: 'VIEW' }), models);

    expect(statuses).toEqual([
      { relation: 'a.v', materialized: 'view', expectedType: 'VIEW', status: 'synced', actualType: 'VIEW', rowCount: 4 },
      {
        relation: 'a.t',
        materialized: 'table',
        expectedType: 'BASE TABLE',
        status: 'type_mismatch',
        actualType: 'VIEW',
        rowCount: 4,
      },
      { relation: 'a.gone', materialized: 'view', expectedType: 'VIEW', status: 'missing' },
    ]);
  });

  it('prints a table and exits 0 when everything is synced', async () => {
    const output = captureConsole();
    project = await tempProject(FILES);
    const client = tableTypes({ base: 'VIEW', report: 'BASE TABLE' });

    expect(await statusCommand({ root: project.root, client })).toBe(EXIT_OK);
    expect(output.out()).toEqual([
      '[model] Models (2 total):',
      `  a.base    ${'view'.padEnd(12)}  exists (4 rows)`,
      `  a.report  ${'table'.padEnd(12)}  exists (4 rows)`,
      '[model] Summary: 2 synced, 0 missing, 0 type mismatched',
    ]);
  });

  it('exits 1 when a model is missing', async () => {
    captureConsole();
    project = await tempProject(FILES);
    expect(await statusCommand({ root: project.root, client: tableTypes({ base: 'VIEW' }) })).toBe(EXIT_ISSUES);
  });
});
