import { describe, it, expect, afterEach } from 'vitest';
import { readdir, readFile } from 'node:fs/promises';
import { DependencyError } from '../../core/errors';
import { parseRelation } from '../../core/relation';
import { formatDepsLine, replaceBody, replaceDepsLine, rewriteDepsLine, rewriteModelBody } from '../../lint/rewrite';
import { tempProject } from '../fixtures';
import type { TempProject } from '../fixtures';

const MODEL = '-- materialized: view\n-- deps: a.old\n-- tags: x\n\nSELECT *\nFROM a.new;\n';

describe('formatDepsLine', () => {
  it('sorts deps', () => {
    expect(formatDepsLine([parseRelation('b.x'), parseRelation('a.y')])).toBe('-- deps: a.y, b.x');
  });

  it('keeps the key when empty', () => {
    expect(formatDepsLine([])).toBe('-- deps:');
  });
});

describe('replaceDepsLine', () => {
  it('replaces only the deps line', () => {
    expect(replaceDepsLine(MODEL, [parseRelation('a.new')])).toBe(
      '-- materialized: view\n-- deps: a.new\n-- tags: x\n\nSELECT *\nFROM a.new;\n',
    );
  });

  it('requires an existing deps line', () => {
    expect(() => replaceDepsLine('-- materialized: view\nSELECT 1', [])).toThrow(DependencyError);
  });
});

describe('replaceBody', () => {
  it('keeps the header and terminates the body', () => {
    expect(replaceBody(MODEL, 'SELECT * FROM "a"."new"')).toBe(
      '-- materialized: view\n-- deps: a.old\n-- tags: x\n\nSELECT * FROM "a"."new";\n',
    );
  });
});

describe('file rewrites', () => {
  let project: TempProject | undefined;

  afterEach(async () => {
    await project?.cleanup();
    project = undefined;
  });

  it('rewrites the deps line in place and leaves no temp file', async () => {
    project = await tempProject({ 'models/a/report.sql': MODEL });
    const path = project.path('models/a/report.sql');

    await rewriteDepsLine(path, [parseRelation('a.new')]);

    expect(await readFile(path, 'utf8')).toBe('-- materialized: view\n-- deps: a.new\n-- tags: x\n\nSELECT *\nFROM a.new;\n');
    expect(await readdir(project.path('models/a'))).toEqual(['report.sql']);
  });

  it('rewrites the body', async () => {
    project = await tempProject({ 'models/a/report.sql': MODEL });
    const path = project.path('models/a/report.sql');

    await rewriteModelBody(path, 'SELECT 2');

    expect(await readFile(path, 'utf8')).toBe('-- materialized: view\n-- deps: a.old\n-- tags: x\n\nSELECT 2;\n');
  });

  it('names the file when a rewrite fails', async () => {
    project = await tempProject({ 'models/a/report.sql': '-- materialized: view\nSELECT 1\n' });
    const path = project.path('models/a/report.sql');
    await expect(rewriteDepsLine(path, [])).rejects.toThrow(
      `rewrite deps: ${path}: missing required '-- deps:' line in header`,
    );
  });
});
