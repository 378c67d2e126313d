import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'node:path';
import { GraphError, ModelError } from '../../core/errors';
import { loadProject, modelIdFromPath } from '../../graph/project';
import { tempProject } from '../fixtures';
import type { TempProject } from '../fixtures';

const VIEW = '-- materialized: view\n-- deps:\n\nSELECT 1\n';

describe('modelIdFromPath', () => {
  it('takes the schema from the directory', () => {
    expect(modelIdFromPath('/p/models', join('/p/models', 'analytics', 'user_stats.sql'))).toEqual({
      schema: 'analytics',
      name: 'user_stats',
    });
  });

  it('requires exactly one directory level', () => {
    expect(() => modelIdFromPath('/p/models', join('/p/models', 'x.sql'))).toThrow(GraphError);
    expect(() => modelIdFromPath('/p/models', join('/p/models', 'a', 'b', 'x.sql'))).toThrow(
      'nested paths not supported',
    );
  });
});

describe('loadProject', () => {
  let project: TempProject | undefined;

  afterEach(async () => {
    await project?.cleanup();
    project = undefined;
  });

  it('loads models and sources', async () => {
    project = await tempProject({
      'models/staging/orders.sql': VIEW,
      'models/marts/revenue.sql': '-- materialized: table\n-- deps: staging.orders\n\nSELECT * FROM staging.orders\n',
      'models/marts/README.md': 'notes',
    });
    const loaded = await loadProject(project.root, { sources: ['public.users'] });

    expect([...loaded.models.keys()]).toEqual(['marts.revenue', 'staging.orders']);
    expect([...loaded.sources.keys()]).toEqual(['public.users']);
    const revenue = loaded.models.get('marts.revenue');
    expect(revenue?.path).toBe(project.path('models/marts/revenue.sql'));
    expect(revenue?.header.materialized).toBe('table');
    expect(revenue?.bodySql).toBe('SELECT * FROM staging.orders');
  });

  it('honours a custom models directory', async () => {
    project = await tempProject({ 'sql/app/users.sql': VIEW });
    const loaded = await loadProject(project.root, { modelsDir: 'sql' });
    expect([...loaded.models.keys()]).toEqual(['app.users']);
  });

  it('reports a missing models directory', async () => {
    project = await tempProject({});
    await expect(loadProject(project.root)).rejects.toThrow(
      `models directory not found: ${project.path('models')}`,
    );
  });

  it('rejects nested model files', async () => {
    project = await tempProject({ 'models/a/b/c.sql': VIEW });
    await expect(loadProject(project.root)).rejects.toBeInstanceOf(GraphError);
  });

  it('names the config when a source is malformed', async () => {
    project = await tempProject({ 'models/a/b.sql': VIEW });
    await expect(loadProject(project.root, { sources: ['users'] })).rejects.toThrow(
      "parse sources from config: invalid relation 'users'",
    );
    await expect(loadProject(project.root, { sources: ['users'] })).rejects.toBeInstanceOf(ModelError);
  });
});
