import { describe, it, expect } from 'vitest';
import { GraphError } from '../../core/errors';
import { parseRelation, relationKey } from '../../core/relation';
import type { Relation } from '../../core/types';
import { getDownstreamOrder, getUpstreamOrder, modelDeps, topoSort, topoSortLayers } from '../../graph/dag';
import { makeModel, makeProject } from '../fixtures';

const keys = (rels: readonly Relation[]) => rels.map(relationKey);

const chain = makeProject([
  ['a.c', ['a.b']],
  ['a.b', ['a.a']],
  ['a.a', []],
]);

describe('topoSort', () => {
  it('orders dependencies first', () => {
    expect(keys(topoSort(chain))).toEqual(['a.a', 'a.b', 'a.c']);
  });

  it('sorts each layer', () => {
    const project = makeProject([
      ['marts.dashboard', ['marts.revenue']],
      ['marts.revenue', ['staging.users', 'staging.orders']],
      ['staging.users', []],
      ['staging.orders', ['public.raw_orders']],
    ]);
    expect(topoSortLayers(project).map(keys)).toEqual([
      ['staging.orders', 'staging.users'],
      ['marts.revenue'],
      ['marts.dashboard'],
    ]);
  });

  it('ignores deps that are not models', () => {
    const project = makeProject([['a.x', ['public.users']]], ['public.users']);
    expect(modelDeps(project, makeModel('a.x', { deps: [parseRelation('public.users')] }))).toEqual([]);
    expect(keys(topoSort(project))).toEqual(['a.x']);
  });

  it('names every model left in a cycle', () => {
    const project = makeProject([
      ['a.x', ['a.y']],
      ['a.y', ['a.x']],
      ['a.z', ['a.y']],
      ['a.root', []],
    ]);
    expect(() => topoSort(project)).toThrow(new GraphError('circular dependency: a.x, a.y, a.z'));
  });
});

describe('getUpstreamOrder', () => {
  it('returns the target last', () => {
    expect(keys(getUpstreamOrder(chain, parseRelation('a.c')))).toEqual(['a.a', 'a.b', 'a.c']);
  });

  it('visits shared deps once', () => {
    const project = makeProject([
      ['a.top', ['a.left', 'a.right']],
      ['a.left', ['a.base']],
      ['a.right', ['a.base']],
      ['a.base', []],
    ]);
    expect(keys(getUpstreamOrder(project, parseRelation('a.top')))).toEqual([
      'a.base',
      'a.left',
      'a.right',
      'a.top',
    ]);
  });

  it('detects cycles on the path', () => {
    const project = makeProject([
      ['a.x', ['a.y']],
      ['a.y', ['a.x']],
    ]);
    expect(() => getUpstreamOrder(project, parseRelation('a.x'))).toThrow('circular dependency involving: a.x');
  });

  it('rejects unknown targets', () => {
    expect(() => getUpstreamOrder(chain, parseRelation('a.nope'))).toThrow('unknown model: a.nope');
  });
});

describe('getDownstreamOrder', () => {
  it('returns the target first', () => {
    expect(keys(getDownstreamOrder(chain, parseRelation('a.a')))).toEqual(['a.a', 'a.b', 'a.c']);
  });

  it('leaves out unrelated models', () => {
    const project = makeProject([
      ['a.a', []],
      ['a.b', ['a.a']],
      ['a.other', []],
    ]);
    expect(keys(getDownstreamOrder(project, parseRelation('a.b')))).toEqual(['a.b']);
  });
});
