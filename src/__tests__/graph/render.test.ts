import { describe, it, expect } from 'vitest';
import { parseRelation } from '../../core/relation';
import { graphJson, mermaidLines, parseGraphFormat, renderGraph } from '../../graph/render';
import { makeProject } from '../fixtures';

const project = makeProject([
  ['a.a', []],
  ['a.b', ['a.a']],
  ['a.c', ['a.b']],
]);
const all = ['a.a', 'a.b', 'a.c'].map(parseRelation);

describe('parseGraphFormat', () => {
  it('accepts known formats only', () => {
    expect(parseGraphFormat('dot')).toBe('dot');
    expect(() => parseGraphFormat('svg')).toThrow('Unknown format: svg. Use: ascii, dot, json, mermaid');
  });
});

describe('renderGraph', () => {
  it('renders ascii layers', () => {
    expect(renderGraph(project, all, 'ascii')).toBe(
      ['Layer 0:', '  a.a', 'Layer 1:', '  a.b <- [a.a]', 'Layer 2:', '  a.c <- [a.b]'].join('\n'),
    );
  });

  it('renders dot edges', () => {
    expect(renderGraph(project, all, 'dot')).toBe(
      ['digraph models {', '    rankdir=LR;', '    "a.a" -> "a.b";', '    "a.b" -> "a.c";', '}'].join('\n'),
    );
  });

  it('renders mermaid with bare names', () => {
    expect(renderGraph(project, all, 'mermaid')).toBe('graph LR\n    a\n    a --> b\n    b --> c');
  });

  it('renders json', () => {
    expect(JSON.parse(renderGraph(project, all, 'json'))).toEqual({
      layers: [['a.a'], ['a.b'], ['a.c']],
      edges: [
        { from: 'a.a', to: 'a.b' },
        { from: 'a.b', to: 'a.c' },
      ],
    });
  });

  it('restricts layers to the selection', () => {
    const selection = ['a.b', 'a.c'].map(parseRelation);
    expect(graphJson(project, selection).layers).toEqual([['a.b'], ['a.c']]);
    expect(renderGraph(project, selection, 'ascii')).toBe('Layer 0:\n  a.b <- [a.a]\nLayer 1:\n  a.c <- [a.b]');
    expect(mermaidLines(project, selection)).toEqual(['    a --> b', '    b --> c']);
  });
});
