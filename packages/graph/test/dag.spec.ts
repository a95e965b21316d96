/* packages/graph/test/dag.spec.ts */
import { describe, it, expect } from 'vitest';
import { GraphCycleError } from '@graphflow/core';
import { GraphDag } from '../src';

describe('GraphDag', () => {
  it('keeps only known, distinct sources as edges', () => {
    const sources: Record<string, string[]> = { a: [], b: ['a', 'a', 'ghost'], c: ['b', 'a'] };
    const dag = GraphDag.fromSources(['a', 'b', 'c'], id => sources[id] ?? []);
    expect(dag.edges).toEqual([['a', 'b'], ['b', 'c'], ['a', 'c']]);
    expect(dag.deps('c')).toEqual(['a', 'b']);
    expect(dag.dependents('a')).toEqual(['b', 'c']);
    expect(dag.deps('a')).toEqual([]);
  });

  it('sorts topologically with ties in encounter order', () => {
    const dag = new GraphDag(['x', 'y', 'z', 'w'], [['z', 'x'], ['w', 'y']]);
    expect(dag.toposort()).toEqual(['z', 'x', 'w', 'y']);
  });

  it('names the nodes caught in a cycle', () => {
    const dag = new GraphDag(['a', 'b', 'c'], [['a', 'b'], ['b', 'a'], ['c', 'a']]);
    let caught: unknown;
    try {
      dag.toposort();
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(GraphCycleError);
    if (caught instanceof GraphCycleError) {
      expect(caught.remaining).toEqual(['a', 'b']);
      expect(caught.message).toBe('Cycle detected among nodes: a, b');
    }
  });
});
