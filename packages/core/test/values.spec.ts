/* packages/core/test/values.spec.ts */
import { describe, it, expect } from 'vitest';
import { EmptyResultError, GraphModelError, NodeNotFoundError, classifyInput, compareJson, isSourceRef, jsonEquals } from '../src';

describe('value helpers', () => {
  it('recognises [node id, slot] refs only', () => {
    expect(isSourceRef(['4', 0])).toBe(true);
    expect(isSourceRef([4, 0])).toBe(false);
    expect(isSourceRef(['4', 0.5])).toBe(false);
    expect(isSourceRef(['4', 0, 1])).toBe(false);
  });

  it('classifies inputs', () => {
    expect(classifyInput(['4', 1])).toEqual({ kind: 'link', ref: ['4', 1] });
    expect(classifyInput('euler')).toEqual({ kind: 'widget', value: 'euler' });
  });

  it('compares JSON structurally', () => {
    expect(jsonEquals({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true);
    expect(jsonEquals({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(jsonEquals([1], { 0: 1 })).toBe(false);
  });

  it('orders like values and leaves mixed ones unordered', () => {
    expect(compareJson(1, 2)).toBe(-1);
    expect(compareJson('b', 'a')).toBe(1);
    expect(compareJson(true, false)).toBe(1);
    expect(compareJson([1], [1])).toBe(0);
    expect(compareJson(1, '1')).toBeNaN();
  });
});

describe('graph errors', () => {
  it('carry a code and the concrete class name', () => {
    const e = new NodeNotFoundError('9');
    expect(e).toBeInstanceOf(GraphModelError);
    expect(e.name).toBe('NodeNotFoundError');
    expect(e.code).toBe('GRAPH_NODE_NOT_FOUND');
    expect(e.message).toBe('Node not found: 9');
    expect(new EmptyResultError('x').code).toBe('GRAPH_EMPTY_RESULT');
  });
});
