/* packages/converter/test/widget-align.spec.ts */
import { describe, it, expect } from 'vitest';
import type { ParamSpec } from '@graphflow/core';
import { SchemaRegistry, alignWidgets, reportableSurplus, widgetFit } from '../src';
import { objectInfo } from '../../../tests/helpers';

const registry = SchemaRegistry.fromSource(objectInfo());

function widgetSpecs(typeName: string): ParamSpec[] {
  return (registry.lookup(typeName)?.params ?? []).filter(p => p.kind === 'widget');
}

describe('widgetFit', () => {
  const [seed, , cfg, sampler] = widgetSpecs('KSampler');

  it('checks numbers against the declared type', () => {
    expect(widgetFit(3, seed)).toBe('fit');
    expect(widgetFit(3.5, seed)).toBe('mismatch');
    expect(widgetFit(3.5, cfg)).toBe('fit');
    expect(widgetFit('3', cfg)).toBe('mismatch');
  });

  it('treats an unknown string in a choice widget as a loose fit', () => {
    expect(widgetFit('euler', sampler)).toBe('fit');
    expect(widgetFit('heun', sampler)).toBe('loose');
    expect(widgetFit(1, sampler)).toBe('mismatch');
  });
});

describe('alignWidgets', () => {
  it('steps over the control value after a seed', () => {
    const { matched, skipped } = alignWidgets(widgetSpecs('KSampler'), [42, 'randomize', 25, 7.5, 'euler', 1]);
    expect(Object.fromEntries(matched)).toEqual({ seed: 42, steps: 25, cfg: 7.5, sampler_name: 'euler', denoise: 1 });
    expect(skipped).toEqual(['randomize']);
    expect(reportableSurplus(skipped)).toEqual([]);
  });

  it('keeps a stale choice rather than dropping it', () => {
    const { matched, skipped } = alignWidgets(widgetSpecs('CheckpointLoaderSimple'), ['model-z.safetensors']);
    expect(matched.get('ckpt_name')).toBe('model-z.safetensors');
    expect(skipped).toEqual([]);
  });

  it('leaves trailing specs unmatched when values run out', () => {
    const { matched, skipped } = alignWidgets(widgetSpecs('EmptyLatentImage'), [1024]);
    expect([...matched.keys()]).toEqual(['width']);
    expect(skipped).toEqual([]);
  });

  it('reports surplus values that are not control values', () => {
    const { skipped } = alignWidgets(widgetSpecs('EmptyLatentImage'), [640, 480, 4, 'extra', 7]);
    expect(skipped).toEqual(['extra', 7]);
    expect(reportableSurplus(['fixed', 'extra', 'decrement'])).toEqual(['extra']);
  });
});
