/* packages/graph/test/layer.spec.ts */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConfigError } from '@graphflow/core';
import { LiveGraphModel, TableGraphModel, createGraphModel, resolveModelLayer } from '../src';

const graph = { '1': { class_type: 'TestNode', inputs: { value: 1 } } };

describe('model layer selection', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('defaults to the table layer', () => {
    vi.stubEnv('GRAPHFLOW_MODEL_LAYER', '');
    expect(resolveModelLayer()).toBe('table');
    expect(createGraphModel(graph)).toBeInstanceOf(TableGraphModel);
  });

  it('reads the layer from the environment', () => {
    vi.stubEnv('GRAPHFLOW_MODEL_LAYER', 'live');
    expect(resolveModelLayer()).toBe('live');
    expect(createGraphModel(graph)).toBeInstanceOf(LiveGraphModel);
  });

  it('prefers an explicit layer over the environment', () => {
    vi.stubEnv('GRAPHFLOW_MODEL_LAYER', 'live');
    expect(createGraphModel(graph, { layer: 'table' }).layer).toBe('table');
  });

  it('rejects an unknown layer name', () => {
    vi.stubEnv('GRAPHFLOW_MODEL_LAYER', 'cached');
    expect(() => createGraphModel(graph)).toThrow(ConfigError);
  });
});
