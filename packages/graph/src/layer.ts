// packages/graph/src/layer.ts
// Picks one GraphModel implementation from explicit configuration.
import type { ApiGraph, ModelLayer, SchemaLookup } from '@graphflow/core';
import { childLogger, loadConfig } from '@graphflow/core';
import { LiveGraphModel, TableGraphModel } from './graph-model';
import type { GraphModel } from './graph-model';

const log = childLogger('graph');

export interface GraphModelOptions {
  registry?: SchemaLookup;
  layer?: ModelLayer;   // falls back to GRAPHFLOW_MODEL_LAYER, then 'table'
}

export function resolveModelLayer(layer?: ModelLayer): ModelLayer {
  return layer ?? loadConfig().modelLayer;
}

export function createGraphModel(graph: ApiGraph, opts: GraphModelOptions = {}): GraphModel {
  const layer = resolveModelLayer(opts.layer);
  log.debug({ layer, nodes: Object.keys(graph).length, schema: opts.registry ? 'yes' : 'no' }, 'graph-model');
  switch (layer) {
    case 'table': return new TableGraphModel(graph, opts.registry);
    case 'live': return new LiveGraphModel(graph, opts.registry);
    default: {
      const never: never = layer;
      throw new Error(`Unknown model layer: ${String(never)}`);
    }
  }
}
