// packages/graph/src/index.ts
export { WrappedValue } from './wrapped-value';
export { NodeView, rawValue } from './node-view';
export type { WidgetRead, LinkRef } from './node-view';
export { NodeGroup } from './node-group';
export type { Transform } from './node-group';
export { GraphDag } from './dag';
export type { Edge } from './dag';
export { TableGraphModel, LiveGraphModel, parseApiGraph } from './graph-model';
export type { GraphModel } from './graph-model';
export { createGraphModel, resolveModelLayer } from './layer';
export type { GraphModelOptions } from './layer';
