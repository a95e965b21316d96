// packages/converter/src/index.ts
export { SchemaRegistry, VALUE_TAGS, classifyTag, parseParamEntry } from './registry';
export { LinkTable } from './link-table';
export type { LinkOrigin } from './link-table';
export { LinkResolver, NodeMode, REROUTE_TYPE, PRIMITIVE_TYPE, NOTE_TYPES } from './link-resolver';
export type { Resolution } from './link-resolver';
export { alignWidgets, widgetFit, reportableSurplus, CONTROL_VALUES, ALIGN_SIZE_GUARD } from './widget-align';
export type { Alignment } from './widget-align';
export { flattenSubgraphs, SUBGRAPH_INPUT_NODE, SUBGRAPH_OUTPUT_NODE, SUBGRAPH_MAX_DEPTH } from './subgraphs';
export type { FlatWorkflow } from './subgraphs';
export { convertNode, partitionSpecs } from './node-converter';
export type { NodeConversion, NodeConvertOptions } from './node-converter';
export { convertWorkflow } from './graph-converter';
export type { ConvertOptions } from './graph-converter';
export { serializeReport, toWireIssue, toCheckRecord } from './report';
export type { WireIssue, WireReport, CheckRecord } from './report';
