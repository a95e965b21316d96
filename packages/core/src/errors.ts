// packages/core/src/errors.ts
import type { ConversionIssue, JsonValue } from './types';

// Issue factories (one place for messages + details)
export const Issues = {
  MALFORMED_WORKFLOW: (details: Array<{ path: string; msg: string }>): ConversionIssue => ({
    category: 'validation', severity: 'critical',
    message: 'Workflow must be an object with "nodes" and "links" arrays',
    details: { issues: details }
  }),
  MALFORMED_NODE: (index: number, details: Array<{ path: string; msg: string }>, nodeId?: string): ConversionIssue => ({
    category: 'validation', severity: 'critical',
    message: `Malformed node entry at index ${index}`,
    ...(nodeId !== undefined ? { nodeId } : {}),
    details: { index, issues: details }
  }),
  MALFORMED_LINK: (index: number, details: Array<{ path: string; msg: string }>): ConversionIssue => ({
    category: 'validation', severity: 'warning',
    message: `Malformed link entry at index ${index} dropped`,
    details: { index, issues: details }
  }),
  DUPLICATE_LINK: (linkId: number): ConversionIssue => ({
    category: 'validation', severity: 'warning',
    message: `Duplicate link id ${linkId} dropped`,
    details: { link_id: linkId }
  }),
  DANGLING_LINK: (linkId: number, missing: string[]): ConversionIssue => ({
    category: 'validation', severity: 'warning',
    message: `Link ${linkId} references missing node(s): ${missing.join(', ')}`,
    details: { link_id: linkId, missing_nodes: missing }
  }),
  UNKNOWN_TYPE: (nodeId: string, typeName: string): ConversionIssue => ({
    category: 'schema', severity: 'critical',
    message: `No schema registered for node type: ${typeName}`,
    nodeId,
    details: { class_type: typeName }
  }),
  MALFORMED_SCHEMA_ENTRY: (typeName: string, param: string, reason: string): ConversionIssue => ({
    category: 'schema', severity: 'warning',
    message: `Ignoring malformed schema entry ${typeName}.${param}: ${reason}`,
    details: { class_type: typeName, param }
  }),
  MALFORMED_SCHEMA_SOURCE: (): ConversionIssue => ({
    category: 'schema', severity: 'warning',
    message: 'Schema source must be an object keyed by type name; registry is empty'
  }),
  MALFORMED_SCHEMA_TYPE: (typeName: string): ConversionIssue => ({
    category: 'schema', severity: 'warning',
    message: `Ignoring malformed schema for type: ${typeName}`,
    details: { class_type: typeName }
  }),
  SURPLUS_WIDGETS: (nodeId: string, expected: number, received: number, dropped: JsonValue[]): ConversionIssue => ({
    category: 'validation', severity: 'warning',
    message: `Dropped ${dropped.length} surplus widget value(s): expected ${expected}, received ${received}`,
    nodeId,
    details: { expected, received, dropped }
  }),
  MISSING_WIDGET: (nodeId: string, param: string): ConversionIssue => ({
    category: 'validation', severity: 'critical',
    message: `Missing value for required widget: ${param}`,
    nodeId,
    details: { param }
  }),
  MISSING_LINK: (nodeId: string, param: string): ConversionIssue => ({
    category: 'validation', severity: 'critical',
    message: `Missing link for required input: ${param}`,
    nodeId,
    details: { param }
  }),
  UNRESOLVED_LINK: (nodeId: string, param: string, linkId: number, reason: string): ConversionIssue => ({
    category: 'validation', severity: 'critical',
    message: `Unresolved link ${linkId} for required input: ${param} (${reason})`,
    nodeId,
    details: { param, link_id: linkId, reason }
  }),
  UNRESOLVED_WIDGET_LINK: (nodeId: string, param: string, linkId: number, reason: string): ConversionIssue => ({
    category: 'validation', severity: 'warning',
    message: `Unresolved link ${linkId} for widget input: ${param} (${reason}); widget value kept`,
    nodeId,
    details: { param, link_id: linkId, reason }
  }),
  UNDECLARED_INPUT: (nodeId: string, param: string, typeName: string): ConversionIssue => ({
    category: 'validation', severity: 'warning',
    message: `Linked input "${param}" is not declared by ${typeName}; ignored`,
    nodeId,
    details: { param, class_type: typeName }
  }),
  INACTIVE_NODE: (nodeId: string, mode: number): ConversionIssue => ({
    category: 'validation', severity: 'warning',
    message: `Node ${nodeId} is ${mode === 4 ? 'bypassed' : 'muted'}; omitted`,
    nodeId,
    details: { mode }
  }),
  DUPLICATE_NODE: (index: number, nodeId: string): ConversionIssue => ({
    category: 'validation', severity: 'critical',
    message: `Duplicate node id ${nodeId} at index ${index} skipped`,
    nodeId,
    details: { index }
  }),
  CONFIG_IGNORED: (details: Array<{ path: string; msg: string }>): ConversionIssue => ({
    category: 'validation', severity: 'warning',
    message: 'Ignoring invalid graphflow configuration; using defaults',
    details: { issues: details }
  }),
  OUT_OF_BOUNDS: (nodeId: string, param: string, value: number, min?: number, max?: number): ConversionIssue => ({
    category: 'validation', severity: 'warning',
    message: `Value ${value} for ${param} is outside [${min ?? '-inf'}, ${max ?? 'inf'}]`,
    nodeId,
    details: { param, value, ...(min !== undefined ? { min } : {}), ...(max !== undefined ? { max } : {}) }
  }),
  NOT_A_CHOICE: (nodeId: string, param: string, value: JsonValue): ConversionIssue => ({
    category: 'validation', severity: 'warning',
    message: `Value for ${param} is not one of its choices`,
    nodeId,
    details: { param, value }
  }),
  INTERNAL: (message: string, nodeId?: string): ConversionIssue => ({
    category: 'internal', severity: 'critical',
    message: `Internal error: ${message}`,
    ...(nodeId !== undefined ? { nodeId } : {})
  })
} as const;

// ---- graph-model errors (caller programming errors, thrown) ----
export type GraphErrorCode =
  | 'GRAPH_NODE_NOT_FOUND'
  | 'GRAPH_EMPTY_RESULT'
  | 'GRAPH_PARAM_KIND'
  | 'GRAPH_CYCLE';

export class GraphModelError extends Error {
  constructor(readonly code: GraphErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NodeNotFoundError extends GraphModelError {
  constructor(readonly nodeId: string) {
    super('GRAPH_NODE_NOT_FOUND', `Node not found: ${nodeId}`);
  }
}

export class EmptyResultError extends GraphModelError {
  constructor(what: string) {
    super('GRAPH_EMPTY_RESULT', `Empty result: ${what}`);
  }
}

export class ParamKindError extends GraphModelError {
  constructor(readonly param: string, message: string) {
    super('GRAPH_PARAM_KIND', message);
  }
}

export class GraphCycleError extends GraphModelError {
  constructor(readonly remaining: string[]) {
    super('GRAPH_CYCLE', `Cycle detected among nodes: ${remaining.join(', ')}`);
  }
}

export class ConfigError extends Error {
  readonly code = 'CONFIG_INVALID';
  constructor(message: string, readonly details: Array<{ path: string; msg: string }> = []) {
    super(message);
    this.name = 'ConfigError';
  }
}
