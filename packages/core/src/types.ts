// --------------------
// JSON values
// --------------------
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// --------------------
// Schema (per-type parameter declarations)
// --------------------
export type ParamKind = 'widget' | 'link';

export interface ParamSpec {
  readonly name: string;
  readonly kind: ParamKind;
  readonly valueType: string;     // e.g. 'INT', 'MODEL', 'COMBO'
  readonly required: boolean;
  readonly hasDefault: boolean;   // distinguishes `default: null` from no default
  readonly default?: JsonValue;
  readonly min?: number;
  readonly max?: number;
  readonly step?: number;
  readonly choices?: readonly JsonValue[];
  readonly tooltip?: string;
}

export interface ClassSchema {
  readonly typeName: string;
  readonly params: readonly ParamSpec[]; // required first, declaration order kept
  readonly displayName?: string;
  readonly category?: string;
  readonly outputs?: readonly string[];
}

export interface SchemaLookup {
  lookup(typeName: string): ClassSchema | undefined;
}

// --------------------
// UI-format workflow
// --------------------
export type NodeId = number | string;

export interface UiInput {
  name: string;
  link: number | null;  // null = literal placeholder
  type?: string;
}

export interface UiNode {
  id: NodeId;
  type: string;
  widgets: JsonValue[] | JsonObject;
  inputs: UiInput[];
  title?: string;
  mode?: number;
}

export interface UiLink {
  id: number;
  originId: NodeId;
  originSlot: number;
  targetId: NodeId;
  targetSlot: number;
  type: string;
}

export interface UiWorkflow {
  nodes: UiNode[];
  links: UiLink[];
}

// --------------------
// API-format graph
// --------------------
export type SourceRef = [string, number];   // [source node id, output slot]

export interface ApiNodeMeta {
  title?: string;
  [key: string]: JsonValue | undefined;
}

export interface ApiNode {
  class_type: string;
  inputs: Record<string, JsonValue>;
  _meta?: ApiNodeMeta;
}

export type ApiGraph = Record<string, ApiNode>;

export type InputValue =
  | { kind: 'link'; ref: SourceRef }
  | { kind: 'widget'; value: JsonValue };

// --------------------
// Diagnostics
// --------------------
export type IssueCategory = 'schema' | 'network' | 'validation' | 'internal';
export type IssueSeverity = 'warning' | 'critical';

export interface ConversionIssue {
  category: IssueCategory;
  severity: IssueSeverity;
  message: string;
  nodeId?: string;
  details?: Record<string, unknown>;
}

export interface ConversionContext {
  serverUrl?: string;   // recorded only; the core never dials out
  timeout: number;      // seconds, recorded only
  includeMeta: boolean;
  checkBounds: boolean;
}

export interface ConversionReport {
  success: boolean;
  errors: ConversionIssue[];
  warnings: ConversionIssue[];
  processedNodes: number;
  skippedNodes: number;
  totalNodes: number;
  apiData: ApiGraph;
  context: ConversionContext;
}
