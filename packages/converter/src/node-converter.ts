// packages/converter/src/node-converter.ts
// One UI node -> one API node, guided by its class schema.
import type {
  ApiNode, ClassSchema, ConversionIssue, JsonObject, JsonValue, ParamSpec, UiInput, UiNode
} from '@graphflow/core';
import { Issues, jsonEquals } from '@graphflow/core';
import type { LinkResolver, Resolution } from './link-resolver';
import { NodeMode } from './link-resolver';
import { alignWidgets, reportableSurplus } from './widget-align';

export interface NodeConvertOptions {
  includeMeta?: boolean;
  checkBounds?: boolean;
}

export interface NodeConversion {
  apiNode?: ApiNode;          // absent => node skipped
  issues: ConversionIssue[];
  claimedLinks: number[];     // dangling links already reported by one of `issues`
}

export function partitionSpecs(schema: ClassSchema): { widgets: ParamSpec[]; links: ParamSpec[] } {
  return {
    widgets: schema.params.filter(p => p.kind === 'widget'),
    links: schema.params.filter(p => p.kind === 'link')
  };
}

// ---------- widgets ----------
function fillMissing(nodeId: string, spec: ParamSpec, values: Map<string, JsonValue>, issues: ConversionIssue[]) {
  if (spec.hasDefault && spec.default !== undefined) values.set(spec.name, spec.default);
  else if (spec.required) issues.push(Issues.MISSING_WIDGET(nodeId, spec.name));
}

function consumePositional(nodeId: string, specs: ParamSpec[], widgets: JsonValue[], values: Map<string, JsonValue>, issues: ConversionIssue[]) {
  const { matched, skipped } = alignWidgets(specs, widgets);
  for (const spec of specs) {
    if (matched.has(spec.name)) values.set(spec.name, matched.get(spec.name) ?? null);
    else fillMissing(nodeId, spec, values, issues);
  }
  const dropped = reportableSurplus(skipped);
  if (dropped.length) {
    issues.push(Issues.SURPLUS_WIDGETS(nodeId, specs.length, widgets.length, dropped));
  }
}

function consumeNamed(nodeId: string, specs: ParamSpec[], widgets: JsonObject, values: Map<string, JsonValue>, issues: ConversionIssue[]) {
  for (const spec of specs) {
    if (Object.prototype.hasOwnProperty.call(widgets, spec.name)) values.set(spec.name, widgets[spec.name]);
    else fillMissing(nodeId, spec, values, issues);
  }
  const known = new Set(specs.map(s => s.name));
  const dropped = Object.keys(widgets).filter(k => !known.has(k)).map(k => widgets[k]);
  if (dropped.length) {
    issues.push(Issues.SURPLUS_WIDGETS(nodeId, specs.length, Object.keys(widgets).length, dropped));
  }
}

function checkBounds(nodeId: string, spec: ParamSpec, value: JsonValue, issues: ConversionIssue[]) {
  if (typeof value === 'number' && ((spec.min !== undefined && value < spec.min) || (spec.max !== undefined && value > spec.max))) {
    issues.push(Issues.OUT_OF_BOUNDS(nodeId, spec.name, value, spec.min, spec.max));
  }
  if (spec.choices && !spec.choices.some(c => jsonEquals(c, value))) {
    issues.push(Issues.NOT_A_CHOICE(nodeId, spec.name, value));
  }
}

// ---------- links ----------
// first input per name; unnamed slots (reroutes) never match a parameter
function declaredInputs(inputs: UiInput[]): Map<string, UiInput> {
  const m = new Map<string, UiInput>();
  for (const i of inputs) if (i.name !== '' && !m.has(i.name)) m.set(i.name, i);
  return m;
}

function resolvedValue(r: Exclude<Resolution, { kind: 'unresolved' }>): JsonValue {
  return r.kind === 'ref' ? r.ref : r.value;
}

export function convertNode(
  node: UiNode,
  schema: ClassSchema | undefined,
  links: LinkResolver,
  opts: NodeConvertOptions = {}
): NodeConversion {
  const nodeId = String(node.id);
  if (!schema) return { issues: [Issues.UNKNOWN_TYPE(nodeId, node.type)], claimedLinks: [] };
  if (node.mode === NodeMode.NEVER || node.mode === NodeMode.BYPASS) {
    return { issues: [Issues.INACTIVE_NODE(nodeId, node.mode)], claimedLinks: [] };
  }

  const issues: ConversionIssue[] = [];
  const claimedLinks: number[] = [];
  const values = new Map<string, JsonValue>();
  const linkedWidgets = new Set<string>();
  const { widgets: widgetSpecs } = partitionSpecs(schema);

  if (Array.isArray(node.widgets)) consumePositional(nodeId, widgetSpecs, node.widgets, values, issues);
  else consumeNamed(nodeId, widgetSpecs, node.widgets, values, issues);

  const declared = declaredInputs(node.inputs);
  let linkFailure = false;
  for (const spec of schema.params) {
    const decl = declared.get(spec.name);
    const linkId = decl?.link ?? null;

    if (spec.kind === 'link' && linkId === null) {
      if (spec.required) {
        issues.push(Issues.MISSING_LINK(nodeId, spec.name));
        linkFailure = true;
      }
      continue;
    }
    if (linkId === null) continue;   // plain widget

    const r = links.resolve(linkId, decl?.type);
    if (r.kind !== 'unresolved') {
      values.set(spec.name, resolvedValue(r));
      if (spec.kind === 'widget') linkedWidgets.add(spec.name);
      continue;
    }
    // an optional link that cannot be followed is dropped silently
    if (spec.kind === 'link' && !spec.required) continue;

    if (spec.kind === 'link') {
      issues.push(Issues.UNRESOLVED_LINK(nodeId, spec.name, linkId, r.reason));
      linkFailure = true;
    } else {
      issues.push(Issues.UNRESOLVED_WIDGET_LINK(nodeId, spec.name, linkId, r.reason));
    }
    if (r.danglingLink !== undefined) claimedLinks.push(r.danglingLink);
  }

  const known = new Set(schema.params.map(s => s.name));
  for (const decl of declared.values()) {
    if (decl.link !== null && !known.has(decl.name)) {
      issues.push(Issues.UNDECLARED_INPUT(nodeId, decl.name, node.type));
    }
  }

  if (opts.checkBounds) {
    for (const spec of widgetSpecs) {
      const v = values.get(spec.name);
      if (v !== undefined && !linkedWidgets.has(spec.name)) checkBounds(nodeId, spec, v, issues);
    }
  }

  if (linkFailure) return { issues, claimedLinks };

  // inputs follow schema declaration order
  const inputs: Record<string, JsonValue> = {};
  for (const spec of schema.params) {
    const v = values.get(spec.name);
    if (v !== undefined) inputs[spec.name] = v;
  }

  const apiNode: ApiNode = { class_type: node.type, inputs };
  if (opts.includeMeta) apiNode._meta = { title: node.title ?? node.type };
  return { apiNode, issues, claimedLinks };
}
