// packages/graph/src/node-view.ts
import type { ApiGraph, ApiNode, ClassSchema, JsonValue, ParamSpec, SchemaLookup } from '@graphflow/core';
import { NodeNotFoundError, ParamKindError, classifyInput, isSourceRef } from '@graphflow/core';
import { WrappedValue } from './wrapped-value';

export type WidgetRead =
  | { kind: 'wrapped'; value: WrappedValue }
  | { kind: 'raw'; value: JsonValue };

export function rawValue(r: WidgetRead): JsonValue {
  return r.kind === 'wrapped' ? r.value.value : r.value;
}

export interface LinkRef {
  input: string;
  source: string;   // upstream node id
  slot: number;
}

// ---------- single-node view ----------
export class NodeView {
  constructor(
    private readonly graph: ApiGraph,
    readonly id: string,
    private readonly schemas?: SchemaLookup
  ) {}

  private get node(): ApiNode {
    const n = Object.prototype.hasOwnProperty.call(this.graph, this.id) ? this.graph[this.id] : undefined;
    if (!n) throw new NodeNotFoundError(this.id);
    return n;
  }

  private get schema(): ClassSchema | undefined {
    return this.schemas?.lookup(this.node.class_type);
  }

  get classType(): string {
    return this.node.class_type;
  }

  get title(): string | undefined {
    return this.node._meta?.title;
  }

  /** Widget parameter names: schema-driven, else every input that is not a [id, slot] ref. */
  widgetNames(): string[] {
    const schema = this.schema;
    if (schema) return schema.params.filter(p => p.kind === 'widget').map(p => p.name);
    return Object.entries(this.node.inputs)
      .filter(([, v]) => classifyInput(v).kind === 'widget')
      .map(([k]) => k);
  }

  attrs(): string[] {
    return this.widgetNames();
  }

  /** Link inputs, for id-based traversal. */
  links(): LinkRef[] {
    const schema = this.schema;
    const linkNames = schema ? new Set(schema.params.filter(p => p.kind === 'link').map(p => p.name)) : undefined;
    const out: LinkRef[] = [];
    for (const [input, v] of Object.entries(this.node.inputs)) {
      if (linkNames && !linkNames.has(input)) continue;
      const c = classifyInput(v);
      if (c.kind === 'link') out.push({ input, source: c.ref[0], slot: c.ref[1] });
    }
    return out;
  }

  /** Throws ParamKindError unless `name` is a widget of this node. */
  assertWidget(name: string, forWrite = false): ParamSpec | undefined {
    const schema = this.schema;
    if (schema) {
      const spec = schema.params.find(p => p.name === name);
      if (!spec) throw new ParamKindError(name, `${schema.typeName} has no parameter "${name}"`);
      if (spec.kind === 'link') {
        throw new ParamKindError(name, `"${name}" is a link parameter of ${schema.typeName}; reach it through links()`);
      }
      return spec;
    }
    const inputs = this.node.inputs;
    const present = Object.prototype.hasOwnProperty.call(inputs, name);
    if (present && isSourceRef(inputs[name])) {
      throw new ParamKindError(name, `"${name}" holds a link on node ${this.id}; reach it through links()`);
    }
    if (!present && !forWrite) throw new ParamKindError(name, `Node ${this.id} has no widget "${name}"`);
    return undefined;
  }

  /**
   * Read a widget: wrapped with its ParamSpec when a schema is known, raw otherwise.
   * A declared widget missing from the node reads as its default (or null).
   */
  get(name: string): WidgetRead {
    const spec = this.assertWidget(name);
    const inputs = this.node.inputs;
    const present = Object.prototype.hasOwnProperty.call(inputs, name);
    if (spec) {
      const v = present ? inputs[name] : spec.hasDefault && spec.default !== undefined ? spec.default : null;
      return { kind: 'wrapped', value: new WrappedValue(v, spec) };
    }
    return { kind: 'raw', value: inputs[name] };
  }

  set(name: string, value: JsonValue | WrappedValue): this {
    this.assertWidget(name, true);
    this.node.inputs[name] = WrappedValue.unwrap(value);
    return this;
  }

  toJSON(): ApiNode {
    return this.node;
  }
}
