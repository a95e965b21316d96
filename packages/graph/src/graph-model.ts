// packages/graph/src/graph-model.ts
// Navigation + mutation over an API graph. Views alias the wrapped mapping;
// writes go through NodeView/NodeGroup only.
import type { ApiGraph, ApiNode, ModelLayer, SchemaLookup } from '@graphflow/core';
import { ApiGraphSchema, NodeNotFoundError, isApiGraph } from '@graphflow/core';
import { GraphDag } from './dag';
import { NodeGroup } from './node-group';
import { NodeView } from './node-view';
import type { LinkRef } from './node-view';

export interface GraphModel extends Iterable<[string, ApiNode]> {
  readonly layer: ModelLayer;
  /** Type names present, encounter order (the lookup table's keys). */
  types(): string[];
  /** User-facing listing of available lookups. */
  attrs(): string[];
  ofType(typeName: string): NodeGroup;
  byId(id: string | number): NodeView;
  find(predicate: (node: NodeView) => boolean): NodeGroup;
  entries(): IterableIterator<[string, ApiNode]>;
  links(id: string | number): LinkRef[];
  dag(): GraphDag;
  toJSON(): ApiGraph;
  serialize(indent?: number): string;
}

/** Validate an externally supplied mapping; the caller's object is kept, not copied. */
export function parseApiGraph(value: unknown): ApiGraph {
  const r = ApiGraphSchema.safeParse(value);
  if (!r.success) throw r.error;
  return isApiGraph(value) ? value : r.data;
}

abstract class BaseGraphModel implements GraphModel {
  abstract readonly layer: ModelLayer;

  constructor(protected readonly graph: ApiGraph, protected readonly schemas?: SchemaLookup) {}

  protected abstract idsOfType(typeName: string): readonly string[];
  abstract types(): string[];

  protected view(id: string): NodeView {
    return new NodeView(this.graph, id, this.schemas);
  }

  attrs(): string[] {
    return this.types();
  }

  ofType(typeName: string): NodeGroup {
    return new NodeGroup(typeName, this.idsOfType(typeName).map(id => this.view(id)));
  }

  byId(id: string | number): NodeView {
    const key = String(id);
    if (!Object.prototype.hasOwnProperty.call(this.graph, key)) throw new NodeNotFoundError(key);
    return this.view(key);
  }

  find(predicate: (node: NodeView) => boolean): NodeGroup {
    const hits = Object.keys(this.graph).map(id => this.view(id)).filter(predicate);
    return new NodeGroup('query', hits);
  }

  *entries(): IterableIterator<[string, ApiNode]> {
    for (const id of Object.keys(this.graph)) yield [id, this.graph[id]];
  }

  [Symbol.iterator](): Iterator<[string, ApiNode]> {
    return this.entries();
  }

  links(id: string | number): LinkRef[] {
    return this.byId(id).links();
  }

  dag(): GraphDag {
    return GraphDag.fromSources(Object.keys(this.graph), id => this.links(id).map(l => l.source));
  }

  toJSON(): ApiGraph {
    return this.graph;
  }

  serialize(indent?: number): string {
    return JSON.stringify(this.graph, null, indent);
  }
}

/** Type table built once at construction. */
export class TableGraphModel extends BaseGraphModel {
  readonly layer = 'table' as const;
  private readonly table = new Map<string, string[]>();

  constructor(graph: ApiGraph, schemas?: SchemaLookup) {
    super(graph, schemas);
    for (const [id, node] of Object.entries(graph)) {
      const ids = this.table.get(node.class_type);
      if (ids) ids.push(id);
      else this.table.set(node.class_type, [id]);
    }
  }

  protected idsOfType(typeName: string): readonly string[] {
    return this.table.get(typeName) ?? [];
  }

  types(): string[] {
    return [...this.table.keys()];
  }
}

/** Groups recomputed from the mapping on every query. */
export class LiveGraphModel extends BaseGraphModel {
  readonly layer = 'live' as const;

  protected idsOfType(typeName: string): readonly string[] {
    return Object.keys(this.graph).filter(id => this.graph[id].class_type === typeName);
  }

  types(): string[] {
    return [...new Set(Object.values(this.graph).map(n => n.class_type))];
  }
}
