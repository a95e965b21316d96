// packages/graph/src/node-group.ts
import type { JsonValue } from '@graphflow/core';
import { EmptyResultError } from '@graphflow/core';
import { NodeView, rawValue } from './node-view';
import { WrappedValue } from './wrapped-value';

export type Transform = (current: JsonValue, node: NodeView) => JsonValue | WrappedValue;

// ordered views sharing a type (or a query result); writes fan out to every member
export class NodeGroup implements Iterable<NodeView> {
  constructor(readonly label: string, private readonly members: readonly NodeView[]) {}

  get length(): number {
    return this.members.length;
  }

  [Symbol.iterator](): Iterator<NodeView> {
    return this.members[Symbol.iterator]();
  }

  at(index: number): NodeView | undefined {
    return this.members.at(index);
  }

  first(): NodeView {
    const n = this.members[0];
    if (!n) throw new EmptyResultError(`no nodes in ${this.label}`);
    return n;
  }

  ids(): string[] {
    return this.members.map(m => m.id);
  }

  toArray(): NodeView[] {
    return [...this.members];
  }

  /** Union of member widget names, first-seen order. */
  attrs(): string[] {
    const seen = new Set<string>();
    for (const m of this.members) for (const n of m.widgetNames()) seen.add(n);
    return [...seen];
  }

  values(name: string): JsonValue[] {
    return this.members.map(m => rawValue(m.get(name)));
  }

  /** Assign across all members; validated up front so a rejected name mutates nothing. */
  set(name: string, value: JsonValue | WrappedValue): this {
    for (const m of this.members) m.assertWidget(name, true);
    for (const m of this.members) m.set(name, value);
    return this;
  }

  apply(name: string, fn: Transform): this {
    const next = this.members.map(m => {
      const declared = m.assertWidget(name, true) !== undefined;
      const present = Object.prototype.hasOwnProperty.call(m.toJSON().inputs, name);
      return { m, declared, present };
    }).map(({ m, declared, present }) => fn(declared || present ? rawValue(m.get(name)) : null, m));
    this.members.forEach((m, i) => m.set(name, next[i]));
    return this;
  }
}
