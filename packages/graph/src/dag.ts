// packages/graph/src/dag.ts
// Dependency view over an API graph. Only refs whose source id is a node of
// the graph become edges.
import { GraphCycleError } from '@graphflow/core';

export type Edge = [string, string]; // [src, dst]

export class GraphDag {
  private readonly order: Map<string, number>;

  constructor(readonly nodes: readonly string[], readonly edges: readonly Edge[]) {
    this.order = new Map(nodes.map((n, i) => [n, i]));
  }

  static fromSources(nodes: readonly string[], sourcesOf: (id: string) => readonly string[]): GraphDag {
    const known = new Set(nodes);
    const edges: Edge[] = [];
    const seen = new Set<string>();
    for (const dst of nodes) {
      for (const src of sourcesOf(dst)) {
        const key = `${src}->${dst}`;
        if (!known.has(src) || seen.has(key)) continue;
        seen.add(key);
        edges.push([src, dst]);
      }
    }
    return new GraphDag(nodes, edges);
  }

  private byOrder = (a: string, b: string) => (this.order.get(a) ?? 0) - (this.order.get(b) ?? 0);

  /** Immediate upstream nodes. */
  deps(id: string | number): string[] {
    const nid = String(id);
    return [...new Set(this.edges.filter(([, d]) => d === nid).map(([s]) => s))].sort(this.byOrder);
  }

  /** Immediate downstream nodes. */
  dependents(id: string | number): string[] {
    const nid = String(id);
    return [...new Set(this.edges.filter(([s]) => s === nid).map(([, d]) => d))].sort(this.byOrder);
  }

  /** Kahn's algorithm; ties broken by encounter order. */
  toposort(): string[] {
    const indegree = new Map<string, number>(this.nodes.map(n => [n, 0]));
    for (const [, d] of this.edges) indegree.set(d, (indegree.get(d) ?? 0) + 1);

    const ready = this.nodes.filter(n => indegree.get(n) === 0);
    const out: string[] = [];
    while (ready.length) {
      ready.sort(this.byOrder);
      const n = ready.shift();
      if (n === undefined) break;
      out.push(n);
      for (const d of this.dependents(n)) {
        const left = (indegree.get(d) ?? 0) - 1;
        indegree.set(d, left);
        if (left === 0) ready.push(d);
      }
    }

    if (out.length !== this.nodes.length) {
      const done = new Set(out);
      throw new GraphCycleError(this.nodes.filter(n => !done.has(n)));
    }
    return out;
  }
}
