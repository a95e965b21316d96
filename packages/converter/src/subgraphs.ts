// packages/converter/src/subgraphs.ts
// Inline subgraph instances before conversion. A subgraph definition lives in
// `definitions.subgraphs`; inside it, node -10 is the instance's input
// boundary and node -20 its output boundary.
import { z } from 'zod';
import type { UiLink } from '@graphflow/core';
import { NodeIdSchema, UiLinkSchema, childLogger, isRecord } from '@graphflow/core';

const log = childLogger('subgraphs');

export const SUBGRAPH_INPUT_NODE = -10;
export const SUBGRAPH_OUTPUT_NODE = -20;
export const SUBGRAPH_MAX_DEPTH = 8;

const SubgraphDefSchema = z.object({
  id: z.string().min(1),
  nodes: z.array(z.unknown()),
  links: z.array(z.unknown()),
  inputs: z.array(z.object({ name: z.string() }).passthrough())
});
type SubgraphDef = z.infer<typeof SubgraphDefSchema>;

const DefinitionsSchema = z.object({ subgraphs: z.array(z.unknown()) });

export interface FlatWorkflow {
  nodes: unknown[];
  links: unknown[];
  expanded: number;   // instances inlined across all passes
}

interface RawWorkflow {
  nodes: unknown[];
  links: unknown[];
  definitions?: unknown;
  last_node_id?: unknown;
  last_link_id?: unknown;
}

function subgraphDefs(definitions: unknown): Map<string, SubgraphDef> {
  const out = new Map<string, SubgraphDef>();
  const defs = DefinitionsSchema.safeParse(definitions);
  if (!defs.success) return out;
  for (const raw of defs.data.subgraphs) {
    const def = SubgraphDefSchema.safeParse(raw);
    if (def.success && !out.has(def.data.id)) out.set(def.data.id, def.data);
  }
  return out;
}

function parseLink(raw: unknown): UiLink | undefined {
  const r = UiLinkSchema.safeParse(raw);
  return r.success ? r.data : undefined;
}

const asInt = (v: unknown): number | undefined => (typeof v === 'number' && Number.isInteger(v) ? v : undefined);
const sameId = (a: unknown, b: unknown) => (typeof a === 'number' || typeof a === 'string') && String(a) === String(b);

function maxIntId(values: Iterable<unknown>, floor: unknown): number {
  let max = asInt(floor) ?? 0;
  for (const v of values) {
    const n = asInt(v);
    if (n !== undefined && n > max) max = n;
  }
  return max;
}

function instanceId(node: unknown, defs: ReadonlyMap<string, SubgraphDef>): string | undefined {
  if (!isRecord(node) || typeof node.type !== 'string' || !defs.has(node.type)) return undefined;
  const id = NodeIdSchema.safeParse(node.id);
  return id.success ? String(id.data) : undefined;
}

// input name -> link id feeding it on the instance node
function instanceInputs(node: Record<string, unknown>): Map<string, number> {
  const out = new Map<string, number>();
  if (!Array.isArray(node.inputs)) return out;
  for (const inp of node.inputs) {
    if (!isRecord(inp) || typeof inp.name !== 'string') continue;
    const link = asInt(inp.link);
    if (link !== undefined) out.set(inp.name, link);
  }
  return out;
}

function remapInputs(node: Record<string, unknown>, mapLink: (id: number) => number | null): Record<string, unknown> {
  if (!Array.isArray(node.inputs)) return node;
  const inputs = node.inputs.map((inp: unknown) => {
    if (!isRecord(inp)) return inp;
    const link = asInt(inp.link);
    return link === undefined ? inp : { ...inp, link: mapLink(link) };
  });
  return { ...node, inputs };
}

function flattenOnce(wf: RawWorkflow, defs: ReadonlyMap<string, SubgraphDef>): { wf: RawWorkflow; expanded: number } {
  if (!wf.nodes.some(n => instanceId(n, defs) !== undefined)) return { wf, expanded: 0 };

  let nodes = [...wf.nodes];
  let links = [...wf.links];
  const original = new Map<number, UiLink>();
  for (const raw of wf.links) {
    const l = parseLink(raw);
    if (l && !original.has(l.id)) original.set(l.id, l);
  }

  let nextNodeId = maxIntId(nodes.map(n => (isRecord(n) ? n.id : undefined)), wf.last_node_id) + 1;
  let nextLinkId = maxIntId(original.keys(), wf.last_link_id) + 1;
  let expanded = 0;

  for (const inst of wf.nodes) {
    const instId = instanceId(inst, defs);
    if (instId === undefined || !isRecord(inst) || typeof inst.type !== 'string') continue;
    const def = defs.get(inst.type);
    if (!def) continue;
    expanded++;

    // boundary links of this instance leave the outer graph
    const outBySlot = new Map<number, UiLink[]>();
    const boundary = new Set<number>();
    for (const raw of links) {
      const l = parseLink(raw);
      if (!l) continue;
      if (sameId(l.targetId, instId)) boundary.add(l.id);
      if (sameId(l.originId, instId)) {
        boundary.add(l.id);
        outBySlot.set(l.originSlot, [...(outBySlot.get(l.originSlot) ?? []), l]);
      }
    }
    nodes = nodes.filter(n => n !== inst);
    links = links.filter(raw => {
      const l = parseLink(raw);
      return !l || !boundary.has(l.id);
    });

    // outer origin feeding each boundary input slot
    const feeds = instanceInputs(inst);
    const slotOrigin = def.inputs.map(input => {
      const linkId = feeds.get(input.name);
      return linkId === undefined ? undefined : original.get(linkId);
    });

    const nodeIds = new Map<string, number>();
    for (const n of def.nodes) {
      if (!isRecord(n)) continue;
      const id = asInt(n.id);
      if (id !== undefined && id >= 0) nodeIds.set(String(id), nextNodeId++);
    }

    const innerLinks = new Map<number, number | null>();
    const rewired = new Map<number, number>();
    for (const raw of def.links) {
      const l = parseLink(raw);
      if (!l) continue;
      if (sameId(l.originId, SUBGRAPH_INPUT_NODE)) {
        const ext = slotOrigin[l.originSlot];
        const target = nodeIds.get(String(l.targetId));
        if (!ext || target === undefined) { innerLinks.set(l.id, null); continue; }
        const id = nextLinkId++;
        innerLinks.set(l.id, id);
        links.push([id, ext.originId, ext.originSlot, target, l.targetSlot, l.type]);
        continue;
      }
      if (sameId(l.targetId, SUBGRAPH_OUTPUT_NODE)) {
        const origin = nodeIds.get(String(l.originId));
        if (origin === undefined) continue;
        for (const ext of outBySlot.get(l.targetSlot) ?? []) {
          const id = nextLinkId++;
          rewired.set(ext.id, id);
          links.push([id, origin, l.originSlot, ext.targetId, ext.targetSlot, ext.type]);
        }
        continue;
      }
      const origin = nodeIds.get(String(l.originId));
      const target = nodeIds.get(String(l.targetId));
      if (origin === undefined || target === undefined) { innerLinks.set(l.id, null); continue; }
      const id = nextLinkId++;
      innerLinks.set(l.id, id);
      links.push([id, origin, l.originSlot, target, l.targetSlot, l.type]);
    }

    for (const n of def.nodes) {
      if (!isRecord(n)) continue;
      const id = asInt(n.id);
      const newId = id === undefined ? undefined : nodeIds.get(String(id));
      if (newId === undefined) continue;
      nodes.push(remapInputs({ ...n, id: newId }, lid => innerLinks.get(lid) ?? null));
    }

    if (rewired.size) {
      nodes = nodes.map(n => (isRecord(n) ? remapInputs(n, lid => rewired.get(lid) ?? lid) : n));
    }
  }

  return { wf: { ...wf, nodes, links, last_node_id: nextNodeId - 1, last_link_id: nextLinkId - 1 }, expanded };
}

/** Inline subgraph instances, nested ones included, up to `maxDepth` passes. */
export function flattenSubgraphs(workflow: RawWorkflow, maxDepth = SUBGRAPH_MAX_DEPTH): FlatWorkflow {
  const defs = subgraphDefs(workflow.definitions);
  if (!defs.size) return { nodes: workflow.nodes, links: workflow.links, expanded: 0 };

  let wf = workflow;
  let expanded = 0;
  for (let depth = 0; depth < maxDepth; depth++) {
    const pass = flattenOnce(wf, defs);
    wf = pass.wf;
    expanded += pass.expanded;
    if (!pass.expanded) break;
  }
  if (expanded) log.debug({ expanded, nodes: wf.nodes.length }, 'subgraphs-flattened');
  return { nodes: wf.nodes, links: wf.links, expanded };
}
