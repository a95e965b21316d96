// packages/converter/src/link-resolver.ts
// Follows a link to the node that actually produces its value, walking through
// editor-only pass-through nodes on the way.
import type { JsonValue, SourceRef, UiNode } from '@graphflow/core';
import type { LinkTable } from './link-table';

// LiteGraph node modes
export const NodeMode = { ALWAYS: 0, NEVER: 2, BYPASS: 4 } as const;

export const REROUTE_TYPE = 'Reroute';
export const PRIMITIVE_TYPE = 'PrimitiveNode';
export const NOTE_TYPES: ReadonlySet<string> = new Set(['Note', 'MarkdownNote']);

export type Resolution =
  | { kind: 'ref'; ref: SourceRef }
  | { kind: 'value'; value: JsonValue }   // inlined from a PrimitiveNode
  | { kind: 'unresolved'; reason: string; danglingLink?: number };

type Unresolved = Extract<Resolution, { kind: 'unresolved' }>;

interface Origin {
  nodeId: string;
  slot: number;
}

function unresolved(reason: string, danglingLink?: number): Unresolved {
  return danglingLink === undefined ? { kind: 'unresolved', reason } : { kind: 'unresolved', reason, danglingLink };
}

function firstWidgetValue(node: UiNode): JsonValue | undefined {
  if (Array.isArray(node.widgets)) return node.widgets[0];
  const keys = Object.keys(node.widgets);
  return keys.length ? node.widgets[keys[0]] : undefined;
}

export class LinkResolver {
  constructor(
    private readonly links: LinkTable,
    private readonly nodes: ReadonlyMap<string, UiNode> = new Map()
  ) {}

  /**
   * Resolve `linkId` as seen by an input of `inputType` (the link's own type
   * when omitted). Origins that are not known nodes resolve to a plain ref.
   */
  resolve(linkId: number, inputType?: string): Resolution {
    const seen = new Set<number>();
    let current = linkId;

    for (;;) {
      if (seen.has(current)) return unresolved(`cycle through link ${current}`);
      seen.add(current);

      const link = this.links.get(current);
      if (!link) return this.missing(current);

      const type = inputType ?? link.type;
      const passed = this.skipBypassed({ nodeId: String(link.originId), slot: link.originSlot }, type);
      if ('reason' in passed) return passed;

      const origin = this.nodes.get(passed.nodeId);
      if (!origin) return { kind: 'ref', ref: [passed.nodeId, passed.slot] };
      if (origin.mode === NodeMode.NEVER) return unresolved(`node ${passed.nodeId} is muted`);

      if (origin.type === REROUTE_TYPE) {
        const upstream = origin.inputs.find(i => i.link !== null);
        if (!upstream || upstream.link === null) return unresolved(`reroute ${passed.nodeId} has no input link`);
        current = upstream.link;
        continue;
      }
      if (origin.type === PRIMITIVE_TYPE) {
        const value = firstWidgetValue(origin);
        return value === undefined ? unresolved(`primitive ${passed.nodeId} has no value`) : { kind: 'value', value };
      }
      if (NOTE_TYPES.has(origin.type)) return unresolved(`node ${passed.nodeId} is a note`);

      return { kind: 'ref', ref: [passed.nodeId, passed.slot] };
    }
  }

  private missing(linkId: number): Unresolved {
    const nodes = this.links.missingNodes(linkId);
    return nodes
      ? unresolved(`link ${linkId} references missing node(s): ${nodes.join(', ')}`, linkId)
      : unresolved(`link ${linkId} not found`);
  }

  // a bypassed node forwards the first input of the same type
  private skipBypassed(start: Origin, type: string): Origin | Unresolved {
    let origin = start;
    const visited = new Set<string>();
    for (;;) {
      const node = this.nodes.get(origin.nodeId);
      if (!node || node.mode !== NodeMode.BYPASS) return origin;
      if (visited.has(origin.nodeId)) return unresolved(`bypass cycle at node ${origin.nodeId}`);
      visited.add(origin.nodeId);

      const through = node.inputs.find(i => i.link !== null && i.type === type);
      if (!through || through.link === null) return unresolved(`bypassed node ${origin.nodeId} has no ${type} input`);
      const link = this.links.get(through.link);
      if (!link) return this.missing(through.link);
      origin = { nodeId: String(link.originId), slot: link.originSlot };
    }
  }
}
