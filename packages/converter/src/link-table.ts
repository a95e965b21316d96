// packages/converter/src/link-table.ts
import type { ConversionIssue, UiLink } from '@graphflow/core';
import { Issues, UiLinkSchema, issueDetails } from '@graphflow/core';

export interface LinkOrigin {
  nodeId: string;
  slot: number;
}

export class LinkTable {
  private constructor(
    private readonly byId: ReadonlyMap<number, UiLink>,
    private readonly danglingById: ReadonlyMap<number, readonly string[]>
  ) {}

  /**
   * Index raw link entries by id. Malformed, duplicate and dangling links are
   * dropped, one warning each; this never fails outright.
   */
  static build(links: readonly unknown[], nodeIds: ReadonlySet<string>): { table: LinkTable; issues: ConversionIssue[] } {
    const issues: ConversionIssue[] = [];
    const byId = new Map<number, UiLink>();
    const dangling = new Map<number, string[]>();

    links.forEach((raw, index) => {
      const parsed = UiLinkSchema.safeParse(raw);
      if (!parsed.success) {
        issues.push(Issues.MALFORMED_LINK(index, issueDetails(parsed.error)));
        return;
      }
      const link = parsed.data;
      if (byId.has(link.id)) {
        issues.push(Issues.DUPLICATE_LINK(link.id));
        return;
      }
      const missing = [String(link.originId), String(link.targetId)].filter(id => !nodeIds.has(id));
      if (missing.length) {
        const nodes = [...new Set(missing)];
        if (!dangling.has(link.id)) dangling.set(link.id, nodes);
        issues.push(Issues.DANGLING_LINK(link.id, nodes));
        return;
      }
      byId.set(link.id, link);
    });

    return { table: new LinkTable(byId, dangling), issues };
  }

  static empty(): LinkTable {
    return new LinkTable(new Map(), new Map());
  }

  resolve(linkId: number): LinkOrigin | undefined {
    const l = this.byId.get(linkId);
    return l ? { nodeId: String(l.originId), slot: l.originSlot } : undefined;
  }

  get(linkId: number): UiLink | undefined {
    return this.byId.get(linkId);
  }

  /** Missing endpoint ids of a link dropped as dangling. */
  missingNodes(linkId: number): readonly string[] | undefined {
    return this.danglingById.get(linkId);
  }

  get size(): number {
    return this.byId.size;
  }
}
