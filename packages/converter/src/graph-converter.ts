// packages/converter/src/graph-converter.ts
// UI workflow -> API graph + partial-success report. Synchronous, no I/O.
import type { z } from 'zod';
import type {
  ApiGraph, ConversionContext, ConversionIssue, ConversionReport, GraphflowConfig, UiNode
} from '@graphflow/core';
import {
  ConfigError, Issues, NodeIdSchema, UiNodeSchema, WorkflowShapeSchema, childLogger, issueDetails, isRecord, loadConfig
} from '@graphflow/core';
import { LinkResolver } from './link-resolver';
import { LinkTable } from './link-table';
import { convertNode } from './node-converter';
import type { SchemaRegistry } from './registry';
import { flattenSubgraphs } from './subgraphs';

const log = childLogger('converter');

export interface ConvertOptions {
  serverUrl?: string;     // recorded for observability only
  includeMeta?: boolean;
  timeout?: number;       // seconds, recorded only
  checkBounds?: boolean;
}

// env is read only for options the caller left unset; a bad env degrades to defaults
function envDefaults(opts: ConvertOptions, issues: ConversionIssue[]): GraphflowConfig | undefined {
  const complete =
    opts.serverUrl !== undefined && opts.timeout !== undefined &&
    opts.includeMeta !== undefined && opts.checkBounds !== undefined;
  if (complete) return undefined;
  try {
    return loadConfig();
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    log.warn({ issues: e.details.length }, 'config-ignored');
    issues.push(Issues.CONFIG_IGNORED(e.details));
    return loadConfig({});
  }
}

function resolveContext(opts: ConvertOptions): { context: ConversionContext; issues: ConversionIssue[] } {
  const issues: ConversionIssue[] = [];
  const cfg = envDefaults(opts, issues);
  const serverUrl = opts.serverUrl ?? cfg?.serverUrl;
  const context: ConversionContext = {
    ...(serverUrl !== undefined ? { serverUrl } : {}),
    timeout: opts.timeout ?? cfg?.timeout ?? 30,
    includeMeta: opts.includeMeta ?? cfg?.includeMeta ?? false,
    checkBounds: opts.checkBounds ?? cfg?.checkBounds ?? false
  };
  return { context, issues };
}

// best-effort id for diagnostics on entries that failed validation
function rawNodeId(raw: unknown): string | undefined {
  if (!isRecord(raw)) return undefined;
  const id = NodeIdSchema.safeParse(raw.id);
  return id.success ? String(id.data) : undefined;
}

function finish(
  issues: ConversionIssue[],
  apiData: ApiGraph,
  counts: { processed: number; skipped: number; total: number },
  context: ConversionContext
): ConversionReport {
  const errors = issues.filter(i => i.severity === 'critical');
  const warnings = issues.filter(i => i.severity !== 'critical');
  return {
    success: errors.length === 0,
    errors,
    warnings,
    processedNodes: counts.processed,
    skippedNodes: counts.skipped,
    totalNodes: counts.total,
    apiData,
    context
  };
}

export function convertWorkflow(workflow: unknown, registry: SchemaRegistry, opts: ConvertOptions = {}): ConversionReport {
  const { context, issues: configIssues } = resolveContext(opts);

  const shape = WorkflowShapeSchema.safeParse(workflow);
  if (!shape.success) {
    log.debug({ issues: shape.error.issues.length }, 'workflow-rejected');
    return finish(
      [...configIssues, Issues.MALFORMED_WORKFLOW(issueDetails(shape.error))],
      {}, { processed: 0, skipped: 0, total: 0 }, context
    );
  }

  const { nodes: rawNodes, links: rawLinks } = flattenSubgraphs(shape.data);
  const nodeIssues: ConversionIssue[] = [];

  // validate node entries up front so the link table knows every valid id
  type Entry =
    | { index: number; raw: unknown; node: UiNode }
    | { index: number; raw: unknown; node?: undefined; error: z.ZodError };
  const entries: Entry[] = rawNodes.map((raw, index): Entry => {
    const parsed = UiNodeSchema.safeParse(raw);
    return parsed.success ? { index, raw, node: parsed.data } : { index, raw, error: parsed.error };
  });

  // first entry wins a repeated id
  const nodeMap = new Map<string, UiNode>();
  for (const e of entries) {
    if (e.node && !nodeMap.has(String(e.node.id))) nodeMap.set(String(e.node.id), e.node);
  }

  const { table, issues: linkIssues } = LinkTable.build(rawLinks, new Set(nodeMap.keys()));
  const resolver = new LinkResolver(table, nodeMap);

  const apiData: ApiGraph = {};
  const claimed = new Set<number>();
  let processed = 0;
  let skipped = 0;

  for (const entry of entries) {
    if (!entry.node) {
      nodeIssues.push(Issues.MALFORMED_NODE(entry.index, issueDetails(entry.error), rawNodeId(entry.raw)));
      skipped++;
      continue;
    }

    const node = entry.node;
    const nodeId = String(node.id);
    if (nodeMap.get(nodeId) !== node) {
      nodeIssues.push(Issues.DUPLICATE_NODE(entry.index, nodeId));
      skipped++;
      continue;
    }
    try {
      const result = convertNode(node, registry.lookup(node.type), resolver, {
        includeMeta: context.includeMeta,
        checkBounds: context.checkBounds
      });
      nodeIssues.push(...result.issues);
      for (const id of result.claimedLinks) claimed.add(id);
      if (result.apiNode) {
        apiData[nodeId] = result.apiNode;
        processed++;
      } else {
        skipped++;
      }
    } catch (e) {
      nodeIssues.push(Issues.INTERNAL(e instanceof Error ? e.message : String(e), nodeId));
      skipped++;
    }
  }

  // a dangling link already reported against the input it feeds is not reported twice
  const unclaimed = linkIssues.filter(i => {
    const linkId = i.details?.link_id;
    return !(i.details?.missing_nodes !== undefined && typeof linkId === 'number' && claimed.has(linkId));
  });

  const issues = [...configIssues, ...unclaimed, ...nodeIssues];
  const total = rawNodes.length;
  const report = finish(issues, apiData, { processed, skipped, total }, context);
  log.debug(
    {
      processed, skipped, total,
      errors: report.errors.length, warnings: report.warnings.length,
      server_url: context.serverUrl ?? 'unset', timeout: context.timeout
    },
    'workflow-converted'
  );
  return report;
}
