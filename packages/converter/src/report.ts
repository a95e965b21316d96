// packages/converter/src/report.ts
// Wire shape shared with transports and test harnesses.
import type { ApiGraph, ConversionIssue, ConversionReport, IssueCategory, IssueSeverity } from '@graphflow/core';

export interface WireIssue {
  category: IssueCategory;
  severity: IssueSeverity;
  message: string;
  node_id?: string;
  details?: Record<string, unknown>;
}

export interface WireReport {
  success: boolean;
  errors: WireIssue[];
  warnings: WireIssue[];
  api_data: ApiGraph;
  processed_nodes: number;
  skipped_nodes: number;
  total_nodes: number;
}

export function toWireIssue(i: ConversionIssue): WireIssue {
  return {
    category: i.category,
    severity: i.severity,
    message: i.message,
    ...(i.nodeId !== undefined ? { node_id: i.nodeId } : {}),
    ...(i.details !== undefined ? { details: i.details } : {})
  };
}

export function serializeReport(r: ConversionReport): WireReport {
  return {
    success: r.success,
    errors: r.errors.map(toWireIssue),
    warnings: r.warnings.map(toWireIssue),
    api_data: r.apiData,
    processed_nodes: r.processedNodes,
    skipped_nodes: r.skippedNodes,
    total_nodes: r.totalNodes
  };
}

// pass/fail record consumed by external test runners
export interface CheckRecord {
  name: string;
  passed: boolean;
  summary: string;
}

export function toCheckRecord(name: string, r: ConversionReport): CheckRecord {
  const counts = `${r.processedNodes}/${r.totalNodes} nodes converted, ${r.skippedNodes} skipped`;
  const diag = `${r.errors.length} error(s), ${r.warnings.length} warning(s)`;
  return { name, passed: r.success, summary: `${counts}; ${diag}` };
}
