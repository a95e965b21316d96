/* packages/converter/test/report.spec.ts */
import { describe, it, expect } from 'vitest';
import { Issues } from '@graphflow/core';
import { SchemaRegistry, convertWorkflow, serializeReport, toCheckRecord, toWireIssue } from '../src';
import { objectInfo, uiNode } from '../../../tests/helpers';

const registry = SchemaRegistry.fromSource(objectInfo());
const report = convertWorkflow(
  { nodes: [uiNode(1, 'TestNode', [42]), uiNode(2, 'InvalidNode')], links: [] },
  registry
);

describe('serializeReport', () => {
  it('emits the snake_case wire shape', () => {
    expect(serializeReport(report)).toEqual({
      success: false,
      errors: [{
        category: 'schema',
        severity: 'critical',
        message: 'No schema registered for node type: InvalidNode',
        node_id: '2',
        details: { class_type: 'InvalidNode' }
      }],
      warnings: [],
      api_data: { '1': { class_type: 'TestNode', inputs: { value: 42 } } },
      processed_nodes: 1,
      skipped_nodes: 1,
      total_nodes: 2
    });
  });

  it('omits absent node ids and details', () => {
    const w = toWireIssue(Issues.MALFORMED_SCHEMA_SOURCE());
    expect(Object.keys(w)).toEqual(['category', 'severity', 'message']);
  });

  it('survives a JSON round trip', () => {
    const wire = serializeReport(report);
    expect(JSON.parse(JSON.stringify(wire))).toEqual(wire);
  });
});

describe('toCheckRecord', () => {
  it('summarises counts and diagnostics', () => {
    expect(toCheckRecord('mixed', report)).toEqual({
      name: 'mixed',
      passed: false,
      summary: '1/2 nodes converted, 1 skipped; 1 error(s), 0 warning(s)'
    });
  });
});
