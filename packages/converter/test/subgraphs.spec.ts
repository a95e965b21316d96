/* packages/converter/test/subgraphs.spec.ts */
import { describe, it, expect } from 'vitest';
import { flattenSubgraphs } from '../src';
import { uiLink, uiNode } from '../../../tests/helpers';

const loader = uiNode(1, 'CheckpointLoaderSimple', ['model-a.safetensors']);
const consumer = (link: number | null) => uiNode(3, 'LoraLoader', ['detail.safetensors', 1], [{ name: 'model', link, type: 'MODEL' }]);

const stack = {
  id: 'stack',
  inputs: [{ name: 'model_in' }],
  nodes: [uiNode(1, 'LoraLoader', ['style.safetensors', 0.5], [{ name: 'model', link: 1, type: 'MODEL' }])],
  links: [uiLink(1, -10, 0, 1, 0, 'MODEL'), uiLink(2, 1, 0, -20, 0, 'MODEL')]
};

const outer = {
  id: 'outer',
  inputs: [{ name: 'model_in' }],
  nodes: [uiNode(1, 'stack', [], [{ name: 'model_in', link: 1 }])],
  links: [uiLink(1, -10, 0, 1, 0, 'MODEL'), uiLink(2, 1, 0, -20, 0, 'MODEL')]
};

function workflow(instanceType: string, instanceLink: number | null) {
  return {
    nodes: [loader, uiNode(2, instanceType, [], [{ name: 'model_in', link: instanceLink }]), consumer(2)],
    links: [
      ...(instanceLink === null ? [] : [uiLink(1, 1, 0, 2, 0, 'MODEL')]),
      uiLink(2, 2, 0, 3, 0, 'MODEL')
    ],
    last_node_id: 3,
    last_link_id: 2,
    definitions: { subgraphs: [stack, outer] }
  };
}

describe('flattenSubgraphs', () => {
  it('returns the workflow untouched without definitions', () => {
    const nodes = [loader];
    const links: unknown[] = [];
    const flat = flattenSubgraphs({ nodes, links });
    expect(flat.nodes).toBe(nodes);
    expect(flat.links).toBe(links);
    expect(flat.expanded).toBe(0);
  });

  it('replaces an instance with its inner nodes and rewires the boundary', () => {
    const flat = flattenSubgraphs(workflow('stack', 1));
    expect(flat.expanded).toBe(1);
    expect(flat.links).toEqual([uiLink(3, 1, 0, 4, 0, 'MODEL'), uiLink(4, 4, 0, 3, 0, 'MODEL')]);
    expect(flat.nodes).toEqual([
      { ...loader, inputs: [] },
      consumer(4),
      uiNode(4, 'LoraLoader', ['style.safetensors', 0.5], [{ name: 'model', link: 3, type: 'MODEL' }])
    ]);
  });

  it('leaves an inner input unlinked when the instance input is not connected', () => {
    const flat = flattenSubgraphs(workflow('stack', null));
    expect(flat.links).toEqual([uiLink(3, 4, 0, 3, 0, 'MODEL')]);
    expect(flat.nodes).toContainEqual(
      uiNode(4, 'LoraLoader', ['style.safetensors', 0.5], [{ name: 'model', link: null, type: 'MODEL' }])
    );
  });

  it('expands nested instances over several passes', () => {
    const flat = flattenSubgraphs(workflow('outer', 1));
    expect(flat.expanded).toBe(2);
    expect(flat.links).toEqual([uiLink(5, 1, 0, 5, 0, 'MODEL'), uiLink(6, 5, 0, 3, 0, 'MODEL')]);
    expect(flat.nodes).toEqual([
      { ...loader, inputs: [] },
      consumer(6),
      uiNode(5, 'LoraLoader', ['style.safetensors', 0.5], [{ name: 'model', link: 5, type: 'MODEL' }])
    ]);
  });

  it('stops after the depth limit', () => {
    const flat = flattenSubgraphs(workflow('outer', 1), 1);
    expect(flat.expanded).toBe(1);
    expect(flat.nodes).toContainEqual(uiNode(4, 'stack', [], [{ name: 'model_in', link: 3 }]));
  });
});
