/* tests/workflow.spec.ts */
import { describe, it, expect } from 'vitest';
import { SchemaRegistry, convertWorkflow, serializeReport } from '@graphflow/converter';
import { createGraphModel, parseApiGraph, rawValue } from '@graphflow/graph';
import { objectInfo, txt2imgWorkflow } from './helpers';

const registry = SchemaRegistry.fromSource(objectInfo());

describe('workflow -> api graph -> model', () => {
  it('edits a converted workflow and serialises the result', () => {
    const report = convertWorkflow(txt2imgWorkflow(), registry);
    expect(report.success).toBe(true);

    const model = createGraphModel(report.apiData, { registry, layer: 'table' });
    model.ofType('KSampler').set('seed', 7).set('sampler_name', 'dpmpp_2m');
    model.ofType('EmptyLatentImage').apply('width', v => (typeof v === 'number' ? v / 2 : v));

    const out = JSON.parse(model.serialize());
    expect(out['3'].inputs).toMatchObject({ seed: 7, sampler_name: 'dpmpp_2m', model: ['4', 0] });
    expect(out['5'].inputs.width).toBe(384);
    expect(report.apiData['3'].inputs.seed).toBe(7);
  });

  it('reloads the wire report into a model', () => {
    const wire = JSON.parse(JSON.stringify(serializeReport(convertWorkflow(txt2imgWorkflow(), registry))));
    const model = createGraphModel(parseApiGraph(wire.api_data), { registry, layer: 'live' });
    const prompts = model.ofType('CLIPTextEncode');
    expect(prompts.values('text')).toEqual(['a red fox in snow', 'blurry']);
    expect(rawValue(model.byId(4).get('ckpt_name'))).toBe('model-a.safetensors');
    expect(model.dag().toposort()).toEqual(['4', '5', '6', '7', '3', '8', '9']);
  });

  it('converts mixed link forms and string ids', () => {
    const report = convertWorkflow(
      {
        nodes: [
          { id: 'ckpt', type: 'CheckpointLoaderSimple', widgets_values: ['model-b.safetensors'] },
          { id: 'enc', type: 'CLIPTextEncode', widgets_values: ['hello'], inputs: [{ name: 'clip', link: 1 }] }
        ],
        links: [{ id: 1, origin_id: 'ckpt', origin_slot: 1, target_id: 'enc', target_slot: 0 }]
      },
      registry
    );
    expect(report.apiData).toEqual({
      ckpt: { class_type: 'CheckpointLoaderSimple', inputs: { ckpt_name: 'model-b.safetensors' } },
      enc: { class_type: 'CLIPTextEncode', inputs: { text: 'hello', clip: ['ckpt', 1] } }
    });
    expect(createGraphModel(report.apiData, { registry }).dag().deps('enc')).toEqual(['ckpt']);
  });
});
