/* tests/helpers.ts */
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { JsonObject, JsonValue } from '@graphflow/core';

const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');

export function loadFixture(name: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(FIXTURES, name), 'utf-8'));
}

// fresh copy per call; tests mutate what they load
export const objectInfo = (): unknown => loadFixture('object-info.json');
export const txt2imgWorkflow = (): unknown => loadFixture('txt2img.workflow.json');
export const txt2imgApi = (): unknown => loadFixture('txt2img.api.json');

export function uiNode(
  id: number | string,
  type: string,
  widgets: JsonValue[] | JsonObject = [],
  inputs: Array<{ name: string; link: number | null; type?: string; widget?: { name: string } }> = []
) {
  return { id, type, widgets, inputs };
}

/** `[id, origin, originSlot, target, targetSlot, type]` */
export function uiLink(id: number, origin: number | string, originSlot: number, target: number | string, targetSlot: number, type = '*') {
  return [id, origin, originSlot, target, targetSlot, type];
}
