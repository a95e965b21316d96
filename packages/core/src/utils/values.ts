import type { InputValue, JsonValue, SourceRef } from '../types';

// [node id, slot] pair as emitted for link inputs
export function isSourceRef(v: unknown): v is SourceRef {
  return Array.isArray(v)
    && v.length === 2
    && typeof v[0] === 'string'
    && typeof v[1] === 'number'
    && Number.isInteger(v[1]);
}

export function classifyInput(value: JsonValue): InputValue {
  return isSourceRef(value) ? { kind: 'link', ref: value } : { kind: 'widget', value };
}

export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((x, i) => jsonEquals(x, b[i]));
  }
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object' || Array.isArray(b)) {
    return false;
  }
  const ka = Object.keys(a), kb = Object.keys(b);
  return ka.length === kb.length && ka.every(k => k in b && jsonEquals(a[k], b[k]));
}

// numbers numerically, strings lexically, booleans false < true; otherwise NaN (unordered)
export function compareJson(a: JsonValue, b: JsonValue): number {
  if (typeof a === 'number' && typeof b === 'number') return a === b ? 0 : a < b ? -1 : 1;
  if (typeof a === 'string' && typeof b === 'string') return a === b ? 0 : a < b ? -1 : 1;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return jsonEquals(a, b) ? 0 : Number.NaN;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}
