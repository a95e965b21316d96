// packages/converter/src/widget-align.ts
// Positional widget values -> widget specs. The editor stores extra UI-only
// values (e.g. a seed's control_after_generate) between real ones, so values
// are aligned by type with a small edit-distance pass rather than by index.
import type { JsonValue, ParamSpec } from '@graphflow/core';
import { jsonEquals } from '@graphflow/core';

// values the editor appends after seed-like widgets
export const CONTROL_VALUES: ReadonlySet<string> = new Set(['fixed', 'increment', 'decrement', 'randomize']);

// above this many cells the alignment falls back to plain index order
export const ALIGN_SIZE_GUARD = 2000;

const SKIP = 1;
const MISSING = 2;
const MATCH = 2;
const LOOSE = 0;      // a string in a choice widget that is not one of its choices
const MISMATCH = 6;

export interface Alignment {
  matched: Map<string, JsonValue>;
  skipped: JsonValue[];
}

type Fit = 'fit' | 'loose' | 'mismatch';

export function widgetFit(value: JsonValue, spec: ParamSpec): Fit {
  if (spec.choices) {
    if (spec.choices.some(c => jsonEquals(c, value))) return 'fit';
    return typeof value === 'string' ? 'loose' : 'mismatch';
  }
  switch (spec.valueType.toUpperCase()) {
    case 'INT': return typeof value === 'number' && Number.isInteger(value) ? 'fit' : 'mismatch';
    case 'FLOAT': return typeof value === 'number' ? 'fit' : 'mismatch';
    case 'BOOLEAN': return typeof value === 'boolean' || value === 0 || value === 1 ? 'fit' : 'mismatch';
    case 'STRING': return typeof value === 'string' ? 'fit' : 'mismatch';
    default: return 'fit';
  }
}

const score = (f: Fit) => (f === 'fit' ? MATCH : f === 'loose' ? LOOSE : -MISMATCH);

type Step = 'skip' | 'missing' | 'match';

export function alignWidgets(specs: readonly ParamSpec[], values: readonly JsonValue[]): Alignment {
  const n = specs.length;
  const m = values.length;
  const matched = new Map<string, JsonValue>();

  if (n * m > ALIGN_SIZE_GUARD) {
    specs.forEach((s, i) => { if (i < m) matched.set(s.name, values[i]); });
    return { matched, skipped: values.slice(n) };
  }

  const dp: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(-Infinity));
  const back: Array<Array<Step | undefined>> = Array.from({ length: n + 1 }, () => new Array<Step | undefined>(m + 1));
  dp[0][0] = 0;
  for (let j = 1; j <= m; j++) { dp[0][j] = dp[0][j - 1] - SKIP; back[0][j] = 'skip'; }

  for (let i = 1; i <= n; i++) {
    dp[i][0] = dp[i - 1][0] - MISSING;
    back[i][0] = 'missing';
    for (let j = 1; j <= m; j++) {
      // ties keep the earlier candidate: skip, then missing, then match
      let best = dp[i][j - 1] - SKIP;
      let step: Step = 'skip';
      if (dp[i - 1][j] - MISSING > best) { best = dp[i - 1][j] - MISSING; step = 'missing'; }
      const viaMatch = dp[i - 1][j - 1] + score(widgetFit(values[j - 1], specs[i - 1]));
      if (viaMatch > best) { best = viaMatch; step = 'match'; }
      dp[i][j] = best;
      back[i][j] = step;
    }
  }

  const skipped: JsonValue[] = [];
  let i = n, j = m;
  while (i > 0 || j > 0) {
    const step = back[i][j];
    if (step === 'match') { matched.set(specs[i - 1].name, values[j - 1]); i--; j--; }
    else if (step === 'missing') i--;
    else if (step === 'skip') { skipped.push(values[j - 1]); j--; }
    else break;
  }
  return { matched, skipped: skipped.reverse() };
}

/** Skipped values worth reporting: editor control values are expected noise. */
export function reportableSurplus(skipped: readonly JsonValue[]): JsonValue[] {
  return skipped.filter(v => !(typeof v === 'string' && CONTROL_VALUES.has(v)));
}
