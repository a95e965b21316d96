// packages/converter/src/registry.ts
// Type name -> ordered parameter schema. Classification (widget vs link) is
// driven by the declared type tag only.
import { z } from 'zod';
import type { ClassSchema, ConversionIssue, JsonValue, ParamSpec } from '@graphflow/core';
import { Issues, JsonValueSchema, childLogger, isRecord } from '@graphflow/core';

const log = childLogger('registry');

// tags that carry a literal value; anything else is an opaque link type
export const VALUE_TAGS: ReadonlySet<string> = new Set(['INT', 'FLOAT', 'STRING', 'BOOLEAN', 'COMBO']);

const ParamOptionsSchema = z.object({
  default: JsonValueSchema.optional(),
  min: z.number().optional(),
  max: z.number().optional(),
  step: z.number().optional(),
  tooltip: z.string().optional(),
  options: z.array(JsonValueSchema).optional()   // COMBO choices (newer schema form)
}).passthrough();

const ChoiceListSchema = z.array(JsonValueSchema);

type EntryResult = { ok: true; spec: ParamSpec } | { ok: false; reason: string };

export function classifyTag(tag: string): ParamSpec['kind'] {
  return VALUE_TAGS.has(tag.toUpperCase()) ? 'widget' : 'link';
}

export function parseParamEntry(name: string, entry: unknown, required: boolean): EntryResult {
  if (!Array.isArray(entry) || entry.length === 0) {
    return { ok: false, reason: 'expected a non-empty [type, options] array' };
  }
  const tag: unknown = entry[0];
  const second: unknown = entry[1];
  if (second !== undefined && !isRecord(second)) {
    return { ok: false, reason: 'options must be an object' };
  }
  const rawOpts: Record<string, unknown> = isRecord(second) ? second : {};
  const opts = ParamOptionsSchema.safeParse(rawOpts);
  if (!opts.success) {
    const first = opts.error.issues[0];
    return { ok: false, reason: `invalid option ${first?.path.join('.') ?? ''}: ${first?.message ?? 'unknown'}` };
  }
  const o = opts.data;
  const hasDefault = 'default' in rawOpts && o.default !== undefined;

  let kind: ParamSpec['kind'];
  let valueType: string;
  let choices: readonly JsonValue[] | undefined;

  if (Array.isArray(tag)) {
    const parsed = ChoiceListSchema.safeParse(tag);
    if (!parsed.success) return { ok: false, reason: 'choice list must hold JSON values' };
    kind = 'widget';
    valueType = 'COMBO';
    choices = Object.freeze(parsed.data);
  } else if (typeof tag === 'string' && tag.length > 0) {
    kind = classifyTag(tag);
    valueType = tag;
    if (tag.toUpperCase() === 'COMBO' && o.options) choices = Object.freeze(o.options);
  } else {
    return { ok: false, reason: 'type tag must be a string or a list of choices' };
  }

  const spec: ParamSpec = {
    name,
    kind,
    valueType,
    required,
    hasDefault,
    ...(hasDefault ? { default: o.default } : {}),
    ...(o.min !== undefined ? { min: o.min } : {}),
    ...(o.max !== undefined ? { max: o.max } : {}),
    ...(o.step !== undefined ? { step: o.step } : {}),
    ...(choices ? { choices } : {}),
    ...(o.tooltip !== undefined ? { tooltip: o.tooltip } : {})
  };
  return { ok: true, spec: Object.freeze(spec) };
}

function parseClassSchema(typeName: string, def: Record<string, unknown>, diagnostics: ConversionIssue[]): ClassSchema | null {
  const input = def.input ?? {};
  if (!isRecord(input)) return null;

  const params: ParamSpec[] = [];
  for (const section of ['required', 'optional'] as const) {
    const entries = input[section];
    if (entries === undefined) continue;
    if (!isRecord(entries)) {
      diagnostics.push(Issues.MALFORMED_SCHEMA_ENTRY(typeName, `input.${section}`, 'section must be an object'));
      continue;
    }
    for (const [name, entry] of Object.entries(entries)) {
      const r = parseParamEntry(name, entry, section === 'required');
      if (r.ok) params.push(r.spec);
      else diagnostics.push(Issues.MALFORMED_SCHEMA_ENTRY(typeName, name, r.reason));
    }
  }

  const outputs = Array.isArray(def.output) && def.output.every((x): x is string => typeof x === 'string')
    ? Object.freeze([...def.output])
    : undefined;

  return Object.freeze({
    typeName,
    params: Object.freeze(params),
    ...(typeof def.display_name === 'string' ? { displayName: def.display_name } : {}),
    ...(typeof def.category === 'string' ? { category: def.category } : {}),
    ...(outputs ? { outputs } : {})
  });
}

export class SchemaRegistry {
  private constructor(
    private readonly schemas: ReadonlyMap<string, ClassSchema>,
    readonly diagnostics: readonly ConversionIssue[]
  ) {}

  static empty(): SchemaRegistry {
    return new SchemaRegistry(new Map(), []);
  }

  static fromSchemas(schemas: Iterable<ClassSchema>): SchemaRegistry {
    const m = new Map<string, ClassSchema>();
    for (const s of schemas) m.set(s.typeName, s);
    return new SchemaRegistry(m, []);
  }

  /** Build from a raw `{ Type: { input: { required, optional } } }` description; never throws. */
  static fromSource(raw: unknown): SchemaRegistry {
    const diagnostics: ConversionIssue[] = [];
    const m = new Map<string, ClassSchema>();

    if (!isRecord(raw)) {
      diagnostics.push(Issues.MALFORMED_SCHEMA_SOURCE());
    } else {
      for (const [typeName, def] of Object.entries(raw)) {
        const schema = isRecord(def) ? parseClassSchema(typeName, def, diagnostics) : null;
        if (schema) m.set(typeName, schema);
        else diagnostics.push(Issues.MALFORMED_SCHEMA_TYPE(typeName));
      }
    }

    for (const d of diagnostics) log.warn({ details: d.details }, d.message);
    return new SchemaRegistry(m, Object.freeze(diagnostics));
  }

  lookup(typeName: string): ClassSchema | undefined {
    return this.schemas.get(typeName);
  }

  has(typeName: string): boolean {
    return this.schemas.has(typeName);
  }

  /** ParamSpec for `typeName.param`, if declared. */
  param(typeName: string, param: string): ParamSpec | undefined {
    return this.schemas.get(typeName)?.params.find(p => p.name === param);
  }

  types(): string[] {
    return [...this.schemas.keys()];
  }

  get size(): number {
    return this.schemas.size;
  }
}
