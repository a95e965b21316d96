// packages/core/src/schemas.ts
import { z } from 'zod';
import type { ApiGraph, JsonValue, UiInput, UiLink, UiNode } from './types';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
  ])
);

export const NodeIdSchema = z.union([z.number().int(), z.string().min(1)]);

// ---- UI-format workflow ----
export const WorkflowShapeSchema = z.object({
  nodes: z.array(z.unknown()),
  links: z.array(z.unknown()),
  definitions: z.unknown().optional(),   // { subgraphs: [...] } in newer editor exports
  last_node_id: z.unknown().optional(),
  last_link_id: z.unknown().optional()
});

const WidgetValuesSchema = z.union([z.array(JsonValueSchema), z.record(JsonValueSchema)]);

// reroute slots carry an empty name
export const UiInputSchema = z.object({
  name: z.string(),
  link: z.number().int().nullable().optional(),
  type: z.union([z.string(), z.number()]).optional()
}).transform((i): UiInput => ({
  name: i.name,
  link: i.link ?? null,
  ...(i.type !== undefined ? { type: String(i.type) } : {})
}));

// accepts both `widgets` and the editor's `widgets_values`
export const UiNodeSchema = z.object({
  id: NodeIdSchema,
  type: z.string().min(1),
  widgets: WidgetValuesSchema.nullable().optional(),
  widgets_values: WidgetValuesSchema.nullable().optional(),
  inputs: z.array(UiInputSchema).nullable().optional(),
  title: z.string().optional(),
  mode: z.number().int().optional()
}).transform((n): UiNode => ({
  id: n.id,
  type: n.type,
  widgets: n.widgets ?? n.widgets_values ?? [],
  inputs: n.inputs ?? [],
  ...(n.title !== undefined ? { title: n.title } : {}),
  ...(n.mode !== undefined ? { mode: n.mode } : {})
}));

const LinkTypeSchema = z.union([z.string(), z.number()]).transform(String);

// [id, origin_id, origin_slot, target_id, target_slot, type]
const UiLinkTupleSchema = z.tuple([
  z.number().int(), NodeIdSchema, z.number().int(), NodeIdSchema, z.number().int(), LinkTypeSchema
]).transform(([id, originId, originSlot, targetId, targetSlot, type]): UiLink => ({
  id, originId, originSlot, targetId, targetSlot, type
}));

const UiLinkObjectSchema = z.object({
  id: z.number().int(),
  origin_id: NodeIdSchema,
  origin_slot: z.number().int(),
  target_id: NodeIdSchema,
  target_slot: z.number().int(),
  type: LinkTypeSchema.optional()
}).transform((l): UiLink => ({
  id: l.id,
  originId: l.origin_id,
  originSlot: l.origin_slot,
  targetId: l.target_id,
  targetSlot: l.target_slot,
  type: l.type ?? '*'
}));

export const UiLinkSchema = z.union([UiLinkTupleSchema, UiLinkObjectSchema]);

// ---- API-format graph ----
export const ApiNodeSchema = z.object({
  class_type: z.string().min(1),
  inputs: z.record(JsonValueSchema),
  _meta: z.object({ title: z.string().optional() }).catchall(JsonValueSchema).optional()
});

export const ApiGraphSchema = z.record(ApiNodeSchema);

export function isApiGraph(value: unknown): value is ApiGraph {
  return ApiGraphSchema.safeParse(value).success;
}

// zod issues -> compact details ({ path, msg })
export function issueDetails(err: z.ZodError): Array<{ path: string; msg: string }> {
  return err.issues.map(i => ({ path: i.path.join('.'), msg: i.message }));
}
