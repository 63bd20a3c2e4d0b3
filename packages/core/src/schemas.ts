// packages/core/src/schemas.ts
// Wire format for traced-contact input. Parsing yields the domain types in ./types.
import { z } from 'zod';
import type {
  BidirectionalTrace, ContactInput, DirectionalTrace, TraceCollection, TraceUnit
} from './types';
import { edgesFromPool } from './utils/edge-pool';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

// numeric holding ids are accepted and carried as strings
export const HoldingIdSchema = z.union([z.string().trim().min(1), z.number().int()]).transform(String);

export const DateSchema = z.string()
  .regex(ISO_DATE, 'expected YYYY-MM-DD')
  .transform((s, ctx) => {
    const d = new Date(`${s}T00:00:00.000Z`);
    if (Number.isNaN(d.getTime()) || d.toISOString().slice(0, 10) !== s) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid calendar date: ${s}` });
      return z.NEVER;
    }
    return d;
  });

export const DirectionSchema = z.enum(['in', 'out']);

export const TracedEdgeSchema = z.object({
  source: HoldingIdSchema,
  destination: HoldingIdSchema,
  distance: z.number().int().positive()
}).strict();

export const EdgePoolSchema = z.object({
  source: z.array(HoldingIdSchema),
  destination: z.array(HoldingIdSchema),
  index: z.array(z.number().int().nonnegative()),
  distance: z.array(z.number().int().positive())
}).strict().superRefine((pool, ctx) => {
  if (pool.source.length !== pool.destination.length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['destination'], message: 'destination pool must match source pool length' });
  }
  if (pool.index.length !== pool.distance.length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['distance'], message: 'distance must have one entry per index step' });
  }
  const size = Math.min(pool.source.length, pool.destination.length);
  pool.index.forEach((i, step) => {
    if (i >= size) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['index', step], message: `index ${i} is outside the pool` });
  });
}).transform(edgesFromPool);

const EdgeListSchema = z.array(TracedEdgeSchema);

// direct list of edges, or pooled endpoints + traversal index; the shape picks the branch
export const EdgesSchema = z.unknown().transform((value, ctx) => {
  const result = Array.isArray(value) ? EdgeListSchema.safeParse(value) : EdgePoolSchema.safeParse(value);
  if (!result.success) {
    result.error.issues.forEach((issue) => ctx.addIssue(issue));
    return z.NEVER;
  }
  return result.data;
});

const windowOrdered = (w: { windowBegin: Date; windowEnd: Date }) =>
  w.windowBegin.getTime() <= w.windowEnd.getTime();
const WINDOW_ORDER_ISSUE = { message: 'windowBegin must not be after windowEnd', path: ['windowEnd'] };

export const DirectionalTraceSchema: z.ZodType<DirectionalTrace, z.ZodTypeDef, unknown> = z.object({
  kind: z.literal('directional'),
  root: HoldingIdSchema,
  direction: DirectionSchema,
  windowBegin: DateSchema,
  windowEnd: DateSchema,
  edges: EdgesSchema
}).strict().refine(windowOrdered, WINDOW_ORDER_ISSUE);

// one side of a bidirectional trace; root and direction come from the parent
const TraceSideSchema = z.object({
  windowBegin: DateSchema,
  windowEnd: DateSchema,
  edges: EdgesSchema
}).strict().refine(windowOrdered, WINDOW_ORDER_ISSUE);

export const BidirectionalTraceSchema: z.ZodType<BidirectionalTrace, z.ZodTypeDef, unknown> = z.object({
  kind: z.literal('bidirectional'),
  root: HoldingIdSchema,
  ingoing: TraceSideSchema,
  outgoing: TraceSideSchema
}).strict().transform(({ root, ingoing, outgoing }) => ({
  kind: 'bidirectional' as const,
  root,
  ingoing: { kind: 'directional' as const, root, direction: 'in' as const, ...ingoing },
  outgoing: { kind: 'directional' as const, root, direction: 'out' as const, ...outgoing }
}));

export const TraceUnitSchema: z.ZodType<TraceUnit, z.ZodTypeDef, unknown> =
  z.union([DirectionalTraceSchema, BidirectionalTraceSchema]);

// Bundles (arrays of traces) are accepted here; the collection flattener rejects them.
export const TraceCollectionSchema: z.ZodType<TraceCollection, z.ZodTypeDef, unknown> = z.object({
  kind: z.literal('collection'),
  items: z.array(z.union([TraceUnitSchema, z.array(TraceUnitSchema)]))
}).strict();

export const ContactInputKindSchema = z.enum(['directional', 'bidirectional', 'collection']);

const KindProbe = z.object({ kind: ContactInputKindSchema }).passthrough();

/**
 * Parse a wire value into a ContactInput. The kind is read first so that
 * validation issues point at the fields of the intended variant.
 */
export function parseContactInput(input: unknown): ContactInput {
  const { kind } = KindProbe.parse(input);
  switch (kind) {
    case 'directional': return DirectionalTraceSchema.parse(input);
    case 'bidirectional': return BidirectionalTraceSchema.parse(input);
    case 'collection': return TraceCollectionSchema.parse(input);
  }
}
