import { z } from 'zod';

export const ActionOutcomeSchema = z.enum(['pending', 'success', 'error']);

const PropertyValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ElementInfoSchema = z.object({
  index: z.number().int().nonnegative().optional(),
  tagName: z.string(),
  attributes: z.record(z.string()),
  textContent: z.string().optional(),
  innerText: z.string().optional(),
  isVisible: z.boolean().optional(),
  isEnabled: z.boolean().optional(),
  position: z.object({ x: z.number(), y: z.number() }).optional(),
  size: z.object({ width: z.number(), height: z.number() }).optional(),
  xpath: z.string().optional(),
  cssSelector: z.string().optional(),
  parent: z
    .object({
      tagName: z.string(),
      id: z.string().nullable(),
      className: z.string().nullable(),
    })
    .optional(),
  children: z.object({ count: z.number().int().nonnegative(), tags: z.array(z.string()) }).optional(),
});

export const PageChangeInfoSchema = z.object({
  changed: z.boolean(),
  previousUrl: z.string().optional(),
  newUrl: z.string().optional(),
  previousTitle: z.string().optional(),
  newTitle: z.string().optional(),
});

export const ActionRecordSchema = z.object({
  sequenceIndex: z.number().int().nonnegative(),
  actionType: z.string().min(1),
  targetSelector: z.string().optional(),
  targetElementInfo: ElementInfoSchema.optional(),
  startedAt: z.string(),
  completedAt: z.string().optional(),
  durationMs: z.number().nonnegative().optional(),
  outcome: ActionOutcomeSchema,
  errorDetail: z.string().optional(),
  pageChangeInfo: PageChangeInfoSchema.optional(),
  result: z.string().optional(),
  elementChanges: z.record(z.object({ before: PropertyValueSchema, after: PropertyValueSchema })).optional(),
  incomplete: z.boolean().optional(),
});
