import { z } from 'zod';

export const ActionRefSchema = z.object({
  type: z.enum(['goto', 'go_back', 'click', 'fill', 'type', 'press', 'scroll', 'extract_content']),
  selector: z.string().optional(),
  value: z.string().optional(),
  url: z.string().optional(),
  index: z.number().int().nonnegative().optional(),
});

export const ActionListSchema = z.object({
  actions: z.array(ActionRefSchema),
  options: z
    .object({
      headless: z.boolean().optional(),
      timeout: z.number().int().positive().optional(),
    })
    .optional(),
});

export type ActionListInput = z.infer<typeof ActionListSchema>;
