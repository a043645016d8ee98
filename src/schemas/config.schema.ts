import { z } from 'zod';

export const SinkTogglesSchema = z.object({
  text: z.boolean().optional(),
  json: z.boolean().optional(),
  elementDetails: z.boolean().optional(),
});

export const RecorderConfigSchema = z.object({
  logDirectory: z.string().min(1),
  sessionId: z.string().min(1).optional(),
  sinks: SinkTogglesSchema.optional(),
});

export type RecorderConfig = z.infer<typeof RecorderConfigSchema>;
