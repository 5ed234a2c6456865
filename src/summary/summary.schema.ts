import { z } from 'zod';

const confidence = z.number().min(0).max(1);
const timestampMs = z.number().int().nonnegative();

export const actionItemSchema = z.object({
  id: z.string().min(1),
  description: z.string().min(1),
  owner: z.string().optional(),
  due_date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
    .optional(),
  status: z.enum(['pending', 'completed', 'cancelled']).optional(),
  source_timestamp_ms: timestampMs.optional(),
  confidence: confidence.optional(),
});

export const decisionSchema = z.object({
  id: z.string().min(1),
  decision: z.string().min(1),
  rationale: z.string().optional(),
  impact: z.string().optional(),
  source_timestamp_ms: timestampMs.optional(),
  confidence: confidence.optional(),
});

export const highlightSchema = z.object({
  text: z.string().min(1),
  timestamp_ms: timestampMs,
  speaker_name: z.string().optional(),
});

/** What the model is asked to return. */
export const modelSummarySchema = z.object({
  summary_text: z.string().min(1),
  actions: z.array(actionItemSchema),
  decisions: z.array(decisionSchema),
  key_topics: z.array(z.string()).optional(),
  highlights: z.array(highlightSchema).optional(),
  participants: z.array(z.string()).optional(),
});

/** The stored summary artifact. */
export const summarySchema = modelSummarySchema.extend({
  recording_id: z.string().min(1),
  generated_at: z.string().datetime({ offset: true }),
  pipeline_version: z.string().min(1),
  model_version: z.string().min(1),
  generation_id: z.string().optional(),
});

export type ModelSummary = z.infer<typeof modelSummarySchema>;
export type Summary = z.infer<typeof summarySchema>;
