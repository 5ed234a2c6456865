import { z } from 'zod';

const confidence = z.number().min(0).max(1);
const ms = z.number().int().nonnegative();

export const transcriptWordSchema = z
  .object({
    word: z.string(),
    start_ms: ms,
    end_ms: ms,
    confidence: confidence.optional(),
  })
  .refine((w) => w.end_ms >= w.start_ms, { message: 'end_ms must not precede start_ms' });

export const transcriptSegmentSchema = z
  .object({
    id: z.string().min(1),
    start_ms: ms,
    end_ms: ms,
    speaker_label: z.string().min(1),
    text: z.string(),
    confidence: confidence.optional(),
    words: z.array(transcriptWordSchema).optional(),
  })
  .refine((s) => s.end_ms >= s.start_ms, { message: 'end_ms must not precede start_ms' });

export const transcriptSchema = z.object({
  recording_id: z.string().min(1),
  generated_at: z.string().datetime({ offset: true }),
  duration_ms: ms.optional(),
  total_segments: z.number().int().nonnegative().optional(),
  speakers_detected: z.number().int().nonnegative().optional(),
  segments: z.array(transcriptSegmentSchema),
  speaker_map: z
    .record(
      z.object({
        name: z.string(),
        confidence: confidence.optional(),
        manually_corrected: z.boolean().optional(),
      }),
    )
    .optional(),
  pipeline_version: z.string().min(1),
  model_version: z.string().min(1),
});

export type TranscriptWord = z.infer<typeof transcriptWordSchema>;
export type TranscriptSegment = z.infer<typeof transcriptSegmentSchema>;
export type Transcript = z.infer<typeof transcriptSchema>;
