import { z } from 'zod';
import { TranscriptionError } from '../common/pipeline-errors';
import { Transcript, TranscriptSegment, TranscriptWord } from './transcript.schema';

// Subset of the Amazon Transcribe batch output we rely on.
const rawItemSchema = z.object({
  type: z.enum(['pronunciation', 'punctuation']),
  start_time: z.string().optional(),
  end_time: z.string().optional(),
  speaker_label: z.string().optional(),
  alternatives: z
    .array(z.object({ content: z.string(), confidence: z.string().optional() }))
    .min(1),
});

const rawOutputSchema = z.object({
  results: z.object({
    transcripts: z.array(z.object({ transcript: z.string() })),
    items: z.array(rawItemSchema).default([]),
    speaker_labels: z
      .object({
        segments: z
          .array(
            z.object({
              speaker_label: z.string(),
              items: z
                .array(z.object({ start_time: z.string(), speaker_label: z.string() }))
                .default([]),
            }),
          )
          .default([]),
      })
      .optional(),
  }),
});

type RawOutput = z.infer<typeof rawOutputSchema>;

const DEFAULT_SPEAKER = 'spk_0';

const STRIP_BIDI = /[\u200E\u200F\u202A-\u202E]/g;
function cleanupWord(s: string) {
  // remove bidi/invisible direction chars; keep spacing as-is
  return s.replace(STRIP_BIDI, '');
}

function cleanJoin(words: string[]) {
  return words.join(' ').replace(/\s+/g, ' ').trim();
}

function toMs(seconds: string | undefined, fallback: number) {
  if (seconds === undefined) return fallback;
  const n = Number(seconds);
  return Number.isFinite(n) && n >= 0 ? Math.round(n * 1000) : fallback;
}

function toConfidence(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? Math.min(1, Math.max(0, n)) : undefined;
}

/** Older outputs only carry speakers under `speaker_labels`, keyed by start time. */
function speakerIndex(raw: RawOutput): Map<string, string> {
  const out = new Map<string, string>();
  for (const seg of raw.results.speaker_labels?.segments ?? []) {
    for (const item of seg.items) out.set(item.start_time, item.speaker_label);
  }
  return out;
}

interface Run {
  speaker: string;
  words: TranscriptWord[];
}

function toSegment(run: Run, n: number): TranscriptSegment {
  const first = run.words[0];
  const last = run.words[run.words.length - 1];
  const scored = run.words.filter((w) => w.confidence !== undefined);
  const segment: TranscriptSegment = {
    id: `seg_${String(n + 1).padStart(3, '0')}`,
    start_ms: first.start_ms,
    end_ms: Math.max(first.start_ms, last.end_ms),
    speaker_label: run.speaker,
    text: cleanJoin(run.words.map((w) => w.word)),
    words: run.words,
  };
  if (scored.length > 0) {
    const total = scored.reduce((sum, w) => sum + (w.confidence ?? 0), 0);
    segment.confidence = Math.round((total / scored.length) * 1000) / 1000;
  }
  return segment;
}

/**
 * Turns raw speech-to-text output into the transcript artifact: consecutive
 * words of one speaker form a segment, punctuation sticks to the word before it.
 */
export function normalizeTranscribeOutput(
  rawJson: unknown,
  meta: { recordingId: string; pipelineVersion: string; modelVersion: string; now?: Date },
): Transcript {
  const parsed = rawOutputSchema.safeParse(rawJson);
  if (!parsed.success) {
    throw new TranscriptionError(
      `unrecognised transcription output: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
    );
  }
  const raw = parsed.data;
  const speakers = speakerIndex(raw);

  const runs: Run[] = [];
  let current: Run | null = null;
  for (const item of raw.results.items) {
    const alt = item.alternatives[0];
    const content = cleanupWord(alt.content);

    if (item.type === 'punctuation') {
      if (current) current.words[current.words.length - 1].word += content;
      continue;
    }

    const previousEnd = current ? current.words[current.words.length - 1].end_ms : 0;
    const start = toMs(item.start_time, previousEnd);
    const word: TranscriptWord = {
      word: content,
      start_ms: start,
      end_ms: Math.max(start, toMs(item.end_time, start)),
    };
    const conf = toConfidence(alt.confidence);
    if (conf !== undefined) word.confidence = conf;

    const speaker: string =
      item.speaker_label ??
      (item.start_time !== undefined ? speakers.get(item.start_time) : undefined) ??
      current?.speaker ??
      DEFAULT_SPEAKER;

    if (!current || current.speaker !== speaker) {
      current = { speaker, words: [] };
      runs.push(current);
    }
    current.words.push(word);
  }

  let segments = runs.map(toSegment);
  if (segments.length === 0) {
    const text = cleanJoin(raw.results.transcripts.map((t) => cleanupWord(t.transcript)));
    segments = text
      ? [{ id: 'seg_001', start_ms: 0, end_ms: 0, speaker_label: DEFAULT_SPEAKER, text }]
      : [];
  }

  return {
    recording_id: meta.recordingId,
    generated_at: (meta.now ?? new Date()).toISOString(),
    duration_ms: segments.reduce((max, s) => Math.max(max, s.end_ms), 0),
    total_segments: segments.length,
    speakers_detected: new Set(segments.map((s) => s.speaker_label)).size,
    segments,
    pipeline_version: meta.pipelineVersion,
    model_version: meta.modelVersion,
  };
}
