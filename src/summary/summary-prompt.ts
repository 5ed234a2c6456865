import { Transcript } from '../transcript/transcript.schema';

/** One `[speaker] text` line per transcript segment. */
export function transcriptToText(transcript: Transcript): string {
  return transcript.segments
    .filter((s) => s.text.trim().length > 0)
    .map((s) => `[${s.speaker_label}] ${s.text.trim()}`)
    .join('\n');
}

export function buildSummaryPrompt(transcriptText: string): string {
  return `Analyze the meeting transcript below and reply with a structured summary in JSON.

Transcript (one "[speaker] text" line per utterance):
${transcriptText}

Reply with a single JSON object of this shape:

{
  "summary_text": "Two or three short paragraphs describing the meeting",
  "actions": [
    { "id": "act_001", "description": "Concrete task", "owner": "Name if stated", "due_date": "YYYY-MM-DD if stated", "source_timestamp_ms": 0 }
  ],
  "decisions": [
    { "id": "dec_001", "decision": "What was decided", "rationale": "Why, if stated", "source_timestamp_ms": 0 }
  ],
  "key_topics": ["topic"],
  "participants": ["name"]
}

Rules:
- Only list action items and decisions that were explicitly discussed.
- Number ids sequentially: act_001, act_002, ... and dec_001, dec_002, ...
- Leave out "owner", "due_date" and "rationale" when the transcript does not state them.
- Output the JSON object only, with no prose and no code fences.`;
}
