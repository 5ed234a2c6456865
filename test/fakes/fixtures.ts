import { PipelineInput } from '../../src/pipeline/pipeline.types';
import { Transcript } from '../../src/transcript/transcript.schema';

export function pipelineInput(overrides: Partial<PipelineInput> = {}): PipelineInput {
  return {
    sessionId: 'r1',
    tenantId: 'u1',
    storageBucket: 'test-bucket',
    storagePrefix: 'users/u1/chunks/r1/',
    chunkCount: 3,
    pipelineVersion: '1.0.0',
    createdAt: '2024-05-01T10:00:00.000Z',
    totalDurationSeconds: 180,
    metadata: {
      trigger: 'completion-detector',
      originalChunkCount: 3,
      triggeredAt: '2024-05-01T10:30:00.000Z',
    },
    ...overrides,
  };
}

/** Two speakers, one sentence each, in the batch speech-to-text output layout. */
export const RAW_TRANSCRIPTION = {
  jobName: 'job-1',
  results: {
    transcripts: [{ transcript: 'Hello there. Hi.' }],
    items: [
      {
        type: 'pronunciation',
        start_time: '0.0',
        end_time: '0.5',
        speaker_label: 'spk_0',
        alternatives: [{ content: 'Hello', confidence: '0.99' }],
      },
      {
        type: 'pronunciation',
        start_time: '0.5',
        end_time: '0.9',
        speaker_label: 'spk_0',
        alternatives: [{ content: 'there', confidence: '0.95' }],
      },
      { type: 'punctuation', alternatives: [{ content: '.', confidence: '0.0' }] },
      {
        type: 'pronunciation',
        start_time: '1.2',
        end_time: '1.4',
        speaker_label: 'spk_1',
        alternatives: [{ content: 'Hi', confidence: '0.9' }],
      },
      { type: 'punctuation', alternatives: [{ content: '.' }] },
    ],
  },
};

export function storedTranscript(overrides: Partial<Transcript> = {}): Transcript {
  return {
    recording_id: 'r1',
    generated_at: '2024-05-01T10:40:00.000Z',
    segments: [
      { id: 'seg_001', start_ms: 0, end_ms: 900, speaker_label: 'spk_0', text: 'Hello there.' },
      { id: 'seg_002', start_ms: 1200, end_ms: 1400, speaker_label: 'spk_1', text: 'Hi.' },
    ],
    pipeline_version: '1.0.0',
    model_version: 'fake-transcribe',
    ...overrides,
  };
}
