/** Payload handed to the orchestrator when a session becomes complete. */
export interface PipelineInput {
  sessionId: string;
  tenantId: string;
  storageBucket: string;
  storagePrefix: string;
  chunkCount: number;
  pipelineVersion: string;
  createdAt: string;
  totalDurationSeconds: number;
  metadata: {
    trigger: string;
    originalChunkCount: number;
    triggeredAt: string;
  };
}

export const PIPELINE_STATES = [
  'Validating',
  'Transcoding',
  'AwaitingTranscription',
  'Summarizing',
  'Finalizing',
  'Completed',
  'Failed',
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

/** Outputs accumulated by the stages as the execution advances. */
export interface PipelineContext {
  videoKey?: string;
  audioKey?: string;
  transcriptionJobName?: string;
  rawTranscriptKey?: string;
  transcriptKey?: string;
  summaryKey?: string;
  /** ISO time after which the transcription wait gives up. */
  transcriptionDeadline?: string;
  /** ISO time of the next scheduled transcription poll. */
  nextCheckAfter?: string;
  pollCount?: number;
}

/** One message on the pipeline queue: "run `state` for this execution". */
export interface PipelineStep {
  executionId: string;
  state: PipelineState;
  input: PipelineInput;
  context: PipelineContext;
  /** 1-based attempt number of the current state. */
  attempt: number;
  enteredAt: string;
}

export abstract class PipelineLauncher {
  abstract newExecutionId(input: Pick<PipelineInput, 'sessionId'>): string;

  /** Schedules the first step of a new execution. */
  abstract start(executionId: string, input: PipelineInput): Promise<void>;
}
