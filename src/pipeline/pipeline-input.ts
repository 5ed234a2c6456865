import { PipelineInput } from './pipeline.types';

export interface PipelineInputSource {
  tenantId: string;
  sessionId: string;
  expectedSegmentCount: number | null;
  totalDurationSeconds?: number | null;
  createdAt?: string | null;
}

export function chunkPrefix(tenantId: string, sessionId: string) {
  return `users/${tenantId}/chunks/${sessionId}/`;
}

/**
 * Builds the orchestrator start payload. `chunkCount` is the number of
 * segments actually present; the declared size travels in `metadata`.
 */
export function buildPipelineInput(
  source: PipelineInputSource,
  opts: {
    bucket: string;
    uploadedChunks: number;
    pipelineVersion: string;
    trigger?: string;
    now?: Date;
  },
): PipelineInput {
  const now = (opts.now ?? new Date()).toISOString();
  return {
    sessionId: source.sessionId,
    tenantId: source.tenantId,
    storageBucket: opts.bucket,
    storagePrefix: chunkPrefix(source.tenantId, source.sessionId),
    chunkCount: opts.uploadedChunks,
    pipelineVersion: opts.pipelineVersion,
    createdAt: source.createdAt ?? now,
    totalDurationSeconds: source.totalDurationSeconds ?? 0,
    metadata: {
      trigger: opts.trigger ?? 'completion-detector',
      originalChunkCount: source.expectedSegmentCount ?? opts.uploadedChunks,
      triggeredAt: now,
    },
  };
}
