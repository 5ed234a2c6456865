import { ConfigService } from '@nestjs/config';
import { AppEnv } from '../config/env.validation';

export const PIPELINE_SETTINGS = Symbol('PIPELINE_SETTINGS');

export interface PipelineSettings {
  bucket: string;
  pipelineVersion: string;
  maxAttempts: number;
  retryBaseMs: number;
  pollInitialMs: number;
  pollMaxMs: number;
  transcribeTimeoutMs: number;
}

export function pipelineSettingsFactory(
  cfg: ConfigService<AppEnv, true>,
): PipelineSettings {
  return {
    bucket: cfg.get('S3_BUCKET', { infer: true }),
    pipelineVersion: cfg.get('PIPELINE_VERSION', { infer: true }),
    maxAttempts: cfg.get('PIPELINE_MAX_ATTEMPTS', { infer: true }),
    retryBaseMs: cfg.get('PIPELINE_RETRY_BASE_MS', { infer: true }),
    pollInitialMs: cfg.get('TRANSCRIBE_POLL_INITIAL_MS', { infer: true }),
    pollMaxMs: cfg.get('TRANSCRIBE_POLL_MAX_MS', { infer: true }),
    transcribeTimeoutMs: cfg.get('TRANSCRIBE_TIMEOUT_MS', { infer: true }),
  };
}
