import {
  BadRequestException,
  GetTranscriptionJobCommand,
  LanguageCode,
  StartTranscriptionJobCommand,
  TranscribeClient,
} from '@aws-sdk/client-transcribe';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { ProcessingError } from '../common/pipeline-errors';
import { AppEnv } from '../config/env.validation';

export interface TranscriptionRequest {
  jobName: string;
  sessionId: string;
  bucket: string;
  audioKey: string;
  outputKey: string;
  pipelineVersion: string;
}

export type TranscriptionJobState =
  | { status: 'QUEUED' | 'IN_PROGRESS' }
  | { status: 'COMPLETED' }
  | { status: 'FAILED'; failureReason: string }
  | { status: 'NOT_FOUND' };

export abstract class Transcriber {
  /** Identifies the engine in the transcript artifact's `model_version`. */
  abstract readonly modelVersion: string;

  abstract start(req: TranscriptionRequest): Promise<void>;

  abstract status(jobName: string): Promise<TranscriptionJobState>;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `meeting-transcript-{sessionId}-{yyyymmdd-HHMMSS}-{8 hex}` in UTC. */
export function transcriptionJobName(sessionId: string, now = new Date(), suffix?: string) {
  const stamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `-${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  const safeId = sessionId.replace(/[^0-9a-zA-Z._-]/g, '-').slice(0, 120);
  return `meeting-transcript-${safeId}-${stamp}-${suffix ?? randomUUID().slice(0, 8)}`;
}

const LANGUAGE_OPTIONS: LanguageCode[] = ['en-US', 'es-US', 'fr-FR', 'de-DE'];
const MAX_SPEAKERS = 10;

@Injectable()
export class AwsTranscriber extends Transcriber {
  readonly modelVersion = 'amazon-transcribe';
  private readonly log = new Logger(AwsTranscriber.name);
  private readonly client: TranscribeClient;
  private readonly dataAccessRoleArn: string | undefined;

  constructor(cfg: ConfigService<AppEnv, true>) {
    super();
    this.client = new TranscribeClient({ region: cfg.get('AWS_REGION', { infer: true }) });
    this.dataAccessRoleArn = cfg.get('TRANSCRIBE_SERVICE_ROLE_ARN', { infer: true });
  }

  async start(req: TranscriptionRequest): Promise<void> {
    try {
      await this.client.send(
        new StartTranscriptionJobCommand({
          TranscriptionJobName: req.jobName,
          Media: { MediaFileUri: `s3://${req.bucket}/${req.audioKey}` },
          MediaFormat: 'wav',
          OutputBucketName: req.bucket,
          OutputKey: req.outputKey,
          IdentifyLanguage: true,
          LanguageOptions: LANGUAGE_OPTIONS,
          Settings: { ShowSpeakerLabels: true, MaxSpeakerLabels: MAX_SPEAKERS },
          JobExecutionSettings: this.dataAccessRoleArn
            ? { AllowDeferredExecution: true, DataAccessRoleArn: this.dataAccessRoleArn }
            : undefined,
          Tags: [
            { Key: 'RecordingId', Value: req.sessionId },
            { Key: 'PipelineVersion', Value: req.pipelineVersion },
          ],
        }),
      );
    } catch (error) {
      throw new ProcessingError(`could not start transcription ${req.jobName}: ${String(error)}`, {
        cause: error,
      });
    }
    this.log.log(`🎙️  Transcription job started: ${req.jobName}`);
  }

  async status(jobName: string): Promise<TranscriptionJobState> {
    try {
      const res = await this.client.send(
        new GetTranscriptionJobCommand({ TranscriptionJobName: jobName }),
      );
      const job = res.TranscriptionJob;
      switch (job?.TranscriptionJobStatus) {
        case 'COMPLETED':
          return { status: 'COMPLETED' };
        case 'FAILED':
          return { status: 'FAILED', failureReason: job?.FailureReason ?? 'unknown failure' };
        case 'QUEUED':
          return { status: 'QUEUED' };
        case 'IN_PROGRESS':
          return { status: 'IN_PROGRESS' };
        default:
          return { status: 'NOT_FOUND' };
      }
    } catch (error) {
      if (error instanceof BadRequestException && /couldn't be found/i.test(error.message)) {
        return { status: 'NOT_FOUND' };
      }
      throw new ProcessingError(`could not read transcription ${jobName}: ${String(error)}`, {
        cause: error,
      });
    }
  }
}
