import { Injectable, Logger } from '@nestjs/common';
import { SessionCatalog } from '../../catalog/session-catalog';
import { TranscriptionError, ValidationError } from '../../common/pipeline-errors';
import { ObjectStore } from '../../s3/object-store';
import { normalizeTranscribeOutput } from '../../transcript/transcript.normalizer';
import { Transcriber } from '../../workers/transcriber';
import { artifactKeys, toS3Uri } from '../artifact-keys';
import { PipelineContext, PipelineInput } from '../pipeline.types';

export type TranscriptionPoll =
  | { status: 'running' }
  | { status: 'completed'; transcriptKey: string };

@Injectable()
export class PollTranscribeStage {
  private readonly log = new Logger(PollTranscribeStage.name);

  constructor(
    private readonly transcriber: Transcriber,
    private readonly store: ObjectStore,
    private readonly catalog: SessionCatalog,
  ) {}

  async run(input: PipelineInput, context: PipelineContext): Promise<TranscriptionPoll> {
    const { tenantId, sessionId, storageBucket } = input;
    const jobName = context.transcriptionJobName;
    if (!jobName) {
      throw new ValidationError(`no transcription job recorded for ${sessionId}`);
    }

    const job = await this.transcriber.status(jobName);
    switch (job.status) {
      case 'QUEUED':
      case 'IN_PROGRESS':
        this.log.log(`⏳ ${tenantId}/${sessionId}: ${jobName} is ${job.status}`);
        return { status: 'running' };
      case 'FAILED':
        throw new TranscriptionError(job.failureReason);
      case 'NOT_FOUND':
        throw new TranscriptionError(`transcription job ${jobName} not found`);
      case 'COMPLETED':
        break;
    }

    const rawKey = context.rawTranscriptKey ?? artifactKeys.rawTranscript(tenantId, sessionId);
    const rawText = await this.store.getObjectText(rawKey, storageBucket);
    let rawJson: unknown;
    try {
      rawJson = JSON.parse(rawText);
    } catch (error) {
      throw new TranscriptionError(`transcription output ${rawKey} is not JSON`, { cause: error });
    }

    const transcript = normalizeTranscribeOutput(rawJson, {
      recordingId: sessionId,
      pipelineVersion: input.pipelineVersion,
      modelVersion: this.transcriber.modelVersion,
    });

    const transcriptKey = artifactKeys.transcript(tenantId, sessionId);
    await this.store.putObject(
      transcriptKey,
      Buffer.from(JSON.stringify(transcript, null, 2)),
      'application/json',
    );
    await this.catalog.recordArtifact(
      tenantId,
      sessionId,
      'transcript',
      toS3Uri({ bucket: this.store.bucketName(), key: transcriptKey }),
    );

    this.log.log(
      `📝 ${tenantId}/${sessionId}: transcript stored (${transcript.segments.length} segments)`,
    );
    return { status: 'completed', transcriptKey };
  }
}
