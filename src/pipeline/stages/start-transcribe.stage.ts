import { Injectable, Logger } from '@nestjs/common';
import { ValidationError } from '../../common/pipeline-errors';
import { Transcriber, transcriptionJobName } from '../../workers/transcriber';
import { artifactKeys } from '../artifact-keys';
import { PipelineContext, PipelineInput } from '../pipeline.types';

export interface TranscribeStarted {
  jobName: string;
  rawTranscriptKey: string;
}

@Injectable()
export class StartTranscribeStage {
  private readonly log = new Logger(StartTranscribeStage.name);

  constructor(private readonly transcriber: Transcriber) {}

  async run(
    input: PipelineInput,
    context: PipelineContext,
    now = new Date(),
  ): Promise<TranscribeStarted> {
    if (!context.audioKey) {
      throw new ValidationError(`no audio artifact for ${input.sessionId}`);
    }

    const jobName = transcriptionJobName(input.sessionId, now);
    const rawTranscriptKey = artifactKeys.rawTranscript(input.tenantId, input.sessionId);

    await this.transcriber.start({
      jobName,
      sessionId: input.sessionId,
      bucket: input.storageBucket,
      audioKey: context.audioKey,
      outputKey: rawTranscriptKey,
      pipelineVersion: input.pipelineVersion,
    });

    this.log.log(`🎙️  ${input.tenantId}/${input.sessionId}: transcription ${jobName} queued`);
    return { jobName, rawTranscriptKey };
  }
}
