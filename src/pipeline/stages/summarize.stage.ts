import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { ZodError } from 'zod';
import { SessionCatalog } from '../../catalog/session-catalog';
import { SummaryFormatError, TranscriptionError } from '../../common/pipeline-errors';
import { ObjectStore } from '../../s3/object-store';
import { SummaryModel } from '../../summary/summary-model';
import { buildSummaryPrompt, transcriptToText } from '../../summary/summary-prompt';
import { Summary, modelSummarySchema, summarySchema } from '../../summary/summary.schema';
import { Transcript, transcriptSchema } from '../../transcript/transcript.schema';
import { artifactKeys, toS3Uri } from '../artifact-keys';
import { PipelineContext, PipelineInput } from '../pipeline.types';

function firstIssue(error: ZodError) {
  const issue = error.issues[0];
  return issue ? `${issue.path.join('.') || '(root)'} ${issue.message}` : 'invalid';
}

@Injectable()
export class SummarizeStage {
  private readonly log = new Logger(SummarizeStage.name);

  constructor(
    private readonly store: ObjectStore,
    private readonly model: SummaryModel,
    private readonly catalog: SessionCatalog,
  ) {}

  async run(
    input: PipelineInput,
    context: PipelineContext,
    now = new Date(),
  ): Promise<{ summaryKey: string }> {
    const { tenantId, sessionId } = input;
    const transcript = await this.loadTranscript(input, context);

    const reply = await this.model.complete(buildSummaryPrompt(transcriptToText(transcript)));

    // the reply is used as-is: no fence stripping, no repair
    let json: unknown;
    try {
      json = JSON.parse(reply.trim());
    } catch (error) {
      this.log.error(
        `❌ ${tenantId}/${sessionId}: model reply is not JSON (${reply.length} chars): ${reply.slice(0, 200)}`,
      );
      throw new SummaryFormatError('model reply is not valid JSON', { cause: error });
    }

    const modelOut = modelSummarySchema.safeParse(json);
    if (!modelOut.success) {
      throw new SummaryFormatError(`model reply does not match the summary shape: ${firstIssue(modelOut.error)}`);
    }

    const candidate: Summary = {
      ...modelOut.data,
      recording_id: sessionId,
      generated_at: now.toISOString(),
      pipeline_version: input.pipelineVersion,
      model_version: this.model.modelVersion,
      generation_id: randomUUID(),
    };
    const summary = summarySchema.safeParse(candidate);
    if (!summary.success) {
      throw new SummaryFormatError(`summary artifact invalid: ${firstIssue(summary.error)}`);
    }

    const summaryKey = artifactKeys.summary(tenantId, sessionId);
    await this.store.putObject(
      summaryKey,
      Buffer.from(JSON.stringify(summary.data, null, 2)),
      'application/json',
    );
    await this.catalog.recordArtifact(
      tenantId,
      sessionId,
      'summary',
      toS3Uri({ bucket: this.store.bucketName(), key: summaryKey }),
    );

    this.log.log(
      `🧾 ${tenantId}/${sessionId}: summary stored (${summary.data.actions.length} actions, ${summary.data.decisions.length} decisions)`,
    );
    return { summaryKey };
  }

  private async loadTranscript(
    input: PipelineInput,
    context: PipelineContext,
  ): Promise<Transcript> {
    const key = context.transcriptKey ?? artifactKeys.transcript(input.tenantId, input.sessionId);
    const text = await this.store.getObjectText(key, input.storageBucket);

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new TranscriptionError(`transcript ${key} is not JSON`, { cause: error });
    }
    const parsed = transcriptSchema.safeParse(json);
    if (!parsed.success) {
      throw new TranscriptionError(`transcript ${key} is invalid: ${firstIssue(parsed.error)}`);
    }
    return parsed.data;
  }
}
