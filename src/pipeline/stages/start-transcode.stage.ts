import { Injectable, Logger } from '@nestjs/common';
import { SessionCatalog } from '../../catalog/session-catalog';
import { ProcessingError } from '../../common/pipeline-errors';
import { SegmentRegistry } from '../../registry/segment-registry';
import { Transcoder } from '../../workers/transcoder';
import { artifactKeys, toS3Uri } from '../artifact-keys';
import { PipelineInput } from '../pipeline.types';

export interface TranscodeOutput {
  videoKey: string;
  audioKey: string;
}

@Injectable()
export class StartTranscodeStage {
  private readonly log = new Logger(StartTranscodeStage.name);

  constructor(
    private readonly registry: SegmentRegistry,
    private readonly catalog: SessionCatalog,
    private readonly transcoder: Transcoder,
  ) {}

  async run(input: PipelineInput): Promise<TranscodeOutput> {
    const { tenantId, sessionId, storageBucket } = input;

    const segments = await this.registry.listSegments(tenantId, sessionId);
    if (segments.length !== input.chunkCount) {
      // registry not yet consistent with the dispatch decision
      throw new ProcessingError(
        `expected ${input.chunkCount} segments for ${sessionId}, registry has ${segments.length}`,
      );
    }

    const result = await this.transcoder.transcode({
      tenantId,
      sessionId,
      bucket: storageBucket,
      segmentKeys: segments.map((s) => s.storageRef.key),
      videoKey: artifactKeys.video(tenantId, sessionId),
      audioKey: artifactKeys.audio(tenantId, sessionId),
    });

    await this.catalog.recordArtifact(
      tenantId,
      sessionId,
      'video',
      toS3Uri({ bucket: storageBucket, key: result.videoKey }),
    );
    await this.catalog.recordArtifact(
      tenantId,
      sessionId,
      'audio',
      toS3Uri({ bucket: storageBucket, key: result.audioKey }),
    );

    this.log.log(`🎞️  ${tenantId}/${sessionId}: video and audio ready`);
    return result;
  }
}
