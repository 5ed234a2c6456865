import { Injectable, Logger } from '@nestjs/common';
import {
  CompletionDetector,
  CompletionResult,
} from '../completion/completion-detector.service';
import { MalformedKeyError, describeError, isPipelineError } from '../common/pipeline-errors';
import { SegmentRegistry } from '../registry/segment-registry';
import { ChunkKey, parseChunkKey } from './chunk-key';
import { UploadNotification } from './upload-notification';

export type IntakeOutcome =
  | { outcome: 'dropped'; reason: string }
  | {
      outcome: 'accepted';
      tenantId: string;
      sessionId: string;
      chunkIndex: number;
      created: boolean;
      /** `null` when the completion check failed with an error a redelivery cannot fix. */
      completion: CompletionResult | null;
    };

@Injectable()
export class ChunkIntakeService {
  private readonly log = new Logger(ChunkIntakeService.name);

  constructor(
    private readonly registry: SegmentRegistry,
    private readonly detector: CompletionDetector,
  ) {}

  /**
   * Records one uploaded chunk and re-evaluates the session. Throws
   * `InvalidSegmentError` (retryable) when the object is not usable yet, and
   * passes on retryable completion-check failures, a failed dispatch among them.
   */
  async handle(notification: UploadNotification): Promise<IntakeOutcome> {
    let key: ChunkKey;
    try {
      key = parseChunkKey(notification.objectKey);
    } catch (error) {
      if (error instanceof MalformedKeyError) {
        this.log.warn(`🗑️  Dropping notification: ${error.message}`);
        return { outcome: 'dropped', reason: error.message };
      }
      throw error;
    }

    const { tenantId, sessionId, chunkIndex } = key;
    this.log.log(`📥 Chunk uploaded: ${tenantId}/${sessionId}#${chunkIndex}`);

    const { created } = await this.registry.upsertSegment({
      tenantId,
      sessionId,
      chunkIndex,
      storageRef: { bucket: notification.bucket, key: notification.objectKey },
      byteSize: notification.objectSize,
      integrityTag: notification.etag,
      uploadedAt: notification.eventTimestamp,
    });

    // duplicates still trigger a check: the last notification may be the redelivered one
    let completion: CompletionResult | null = null;
    try {
      completion = await this.detector.evaluate(tenantId, sessionId);
    } catch (error) {
      this.log.error(
        `❌ Completion check failed for ${tenantId}/${sessionId}: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      // a redelivery re-runs the check, which can claim a dispatch_failed session again
      if (isPipelineError(error) && error.retryable) throw error;
    }

    return { outcome: 'accepted', tenantId, sessionId, chunkIndex, created, completion };
  }
}
