import { Segment } from '../db/segment.entity';
import { StorageRef } from '../s3/object-store';

export interface SegmentUpsert {
  tenantId: string;
  sessionId: string;
  chunkIndex: number;
  storageRef: StorageRef;
  byteSize: number;
  integrityTag: string;
  uploadedAt?: string;
}

export abstract class SegmentRegistry {
  /**
   * Records a validated segment. First write wins: a second call for the same
   * `(tenantId, sessionId, chunkIndex)` returns `created: false` and leaves the
   * stored record untouched. Throws `InvalidSegmentError` when the object is
   * empty or unreachable.
   */
  abstract upsertSegment(input: SegmentUpsert): Promise<{ created: boolean }>;

  abstract listValidatedIndices(
    tenantId: string,
    sessionId: string,
  ): Promise<Set<number>>;

  /** Validated segments ordered by index. */
  abstract listSegments(tenantId: string, sessionId: string): Promise<Segment[]>;
}
