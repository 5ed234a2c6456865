import { StorageRef } from '../s3/object-store';

export type SegmentValidationState = 'validated' | 'rejected';

/** One uploaded chunk of a session, stored as JSON in the registry hash. */
export interface Segment {
  tenantId: string;
  sessionId: string;
  chunkIndex: number;
  storageRef: StorageRef;
  byteSize: number;
  integrityTag: string;
  uploadedAt: string;
  validationState: SegmentValidationState;
  rejectionReason?: string;
}
