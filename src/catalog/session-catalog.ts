import { ArtifactKind, Session } from '../db/session.entity';
import { SessionStatus, canTransition } from './session-status';

export interface SessionDeclaration {
  tenantId: string;
  sessionId: string;
  expectedSegmentCount: number;
  totalDurationSeconds?: number | null;
  createdAt?: string;
}

/** Fields that may be written alongside a status change. */
export type SessionPatch = Partial<
  Pick<
    Session,
    | 'executionHandle'
    | 'missingIndices'
    | 'errorDetail'
    | 'transcriptionJobName'
    | 'nextCheckAfter'
    | 'pipelineVersion'
    | 'completedAt'
    | 'videoLocation'
    | 'audioLocation'
    | 'transcriptLocation'
    | 'summaryLocation'
  >
>;

export interface TransitionResult {
  /** `false` means another invocation moved the session first. */
  applied: boolean;
}

export abstract class SessionCatalog {
  /**
   * Creates the session if it does not exist and sets its size while it is
   * still pre-dispatch. Returns the stored row.
   */
  abstract declareSession(declaration: SessionDeclaration): Promise<Session>;

  abstract getSession(tenantId: string, sessionId: string): Promise<Session | null>;

  /** `null` until the producer has declared the session size. */
  abstract getExpectedCount(
    tenantId: string,
    sessionId: string,
  ): Promise<number | null>;

  /**
   * Compare-and-swap on `status`: applies only when the current status is one
   * of `from`.
   */
  abstract transitionStatus(
    tenantId: string,
    sessionId: string,
    from: readonly SessionStatus[],
    to: SessionStatus,
    extra?: SessionPatch,
  ): Promise<TransitionResult>;

  abstract recordArtifact(
    tenantId: string,
    sessionId: string,
    kind: ArtifactKind,
    location: string,
  ): Promise<void>;

  abstract recordPollSchedule(
    tenantId: string,
    sessionId: string,
    jobName: string,
    nextCheckAfter: string,
  ): Promise<void>;

  protected assertEdges(from: readonly SessionStatus[], to: SessionStatus) {
    const illegal = from.filter((f) => !canTransition(f, to));
    if (from.length === 0 || illegal.length > 0) {
      throw new Error(
        `Illegal session transition [${illegal.join(', ') || '∅'}] -> ${to}`,
      );
    }
  }
}
