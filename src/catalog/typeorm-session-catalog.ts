import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { CatalogError } from '../common/pipeline-errors';
import { ARTIFACT_COLUMNS, ArtifactKind, Session } from '../db/session.entity';
import {
  SessionCatalog,
  SessionDeclaration,
  SessionPatch,
  TransitionResult,
} from './session-catalog';
import { PRE_DISPATCH_STATUSES, SessionStatus } from './session-status';

@Injectable()
export class TypeOrmSessionCatalog extends SessionCatalog {
  private readonly log = new Logger(TypeOrmSessionCatalog.name);

  constructor(
    @InjectRepository(Session) private readonly sessions: Repository<Session>,
  ) {
    super();
  }

  async declareSession(declaration: SessionDeclaration): Promise<Session> {
    const { tenantId, sessionId, expectedSegmentCount } = declaration;
    const totalDurationSeconds = declaration.totalDurationSeconds ?? null;

    await this.write(`declare ${tenantId}/${sessionId}`, async () => {
      await this.sessions
        .createQueryBuilder()
        .insert()
        .into(Session)
        .values({
          tenantId,
          sessionId,
          status: 'recording',
          expectedSegmentCount,
          totalDurationSeconds,
          declaredAt: declaration.createdAt ?? new Date().toISOString(),
        })
        .orIgnore()
        .execute();

      await this.sessions.update(
        { tenantId, sessionId, status: In([...PRE_DISPATCH_STATUSES]) },
        { expectedSegmentCount, totalDurationSeconds },
      );
    });

    const stored = await this.getSession(tenantId, sessionId);
    if (!stored) {
      throw new CatalogError(`session ${sessionId} missing right after declaration`);
    }
    this.log.log(
      `📝 Session declared: ${tenantId}/${sessionId} expects ${stored.expectedSegmentCount} segments (status=${stored.status})`,
    );
    return stored;
  }

  async getSession(tenantId: string, sessionId: string): Promise<Session | null> {
    return this.sessions.findOneBy({ tenantId, sessionId });
  }

  async getExpectedCount(
    tenantId: string,
    sessionId: string,
  ): Promise<number | null> {
    const row = await this.sessions.findOne({
      where: { tenantId, sessionId },
      select: { tenantId: true, sessionId: true, expectedSegmentCount: true },
    });
    return row?.expectedSegmentCount ?? null;
  }

  async transitionStatus(
    tenantId: string,
    sessionId: string,
    from: readonly SessionStatus[],
    to: SessionStatus,
    extra: SessionPatch = {},
  ): Promise<TransitionResult> {
    this.assertEdges(from, to);

    const result = await this.write(`transition ${tenantId}/${sessionId} -> ${to}`, () =>
      this.sessions.update(
        { tenantId, sessionId, status: In([...from]) },
        { ...extra, status: to },
      ),
    );
    const applied = (result.affected ?? 0) > 0;

    if (applied) {
      this.log.log(`🔄 ${tenantId}/${sessionId}: [${from.join('|')}] -> ${to}`);
    } else {
      this.log.debug(`🏁 ${tenantId}/${sessionId}: transition to ${to} not applied`);
    }
    return { applied };
  }

  async recordArtifact(
    tenantId: string,
    sessionId: string,
    kind: ArtifactKind,
    location: string,
  ): Promise<void> {
    const patch: SessionPatch = {};
    patch[ARTIFACT_COLUMNS[kind]] = location;
    await this.write(`artifact ${kind} for ${tenantId}/${sessionId}`, () =>
      this.sessions.update({ tenantId, sessionId }, patch),
    );
  }

  async recordPollSchedule(
    tenantId: string,
    sessionId: string,
    jobName: string,
    nextCheckAfter: string,
  ): Promise<void> {
    await this.write(`poll schedule for ${tenantId}/${sessionId}`, () =>
      this.sessions.update(
        { tenantId, sessionId },
        { transcriptionJobName: jobName, nextCheckAfter },
      ),
    );
  }

  private async write<T>(what: string, op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.log.error(`❌ Catalog write failed (${what}): ${reason}`);
      throw new CatalogError(`${what}: ${reason}`, { cause: error });
    }
  }
}
