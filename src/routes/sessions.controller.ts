import {
  BadRequestException,
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { SessionCatalog } from '../catalog/session-catalog';
import { findIndexGaps } from '../completion/completion-detector.service';
import { ARTIFACT_COLUMNS, ArtifactKind, Session } from '../db/session.entity';
import { SessionDeclarationService } from '../intake/session-declaration.service';
import { belongsToTenant, parseS3Uri } from '../pipeline/artifact-keys';
import { SegmentRegistry } from '../registry/segment-registry';
import { ObjectStore } from '../s3/object-store';

const PRESIGN_TTL_SECONDS = 900;

function isArtifactKind(value: string): value is ArtifactKind {
  return Object.hasOwn(ARTIFACT_COLUMNS, value);
}

export function toSessionView(s: Session) {
  return {
    tenantId: s.tenantId,
    sessionId: s.sessionId,
    status: s.status,
    expectedSegmentCount: s.expectedSegmentCount,
    totalDurationSeconds: s.totalDurationSeconds,
    missingIndices: s.missingIndices,
    artifacts: {
      video: s.videoLocation,
      audio: s.audioLocation,
      transcript: s.transcriptLocation,
      summary: s.summaryLocation,
    },
    transcriptionJobName: s.transcriptionJobName,
    nextCheckAfter: s.nextCheckAfter,
    errorDetail: s.errorDetail,
    pipelineVersion: s.pipelineVersion,
    declaredAt: s.declaredAt,
    completedAt: s.completedAt,
  };
}

@Controller('tenants/:tenantId/sessions')
export class SessionsController {
  constructor(
    private readonly declarations: SessionDeclarationService,
    private readonly catalog: SessionCatalog,
    private readonly registry: SegmentRegistry,
    private readonly store: ObjectStore,
  ) {}

  @Post()
  async declare(@Param('tenantId') tenantId: string, @Body() body: unknown) {
    const declaration = this.declarations.parse(body);
    const { session, completion } = await this.declarations.declare(tenantId, declaration);
    return { session: toSessionView(session), completion };
  }

  @Get(':sessionId')
  async get(@Param('tenantId') tenantId: string, @Param('sessionId') sessionId: string) {
    return toSessionView(await this.load(tenantId, sessionId));
  }

  @Get(':sessionId/segments')
  async segments(
    @Param('tenantId') tenantId: string,
    @Param('sessionId') sessionId: string,
  ) {
    const session = await this.catalog.getSession(tenantId, sessionId);
    const validated = await this.registry.listValidatedIndices(tenantId, sessionId);
    if (!session && validated.size === 0) {
      throw new NotFoundException(`session ${sessionId} not found`);
    }

    const expected = session?.expectedSegmentCount ?? null;
    const gaps = expected === null ? null : findIndexGaps(validated, expected);
    return {
      expectedSegmentCount: expected,
      validated: [...validated].sort((a, b) => a - b),
      missing: gaps?.missing ?? null,
      unexpected: gaps?.unexpected ?? null,
    };
  }

  @Get(':sessionId/artifacts/:kind')
  async artifact(
    @Param('tenantId') tenantId: string,
    @Param('sessionId') sessionId: string,
    @Param('kind') kind: string,
  ) {
    if (!isArtifactKind(kind)) {
      throw new BadRequestException(`unknown artifact kind "${kind}"`);
    }
    const session = await this.load(tenantId, sessionId);
    const location = session[ARTIFACT_COLUMNS[kind]];
    const ref = typeof location === 'string' ? parseS3Uri(location) : null;
    if (!ref || !belongsToTenant(ref.key, tenantId)) {
      throw new NotFoundException(`no ${kind} artifact for session ${sessionId}`);
    }

    const url = await this.store.presignGet(ref.key, PRESIGN_TTL_SECONDS);
    return { kind, location, url, expiresIn: PRESIGN_TTL_SECONDS };
  }

  private async load(tenantId: string, sessionId: string): Promise<Session> {
    const session = await this.catalog.getSession(tenantId, sessionId);
    if (!session) {
      throw new NotFoundException(`session ${sessionId} not found`);
    }
    return session;
  }
}
