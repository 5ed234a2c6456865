import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { SessionCatalog } from '../catalog/session-catalog';
import { CatalogError, ValidationError, describeError } from '../common/pipeline-errors';
import {
  CompletionDetector,
  CompletionResult,
} from '../completion/completion-detector.service';
import { Session } from '../db/session.entity';

export const sessionDeclarationSchema = z.object({
  sessionId: z.string().trim().min(1).max(128).regex(/^[^/]+$/, 'must not contain "/"'),
  expectedSegmentCount: z.number().int().positive().max(999),
  totalDurationSeconds: z.number().nonnegative().nullish(),
  createdAt: z.string().datetime({ offset: true }).optional(),
});

export type SessionDeclarationBody = z.infer<typeof sessionDeclarationSchema>;

export interface DeclarationOutcome {
  session: Session;
  completion: CompletionResult | null;
}

@Injectable()
export class SessionDeclarationService {
  private readonly log = new Logger(SessionDeclarationService.name);

  constructor(
    private readonly catalog: SessionCatalog,
    private readonly detector: CompletionDetector,
  ) {}

  parse(raw: unknown): SessionDeclarationBody {
    const parsed = sessionDeclarationSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(
        parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      );
    }
    return parsed.data;
  }

  /**
   * Stores the declared size, then checks completeness: the declaration can
   * arrive after the last chunk.
   */
  async declare(tenantId: string, body: SessionDeclarationBody): Promise<DeclarationOutcome> {
    await this.catalog.declareSession({
      tenantId,
      sessionId: body.sessionId,
      expectedSegmentCount: body.expectedSegmentCount,
      totalDurationSeconds:
        body.totalDurationSeconds == null ? null : Math.round(body.totalDurationSeconds),
      createdAt: body.createdAt,
    });

    let completion: CompletionResult | null = null;
    try {
      completion = await this.detector.evaluate(tenantId, body.sessionId);
    } catch (error) {
      this.log.error(
        `❌ Completion check after declaration failed for ${tenantId}/${body.sessionId}: ${describeError(error)}`,
      );
    }

    // re-read: the check above may have moved the status
    const session = await this.catalog.getSession(tenantId, body.sessionId);
    if (!session) {
      throw new CatalogError(`session ${body.sessionId} vanished after declaration`);
    }
    return { session, completion };
  }
}
