import { Injectable, Logger } from '@nestjs/common';
import { SessionCatalog } from '../../catalog/session-catalog';
import { CatalogError } from '../../common/pipeline-errors';
import { PipelineInput } from '../pipeline.types';

@Injectable()
export class FinalizeCatalogStage {
  private readonly log = new Logger(FinalizeCatalogStage.name);

  constructor(private readonly catalog: SessionCatalog) {}

  async run(input: PipelineInput, now = new Date()): Promise<void> {
    const { tenantId, sessionId } = input;
    const { applied } = await this.catalog.transitionStatus(
      tenantId,
      sessionId,
      ['finalizing'],
      'completed',
      { completedAt: now.toISOString(), pipelineVersion: input.pipelineVersion },
    );

    if (!applied) {
      const current = await this.catalog.getSession(tenantId, sessionId);
      if (current?.status === 'completed') {
        this.log.log(`🛑 ${tenantId}/${sessionId} already completed`);
        return;
      }
      throw new CatalogError(
        `could not complete ${sessionId}: status is ${current?.status ?? 'missing'}`,
      );
    }
    this.log.log(`🎉 ${tenantId}/${sessionId} completed`);
  }
}
