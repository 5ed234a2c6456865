import { Inject, Injectable, Logger } from '@nestjs/common';
import { SessionCatalog } from '../catalog/session-catalog';
import { PRE_DISPATCH_STATUSES } from '../catalog/session-status';
import { ProcessingError, describeError } from '../common/pipeline-errors';
import { buildPipelineInput } from '../pipeline/pipeline-input';
import { PIPELINE_SETTINGS, PipelineSettings } from '../pipeline/pipeline.settings';
import { PipelineLauncher } from '../pipeline/pipeline.types';
import { SegmentRegistry } from '../registry/segment-registry';

export type CompletionResult =
  | { complete: false; reason: 'awaiting-declaration' }
  | { complete: false; reason: 'missing-segments'; missing: number[] }
  | { complete: false; reason: 'unexpected-segments'; unexpected: number[] }
  | { complete: true; dispatched: false }
  | { complete: true; dispatched: true; executionHandle: string };

export interface IndexGap {
  missing: number[];
  unexpected: number[];
}

/** Compares validated indices against the contiguous range `0..expected-1`. */
export function findIndexGaps(validated: ReadonlySet<number>, expected: number): IndexGap {
  const missing: number[] = [];
  for (let i = 0; i < expected; i++) {
    if (!validated.has(i)) missing.push(i);
  }
  const unexpected = [...validated]
    .filter((i) => i < 0 || i >= expected)
    .sort((a, b) => a - b);
  return { missing, unexpected };
}

@Injectable()
export class CompletionDetector {
  private readonly log = new Logger(CompletionDetector.name);

  constructor(
    private readonly catalog: SessionCatalog,
    private readonly registry: SegmentRegistry,
    private readonly launcher: PipelineLauncher,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {}

  /**
   * Decides whether the session is complete and, if so, starts at most one
   * pipeline execution for it. Safe to call any number of times concurrently.
   */
  async evaluate(tenantId: string, sessionId: string): Promise<CompletionResult> {
    const expected = await this.catalog.getExpectedCount(tenantId, sessionId);
    if (expected === null) {
      this.log.log(`⏳ ${tenantId}/${sessionId}: size not declared yet`);
      return { complete: false, reason: 'awaiting-declaration' };
    }

    const validated = await this.registry.listValidatedIndices(tenantId, sessionId);
    const { missing, unexpected } = findIndexGaps(validated, expected);
    this.log.log(
      `🔢 ${tenantId}/${sessionId}: ${validated.size}/${expected} segments validated`,
    );

    if (missing.length > 0) {
      await this.catalog.transitionStatus(
        tenantId,
        sessionId,
        PRE_DISPATCH_STATUSES,
        'incomplete',
        { missingIndices: missing },
      );
      return { complete: false, reason: 'missing-segments', missing };
    }

    if (unexpected.length > 0) {
      this.log.warn(
        `⚠️  ${tenantId}/${sessionId}: indices outside the declared range ${JSON.stringify(unexpected)}`,
      );
      return { complete: false, reason: 'unexpected-segments', unexpected };
    }

    return this.dispatch(tenantId, sessionId, validated.size);
  }

  private async dispatch(
    tenantId: string,
    sessionId: string,
    uploadedChunks: number,
  ): Promise<CompletionResult> {
    const executionId = this.launcher.newExecutionId({ sessionId });

    // the single linearization point between concurrent evaluations
    const claim = await this.catalog.transitionStatus(
      tenantId,
      sessionId,
      PRE_DISPATCH_STATUSES,
      'ready',
      { executionHandle: executionId, missingIndices: null, errorDetail: null },
    );
    if (!claim.applied) {
      this.log.log(`🛑 ${tenantId}/${sessionId}: already dispatched, suppressing duplicate`);
      return { complete: true, dispatched: false };
    }

    try {
      const session = await this.catalog.getSession(tenantId, sessionId);
      const input = buildPipelineInput(
        {
          tenantId,
          sessionId,
          expectedSegmentCount: session?.expectedSegmentCount ?? uploadedChunks,
          totalDurationSeconds: session?.totalDurationSeconds,
          createdAt: session?.declaredAt,
        },
        {
          bucket: this.settings.bucket,
          uploadedChunks,
          pipelineVersion: this.settings.pipelineVersion,
        },
      );
      await this.launcher.start(executionId, input);
    } catch (error) {
      this.log.error(
        `❌ ${tenantId}/${sessionId}: pipeline start failed: ${describeError(error)}`,
      );
      // nothing runs under this claim; a later evaluation may claim again
      await this.catalog.transitionStatus(tenantId, sessionId, ['ready'], 'dispatch_failed', {
        errorDetail: `dispatch failed: ${describeError(error)}`,
      });
      throw new ProcessingError(`dispatch of ${tenantId}/${sessionId} failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    // may lose to the first pipeline step, which is fine
    await this.catalog.transitionStatus(tenantId, sessionId, ['ready'], 'dispatched', {
      executionHandle: executionId,
    });
    this.log.log(`🚀 ${tenantId}/${sessionId}: pipeline started (${executionId})`);
    return { complete: true, dispatched: true, executionHandle: executionId };
  }
}
