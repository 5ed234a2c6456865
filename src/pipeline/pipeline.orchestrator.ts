import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { SessionCatalog } from '../catalog/session-catalog';
import { isTerminal } from '../catalog/session-status';
import {
  CatalogError,
  ProcessingError,
  TranscriptionError,
  describeError,
  isPipelineError,
} from '../common/pipeline-errors';
import { AppEnv } from '../config/env.validation';
import { Session } from '../db/session.entity';
import { MessageBus, RequeueError } from '../mq/message-bus';
import {
  FAILABLE_STATUSES,
  STATE_STATUS,
  entryStatuses,
  isTerminalState,
  nextState,
  pollDelayMs,
  retryDelayMs,
} from './pipeline.state-machine';
import { PIPELINE_SETTINGS, PipelineSettings } from './pipeline.settings';
import {
  PIPELINE_STATES,
  PipelineContext,
  PipelineInput,
  PipelineLauncher,
  PipelineState,
  PipelineStep,
} from './pipeline.types';
import { FinalizeCatalogStage } from './stages/finalize-catalog.stage';
import { PollTranscribeStage } from './stages/poll-transcribe.stage';
import { StartTranscodeStage } from './stages/start-transcode.stage';
import { StartTranscribeStage } from './stages/start-transcribe.stage';
import { SummarizeStage } from './stages/summarize.stage';
import { ValidateInputStage, parsePipelineInput } from './stages/validate-input.stage';

const contextSchema = z.object({
  videoKey: z.string().optional(),
  audioKey: z.string().optional(),
  transcriptionJobName: z.string().optional(),
  rawTranscriptKey: z.string().optional(),
  transcriptKey: z.string().optional(),
  summaryKey: z.string().optional(),
  transcriptionDeadline: z.string().optional(),
  nextCheckAfter: z.string().optional(),
  pollCount: z.number().int().nonnegative().optional(),
});

// input is only checked for identity here; the stages parse it fully
const envelopeSchema = z.object({
  executionId: z.string().min(1),
  state: z.enum(PIPELINE_STATES),
  input: z.object({ tenantId: z.string().min(1), sessionId: z.string().min(1) }).passthrough(),
  context: contextSchema.default({}),
  attempt: z.number().int().positive().default(1),
  enteredAt: z.string().optional(),
});

type Envelope = z.infer<typeof envelopeSchema>;
type StepMessage = Omit<PipelineStep, 'input'> & { input: Envelope['input'] };

export type StepOutcome =
  | { kind: 'advance'; context: PipelineContext }
  | { kind: 'wait'; context: PipelineContext; delayMs: number }
  | { kind: 'completed' };

export type StepResult =
  | { result: 'dropped'; reason: string }
  | { result: 'advanced'; next: PipelineState }
  | { result: 'waiting'; delayMs: number }
  | { result: 'retrying'; attempt: number; delayMs: number }
  | { result: 'completed' }
  | { result: 'failed'; errorDetail: string };

/**
 * Drives one execution per dispatched session through its states. Each state
 * runs from one message on the pipeline queue; progress, polling waits and
 * retries are further messages, so nothing blocks between steps.
 */
@Injectable()
export class PipelineOrchestrator extends PipelineLauncher implements OnModuleInit {
  private readonly log = new Logger(PipelineOrchestrator.name);
  private readonly queue: string;

  constructor(
    private readonly bus: MessageBus,
    private readonly catalog: SessionCatalog,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    private readonly validateInput: ValidateInputStage,
    private readonly startTranscode: StartTranscodeStage,
    private readonly startTranscribe: StartTranscribeStage,
    private readonly pollTranscribe: PollTranscribeStage,
    private readonly summarize: SummarizeStage,
    private readonly finalizeCatalog: FinalizeCatalogStage,
    cfg: ConfigService<AppEnv, true>,
  ) {
    super();
    this.queue = cfg.get('PIPELINE_QUEUE', { infer: true });
  }

  async onModuleInit() {
    await this.bus.consume(this.queue, async (payload) => {
      await this.handleStep(payload);
    });
  }

  newExecutionId(input: Pick<PipelineInput, 'sessionId'>): string {
    return `${input.sessionId}_${Math.floor(Date.now() / 1000)}_${randomUUID().slice(0, 8)}`;
  }

  async start(executionId: string, input: PipelineInput): Promise<void> {
    const step: PipelineStep = {
      executionId,
      state: 'Validating',
      input,
      context: {},
      attempt: 1,
      enteredAt: new Date().toISOString(),
    };
    await this.bus.publish(this.queue, step);
    this.log.log(`🚀 Execution ${executionId} scheduled for ${input.tenantId}/${input.sessionId}`);
  }

  /**
   * Runs one state of one execution. Rejects with `RequeueError` only when
   * neither the next message nor the failure could be recorded.
   */
  async handleStep(payload: unknown, now = new Date()): Promise<StepResult> {
    const parsed = envelopeSchema.safeParse(payload);
    if (!parsed.success) {
      this.log.error(`❌ Unreadable pipeline step dropped: ${parsed.error.issues[0]?.message}`);
      return { result: 'dropped', reason: 'unreadable step' };
    }
    const step = parsed.data;
    const { tenantId, sessionId } = step.input;

    if (isTerminalState(step.state)) {
      return { result: 'dropped', reason: `${step.state} is terminal` };
    }

    let session: Session | null;
    try {
      session = await this.catalog.getSession(tenantId, sessionId);
    } catch (error) {
      return this.handleFailure(
        step,
        new CatalogError(`cannot read ${tenantId}/${sessionId}: ${describeError(error)}`, {
          cause: error,
        }),
        now,
      );
    }
    if (!session || session.executionHandle !== step.executionId) {
      this.log.warn(`🛑 Step for stale execution ${step.executionId} dropped`);
      return { result: 'dropped', reason: 'stale execution' };
    }
    if (isTerminal(session.status)) {
      return { result: 'dropped', reason: `session already ${session.status}` };
    }

    let outcome: StepOutcome;
    try {
      const entered = await this.catalog.transitionStatus(
        tenantId,
        sessionId,
        entryStatuses(step.state),
        STATE_STATUS[step.state],
      );
      if (!entered.applied) {
        this.log.warn(`🛑 ${tenantId}/${sessionId}: ${step.state} not enterable from ${session.status}`);
        return { result: 'dropped', reason: 'status moved on' };
      }

      const input = parsePipelineInput(step.input);
      outcome = await this.runState(step.state, input, step.context, now);
    } catch (error) {
      return this.handleFailure(step, error, now);
    }

    try {
      return await this.schedule(step, outcome, now);
    } catch (error) {
      return this.handleFailure(
        step,
        new ProcessingError(`cannot schedule the step after ${step.state}: ${describeError(error)}`, {
          cause: error,
        }),
        now,
      );
    }
  }

  private async schedule(step: Envelope, outcome: StepOutcome, now: Date): Promise<StepResult> {
    switch (outcome.kind) {
      case 'completed':
        return { result: 'completed' };
      case 'wait':
        await this.bus.publishDelayed(
          this.queue,
          this.follow(step, step.state, outcome.context, now),
          outcome.delayMs,
        );
        return { result: 'waiting', delayMs: outcome.delayMs };
      case 'advance': {
        const next = nextState(step.state);
        await this.bus.publish(this.queue, this.follow(step, next, outcome.context, now));
        return { result: 'advanced', next };
      }
    }
  }

  private async runState(
    state: PipelineState,
    input: PipelineInput,
    context: PipelineContext,
    now: Date,
  ): Promise<StepOutcome> {
    switch (state) {
      case 'Validating':
        this.validateInput.run(input);
        return { kind: 'advance', context };

      case 'Transcoding': {
        const out = await this.startTranscode.run(input);
        return { kind: 'advance', context: { ...context, ...out } };
      }

      case 'AwaitingTranscription':
        return this.awaitTranscription(input, context, now);

      case 'Summarizing': {
        const out = await this.summarize.run(input, context, now);
        return { kind: 'advance', context: { ...context, ...out } };
      }

      case 'Finalizing':
        await this.finalizeCatalog.run(input, now);
        return { kind: 'completed' };

      case 'Completed':
      case 'Failed':
        throw new Error(`${state} has no entry action`);
    }
  }

  /** First entry starts the job; later entries poll it until done or out of time. */
  private async awaitTranscription(
    input: PipelineInput,
    context: PipelineContext,
    now: Date,
  ): Promise<StepOutcome> {
    const { tenantId, sessionId } = input;
    const { pollInitialMs, pollMaxMs, transcribeTimeoutMs } = this.settings;

    if (!context.transcriptionJobName) {
      const started = await this.startTranscribe.run(input, context, now);
      const delayMs = pollDelayMs(0, pollInitialMs, pollMaxMs);
      const nextCheckAfter = new Date(now.getTime() + delayMs).toISOString();
      await this.catalog.recordPollSchedule(tenantId, sessionId, started.jobName, nextCheckAfter);
      return {
        kind: 'wait',
        delayMs,
        context: {
          ...context,
          transcriptionJobName: started.jobName,
          rawTranscriptKey: started.rawTranscriptKey,
          transcriptionDeadline: new Date(now.getTime() + transcribeTimeoutMs).toISOString(),
          nextCheckAfter,
          pollCount: 0,
        },
      };
    }

    const poll = await this.pollTranscribe.run(input, context);
    if (poll.status === 'completed') {
      return { kind: 'advance', context: { ...context, transcriptKey: poll.transcriptKey } };
    }

    const deadline = context.transcriptionDeadline
      ? Date.parse(context.transcriptionDeadline)
      : Number.POSITIVE_INFINITY;
    if (now.getTime() >= deadline) {
      throw new TranscriptionError(
        `transcription ${context.transcriptionJobName} still running after ${transcribeTimeoutMs}ms`,
      );
    }

    const pollCount = (context.pollCount ?? 0) + 1;
    const delayMs = pollDelayMs(pollCount, pollInitialMs, pollMaxMs);
    const nextCheckAfter = new Date(now.getTime() + delayMs).toISOString();
    await this.catalog.recordPollSchedule(
      tenantId,
      sessionId,
      context.transcriptionJobName,
      nextCheckAfter,
    );
    return { kind: 'wait', delayMs, context: { ...context, pollCount, nextCheckAfter } };
  }

  private async handleFailure(step: Envelope, error: unknown, now: Date): Promise<StepResult> {
    const { tenantId, sessionId } = step.input;
    const retryable = isPipelineError(error) && error.retryable;

    if (retryable && step.attempt < this.settings.maxAttempts) {
      const delayMs = retryDelayMs(step.attempt, this.settings.retryBaseMs);
      this.log.warn(
        `🔁 ${tenantId}/${sessionId}: ${step.state} attempt ${step.attempt} failed (${describeError(error)}), retrying in ${delayMs}ms`,
      );
      try {
        await this.bus.publishDelayed(
          this.queue,
          { ...this.follow(step, step.state, step.context, now), attempt: step.attempt + 1 },
          delayMs,
        );
      } catch (publishError) {
        throw new RequeueError(
          `${tenantId}/${sessionId}: cannot schedule retry of ${step.state}: ${describeError(publishError)}`,
          { cause: publishError },
        );
      }
      return { result: 'retrying', attempt: step.attempt + 1, delayMs };
    }

    const errorDetail = describeError(error);
    this.log.error(
      `❌ ${tenantId}/${sessionId}: ${step.state} failed: ${errorDetail}`,
      error instanceof Error ? error.stack : undefined,
    );
    try {
      await this.catalog.transitionStatus(tenantId, sessionId, FAILABLE_STATUSES, 'failed', {
        errorDetail,
      });
    } catch (catalogError) {
      throw new RequeueError(
        `${tenantId}/${sessionId}: cannot record failure of ${step.state}: ${describeError(catalogError)}`,
        { cause: catalogError },
      );
    }
    return { result: 'failed', errorDetail };
  }

  private follow(
    step: Envelope,
    state: PipelineState,
    context: PipelineContext,
    now: Date,
  ): StepMessage {
    return {
      executionId: step.executionId,
      state,
      input: step.input,
      context,
      attempt: 1,
      enteredAt: now.toISOString(),
    };
  }
}
