import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { describeError, isPipelineError } from '../common/pipeline-errors';
import { AppEnv } from '../config/env.validation';
import { ChunkIntakeService, IntakeOutcome } from '../intake/chunk-intake.service';
import { UploadNotification, parseUploadNotification } from '../intake/upload-notification';
import { retryDelayMs } from '../pipeline/pipeline.state-machine';
import { MessageBus, RequeueError } from './message-bus';

export type ConsumeResult =
  | { result: 'handled'; outcome: IntakeOutcome }
  | { result: 'requeued'; attempt: number; delayMs: number }
  | { result: 'discarded'; reason: string };

/**
 * Feeds upload notifications from the chunk queue into intake. Retryable
 * failures go back on the queue after a delay; anything else is nacked
 * without requeue. If the delayed copy cannot be published the broker keeps
 * the original.
 */
@Injectable()
export class ChunkUploadConsumer implements OnModuleInit {
  private readonly log = new Logger(ChunkUploadConsumer.name);
  private readonly queue: string;
  private readonly maxAttempts: number;
  private readonly retryBaseMs: number;

  constructor(
    private readonly bus: MessageBus,
    private readonly intake: ChunkIntakeService,
    cfg: ConfigService<AppEnv, true>,
  ) {
    this.queue = cfg.get('CHUNK_UPLOAD_QUEUE', { infer: true });
    this.maxAttempts = cfg.get('INTAKE_MAX_ATTEMPTS', { infer: true });
    this.retryBaseMs = cfg.get('INTAKE_RETRY_BASE_MS', { infer: true });
  }

  async onModuleInit() {
    await this.bus.consume(this.queue, async (payload) => {
      await this.handleMessage(payload);
    });
  }

  async handleMessage(payload: unknown): Promise<ConsumeResult> {
    let notification: UploadNotification;
    try {
      notification = parseUploadNotification(payload);
    } catch (error) {
      this.log.warn(`🗑️  Discarding unreadable notification: ${String(error)}`);
      return { result: 'discarded', reason: 'unreadable notification' };
    }

    try {
      const outcome = await this.intake.handle(notification);
      return { result: 'handled', outcome };
    } catch (error) {
      const attempt = notification.deliveryAttempt;
      if (!isPipelineError(error) || !error.retryable || attempt >= this.maxAttempts) {
        throw error;
      }
      const delayMs = retryDelayMs(attempt, this.retryBaseMs);
      this.log.warn(
        `⏰ ${notification.objectKey}: ${error.message}; redelivering in ${delayMs}ms (attempt ${attempt + 1}/${this.maxAttempts})`,
      );
      try {
        await this.bus.publishDelayed(
          this.queue,
          { ...notification, deliveryAttempt: attempt + 1 },
          delayMs,
        );
      } catch (publishError) {
        throw new RequeueError(
          `${notification.objectKey}: cannot schedule redelivery: ${describeError(publishError)}`,
          { cause: publishError },
        );
      }
      return { result: 'requeued', attempt: attempt + 1, delayMs };
    }
  }
}
