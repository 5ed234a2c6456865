import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import amqplib, { Channel, ConsumeMessage } from 'amqplib';
import { AppEnv } from '../config/env.validation';
import { MessageBus, RequeueError } from './message-bus';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

const PREFETCH = 4;
// pause before a requeued message goes back
const REQUEUE_PAUSE_MS = 1000;

export function waitQueueName(queue: string, delayMs: number) {
  return `${queue}.wait.${delayMs}`;
}

@Injectable()
export class RabbitService extends MessageBus implements OnModuleDestroy {
  private readonly log = new Logger(RabbitService.name);
  private readonly url: string;
  private conn: AmqpConnection | null = null;
  private channel: Promise<Channel> | null = null;
  private readonly asserted = new Set<string>();

  constructor(cfg: ConfigService<AppEnv, true>) {
    super();
    this.url = cfg.get('AMQP_URL', { infer: true });
  }

  async ensureChannel(): Promise<Channel> {
    if (!this.channel) {
      this.channel = this.connect().catch((error: unknown) => {
        this.channel = null;
        throw error;
      });
    }
    return this.channel;
  }

  private async connect(): Promise<Channel> {
    try {
      this.conn = await amqplib.connect(this.url);
      this.log.log('✅ Connected to RabbitMQ successfully');
      return await this.conn.createChannel();
    } catch (error) {
      this.log.error(`❌ Failed to establish RabbitMQ connection: ${String(error)}`);
      throw error;
    }
  }

  private async assertQueue(ch: Channel, queue: string) {
    if (this.asserted.has(queue)) return;
    await ch.assertQueue(queue, { durable: true });
    this.asserted.add(queue);
  }

  /** Parking queue whose messages expire back into `queue`. */
  private async assertWaitQueue(ch: Channel, queue: string, delayMs: number) {
    const name = waitQueueName(queue, delayMs);
    if (this.asserted.has(name)) return name;
    await ch.assertQueue(name, {
      durable: true,
      messageTtl: delayMs,
      deadLetterExchange: '',
      deadLetterRoutingKey: queue,
    });
    this.asserted.add(name);
    return name;
  }

  async publish(queue: string, message: unknown) {
    const ch = await this.ensureChannel();
    await this.assertQueue(ch, queue);
    ch.sendToQueue(queue, Buffer.from(JSON.stringify(message)), { persistent: true });
    this.log.debug(`📤 Published to ${queue}`);
  }

  async publishDelayed(queue: string, message: unknown, delayMs: number) {
    if (delayMs <= 0) return this.publish(queue, message);

    const ch = await this.ensureChannel();
    await this.assertQueue(ch, queue);
    const wait = await this.assertWaitQueue(ch, queue, Math.round(delayMs));
    ch.sendToQueue(wait, Buffer.from(JSON.stringify(message)), { persistent: true });
    this.log.debug(`⏰ Published to ${queue} with ${delayMs}ms delay`);
  }

  async consume(queue: string, handler: (payload: unknown) => Promise<void>) {
    const ch = await this.ensureChannel();
    await this.assertQueue(ch, queue);
    await ch.prefetch(PREFETCH);

    await ch.consume(queue, (msg) => {
      if (!msg) {
        this.log.warn(`⚠️  Consumer for ${queue} cancelled by broker`);
        return;
      }
      void this.dispatch(ch, queue, msg, handler);
    });
    this.log.log(`👂 Consuming ${queue}`);
  }

  private async dispatch(
    ch: Channel,
    queue: string,
    msg: ConsumeMessage,
    handler: (payload: unknown) => Promise<void>,
  ) {
    const startTime = Date.now();
    try {
      const payload: unknown = JSON.parse(msg.content.toString());
      await handler(payload);
      ch.ack(msg);
      this.log.debug(`✅ ${queue} message processed in ${Date.now() - startTime}ms`);
    } catch (error) {
      const requeue = error instanceof RequeueError;
      this.log.error(
        `❌ ${queue} message failed after ${Date.now() - startTime}ms: ${String(error)}` +
          (requeue ? ', requeueing' : ''),
      );
      if (requeue) await new Promise((resolve) => setTimeout(resolve, REQUEUE_PAUSE_MS));
      ch.nack(msg, false, requeue);
    }
  }

  async onModuleDestroy() {
    try {
      if (this.channel) {
        const ch = await this.channel;
        await ch.close();
      }
    } catch (error) {
      this.log.error(`❌ Error closing channel: ${String(error)}`);
    }

    try {
      if (this.conn) {
        await this.conn.close();
        this.log.log('✅ Connection closed successfully');
      }
    } catch (error) {
      this.log.error(`❌ Error closing connection: ${String(error)}`);
    }
  }
}
