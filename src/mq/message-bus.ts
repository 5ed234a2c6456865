/**
 * Queue operations the intake consumer and the orchestrator depend on.
 * A handler that resolves acknowledges the message. One that throws
 * `RequeueError` has it put back on its queue; any other error drops it.
 */
export abstract class MessageBus {
  abstract publish(queue: string, message: unknown): Promise<void>;

  /** Delivers `message` to `queue` no earlier than `delayMs` from now. */
  abstract publishDelayed(queue: string, message: unknown, delayMs: number): Promise<void>;

  abstract consume(
    queue: string,
    handler: (payload: unknown) => Promise<void>,
  ): Promise<void>;
}

/** The handler could not hand its work on; the message must be delivered again. */
export class RequeueError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RequeueError';
  }
}
