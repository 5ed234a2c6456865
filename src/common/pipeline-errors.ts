export type PipelineErrorCode =
  | 'MalformedKey'
  | 'InvalidSegment'
  | 'ValidationError'
  | 'ProcessingError'
  | 'TranscriptionError'
  | 'SummaryFormatError'
  | 'CatalogError';

/**
 * Base class for every failure the intake path and the pipeline know how to
 * route. `retryable` decides whether a consumer re-delivers the message or the
 * orchestrator schedules another attempt.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Tenant-visible detail stored on the session; never a stack. */
  toDetail(): string {
    return `${this.code}: ${this.message}`;
  }
}

export class MalformedKeyError extends PipelineError {
  readonly code = 'MalformedKey';
  readonly retryable = false;
}

export class InvalidSegmentError extends PipelineError {
  readonly code = 'InvalidSegment';
  readonly retryable = true;
}

export class ValidationError extends PipelineError {
  readonly code = 'ValidationError';
  readonly retryable = false;
}

export class ProcessingError extends PipelineError {
  readonly code = 'ProcessingError';
  readonly retryable = true;
}

export class TranscriptionError extends PipelineError {
  readonly code = 'TranscriptionError';
  readonly retryable = false;
}

export class SummaryFormatError extends PipelineError {
  readonly code = 'SummaryFormatError';
  readonly retryable = false;
}

export class CatalogError extends PipelineError {
  readonly code = 'CatalogError';
  readonly retryable = true;
}

export function isPipelineError(e: unknown): e is PipelineError {
  return e instanceof PipelineError;
}

export function describeError(e: unknown): string {
  if (isPipelineError(e)) return e.toDetail();
  if (e instanceof Error) return `${e.name}: ${e.message}`;
  return String(e);
}
