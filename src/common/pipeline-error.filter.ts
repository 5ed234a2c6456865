import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { PipelineError, PipelineErrorCode } from './pipeline-errors';

const STATUS_BY_CODE: Record<PipelineErrorCode, HttpStatus> = {
  MalformedKey: HttpStatus.ACCEPTED,
  InvalidSegment: HttpStatus.SERVICE_UNAVAILABLE,
  ValidationError: HttpStatus.BAD_REQUEST,
  ProcessingError: HttpStatus.SERVICE_UNAVAILABLE,
  TranscriptionError: HttpStatus.UNPROCESSABLE_ENTITY,
  SummaryFormatError: HttpStatus.UNPROCESSABLE_ENTITY,
  CatalogError: HttpStatus.SERVICE_UNAVAILABLE,
};

export function httpStatusFor(error: PipelineError): HttpStatus {
  return STATUS_BY_CODE[error.code];
}

/** Maps domain errors to HTTP answers; the body never carries a stack. */
@Catch(PipelineError)
export class PipelineErrorFilter implements ExceptionFilter {
  private readonly log = new Logger(PipelineErrorFilter.name);

  catch(error: PipelineError, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    const status = httpStatusFor(error);
    if (status >= 500) {
      this.log.warn(`⚠️  ${error.toDetail()}`);
    }
    res.status(status).json({
      statusCode: status,
      error: error.code,
      message: error.message,
      retryable: error.retryable,
    });
  }
}
