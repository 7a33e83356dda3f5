import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import {
  InvalidRangeError,
  KindNotEnabledError,
  MalformedPayloadError,
  MeasurementError,
  OutOfRangeError,
  StorageUnavailableError,
} from './measurement.errors';

/**
 * Error body returned for every MeasurementError
 */
interface MeasurementErrorBody {
  statusCode: number;
  error: string;
  message: string;
  [detail: string]: unknown;
}

/**
 * HTTP status for a domain error.
 *
 * Client-input errors (including a disabled kind, on both the read and the
 * write path) are 400; storage failures are 503 so clients know a retry may
 * succeed. UnknownKindError only occurs at startup and maps to 500.
 */
export function statusForError(error: MeasurementError): HttpStatus {
  if (
    error instanceof KindNotEnabledError ||
    error instanceof MalformedPayloadError ||
    error instanceof OutOfRangeError ||
    error instanceof InvalidRangeError
  ) {
    return HttpStatus.BAD_REQUEST;
  }
  if (error instanceof StorageUnavailableError) {
    return HttpStatus.SERVICE_UNAVAILABLE;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

@Catch(MeasurementError)
export class MeasurementExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(MeasurementExceptionFilter.name);

  catch(exception: MeasurementError, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const status = statusForError(exception);

    const message = `${request.method} ${request.url} -> ${status} ${exception.code}: ${exception.message}`;
    if (status >= 500) {
      this.logger.error(message);
    } else {
      this.logger.warn(message);
    }

    const body: MeasurementErrorBody = {
      ...exception.details,
      statusCode: status,
      error: exception.code,
      message: exception.message,
    };
    response.status(status).json(body);
  }
}
