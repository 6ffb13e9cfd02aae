import { ArgumentsHost, Catch, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import {
  AIError,
  ConfigurationError,
  ProviderError,
  ReviewError,
  StorageError,
} from '@core/domain/errors/review.errors';

export function statusForError(error: AIError): HttpStatus {
  if (error instanceof ConfigurationError) return HttpStatus.BAD_REQUEST;
  if (error instanceof StorageError) return HttpStatus.SERVICE_UNAVAILABLE;
  if (error instanceof ProviderError) return HttpStatus.BAD_GATEWAY;
  if (error instanceof ReviewError) return HttpStatus.UNPROCESSABLE_ENTITY;
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

export function toHttpException(error: AIError): HttpException {
  const status = statusForError(error);
  return new HttpException({ statusCode: status, error: error.name, message: error.message }, status, { cause: error });
}

/**
 * Maps review pipeline errors onto HTTP statuses; everything else goes
 * through Nest's default handling.
 */
@Catch(AIError)
export class DomainExceptionFilter extends BaseExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: AIError, host: ArgumentsHost): void {
    const httpException = toHttpException(exception);
    if (httpException.getStatus() >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${exception.name}: ${exception.message}`);
    }
    super.catch(httpException, host);
  }
}
