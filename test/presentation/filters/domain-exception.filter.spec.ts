import { describe, it, expect } from 'vitest';
import { HttpStatus } from '@nestjs/common';
import { statusForError, toHttpException } from '../../../src/presentation/filters/domain-exception.filter';
import {
  AIError,
  ConfigurationError,
  ProviderError,
  ReviewError,
  StorageError,
  TokenLimitError,
} from '../../../src/core/domain/errors/review.errors';

describe('DomainExceptionFilter helpers', () => {
  it('should map each error family to a status', () => {
    expect(statusForError(new ConfigurationError('bad'))).toBe(HttpStatus.BAD_REQUEST);
    expect(statusForError(new StorageError('down'))).toBe(HttpStatus.SERVICE_UNAVAILABLE);
    expect(statusForError(new ProviderError('upstream'))).toBe(HttpStatus.BAD_GATEWAY);
    expect(statusForError(new TokenLimitError('too big'))).toBe(HttpStatus.BAD_GATEWAY);
    expect(statusForError(new ReviewError('unparseable'))).toBe(HttpStatus.UNPROCESSABLE_ENTITY);
    expect(statusForError(new AIError('other'))).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
  });

  it('should expose the error name and message in the response body', () => {
    const exception = toHttpException(new StorageError('Storage is not configured'));

    expect(exception.getStatus()).toBe(503);
    expect(exception.getResponse()).toEqual({
      statusCode: 503,
      error: 'StorageError',
      message: 'Storage is not configured',
    });
  });
});
