/**
 * Base class for every error raised by the review pipeline.
 */
export class AIError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Backend call, auth or transport failure, or a request rejected before the call. */
export class ProviderError extends AIError {}

/** The estimated request size does not fit the backend's context window. */
export class TokenLimitError extends ProviderError {}

/** A response that cannot be parsed, or a file review that failed end to end. */
export class ReviewError extends AIError {}

/** Persistence I/O or deserialization fault. */
export class StorageError extends AIError {}

/** Unknown or misconfigured provider or settings. */
export class ConfigurationError extends AIError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
