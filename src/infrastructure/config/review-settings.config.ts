import { ConfigService } from '@nestjs/config';
import { ReviewType, isReviewType } from '@core/domain/entities/review-request.entity';
import { ConfigurationError } from '@core/domain/errors/review.errors';
import type { AIProviderOptions } from '@core/domain/repositories/ai-provider.repository';
import { DEFAULT_MAX_CONCURRENT, ReviewServiceSettings } from '@core/services/code-review.service';

export const DEFAULT_PROVIDER = 'claude';
export const DEFAULT_DB_PATH = 'reviews.db';

export interface ProviderConfig {
  name: string;
  apiKey: string;
  options: AIProviderOptions;
}

/** Per-provider fallback keys, used when AI_API_KEY is unset. */
const PROVIDER_KEY_VARIABLES: Record<string, string> = {
  claude: 'CLAUDE_API_KEY',
  openai: 'OPENAI_API_KEY',
};

function readString(config: ConfigService, key: string): string | undefined {
  const value = config.get<string>(key);
  if (value === undefined || value === null) return undefined;
  const trimmed = String(value).trim();
  return trimmed === '' ? undefined : trimmed;
}

function readNumber(config: ConfigService, key: string): number | undefined {
  const raw = readString(config, key);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readPositiveInteger(config: ConfigService, key: string): number | undefined {
  const value = readNumber(config, key);
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new ConfigurationError(`${key} must be a positive integer, got ${value}`);
  }
  return value;
}

export function loadProviderConfig(config: ConfigService): ProviderConfig {
  const name = (readString(config, 'AI_PROVIDER') ?? DEFAULT_PROVIDER).toLowerCase();
  const fallbackKey = PROVIDER_KEY_VARIABLES[name];
  const apiKey = readString(config, 'AI_API_KEY') ?? (fallbackKey ? readString(config, fallbackKey) : undefined) ?? '';

  return {
    name,
    apiKey,
    options: {
      model: readString(config, 'AI_MODEL'),
      maxTokens: readPositiveInteger(config, 'AI_MAX_TOKENS'),
      apiEndpoint: readString(config, 'AI_API_ENDPOINT'),
    },
  };
}

export function loadReviewServiceSettings(config: ConfigService): ReviewServiceSettings {
  const temperature = readNumber(config, 'AI_TEMPERATURE');
  if (temperature !== undefined && (temperature < 0 || temperature > 1)) {
    throw new ConfigurationError(`AI_TEMPERATURE must be within [0, 1], got ${temperature}`);
  }

  const reviewType = readString(config, 'REVIEW_TYPE') ?? ReviewType.FULL;
  if (!isReviewType(reviewType)) {
    throw new ConfigurationError(`REVIEW_TYPE must be one of ${Object.values(ReviewType).join(', ')}`);
  }

  return {
    reviewType,
    temperature,
    maxTokens: readPositiveInteger(config, 'AI_MAX_TOKENS'),
    maxConcurrent: readPositiveInteger(config, 'REVIEW_MAX_CONCURRENT') ?? DEFAULT_MAX_CONCURRENT,
  };
}

/**
 * SQLite file for review history, or undefined when the in-memory store
 * was requested (`REVIEW_DB_PATH` set to an empty string or `memory`).
 */
export function loadStoragePath(config: ConfigService): string | undefined {
  const raw = config.get<string>('REVIEW_DB_PATH');
  if (raw === undefined) return DEFAULT_DB_PATH;
  const path = String(raw).trim();
  return path === '' || path.toLowerCase() === 'memory' ? undefined : path;
}
