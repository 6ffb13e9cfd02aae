import { describe, it, expect } from 'vitest';
import { ConfigService } from '@nestjs/config';
import {
  loadProviderConfig,
  loadReviewServiceSettings,
  loadStoragePath,
} from '../../../src/infrastructure/config/review-settings.config';
import { ReviewType } from '../../../src/core/domain/entities/review-request.entity';
import { ConfigurationError } from '../../../src/core/domain/errors/review.errors';

function config(values: Record<string, string>): ConfigService {
  return new ConfigService(values);
}

describe('review settings configuration', () => {
  describe('loadProviderConfig', () => {
    it('should default to claude without options', () => {
      expect(loadProviderConfig(config({}))).toEqual({
        name: 'claude',
        apiKey: '',
        options: { model: undefined, maxTokens: undefined, apiEndpoint: undefined },
      });
    });

    it('should read the provider, key and model options', () => {
      const provider = loadProviderConfig(
        config({
          AI_PROVIDER: ' OpenAI ',
          AI_API_KEY: 'test-secret',
          AI_MODEL: 'gpt-4o-mini',
          AI_MAX_TOKENS: '2048',
          AI_API_ENDPOINT: 'http://localhost:8080/v1/chat/completions',
        }),
      );

      expect(provider).toEqual({
        name: 'openai',
        apiKey: 'test-secret',
        options: {
          model: 'gpt-4o-mini',
          maxTokens: 2048,
          apiEndpoint: 'http://localhost:8080/v1/chat/completions',
        },
      });
    });

    it('should fall back to the provider specific key', () => {
      expect(loadProviderConfig(config({ CLAUDE_API_KEY: 'test-claude-secret' })).apiKey).toBe('test-claude-secret');
      expect(
        loadProviderConfig(config({ AI_PROVIDER: 'openai', CLAUDE_API_KEY: 'test-claude-secret' })).apiKey,
      ).toBe('');
    });

    it('should reject a non-numeric token limit', () => {
      expect(() => loadProviderConfig(config({ AI_MAX_TOKENS: 'lots' }))).toThrow(
        'AI_MAX_TOKENS must be a number, got "lots"',
      );
      expect(() => loadProviderConfig(config({ AI_MAX_TOKENS: '0' }))).toThrow(ConfigurationError);
    });
  });

  describe('loadReviewServiceSettings', () => {
    it('should use defaults', () => {
      expect(loadReviewServiceSettings(config({}))).toEqual({
        reviewType: ReviewType.FULL,
        temperature: undefined,
        maxTokens: undefined,
        maxConcurrent: 3,
      });
    });

    it('should read explicit values', () => {
      const settings = loadReviewServiceSettings(
        config({ AI_TEMPERATURE: '0.2', REVIEW_TYPE: 'security', REVIEW_MAX_CONCURRENT: '8' }),
      );

      expect(settings.temperature).toBe(0.2);
      expect(settings.reviewType).toBe(ReviewType.SECURITY);
      expect(settings.maxConcurrent).toBe(8);
    });

    it('should reject out-of-range temperatures and unknown review types', () => {
      expect(() => loadReviewServiceSettings(config({ AI_TEMPERATURE: '1.5' }))).toThrow(
        'AI_TEMPERATURE must be within [0, 1], got 1.5',
      );
      expect(() => loadReviewServiceSettings(config({ REVIEW_TYPE: 'vibes' }))).toThrow(ConfigurationError);
      expect(() => loadReviewServiceSettings(config({ REVIEW_MAX_CONCURRENT: '2.5' }))).toThrow(
        'REVIEW_MAX_CONCURRENT must be a positive integer, got 2.5',
      );
    });
  });

  describe('loadStoragePath', () => {
    it('should default to reviews.db', () => {
      expect(loadStoragePath(config({}))).toBe('reviews.db');
    });

    it('should select the in-memory store for an empty value or "memory"', () => {
      expect(loadStoragePath(config({ REVIEW_DB_PATH: '' }))).toBeUndefined();
      expect(loadStoragePath(config({ REVIEW_DB_PATH: 'Memory' }))).toBeUndefined();
    });

    it('should return a configured path', () => {
      expect(loadStoragePath(config({ REVIEW_DB_PATH: ' /var/lib/reviews.db ' }))).toBe('/var/lib/reviews.db');
    });
  });
});
