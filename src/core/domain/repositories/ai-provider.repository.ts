import type { AIRequest } from '@core/domain/entities/review-request.entity';
import type { AIResponse } from '@core/domain/entities/ai-response.entity';

/**
 * Uniform contract over an analysis backend (Claude, OpenAI, ...).
 * One instance is shared by every concurrent review task.
 */
export interface AIProvider {
  readonly providerName: string;

  generateReview(request: AIRequest): Promise<AIResponse>;

  /**
   * Probe credentials and reachability. Resolves to false instead of rejecting.
   */
  validateConfiguration(): Promise<boolean>;

  getTokenLimit(): number;

  estimateTokens(text: string): number;
}

export interface AIProviderOptions {
  model?: string;
  maxTokens?: number;
  apiEndpoint?: string;
}

export type AIProviderConstructor = new (apiKey: string, options?: AIProviderOptions) => AIProvider;
