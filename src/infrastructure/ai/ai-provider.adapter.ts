import { Logger } from '@nestjs/common';
import type { AIProvider, AIProviderOptions } from '@core/domain/repositories/ai-provider.repository';
import type { AIRequest, GenerationParams } from '@core/domain/entities/review-request.entity';
import type { AIResponse } from '@core/domain/entities/ai-response.entity';
import { ProviderError, TokenLimitError, errorMessage } from '@core/domain/errors/review.errors';
import { applyReviewSettings, parseReviewPayload } from './ai-response.parser';
import { buildReviewPrompt } from './review-prompt.builder';

export interface AIModelConfig {
  name: string;
  apiEndpoint: string;
  maxTokens: number;
  contextWindow: number;
}

export interface CompletionParams {
  maxTokens: number;
  temperature: number;
  /** Extra backend fields (top_p, stop sequences, ...) sent as-is. */
  extra?: GenerationParams;
}

const PROBE_PROMPT = 'Reply with exactly this JSON and nothing else: {"summary":"ok","comments":[]}';

/**
 * Shared request pipeline for HTTP-backed providers: validate, build the
 * prompt, call the backend, parse. Subclasses only implement the transport.
 */
export abstract class AIProviderAdapter implements AIProvider {
  abstract readonly providerName: string;

  protected readonly logger: Logger;
  protected readonly model: AIModelConfig;

  constructor(
    protected readonly apiKey: string,
    defaultModel: AIModelConfig,
    options: AIProviderOptions = {},
  ) {
    this.logger = new Logger(new.target.name);
    this.model = {
      ...defaultModel,
      name: options.model || defaultModel.name,
      apiEndpoint: options.apiEndpoint || defaultModel.apiEndpoint,
      maxTokens: options.maxTokens ?? defaultModel.maxTokens,
    };
  }

  async generateReview(request: AIRequest): Promise<AIResponse> {
    if (!request.validate()) {
      throw new ProviderError(
        `Invalid review request for ${request.codeContext.filePath || '<unnamed file>'}: ` +
          'content and file path are required, temperature must be within [0, 1] and review type must be known',
      );
    }

    const prompt = buildReviewPrompt(request);
    const maxTokens = request.maxTokens ?? this.model.maxTokens;
    const required = this.estimateTokens(prompt) + maxTokens;
    if (required > this.getTokenLimit()) {
      throw new TokenLimitError(
        `Request for ${request.codeContext.filePath} needs about ${required} tokens, ` +
          `${this.providerName} allows ${this.getTokenLimit()}`,
      );
    }

    let raw: string;
    try {
      raw = await this.callAPI(prompt, {
        maxTokens,
        temperature: request.temperature,
        extra: request.generationParams,
      });
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(`Failed to call ${this.providerName} API: ${errorMessage(error)}`, { cause: error });
    }

    const response = parseReviewPayload(raw, {
      provider: this.providerName,
      model: this.model.name,
      reviewType: request.reviewType,
    });
    return applyReviewSettings(response, request.settings);
  }

  async validateConfiguration(): Promise<boolean> {
    if (!this.apiKey) return false;
    try {
      await this.callAPI(PROBE_PROMPT, { maxTokens: 32, temperature: 0 });
      return true;
    } catch (error) {
      this.logger.warn(`${this.providerName} configuration check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  getTokenLimit(): number {
    return this.model.contextWindow;
  }

  estimateTokens(text: string): number {
    return Math.ceil(text.length / 4);
  }

  getModel(): AIModelConfig {
    return this.model;
  }

  protected abstract callAPI(prompt: string, params: CompletionParams): Promise<string>;

  protected async readErrorBody(response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      return `<unreadable body: ${errorMessage(error)}>`;
    }
  }
}
