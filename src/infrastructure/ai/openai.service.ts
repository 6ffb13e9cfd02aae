import type { AIProviderOptions } from '@core/domain/repositories/ai-provider.repository';
import { ProviderError } from '@core/domain/errors/review.errors';
import { AIModelConfig, AIProviderAdapter, CompletionParams } from './ai-provider.adapter';

export const OPENAI_DEFAULT_MODEL: AIModelConfig = {
  name: 'gpt-4o',
  apiEndpoint: 'https://api.openai.com/v1/chat/completions',
  maxTokens: 4000,
  contextWindow: 128_000,
};

function extractMessage(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('choices' in data) || !Array.isArray(data.choices)) {
    return undefined;
  }
  const [choice] = data.choices;
  if (typeof choice !== 'object' || choice === null || !('message' in choice)) {
    return undefined;
  }
  const message = choice.message;
  if (typeof message !== 'object' || message === null || !('content' in message)) {
    return undefined;
  }
  return typeof message.content === 'string' ? message.content : undefined;
}

export class OpenAIService extends AIProviderAdapter {
  readonly providerName = 'openai';

  constructor(apiKey: string, options: AIProviderOptions = {}) {
    super(apiKey, OPENAI_DEFAULT_MODEL, options);
  }

  protected async callAPI(prompt: string, params: CompletionParams): Promise<string> {
    const response = await fetch(this.model.apiEndpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        ...params.extra,
        model: this.model.name,
        max_tokens: params.maxTokens,
        temperature: params.temperature,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: 'You are a code review assistant that outputs only valid JSON.' },
          { role: 'user', content: prompt },
        ],
      }),
    });

    if (!response.ok) {
      throw new ProviderError(`OpenAI API Error (${response.status}): ${await this.readErrorBody(response)}`);
    }

    const content = extractMessage(await response.json());
    if (content === undefined) {
      throw new ProviderError('OpenAI API returned no message content');
    }
    return content;
  }
}
