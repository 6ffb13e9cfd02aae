import type { AIProviderOptions } from '@core/domain/repositories/ai-provider.repository';
import { ProviderError } from '@core/domain/errors/review.errors';
import { AIModelConfig, AIProviderAdapter, CompletionParams } from './ai-provider.adapter';

export const CLAUDE_DEFAULT_MODEL: AIModelConfig = {
  name: 'claude-3-5-sonnet-20241022',
  apiEndpoint: 'https://api.anthropic.com/v1/messages',
  maxTokens: 4000,
  contextWindow: 200_000,
};

const ANTHROPIC_VERSION = '2023-06-01';

function extractText(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('content' in data) || !Array.isArray(data.content)) {
    return undefined;
  }
  const parts: string[] = [];
  for (const block of data.content) {
    if (typeof block === 'object' && block !== null && 'text' in block && typeof block.text === 'string') {
      parts.push(block.text);
    }
  }
  return parts.length > 0 ? parts.join('') : undefined;
}

export class ClaudeAIService extends AIProviderAdapter {
  readonly providerName = 'claude';

  constructor(apiKey: string, options: AIProviderOptions = {}) {
    super(apiKey, CLAUDE_DEFAULT_MODEL, options);
  }

  protected async callAPI(prompt: string, params: CompletionParams): Promise<string> {
    const response = await fetch(this.model.apiEndpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body: JSON.stringify({
        ...params.extra,
        model: this.model.name,
        max_tokens: params.maxTokens,
        temperature: params.temperature,
        messages: [{ role: 'user', content: prompt }],
      }),
    });

    if (!response.ok) {
      throw new ProviderError(`Claude API Error (${response.status}): ${await this.readErrorBody(response)}`);
    }

    const text = extractText(await response.json());
    if (text === undefined) {
      throw new ProviderError('Claude API returned no text content');
    }
    return text;
  }
}
