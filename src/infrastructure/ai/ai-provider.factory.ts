import type {
  AIProvider,
  AIProviderConstructor,
  AIProviderOptions,
} from '@core/domain/repositories/ai-provider.repository';
import { ConfigurationError, ProviderError } from '@core/domain/errors/review.errors';
import { ClaudeAIService } from './claude-ai.service';
import { OpenAIService } from './openai.service';

/**
 * Name → constructor registry for analysis backends. Names are case-insensitive.
 */
export class AIProviderFactory {
  private readonly providers = new Map<string, AIProviderConstructor>();

  register(name: string, constructor: AIProviderConstructor): void {
    const key = name.trim().toLowerCase();
    if (!key) {
      throw new ConfigurationError('Provider name must not be empty');
    }
    this.providers.set(key, constructor);
  }

  create(name: string, apiKey: string, options: AIProviderOptions = {}): AIProvider {
    const ProviderClass = this.providers.get(name.trim().toLowerCase());
    if (!ProviderClass) {
      throw new ProviderError(
        `Unknown provider: ${name}. Available providers: ${this.availableProviders().join(', ')}`,
      );
    }
    if (!apiKey) {
      throw new ConfigurationError(`API key is required for provider ${name}`);
    }
    return new ProviderClass(apiKey, options);
  }

  availableProviders(): string[] {
    return Array.from(this.providers.keys());
  }
}

export function createDefaultProviderFactory(): AIProviderFactory {
  const factory = new AIProviderFactory();
  factory.register('claude', ClaudeAIService);
  factory.register('openai', OpenAIService);
  return factory;
}
