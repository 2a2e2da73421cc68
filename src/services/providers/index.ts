import { Logger } from '@nestjs/common';
import { ClassifierConfig } from '../../config/gateway.config';
import { ClassifierProvider } from '../../interfaces';
import { OpenAIClassifierProvider } from './openai.provider';
import { AnthropicClassifierProvider } from './anthropic.provider';

export { OpenAIClassifierProvider } from './openai.provider';
export { AnthropicClassifierProvider } from './anthropic.provider';

const logger = new Logger('ClassifierProviders');

/**
 * Pick the configured provider, or null when none is usable.
 * No network probe: a provider with a key counts as available.
 */
export function createClassifierProvider(config: ClassifierConfig): ClassifierProvider | null {
  switch (config.provider) {
    case 'openai':
      if (!config.openaiApiKey) {
        logger.warn('OPENAI_API_KEY not set - using pattern matching only');
        return null;
      }
      return new OpenAIClassifierProvider({
        apiKey: config.openaiApiKey,
        model: config.openaiModel,
        baseUrl: config.openaiBaseUrl,
        timeoutMs: config.timeoutMs,
      });

    case 'anthropic':
      if (!config.anthropicApiKey) {
        logger.warn('ANTHROPIC_API_KEY not set - using pattern matching only');
        return null;
      }
      return new AnthropicClassifierProvider({
        apiKey: config.anthropicApiKey,
        model: config.anthropicModel,
        timeoutMs: config.timeoutMs,
      });

    case 'none':
      logger.log('LLM classification disabled - using pattern matching only');
      return null;
  }
}
