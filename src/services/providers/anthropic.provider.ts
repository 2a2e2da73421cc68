import Anthropic from '@anthropic-ai/sdk';
import { ChatMessage, ClassifierProvider } from '../../interfaces';

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

/**
 * Anthropic Messages API backed classifier provider.
 * System messages are lifted out of the list into the `system` field.
 */
export class AnthropicClassifierProvider implements ClassifierProvider {
  readonly name = 'anthropic';
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(options: AnthropicProviderOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
    this.model = options.model;
  }

  isAvailable(): boolean {
    return true;
  }

  async generate(messages: ChatMessage[], temperature: number, maxTokens: number): Promise<string> {
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const conversation: Anthropic.MessageParam[] = [];
    for (const message of messages) {
      if (message.role === 'user' || message.role === 'assistant') {
        conversation.push({ role: message.role, content: message.content });
      }
    }

    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: maxTokens,
      temperature,
      system: system || undefined,
      messages: conversation,
    });

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('\n');

    if (!text) {
      throw new Error('Anthropic returned no text content');
    }
    return text;
  }
}
