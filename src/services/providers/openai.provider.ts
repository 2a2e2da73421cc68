import OpenAI from 'openai';
import { ChatMessage, ClassifierProvider } from '../../interfaces';

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs: number;
}

/**
 * OpenAI chat-completions backed classifier provider
 */
export class OpenAIClassifierProvider implements ClassifierProvider {
  readonly name = 'openai';
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAIProviderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      // the resolver falls back to pattern matching instead of retrying
      maxRetries: 0,
    });
    this.model = options.model;
  }

  isAvailable(): boolean {
    return true;
  }

  async generate(messages: ChatMessage[], temperature: number, maxTokens: number): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: messages.map(toOpenAIMessage),
      temperature,
      max_tokens: maxTokens,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('OpenAI returned an empty completion');
    }
    return content;
  }
}

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}
