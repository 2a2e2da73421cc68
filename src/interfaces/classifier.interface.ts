/**
 * Text-generation provider contract used by the LLM classifier.
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ClassifierProvider {
  /** Provider label for logs, e.g. "openai" */
  readonly name: string;
  generate(messages: ChatMessage[], temperature: number, maxTokens: number): Promise<string>;
  isAvailable(): boolean;
}

/** Injection token for the optional provider */
export const CLASSIFIER_PROVIDER = Symbol('CLASSIFIER_PROVIDER');
