import type { CompletionOptions, Message, ProviderName } from '../../types/index.js';

/**
 * Interface for chat/completion providers.
 * Both backends implement this interface so the assistant can use either one.
 */
export interface IChatProvider {
  /**
   * Send an ordered, non-empty message sequence and resolve with the assistant's reply.
   * Performs exactly one outbound request; rejects with a NetworkError, ApiError or ParseError.
   */
  complete(messages: readonly Message[], options?: CompletionOptions): Promise<string>;

  /**
   * Backend identifier, also used to pick the prompt shape
   */
  readonly name: ProviderName;

  /**
   * Model used when a call does not override it
   */
  readonly defaultModel: string;
}

export interface ChatProviderSettings {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  transport?: HttpTransport;
}

export type HttpTransport = (url: string, init: RequestInit) => Promise<Response>;

export const DEFAULT_MAX_TOKENS = 500;
export const DEFAULT_TEMPERATURE = 0.7;
