import { getConfig, type Config } from '../../config.js';
import { createChildLogger } from '../../utils/logger.js';
import type { ProviderName } from '../../types/index.js';
import type { ChatProviderSettings, IChatProvider } from './IChatProvider.js';
import { OpenAIChatProvider } from './openai.js';
import { AnthropicChatProvider } from './anthropic.js';

const logger = createChildLogger('chat-provider');

let instance: IChatProvider | null = null;

export function createChatProvider(provider: ProviderName, settings: ChatProviderSettings): IChatProvider {
  switch (provider) {
    case 'openai':
      return new OpenAIChatProvider(settings);
    case 'anthropic':
      return new AnthropicChatProvider(settings);
  }
}

export function settingsFromConfig(config: Config): ChatProviderSettings {
  const shared = {
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    timeoutMs: config.requestTimeoutMs,
  };

  switch (config.chatProvider) {
    case 'openai':
      return { ...shared, apiKey: config.openaiApiKey, model: config.openaiChatModel };
    case 'anthropic':
      return { ...shared, apiKey: config.anthropicApiKey, model: config.anthropicModel };
  }
}

export function getChatProvider(): IChatProvider {
  if (instance) {
    return instance;
  }

  const config = getConfig();
  logger.info({ provider: config.chatProvider }, 'Initializing chat provider');
  instance = createChatProvider(config.chatProvider, settingsFromConfig(config));

  return instance;
}

export function resetChatProvider(): void {
  instance = null;
}

export type { IChatProvider, ChatProviderSettings, HttpTransport } from './IChatProvider.js';
export { OpenAIChatProvider } from './openai.js';
export { AnthropicChatProvider } from './anthropic.js';
