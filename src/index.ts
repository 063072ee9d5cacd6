export { CodingAssistant, getAssistant, type AssistantOptions } from './services/assistant.js';
export {
  createChatProvider,
  getChatProvider,
  resetChatProvider,
  settingsFromConfig,
  OpenAIChatProvider,
  AnthropicChatProvider,
  type IChatProvider,
  type ChatProviderSettings,
  type HttpTransport,
} from './providers/chat/index.js';
export { toOpenAIBody } from './providers/chat/openai.js';
export { toAnthropicBody } from './providers/chat/anthropic.js';
export { getConfig, parseConfig, loadConfigFile, resetConfig, type Config } from './config.js';
export {
  buildCompletionRequest,
  settleCompletion,
  type CompletionOptions,
  type CompletionRequest,
  type CompletionResult,
  type Message,
  type MessageRole,
  type ProviderName,
} from './types/index.js';
export {
  AppError,
  ProviderError,
  NetworkError,
  ApiError,
  ParseError,
  ConfigError,
  isAppError,
  isChatError,
  type ChatError,
} from './utils/errors.js';
export { buildApp } from './server.js';
