import { z } from 'zod';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type ChatProviderSettings,
  type HttpTransport,
  type IChatProvider,
} from './IChatProvider.js';
import { decodeBody, postJson } from './http.js';
import {
  buildCompletionRequest,
  type CompletionDefaults,
  type CompletionOptions,
  type CompletionRequest,
  type Message,
} from '../../types/index.js';
import { ApiError, ConfigError, ParseError, isChatError } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';

const logger = createChildLogger('openai-chat');

export const OPENAI_CHAT_URL = 'https://api.openai.com/v1/chat/completions';
export const OPENAI_DEFAULT_MODEL = 'gpt-3.5-turbo';

interface OpenAIMessage {
  role: string;
  content: string;
}

export interface OpenAIRequestBody {
  model: string;
  messages: OpenAIMessage[];
  max_tokens: number;
  temperature: number;
}

const OpenAIResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string().optional(),
        content: z.string().nullable(),
      }),
      finish_reason: z.string().nullable().optional(),
    })
  ),
  usage: z.unknown().optional(),
});

export function toOpenAIBody(request: CompletionRequest): OpenAIRequestBody {
  return {
    model: request.model,
    messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
    max_tokens: request.maxTokens,
    temperature: request.temperature,
  };
}

export class OpenAIChatProvider implements IChatProvider {
  readonly name = 'openai';
  readonly defaultModel: string;
  private readonly apiKey: string;
  private readonly defaults: CompletionDefaults;
  private readonly timeoutMs?: number;
  private readonly transport: HttpTransport;

  constructor(settings: ChatProviderSettings) {
    if (!settings.apiKey) {
      throw new ConfigError('OPENAI_API_KEY is required for OpenAI chat provider');
    }
    this.apiKey = settings.apiKey;
    this.defaultModel = settings.model ?? OPENAI_DEFAULT_MODEL;
    this.defaults = {
      model: this.defaultModel,
      maxTokens: settings.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: settings.temperature ?? DEFAULT_TEMPERATURE,
    };
    this.timeoutMs = settings.timeoutMs;
    this.transport = settings.transport ?? ((url, init) => fetch(url, init));
    logger.info({ model: this.defaultModel }, 'OpenAI chat provider initialized');
  }

  async complete(messages: readonly Message[], options: CompletionOptions = {}): Promise<string> {
    const request = buildCompletionRequest(messages, options, this.defaults);
    logger.debug({ model: request.model, messageCount: messages.length }, 'Requesting completion');

    try {
      const { status, data } = await postJson({
        provider: this.name,
        url: OPENAI_CHAT_URL,
        headers: { Authorization: `Bearer ${this.apiKey}` },
        body: toOpenAIBody(request),
        transport: this.transport,
        signal: options.signal,
        timeoutMs: this.timeoutMs,
      });

      const response = decodeBody(this.name, OpenAIResponseSchema, data);
      const content = response.choices[0]?.message.content;
      if (typeof content !== 'string') {
        throw new ParseError(this.name, 'No response from OpenAI');
      }

      logger.debug({ status, responseLength: content.length }, 'Received completion');
      return content;
    } catch (error) {
      if (isChatError(error)) {
        logger.warn(
          { provider: this.name, code: error.code, status: error instanceof ApiError ? error.status : undefined },
          'Completion failed'
        );
      }
      throw error;
    }
  }
}
