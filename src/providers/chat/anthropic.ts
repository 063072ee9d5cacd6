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

const logger = createChildLogger('anthropic-chat');

export const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages';
export const ANTHROPIC_VERSION = '2023-06-01';
export const ANTHROPIC_DEFAULT_MODEL = 'claude-3-sonnet-20240229';

interface AnthropicMessage {
  role: string;
  content: string;
}

export interface AnthropicRequestBody {
  model: string;
  max_tokens: number;
  messages: AnthropicMessage[];
  temperature: number;
}

const AnthropicResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  stop_reason: z.string().nullable().optional(),
  usage: z.unknown().optional(),
});

// max_tokens is mandatory on this endpoint, so the request always carries a resolved value
export function toAnthropicBody(request: CompletionRequest): AnthropicRequestBody {
  return {
    model: request.model,
    max_tokens: request.maxTokens,
    messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
    temperature: request.temperature,
  };
}

export class AnthropicChatProvider implements IChatProvider {
  readonly name = 'anthropic';
  readonly defaultModel: string;
  private readonly apiKey: string;
  private readonly defaults: CompletionDefaults;
  private readonly timeoutMs?: number;
  private readonly transport: HttpTransport;

  constructor(settings: ChatProviderSettings) {
    if (!settings.apiKey) {
      throw new ConfigError('ANTHROPIC_API_KEY is required for Anthropic chat provider');
    }
    this.apiKey = settings.apiKey;
    this.defaultModel = settings.model ?? ANTHROPIC_DEFAULT_MODEL;
    this.defaults = {
      model: this.defaultModel,
      maxTokens: settings.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: settings.temperature ?? DEFAULT_TEMPERATURE,
    };
    this.timeoutMs = settings.timeoutMs;
    this.transport = settings.transport ?? ((url, init) => fetch(url, init));
    logger.info({ model: this.defaultModel }, 'Anthropic chat provider initialized');
  }

  async complete(messages: readonly Message[], options: CompletionOptions = {}): Promise<string> {
    const request = buildCompletionRequest(messages, options, this.defaults);
    logger.debug({ model: request.model, messageCount: messages.length }, 'Requesting completion');

    try {
      const { status, data } = await postJson({
        provider: this.name,
        url: ANTHROPIC_MESSAGES_URL,
        headers: {
          'x-api-key': this.apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
        },
        body: toAnthropicBody(request),
        transport: this.transport,
        signal: options.signal,
        timeoutMs: this.timeoutMs,
      });

      const response = decodeBody(this.name, AnthropicResponseSchema, data);
      const text = response.content.find((c) => c.type === 'text')?.text;
      if (text === undefined) {
        throw new ParseError(this.name, 'No text response from Claude');
      }

      logger.debug({ status, responseLength: text.length }, 'Received completion');
      return text;
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
