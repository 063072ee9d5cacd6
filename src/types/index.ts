import { z } from 'zod';
import { isChatError, type ChatError } from '../utils/errors.js';

// Chat message roles
export const MessageRoleSchema = z.enum(['system', 'user', 'assistant']);
export type MessageRole = z.infer<typeof MessageRoleSchema>;

export const MessageSchema = z.object({
  role: MessageRoleSchema,
  content: z.string(),
});

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
}

export type ProviderName = 'openai' | 'anthropic';

// Per-call overrides; anything omitted falls back to the provider defaults
export interface CompletionOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

// Fully resolved request handed to an adapter's wire encoder
export interface CompletionRequest {
  readonly model: string;
  readonly messages: readonly Message[];
  readonly maxTokens: number;
  readonly temperature: number;
}

export interface CompletionDefaults {
  model: string;
  maxTokens: number;
  temperature: number;
}

export function buildCompletionRequest(
  messages: readonly Message[],
  options: CompletionOptions,
  defaults: CompletionDefaults
): CompletionRequest {
  return {
    model: options.model ?? defaults.model,
    messages,
    maxTokens: options.maxTokens ?? defaults.maxTokens,
    temperature: options.temperature ?? defaults.temperature,
  };
}

// Value-shaped view of a completion for callers that prefer not to catch
export type CompletionResult =
  | { ok: true; text: string }
  | { ok: false; error: ChatError };

export async function settleCompletion(completion: Promise<string>): Promise<CompletionResult> {
  try {
    return { ok: true, text: await completion };
  } catch (error) {
    if (isChatError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}

// HTTP request bodies
export const ExplainRequestSchema = z.object({
  topic: z.string().min(1),
});
export type ExplainRequest = z.infer<typeof ExplainRequestSchema>;

export const DebugRequestSchema = z.object({
  code: z.string().min(1),
  error: z.string().min(1),
});
export type DebugRequest = z.infer<typeof DebugRequestSchema>;

export const GenerateRequestSchema = z.object({
  description: z.string().min(1),
});
export type GenerateRequest = z.infer<typeof GenerateRequestSchema>;

export const CompleteRequestSchema = z.object({
  messages: z.array(MessageSchema).min(1),
  model: z.string().min(1).optional(),
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().optional(),
});
export type CompleteRequest = z.infer<typeof CompleteRequestSchema>;

export interface ReplyResponse {
  reply: string;
}
