import { getConfig } from '../config.js';
import { getChatProvider, type IChatProvider } from '../providers/chat/index.js';
import type { CompletionOptions, Message } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import {
  debugPrompt,
  explainPrompt,
  generatePrompt,
  shapeMessages,
  type AssistantTask,
} from './prompts.js';

const logger = createChildLogger('assistant');

export interface AssistantOptions {
  language?: string;
}

/**
 * Coding assistant over a single chat provider. Stateless: every call builds
 * a fresh prompt and issues one completion; failures reach the caller as thrown.
 */
export class CodingAssistant {
  readonly language: string;
  private readonly provider: IChatProvider;

  constructor(provider: IChatProvider, options: AssistantOptions = {}) {
    this.provider = provider;
    this.language = options.language ?? 'TypeScript';
  }

  get providerName(): IChatProvider['name'] {
    return this.provider.name;
  }

  explain(topic: string): Promise<string> {
    return this.ask('explain', explainPrompt(topic, this.language));
  }

  debugCode(code: string, errorText: string): Promise<string> {
    return this.ask('debug', debugPrompt(code, errorText, this.language));
  }

  generateCode(description: string): Promise<string> {
    return this.ask('generate', generatePrompt(description, this.language));
  }

  complete(messages: readonly Message[], options?: CompletionOptions): Promise<string> {
    return this.provider.complete(messages, options);
  }

  private ask(task: AssistantTask, prompt: string): Promise<string> {
    const messages = shapeMessages(this.provider.name, task, prompt, this.language);
    logger.debug({ task, provider: this.provider.name }, 'Dispatching assistant task');
    return this.provider.complete(messages);
  }
}

let instance: CodingAssistant | null = null;

export function getAssistant(): CodingAssistant {
  if (!instance) {
    instance = new CodingAssistant(getChatProvider(), { language: getConfig().assistantLanguage });
  }
  return instance;
}
