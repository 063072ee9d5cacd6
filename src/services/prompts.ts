import type { Message, ProviderName } from '../types/index.js';

export type AssistantTask = 'explain' | 'debug' | 'generate';

interface Persona {
  /** Full system prompt, sent as a separate system message */
  system: string;
  /** Short preamble folded into the single user message */
  prefix: string;
}

function personaFor(task: AssistantTask, language: string): Persona {
  switch (task) {
    case 'explain':
      return {
        system: `You are an expert ${language} programmer who explains concepts clearly with practical examples.`,
        prefix: `You are an expert ${language} programmer.`,
      };
    case 'debug':
      return {
        system: `You are a ${language} expert who helps debug code. Provide clear explanations and corrected code.`,
        prefix: `You are a ${language} debugging expert.`,
      };
    case 'generate':
      return {
        system: `You are a ${language} expert who writes clean, idiomatic code. Always include proper error handling and comments.`,
        prefix: `You are a ${language} code generation expert.`,
      };
  }
}

// Code fence info string: "TypeScript" -> "typescript", "C++" -> "c++"
export function fenceTag(language: string): string {
  return language.trim().toLowerCase().replace(/\s+/g, '-');
}

export function explainPrompt(topic: string, language: string): string {
  return `Explain this ${language} programming concept clearly and concisely with examples: ${topic}`;
}

export function debugPrompt(code: string, errorText: string, language: string): string {
  return `Help debug this ${language} code. Code:\n\`\`\`${fenceTag(language)}\n${code}\n\`\`\`\nError: ${errorText}\n\nPlease explain the issue and provide a fix.`;
}

export function generatePrompt(description: string, language: string): string {
  return `Generate ${language} code for the following requirement: ${description}\n\nPlease provide clean, idiomatic ${language} code with comments.`;
}

/**
 * Shape a task prompt for a backend. OpenAI gets a system + user exchange;
 * Anthropic gets one user message with the persona folded in front.
 */
export function shapeMessages(
  provider: ProviderName,
  task: AssistantTask,
  prompt: string,
  language: string
): Message[] {
  const persona = personaFor(task, language);

  switch (provider) {
    case 'openai':
      return [
        { role: 'system', content: persona.system },
        { role: 'user', content: prompt },
      ];
    case 'anthropic':
      return [{ role: 'user', content: `${persona.prefix} ${prompt}` }];
  }
}
