import { readFileSync } from 'node:fs';
import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigError, describeError } from './utils/errors.js';

dotenv.config();

const configSchema = z.object({
  // Server
  port: z.coerce.number().int().positive().default(3000),
  host: z.string().default('0.0.0.0'),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // API Security (auth is disabled when unset)
  assistantApiKey: z.string().min(1).optional(),

  // Provider Selection
  chatProvider: z.enum(['openai', 'anthropic']).default('openai'),

  // OpenAI
  openaiApiKey: z.string().optional(),
  openaiChatModel: z.string().min(1).default('gpt-3.5-turbo'),

  // Anthropic
  anthropicApiKey: z.string().optional(),
  anthropicModel: z.string().min(1).default('claude-3-sonnet-20240229'),

  // Completion defaults. Temperature is passed through without a range check.
  maxTokens: z.coerce.number().int().positive().default(500),
  temperature: z.coerce.number().default(0.7),
  requestTimeoutMs: z.coerce.number().int().positive().optional(),

  // Assistant
  assistantLanguage: z.string().min(1).default('TypeScript'),

  // Logging
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

function validate(raw: unknown, source: string): Config {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const keys = result.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigError(`invalid ${source}: ${keys.join(', ')}`, result.error.flatten().fieldErrors);
  }
  return result.data;
}

export function parseConfig(env: Record<string, string | undefined>): Config {
  // A variable left blank (`TEMPERATURE=` in .env) counts as unset
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value === '' ? undefined : value;
  };

  const raw = {
    port: read('PORT'),
    host: read('HOST'),
    nodeEnv: read('NODE_ENV'),
    assistantApiKey: read('ASSISTANT_API_KEY'),
    chatProvider: read('CHAT_PROVIDER'),
    openaiApiKey: read('OPENAI_API_KEY'),
    openaiChatModel: read('OPENAI_CHAT_MODEL'),
    anthropicApiKey: read('ANTHROPIC_API_KEY'),
    anthropicModel: read('ANTHROPIC_MODEL'),
    maxTokens: read('MAX_TOKENS'),
    temperature: read('TEMPERATURE'),
    requestTimeoutMs: read('REQUEST_TIMEOUT_MS'),
    assistantLanguage: read('ASSISTANT_LANGUAGE'),
    logLevel: read('LOG_LEVEL'),
  };

  return validate(raw, 'environment');
}

/**
 * Load configuration from a JSON file keyed by the camelCase config names.
 * Keys missing from the file take the same defaults as the environment loader.
 */
export function loadConfigFile(path: string): Config {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigError(`cannot read ${path}: ${describeError(error)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${path} must contain a JSON object`);
  }

  return validate(parsed, path);
}

// Lazy load config to allow env vars to be set before validation
let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = parseConfig(process.env);
  }
  return _config;
}

export function resetConfig(): void {
  _config = null;
}
