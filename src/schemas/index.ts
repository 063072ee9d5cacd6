// Shared OpenAPI schemas for Fastify routes

// Common response schemas
export const ReplyResponse = {
  type: 'object',
  properties: {
    reply: { type: 'string' },
  },
  required: ['reply'],
} as const;

export const HealthResponse = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok'] },
    provider: { type: 'string', enum: ['openai', 'anthropic'] },
    timestamp: { type: 'string', format: 'date-time' },
  },
} as const;

// Assistant task bodies
export const ExplainBody = {
  type: 'object',
  required: ['topic'],
  properties: {
    topic: { type: 'string', minLength: 1, description: 'Concept to explain' },
  },
} as const;

export const DebugBody = {
  type: 'object',
  required: ['code', 'error'],
  properties: {
    code: { type: 'string', minLength: 1, description: 'Source code that fails' },
    error: { type: 'string', minLength: 1, description: 'Compiler or runtime error text' },
  },
} as const;

export const GenerateBody = {
  type: 'object',
  required: ['description'],
  properties: {
    description: { type: 'string', minLength: 1, description: 'What the code should do' },
  },
} as const;

// Raw completion body
export const CompleteBody = {
  type: 'object',
  required: ['messages'],
  properties: {
    messages: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['role', 'content'],
        properties: {
          role: { type: 'string', enum: ['system', 'user', 'assistant'] },
          content: { type: 'string' },
        },
      },
    },
    model: { type: 'string', minLength: 1 },
    max_tokens: { type: 'integer', minimum: 1 },
    temperature: { type: 'number' },
  },
} as const;
