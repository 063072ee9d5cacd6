import type { z } from 'zod';
import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  CompleteRequestSchema,
  DebugRequestSchema,
  ExplainRequestSchema,
  GenerateRequestSchema,
} from '../types/index.js';
import { CompleteBody, DebugBody, ExplainBody, GenerateBody, ReplyResponse } from '../schemas/index.js';
import { ValidationError } from '../utils/errors.js';

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError('Invalid request', result.error.errors);
  }
  return result.data;
}

export async function assistantRoutes(app: FastifyInstance): Promise<void> {
  app.post('/explain', {
    schema: {
      body: ExplainBody,
      response: { 200: ReplyResponse },
    },
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseBody(ExplainRequestSchema, request.body);

    const text = await app.assistant.explain(body.topic);
    return reply.send({ reply: text });
  });

  app.post('/debug', {
    schema: {
      body: DebugBody,
      response: { 200: ReplyResponse },
    },
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseBody(DebugRequestSchema, request.body);

    const text = await app.assistant.debugCode(body.code, body.error);
    return reply.send({ reply: text });
  });

  app.post('/generate', {
    schema: {
      body: GenerateBody,
      response: { 200: ReplyResponse },
    },
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseBody(GenerateRequestSchema, request.body);

    const text = await app.assistant.generateCode(body.description);
    return reply.send({ reply: text });
  });

  app.post('/complete', {
    schema: {
      body: CompleteBody,
      response: { 200: ReplyResponse },
    },
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseBody(CompleteRequestSchema, request.body);

    const { messages, model, max_tokens, temperature } = body;
    const text = await app.assistant.complete(messages, { model, maxTokens: max_tokens, temperature });
    return reply.send({ reply: text });
  });
}
