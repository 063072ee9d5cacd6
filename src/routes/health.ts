import { FastifyInstance } from 'fastify';
import { HealthResponse } from '../schemas/index.js';

export async function healthRoutes(app: FastifyInstance): Promise<void> {
  app.get('/health', {
    schema: {
      response: { 200: HealthResponse },
    },
  }, async (_request, reply) => {
    // No upstream call: a health check must not spend tokens
    return reply.status(200).send({
      status: 'ok',
      provider: app.assistant.providerName,
      timestamp: new Date().toISOString(),
    });
  });
}
