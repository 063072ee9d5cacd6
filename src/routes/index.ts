import { FastifyInstance } from 'fastify';
import { healthRoutes } from './health.js';
import { assistantRoutes } from './assistant.js';

export async function registerRoutes(app: FastifyInstance): Promise<void> {
  await app.register(healthRoutes);
  await app.register(assistantRoutes);
}
