import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { getConfig } from './config.js';
import { logger, createChildLogger } from './utils/logger.js';
import { registerRoutes } from './routes/index.js';
import { isAppError, UnauthorizedError } from './utils/errors.js';
import { CodingAssistant, getAssistant } from './services/assistant.js';

const serverLogger = createChildLogger('server');

// Extend Fastify with the assistant
declare module 'fastify' {
  interface FastifyInstance {
    assistant: CodingAssistant;
  }
}

export interface BuildAppOptions {
  assistant?: CodingAssistant;
  /** Shared secret for the x-assistant-key header; auth is off when unset */
  apiKey?: string;
}

async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const assistant = options.assistant ?? getAssistant();
  const apiKey = 'apiKey' in options ? options.apiKey : getConfig().assistantApiKey;

  const app = Fastify({
    logger: false, // We use our own logger
  });

  await app.register(cors, {
    origin: true,
  });

  app.decorate('assistant', assistant);

  // API key authentication hook
  app.addHook('preHandler', async (request) => {
    if (!apiKey || request.routeOptions.url === '/health') {
      return;
    }

    if (request.headers['x-assistant-key'] !== apiKey) {
      throw new UnauthorizedError();
    }
  });

  // Request logging
  app.addHook('onRequest', async (request) => {
    serverLogger.info({ method: request.method, url: request.url }, 'Request');
  });

  // Response logging
  app.addHook('onResponse', async (request, reply) => {
    serverLogger.info(
      { method: request.method, url: request.url, status: reply.statusCode },
      'Response'
    );
  });

  // Error handler
  app.setErrorHandler(async (error: Error & { validation?: unknown; statusCode?: number }, request, reply) => {
    serverLogger.error({ error: error.message, url: request.url }, 'Request error');

    // Handle validation errors
    if (error.validation) {
      return reply.status(400).send({
        error: 'Validation error',
        details: error.validation,
      });
    }

    // Handle custom app errors
    if (isAppError(error)) {
      return reply.status(error.statusCode).send({
        error: error.message,
        code: error.code,
        details: error.details,
      });
    }

    // Handle Fastify errors with statusCode
    if (error.statusCode) {
      return reply.status(error.statusCode).send({
        error: error.message,
      });
    }

    // Unknown errors
    return reply.status(500).send({
      error: 'Internal server error',
    });
  });

  await registerRoutes(app);

  return app;
}

async function start(): Promise<void> {
  try {
    const config = getConfig();
    const app = await buildApp();

    await app.listen({
      port: config.port,
      host: config.host,
    });

    logger.info({ port: config.port, host: config.host, provider: app.assistant.providerName }, 'Server started');

    // Graceful shutdown
    const shutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, 'Shutting down');
      try {
        await app.close();
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      }
    };

    for (const signal of ['SIGINT', 'SIGTERM']) {
      process.on(signal, () => {
        void shutdown(signal);
      });
    }
  } catch (error) {
    logger.fatal({ error }, 'Failed to start server');
    process.exit(1);
  }
}

// Export for testing
export { buildApp };

// Start server if not imported
if (process.argv[1]?.endsWith('server.ts') || process.argv[1]?.endsWith('server.js')) {
  void start();
}
