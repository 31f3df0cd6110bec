/**
 * Threadlens - Backend Server
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import { pathToFileURL } from 'url';
import { registerRoutes, type RouteDeps } from './api/routes/index.js';
import { errorHandler } from './api/middleware/errorHandler.js';
import { loadConfig } from './lib/config.js';
import { logger } from './lib/logger.js';
import {
  createEmbeddingProvider,
  createQueryAnalyzer,
  createSynthesizer,
  createVectorStore,
} from './services/runtime.js';

const baseLogger: FastifyBaseLogger = logger;

const startTimes = new WeakMap<object, number>();

// Create Fastify instance
export async function buildServer(deps: RouteDeps): Promise<FastifyInstance> {
  const server = Fastify({
    logger: baseLogger,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    disableRequestLogging: true,
    bodyLimit: 64 * 1024,
  });

  server.setErrorHandler(errorHandler);

  server.setNotFoundHandler((request, reply) => {
    reply.code(404).send({
      error: 'Not Found',
      message: `Route ${request.method} ${request.url} not found`,
      code: 'NOT_FOUND',
      requestId: request.id,
      timestamp: new Date().toISOString(),
    });
  });

  // Request timing
  server.addHook('onRequest', async (request) => {
    startTimes.set(request, Date.now());
  });

  server.addHook('onResponse', async (request, reply) => {
    const startTime = startTimes.get(request);
    if (startTime !== undefined) {
      request.log.info(
        {
          method: request.method,
          url: request.url,
          statusCode: reply.statusCode,
          duration: Date.now() - startTime,
        },
        'Request completed'
      );
    }
  });

  await registerRoutes(server, deps);

  return server;
}

// Start server
async function start(): Promise<void> {
  const config = loadConfig();
  const store = createVectorStore(config);

  try {
    await store.open();
  } catch (error) {
    logger.fatal({ err: error }, 'Vector store unavailable, server not started');
    process.exit(1);
  }

  const synthesizer = createSynthesizer(config);
  const analyzer = createQueryAnalyzer(config, {
    store,
    provider: createEmbeddingProvider(config),
    synthesizer,
  });

  const server = await buildServer({
    analyzer,
    store,
    config,
    synthesisModel: synthesizer.model,
    synthesisEnabled: config.synthesis.enabled && Boolean(config.synthesis.apiKey),
  });

  try {
    await server.listen({ port: config.api.port, host: config.api.host });
    logger.info({ host: config.api.host, port: config.api.port }, 'Server listening');
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    await store.close();
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down gracefully');

    try {
      await server.close();
      await store.close();
      logger.info('Server shut down successfully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

// Only run if this is the main module
if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  start().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Server crashed during startup');
    process.exit(1);
  });
}
