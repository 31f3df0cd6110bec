/**
 * Ingestion Worker
 * Long-running process consuming the ingestion queue
 */

import { pathToFileURL } from 'url';
import { loadConfig } from '../lib/config.js';
import { logger } from '../lib/logger.js';
import { createEmbeddingProvider, createIngestionDeps, createVectorStore } from '../services/runtime.js';
import { IngestionProcessor } from './ingestion.job.js';
import { closeQueues, getRedisConnection } from './queue.js';

export async function startWorker(): Promise<() => Promise<void>> {
  const config = loadConfig();
  const store = createVectorStore(config);
  await store.open();

  const deps = createIngestionDeps(config, {
    store,
    provider: createEmbeddingProvider(config),
  });

  const processor = new IngestionProcessor(getRedisConnection(config.redis.url), deps);
  processor.start(1);

  return async () => {
    await processor.stop();
    await closeQueues();
    await store.close();
  };
}

async function main(): Promise<void> {
  try {
    const stop = await startWorker();

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutting down ingestion worker');
      stop().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'Worker shutdown failed');
          process.exit(1);
        }
      );
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Ingestion worker failed to start');
    process.exit(1);
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  void main();
}
