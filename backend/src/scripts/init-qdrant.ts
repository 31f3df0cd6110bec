/**
 * Qdrant Collection Initialization Script
 * Creates the chunk collection and its payload indexes
 */

import { pathToFileURL } from 'url';
import { loadConfig, type AppConfig } from '../lib/config.js';
import { createQdrantClient, ensureCollection, type QdrantClientLike } from '../lib/qdrant.js';
import { logger } from '../lib/logger.js';

export async function initializeQdrantCollection(
  config: AppConfig,
  client: QdrantClientLike = createQdrantClient(config)
): Promise<boolean> {
  const { collection } = config.vectorStore;
  logger.info({ collection }, 'Starting Qdrant collection initialization');

  const created = await ensureCollection(client, collection, config.embedding.dimensions);

  logger.info(
    { collection, created, dimensions: config.embedding.dimensions },
    created ? 'Collection created' : 'Collection already exists, skipping creation'
  );
  return created;
}

async function main(): Promise<void> {
  try {
    await initializeQdrantCollection(loadConfig());
    logger.info('Qdrant initialization script completed successfully');
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, 'Qdrant initialization failed');
    process.exit(1);
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  void main();
}
