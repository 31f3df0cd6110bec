/**
 * Qdrant Vector Database Client
 * Client construction and collection setup for the Qdrant backend
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { logger } from './logger.js';
import type { AppConfig } from './config.js';

export type QdrantMatch =
  | { value: string | number | boolean }
  | { any: string[] | number[] };

export interface QdrantFilter {
  must: Array<{ key: string; match: QdrantMatch }>;
}

export interface QdrantPoint {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

export interface QdrantScoredPoint {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}

export type PayloadFieldSchema = 'keyword' | 'integer' | 'float' | 'bool';

/**
 * The calls the backend makes; QdrantClient satisfies it, tests pass a fake
 */
export interface QdrantClientLike {
  getCollections(): Promise<{ collections: Array<{ name: string }> }>;
  createCollection(
    collectionName: string,
    config: { vectors: { size: number; distance: 'Cosine' } }
  ): Promise<unknown>;
  createPayloadIndex(
    collectionName: string,
    params: { field_name: string; field_schema: PayloadFieldSchema; wait?: boolean }
  ): Promise<unknown>;
  upsert(collectionName: string, params: { wait?: boolean; points: QdrantPoint[] }): Promise<unknown>;
  search(
    collectionName: string,
    params: { vector: number[]; limit: number; filter?: QdrantFilter; with_payload?: boolean }
  ): Promise<QdrantScoredPoint[]>;
  getCollection(collectionName: string): Promise<{ points_count?: number | null }>;
}

/**
 * Payload fields indexed for filtering
 */
export const PAYLOAD_INDEXES: Record<string, PayloadFieldSchema> = {
  chunk_id: 'keyword',
  'metadata.recordId': 'keyword',
  'metadata.sourceType': 'keyword',
  'metadata.category': 'keyword',
  'metadata.embeddingModel': 'keyword',
  'metadata.modifiedAt': 'integer',
};

export function createQdrantClient(config: Pick<AppConfig, 'vectorStore'>): QdrantClient {
  const { qdrantUrl, qdrantApiKey } = config.vectorStore;

  const client = new QdrantClient({
    url: qdrantUrl,
    apiKey: qdrantApiKey,
    timeout: 30000, // 30 second timeout
  });

  logger.info({ url: qdrantUrl }, 'Qdrant client initialized');

  return client;
}

/**
 * Create the collection and its payload indexes if missing.
 * Returns true when the collection was created.
 */
export async function ensureCollection(
  client: QdrantClientLike,
  collectionName: string,
  dimensions: number
): Promise<boolean> {
  const collections = await client.getCollections();
  const exists = collections.collections.some((c) => c.name === collectionName);

  if (exists) {
    logger.debug({ collectionName }, 'Qdrant collection already exists');
    return false;
  }

  await client.createCollection(collectionName, {
    vectors: { size: dimensions, distance: 'Cosine' },
  });

  for (const [field, schema] of Object.entries(PAYLOAD_INDEXES)) {
    await client.createPayloadIndex(collectionName, {
      field_name: field,
      field_schema: schema,
      wait: true,
    });
  }

  logger.info({ collectionName, dimensions }, 'Qdrant collection created');
  return true;
}

export { QdrantClient };
