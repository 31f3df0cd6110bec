/**
 * Qdrant Vector Store
 * Networked backend: chunk ids map to deterministic UUID point ids, the
 * original id, text and metadata travel in the payload
 */

import { v5 as uuidv5 } from 'uuid';
import { z } from 'zod';
import { createLogger } from '../../lib/logger.js';
import { AppError, VectorStoreUnavailableError, errorMessage } from '../../lib/errors.js';
import {
  ensureCollection,
  type QdrantClientLike,
  type QdrantFilter,
  type QdrantMatch,
  type QdrantPoint,
  type QdrantScoredPoint,
} from '../../lib/qdrant.js';
import type {
  MetadataFilter,
  Vector,
  VectorMatch,
  VectorMetadata,
  VectorRecord,
  VectorStoreStats,
} from '../../models/Embedding.js';
import type { VectorStore } from './vectorStore.js';

const log = createLogger('qdrant-store');

// Namespace for chunk id -> point id derivation; changing it orphans stored points
export const POINT_ID_NAMESPACE = '6f1c1e0a-8a4e-4d8e-9b1f-2a7c5d3e9f40';

const UPSERT_BATCH_SIZE = 100;

export function toPointId(chunkId: string): string {
  return uuidv5(chunkId, POINT_ID_NAMESPACE);
}

const metadataValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.string()),
]);

const vectorMetadataSchema = z
  .object({
    recordId: z.string(),
    sourceType: z.enum(['forum', 'web', 'tabular', 'generic']),
    splitIndex: z.number(),
    totalSplits: z.number(),
    offset: z.number(),
    contentHash: z.string(),
    title: z.string().optional(),
    url: z.string().optional(),
    author: z.string().optional(),
    category: z.string().optional(),
    parentId: z.string().optional(),
    modifiedAt: z.number(),
    revision: z.number().default(0),
    qualityScore: z.number(),
    truncated: z.boolean(),
    contextDepth: z.number(),
    embeddingModel: z.string(),
  })
  .catchall(metadataValueSchema);

const payloadSchema = z.object({
  chunk_id: z.string(),
  text: z.string(),
  metadata: vectorMetadataSchema,
});

export interface QdrantStoreOptions {
  collection: string;
  dimensions: number;
  /** Create the collection on open when it does not exist */
  createIfMissing?: boolean;
}

/**
 * Metadata predicate to a Qdrant `must` filter on nested payload keys
 */
export function buildQdrantFilter(filter?: MetadataFilter): QdrantFilter | undefined {
  if (!filter) return undefined;

  const must = Object.entries(filter).map(([key, expected]) => {
    let match: QdrantMatch;
    if (!Array.isArray(expected)) {
      match = { value: expected };
    } else {
      const numbers = expected.filter((value): value is number => typeof value === 'number');
      match = numbers.length === expected.length
        ? { any: numbers }
        : { any: expected.map(String) };
    }
    return { key: `metadata.${key}`, match };
  });

  return must.length > 0 ? { must } : undefined;
}

export class QdrantVectorStore implements VectorStore {
  readonly backend = 'qdrant';
  private isOpen = false;

  constructor(
    private readonly client: QdrantClientLike,
    private readonly options: QdrantStoreOptions
  ) {}

  /**
   * Verify connectivity and ensure the collection exists.
   * A failure here is fatal for the calling run.
   */
  async open(): Promise<void> {
    const { collection, dimensions, createIfMissing = true } = this.options;
    try {
      if (createIfMissing) {
        await ensureCollection(this.client, collection, dimensions);
      } else {
        await this.client.getCollection(collection);
      }
      this.isOpen = true;
      log.info({ collection, dimensions }, 'Qdrant vector store opened');
    } catch (error) {
      throw this.unavailable('open', error);
    }
  }

  async close(): Promise<void> {
    this.isOpen = false;
    log.info({ collection: this.options.collection }, 'Qdrant vector store closed');
  }

  async upsert(records: VectorRecord[]): Promise<number> {
    this.assertOpen();
    const { collection } = this.options;

    for (const record of records) {
      this.checkDimensions(record.vector);
    }

    // Last occurrence wins within one call, matching point overwrite semantics
    const points = new Map<string, QdrantPoint>();
    for (const record of records) {
      points.set(record.chunkId, {
        id: toPointId(record.chunkId),
        vector: record.vector,
        payload: { chunk_id: record.chunkId, text: record.text, metadata: record.metadata },
      });
    }

    const batch = [...points.values()];
    try {
      for (let i = 0; i < batch.length; i += UPSERT_BATCH_SIZE) {
        await this.client.upsert(collection, {
          wait: true,
          points: batch.slice(i, i + UPSERT_BATCH_SIZE),
        });
      }
    } catch (error) {
      throw this.unavailable('upsert', error);
    }

    log.debug({ collection, points: batch.length }, 'Vector batch upserted');
    return batch.length;
  }

  async query(vector: Vector, k: number, filter?: MetadataFilter): Promise<VectorMatch[]> {
    this.assertOpen();
    if (k <= 0) return [];
    this.checkDimensions(vector);

    const { collection } = this.options;
    let results: QdrantScoredPoint[];
    try {
      results = await this.client.search(collection, {
        vector,
        limit: k,
        filter: buildQdrantFilter(filter),
        with_payload: true,
      });
    } catch (error) {
      throw this.unavailable('query', error);
    }

    const matches: VectorMatch[] = [];
    for (const result of results) {
      const payload = payloadSchema.safeParse(result.payload);
      if (!payload.success) {
        log.warn({ collection, pointId: result.id }, 'Skipping point with unreadable payload');
        continue;
      }
      const metadata: VectorMetadata = payload.data.metadata;
      matches.push({
        chunkId: payload.data.chunk_id,
        score: result.score,
        metadata,
        text: payload.data.text,
      });
    }

    log.debug({ collection, resultsCount: matches.length, topScore: matches[0]?.score }, 'Vector search complete');
    return matches;
  }

  async stats(): Promise<VectorStoreStats> {
    this.assertOpen();
    const { collection, dimensions } = this.options;
    try {
      const info = await this.client.getCollection(collection);
      return {
        backend: this.backend,
        collection,
        recordCount: info.points_count ?? 0,
        dimensions,
        distance: 'cosine',
      };
    } catch (error) {
      throw this.unavailable('stats', error);
    }
  }

  private assertOpen(): void {
    if (!this.isOpen) {
      throw new VectorStoreUnavailableError(this.backend, 'Qdrant vector store is not open');
    }
  }

  private checkDimensions(vector: Vector): void {
    if (vector.length !== this.options.dimensions) {
      throw new AppError(
        `Vector has ${vector.length} dimensions, collection expects ${this.options.dimensions}`,
        'VECTOR_DIMENSION_MISMATCH',
        400
      );
    }
  }

  private unavailable(operation: string, error: unknown): VectorStoreUnavailableError {
    log.error(
      { collection: this.options.collection, operation, error: errorMessage(error) },
      'Qdrant operation failed'
    );
    return new VectorStoreUnavailableError(
      this.backend,
      `Qdrant ${operation} failed: ${errorMessage(error)}`,
      error
    );
  }
}
