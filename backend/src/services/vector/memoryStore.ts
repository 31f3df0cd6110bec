/**
 * In-Process Vector Store
 * Map-backed store with brute-force cosine search, used for local runs and tests
 */

import { createLogger } from '../../lib/logger.js';
import { AppError, VectorStoreUnavailableError } from '../../lib/errors.js';
import type {
  MetadataFilter,
  Vector,
  VectorMatch,
  VectorRecord,
  VectorStoreStats,
} from '../../models/Embedding.js';
import { cosineSimilarity, matchesFilter, type VectorStore } from './vectorStore.js';

const log = createLogger('memory-store');

export class MemoryVectorStore implements VectorStore {
  readonly backend = 'memory';
  private readonly records = new Map<string, VectorRecord>();
  private dimensions: number | null = null;
  private isOpen = false;

  constructor(private readonly collection = 'memory') {}

  async open(): Promise<void> {
    this.isOpen = true;
    log.debug({ collection: this.collection }, 'Memory vector store opened');
  }

  async close(): Promise<void> {
    this.isOpen = false;
    log.debug({ collection: this.collection, records: this.records.size }, 'Memory vector store closed');
  }

  async upsert(records: VectorRecord[]): Promise<number> {
    this.assertOpen();

    for (const record of records) {
      this.checkDimensions(record.vector);
    }
    for (const record of records) {
      this.records.set(record.chunkId, {
        ...record,
        vector: [...record.vector],
        metadata: { ...record.metadata },
      });
    }

    return records.length;
  }

  async query(vector: Vector, k: number, filter?: MetadataFilter): Promise<VectorMatch[]> {
    this.assertOpen();
    if (k <= 0 || this.records.size === 0) {
      return [];
    }
    this.checkDimensions(vector);

    const matches: VectorMatch[] = [];
    for (const record of this.records.values()) {
      if (!matchesFilter(record.metadata, filter)) continue;
      matches.push({
        chunkId: record.chunkId,
        score: cosineSimilarity(vector, record.vector),
        metadata: { ...record.metadata },
        text: record.text,
      });
    }

    return matches
      .sort((a, b) => b.score - a.score || a.chunkId.localeCompare(b.chunkId))
      .slice(0, k);
  }

  async stats(): Promise<VectorStoreStats> {
    this.assertOpen();
    return {
      backend: this.backend,
      collection: this.collection,
      recordCount: this.records.size,
      dimensions: this.dimensions,
      distance: 'cosine',
    };
  }

  private assertOpen(): void {
    if (!this.isOpen) {
      throw new VectorStoreUnavailableError(this.backend, 'Memory vector store is not open');
    }
  }

  private checkDimensions(vector: Vector): void {
    if (this.dimensions === null) {
      this.dimensions = vector.length;
      return;
    }
    if (vector.length !== this.dimensions) {
      throw new AppError(
        `Vector has ${vector.length} dimensions, store expects ${this.dimensions}`,
        'VECTOR_DIMENSION_MISMATCH',
        400
      );
    }
  }
}
