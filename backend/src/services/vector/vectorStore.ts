/**
 * Vector Store Contract
 * Shared interface and helpers for the in-process and Qdrant backends
 */

import type {
  MetadataFilter,
  Vector,
  VectorMatch,
  VectorMetadata,
  VectorRecord,
  VectorStoreStats,
} from '../../models/Embedding.js';

/**
 * Idempotent persistence and similarity search over vector records.
 *
 * Handles are constructed explicitly and must be opened before use.
 * `upsert` is the only write: last write wins per chunk id, and records are
 * never duplicated. `query` returns up to `k` neighbours by cosine
 * similarity, highest first; fewer than `k` is not an error.
 */
export interface VectorStore {
  readonly backend: string;
  open(): Promise<void>;
  close(): Promise<void>;
  upsert(records: VectorRecord[]): Promise<number>;
  query(vector: Vector, k: number, filter?: MetadataFilter): Promise<VectorMatch[]>;
  stats(): Promise<VectorStoreStats>;
}

export function cosineSimilarity(a: Vector, b: Vector): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);

  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Equality per field; an array value means "any of"
 */
export function matchesFilter(metadata: VectorMetadata, filter?: MetadataFilter): boolean {
  if (!filter) return true;

  return Object.entries(filter).every(([key, expected]) => {
    const actual = metadata[key];
    if (actual === undefined || actual === null) return false;

    const candidates: Array<string | number | boolean> = Array.isArray(expected) ? expected : [expected];
    if (Array.isArray(actual)) {
      return actual.some((value) => candidates.includes(value));
    }
    return candidates.includes(actual);
  });
}
