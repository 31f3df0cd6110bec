/**
 * Embedding Model Types
 * Vector representations and the records persisted in the vector store
 */

import type { ChunkMetadata } from './Chunk.js';

export type Vector = number[];

/**
 * Outcome of one embedding attempt for one text
 */
export type EmbeddingOutcome =
  | { kind: 'success'; vector: Vector }
  | { kind: 'transient'; reason: string }
  | { kind: 'permanent'; reason: string };

export const EmbeddingOutcomes = {
  success: (vector: Vector): EmbeddingOutcome => ({ kind: 'success', vector }),
  transient: (reason: string): EmbeddingOutcome => ({ kind: 'transient', reason }),
  permanent: (reason: string): EmbeddingOutcome => ({ kind: 'permanent', reason }),
};

/**
 * Metadata stored alongside a vector
 */
export interface VectorMetadata extends ChunkMetadata {
  embeddingModel: string;
}

/**
 * The persisted unit of the vector store
 */
export interface VectorRecord {
  chunkId: string;
  vector: Vector;
  metadata: VectorMetadata;
  text: string;
}

/**
 * Equality or membership predicate over metadata fields
 */
export type MetadataFilter = Record<string, string | number | boolean | Array<string | number>>;

export interface VectorMatch {
  chunkId: string;
  score: number;
  metadata: VectorMetadata;
  text: string;
}

export interface VectorStoreStats {
  backend: string;
  collection: string;
  recordCount: number;
  dimensions: number | null;
  distance: 'cosine';
}

export interface FailedChunk {
  chunkId: string;
  reason: string;
  attempts: number;
}

export interface EmbeddingRunReport {
  embeddings: Map<string, Vector>;
  failed: FailedChunk[];
  totalChunks: number;
  successCount: number;
  failureCount: number;
  retryCount: number;
  durationMs: number;
}
