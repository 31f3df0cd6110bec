/**
 * Ingestion Pipeline
 * Capture files -> normalize -> merge -> chunk -> embed -> upsert
 */

import { createLogger } from '../../lib/logger.js';
import { ConfigError, VectorStoreUnavailableError, type MalformedReason } from '../../lib/errors.js';
import type { ChunkingSettings } from '../../lib/config.js';
import type { Chunk } from '../../models/Chunk.js';
import type { FailedChunk, VectorRecord } from '../../models/Embedding.js';
import type { RecordBatch, SourceType } from '../../models/Record.js';
import { chunkRecords } from '../vector/chunking.js';
import type { EmbeddingDispatcher } from '../vector/embeddingDispatcher.js';
import type { VectorStore } from '../vector/vectorStore.js';
import { readCaptureFile, writeCanonicalRecords, type CaptureSource } from './captureFile.js';
import { mergeBatches, type MergeReport } from './deduplicator.js';

const log = createLogger('ingestion-pipeline');

const UPSERT_CHUNK_SIZE = 256;

export type IngestionStatus = 'completed' | 'completed_with_failures' | 'aborted';

export interface FileReport {
  path: string;
  sourceType: SourceType;
  lines: number;
  records: number;
  malformed: number;
  malformedByReason: Partial<Record<MalformedReason, number>>;
}

export interface IngestionReport {
  status: IngestionStatus;
  dryRun: boolean;
  files: FileReport[];
  merge: MergeReport;
  chunks: { total: number; truncated: number };
  embedding: {
    model: string;
    successCount: number;
    failureCount: number;
    retryCount: number;
    failed: FailedChunk[];
    durationMs: number;
  } | null;
  upserted: number;
  error?: string;
  durationMs: number;
}

export interface IngestionDeps {
  store: VectorStore;
  /** Not needed for dry runs */
  dispatcher?: EmbeddingDispatcher;
  chunking: ChunkingSettings;
}

export interface IngestionOptions {
  sources: CaptureSource[];
  dryRun?: boolean;
  /** Write the merged canonical records here as JSONL */
  mergedOutputPath?: string;
}

export type IngestionStage = 'read' | 'merge' | 'chunk' | 'embed' | 'upsert' | 'done';

export interface IngestionHooks {
  onStage?: (stage: IngestionStage) => void;
}

function toVectorRecords(chunks: Chunk[], embeddings: Map<string, number[]>, model: string): VectorRecord[] {
  const records: VectorRecord[] = [];
  for (const chunk of chunks) {
    const vector = embeddings.get(chunk.chunkId);
    if (!vector) continue;
    records.push({
      chunkId: chunk.chunkId,
      vector,
      metadata: { ...chunk.metadata, embeddingModel: model },
      text: chunk.text,
    });
  }
  return records;
}

/**
 * Process already-normalized batches (given in priority order).
 * A vector store failure aborts the run with status `aborted`.
 */
export async function ingestBatches(
  batches: RecordBatch[],
  deps: IngestionDeps,
  options: { dryRun?: boolean; files?: FileReport[]; mergedOutputPath?: string } = {},
  hooks: IngestionHooks = {}
): Promise<IngestionReport> {
  const startTime = Date.now();
  const dryRun = options.dryRun ?? false;

  hooks.onStage?.('merge');
  const { records, report: merge } = mergeBatches(batches);
  if (options.mergedOutputPath) {
    await writeCanonicalRecords(options.mergedOutputPath, records);
  }

  hooks.onStage?.('chunk');
  const chunks = chunkRecords(records, deps.chunking);
  const truncated = chunks.filter((chunk) => chunk.metadata.truncated).length;

  const base: Omit<IngestionReport, 'status' | 'embedding' | 'upserted' | 'durationMs'> = {
    dryRun,
    files: options.files ?? [],
    merge,
    chunks: { total: chunks.length, truncated },
  };

  if (dryRun) {
    log.info({ records: records.length, chunks: chunks.length }, 'Dry run complete, nothing embedded');
    hooks.onStage?.('done');
    return { ...base, status: 'completed', embedding: null, upserted: 0, durationMs: Date.now() - startTime };
  }

  const { dispatcher } = deps;
  if (!dispatcher) {
    throw new ConfigError('Ingestion requires an embedding dispatcher unless it is a dry run', [
      'OPENAI_API_KEY: Required',
    ]);
  }

  hooks.onStage?.('embed');
  const run = await dispatcher.embedAll(
    chunks.map((chunk) => ({ chunkId: chunk.chunkId, text: chunk.text }))
  );
  const embedding = {
    model: dispatcher.model,
    successCount: run.successCount,
    failureCount: run.failureCount,
    retryCount: run.retryCount,
    failed: run.failed,
    durationMs: run.durationMs,
  };

  hooks.onStage?.('upsert');
  const vectorRecords = toVectorRecords(chunks, run.embeddings, dispatcher.model);
  let upserted = 0;
  try {
    for (let i = 0; i < vectorRecords.length; i += UPSERT_CHUNK_SIZE) {
      upserted += await deps.store.upsert(vectorRecords.slice(i, i + UPSERT_CHUNK_SIZE));
    }
  } catch (error) {
    if (!(error instanceof VectorStoreUnavailableError)) {
      throw error;
    }
    log.error({ upserted, pending: vectorRecords.length - upserted, error: error.message }, 'Ingestion aborted');
    return {
      ...base,
      status: 'aborted',
      embedding,
      upserted,
      error: error.message,
      durationMs: Date.now() - startTime,
    };
  }

  hooks.onStage?.('done');
  const status: IngestionStatus = run.failureCount > 0 ? 'completed_with_failures' : 'completed';
  const report: IngestionReport = {
    ...base,
    status,
    embedding,
    upserted,
    durationMs: Date.now() - startTime,
  };

  log.info(
    {
      status,
      records: records.length,
      chunks: chunks.length,
      embedded: run.successCount,
      failed: run.failureCount,
      upserted,
      durationMs: report.durationMs,
    },
    'Ingestion complete'
  );

  return report;
}

/**
 * Read capture files in priority order and ingest them
 */
export async function runIngestion(
  options: IngestionOptions,
  deps: IngestionDeps,
  hooks: IngestionHooks = {}
): Promise<IngestionReport> {
  hooks.onStage?.('read');

  const batches: RecordBatch[] = [];
  const files: FileReport[] = [];

  for (const source of options.sources) {
    const result = await readCaptureFile(source);
    batches.push(result.batch);
    files.push({
      path: source.path,
      sourceType: source.sourceType,
      lines: result.lines,
      records: result.batch.records.length,
      malformed: result.malformed,
      malformedByReason: result.malformedByReason,
    });
  }

  return ingestBatches(
    batches,
    deps,
    { dryRun: options.dryRun, files, mergedOutputPath: options.mergedOutputPath },
    hooks
  );
}
