/**
 * Test Helper Utilities
 * Config builders, record factories and in-process fakes for network collaborators
 */

import { createHash } from 'crypto';
import { loadConfig, type AppConfig } from '../../src/lib/config.js';
import type {
  QdrantClientLike,
  QdrantFilter,
  QdrantPoint,
  QdrantScoredPoint,
} from '../../src/lib/qdrant.js';
import {
  EmbeddingOutcomes,
  type EmbeddingOutcome,
  type Vector,
  type VectorRecord,
} from '../../src/models/Embedding.js';
import type { CanonicalRecord } from '../../src/models/Record.js';
import type { RetrievedChunk } from '../../src/models/Query.js';
import type { EmbeddingProvider } from '../../src/services/vector/embeddingProvider.js';
import { cosineSimilarity } from '../../src/services/vector/vectorStore.js';
import type { MessagesClient, MessagesResponse } from '../../src/services/assistant/responseGenerator.js';

export const TEST_DIMENSIONS = 64;
export const TEST_MODEL = 'test-embedding';

/**
 * Config with in-memory store and placeholder keys
 */
export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    VECTOR_BACKEND: 'memory',
    OPENAI_API_KEY: 'test-key',
    ANTHROPIC_API_KEY: 'test-secret',
    EMBEDDING_MODEL: TEST_MODEL,
    EMBEDDING_DIMENSIONS: String(TEST_DIMENSIONS),
    EMBEDDING_BASE_DELAY_MS: '0',
    EMBEDDING_MAX_DELAY_MS: '0',
    ...overrides,
  });
}

export function makeRecord(partial: Partial<CanonicalRecord> & { id: string }): CanonicalRecord {
  return {
    sourceType: 'generic',
    modifiedAt: Date.UTC(2024, 0, 1),
    revision: 0,
    content: `Content of ${partial.id}`,
    qualityScore: 1,
    metadata: {},
    ...partial,
  };
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter((term) => term.length > 0);
}

/**
 * Bag-of-words vector: each token adds weight to a hashed dimension.
 * Texts sharing words have positive cosine similarity.
 */
export function hashingVector(text: string, dimensions = TEST_DIMENSIONS): Vector {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of tokenize(text)) {
    const digest = createHash('md5').update(token).digest();
    const index = digest.readUInt32BE(0) % dimensions;
    vector[index] = (vector[index] ?? 0) + 1;
  }
  return vector;
}

/**
 * Deterministic provider computing hashing vectors locally
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[][] = [];

  constructor(
    readonly model = TEST_MODEL,
    readonly dimensions = TEST_DIMENSIONS
  ) {}

  async embedBatch(texts: string[]): Promise<EmbeddingOutcome[]> {
    this.calls.push([...texts]);
    return texts.map((text) =>
      text.trim() === ''
        ? EmbeddingOutcomes.permanent('empty input')
        : EmbeddingOutcomes.success(hashingVector(text, this.dimensions))
    );
  }
}

/**
 * Provider whose outcome per text is decided by a script
 */
export class ScriptedEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[][] = [];
  private readonly attemptsByText = new Map<string, number>();

  constructor(
    private readonly script: (text: string, attempt: number) => EmbeddingOutcome,
    readonly model = TEST_MODEL,
    readonly dimensions = 3
  ) {}

  async embedBatch(texts: string[]): Promise<EmbeddingOutcome[]> {
    this.calls.push([...texts]);
    return texts.map((text) => {
      const attempt = (this.attemptsByText.get(text) ?? 0) + 1;
      this.attemptsByText.set(text, attempt);
      return this.script(text, attempt);
    });
  }

  attemptsFor(text: string): number {
    return this.attemptsByText.get(text) ?? 0;
  }
}

export function makeVectorRecord(
  chunkId: string,
  vector: Vector,
  overrides: Partial<VectorRecord['metadata']> = {},
  text = `text of ${chunkId}`
): VectorRecord {
  return {
    chunkId,
    vector,
    text,
    metadata: {
      recordId: `record-${chunkId}`,
      sourceType: 'forum',
      splitIndex: 0,
      totalSplits: 1,
      offset: 0,
      contentHash: 'hash',
      modifiedAt: Date.UTC(2024, 0, 1),
      revision: 0,
      qualityScore: 1,
      truncated: false,
      contextDepth: 0,
      embeddingModel: TEST_MODEL,
      ...overrides,
    },
  };
}

export function makeRetrievedChunk(
  chunkId: string,
  similarityScore: number,
  overrides: Partial<RetrievedChunk['metadata']> = {},
  text = `text of ${chunkId}`
): RetrievedChunk {
  const record = makeVectorRecord(chunkId, [], overrides, text);
  return {
    chunkId,
    similarityScore,
    rerankScore: similarityScore,
    lexicalScore: 0,
    metadata: record.metadata,
    text,
  };
}

// =============================================================================
// Qdrant fake
// =============================================================================

function readPath(payload: Record<string, unknown>, key: string): unknown {
  let current: unknown = payload;
  for (const part of key.split('.')) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, part);
  }
  return current;
}

function matchesQdrantFilter(payload: Record<string, unknown>, filter?: QdrantFilter): boolean {
  if (!filter) return true;
  return filter.must.every(({ key, match }) => {
    const actual = readPath(payload, key);
    if ('value' in match) return actual === match.value;
    return match.any.some((candidate) => candidate === actual);
  });
}

/**
 * In-process stand-in for the Qdrant REST client
 */
export class FakeQdrantClient implements QdrantClientLike {
  readonly collections = new Map<string, Map<string, QdrantPoint>>();
  readonly payloadIndexes: string[] = [];
  readonly upsertCalls: number[] = [];
  failWith: Error | null = null;

  private check(): void {
    if (this.failWith) throw this.failWith;
  }

  private collection(name: string): Map<string, QdrantPoint> {
    const points = this.collections.get(name);
    if (!points) throw new Error(`Not found: Collection \`${name}\` doesn't exist!`);
    return points;
  }

  async getCollections(): Promise<{ collections: Array<{ name: string }> }> {
    this.check();
    return { collections: [...this.collections.keys()].map((name) => ({ name })) };
  }

  async createCollection(name: string): Promise<boolean> {
    this.check();
    this.collections.set(name, new Map());
    return true;
  }

  async createPayloadIndex(_name: string, params: { field_name: string }): Promise<unknown> {
    this.check();
    this.payloadIndexes.push(params.field_name);
    return {};
  }

  async upsert(name: string, params: { points: QdrantPoint[] }): Promise<unknown> {
    this.check();
    const points = this.collection(name);
    this.upsertCalls.push(params.points.length);
    for (const point of params.points) {
      points.set(point.id, structuredClone(point));
    }
    return { status: 'completed' };
  }

  async search(
    name: string,
    params: { vector: number[]; limit: number; filter?: QdrantFilter }
  ): Promise<QdrantScoredPoint[]> {
    this.check();
    return [...this.collection(name).values()]
      .filter((point) => matchesQdrantFilter(point.payload, params.filter))
      .map((point) => ({ id: point.id, score: cosineSimilarity(params.vector, point.vector), payload: point.payload }))
      .sort((a, b) => b.score - a.score)
      .slice(0, params.limit);
  }

  async getCollection(name: string): Promise<{ points_count: number }> {
    this.check();
    return { points_count: this.collection(name).size };
  }
}

// =============================================================================
// Anthropic fake
// =============================================================================

export interface RecordedMessage {
  model: string;
  system: string;
  content: string;
  signal?: AbortSignal;
}

/**
 * Messages client returning a fixed reply, or failing, or never settling
 */
export class FakeMessagesClient implements MessagesClient {
  readonly requests: RecordedMessage[] = [];
  reply: string | Error | 'hang' = 'Synthesized answer (Source 1)';

  messages = {
    create: async (
      body: {
        model: string;
        max_tokens: number;
        system: string;
        messages: Array<{ role: 'user' | 'assistant'; content: string }>;
      },
      options?: { signal?: AbortSignal }
    ): Promise<MessagesResponse> => {
      this.requests.push({
        model: body.model,
        system: body.system,
        content: body.messages[0]?.content ?? '',
        signal: options?.signal,
      });

      const reply = this.reply;
      if (reply === 'hang') {
        return new Promise<MessagesResponse>((_, reject) => {
          options?.signal?.addEventListener('abort', () => reject(new Error('Request was aborted.')));
        });
      }
      if (reply instanceof Error) {
        throw reply;
      }
      return { content: [{ type: 'text', text: reply }] };
    },
  };
}
