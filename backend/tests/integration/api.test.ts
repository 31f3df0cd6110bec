/**
 * Integration Tests: HTTP API
 *
 * Exercises the Fastify server through inject; no sockets are opened.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/server.js';
import { MemoryVectorStore } from '../../src/services/vector/memoryStore.js';
import { AnthropicAnswerSynthesizer } from '../../src/services/assistant/responseGenerator.js';
import { ingestBatches } from '../../src/services/ingestion/pipeline.js';
import { createIngestionDeps, createQueryAnalyzer } from '../../src/services/runtime.js';
import { BadRequestError } from '../../src/lib/errors.js';
import type { QueryOutcome, QueryRequest } from '../../src/models/Query.js';
import {
  FakeMessagesClient,
  HashingEmbeddingProvider,
  makeRecord,
  testConfig,
} from '../utils/testHelpers.js';

describe('HTTP API', () => {
  const config = testConfig();
  let store: MemoryVectorStore;
  let server: FastifyInstance;

  async function serve(
    options: { synthesisEnabled?: boolean; handle?: (request: QueryRequest) => Promise<QueryOutcome> } = {}
  ): Promise<FastifyInstance> {
    const provider = new HashingEmbeddingProvider();
    const analyzer = createQueryAnalyzer(config, {
      store,
      provider,
      synthesizer: new AnthropicAnswerSynthesizer(new FakeMessagesClient(), {
        model: 'test-model',
        maxTokens: 256,
        timeoutMs: 1000,
      }),
    });

    await ingestBatches(
      [
        {
          label: 'seed',
          records: [
            makeRecord({ id: 'jobs', title: 'Campus jobs', content: 'The library has a student job board.' }),
            makeRecord({ id: 'parking', content: 'Parking permits are sold online.' }),
          ],
        },
      ],
      createIngestionDeps(config, { store, provider })
    );

    server = await buildServer({
      analyzer: options.handle ? { handle: options.handle } : analyzer,
      store,
      config,
      synthesisModel: 'test-model',
      synthesisEnabled: options.synthesisEnabled ?? true,
    });
    return server;
  }

  beforeEach(async () => {
    store = new MemoryVectorStore(config.vectorStore.collection);
    await store.open();
  });

  afterEach(async () => {
    await server.close();
  });

  // ---------------------------------------------------------------------------
  // POST /api/query
  // ---------------------------------------------------------------------------

  describe('POST /api/query', () => {
    it('should return the answer with analysis and sources', async () => {
      await serve();

      const response = await server.inject({
        method: 'POST',
        url: '/api/query',
        payload: { question: 'I want a good job' },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.answer).toBe('Synthesized answer (Source 1)');
      expect(body.category).toBe('jobs');
      expect(body.incomplete).toBe(false);
      expect(body.clarification_questions[0].field_name).toBe('job_location');
      expect(body.sources.length).toBeGreaterThan(0);
      expect(body.sources[0]).toHaveProperty('content_preview');
      expect(['high', 'medium', 'low']).toContain(body.confidence_tier);
    });

    it('should reject an empty question', async () => {
      await serve();

      const response = await server.inject({
        method: 'POST',
        url: '/api/query',
        payload: { question: '   ' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: 'Validation Error',
        code: 'VALIDATION_ERROR',
        validationErrors: [{ field: 'question', message: 'Question must not be empty', code: 'too_small' }],
      });
    });

    it('should reject a missing question', async () => {
      await serve();

      const response = await server.inject({ method: 'POST', url: '/api/query', payload: {} });

      expect(response.statusCode).toBe(400);
      expect(response.json().validationErrors).toEqual([
        { field: 'question', message: 'Required', code: 'invalid_type' },
      ]);
    });

    it('should reject malformed JSON', async () => {
      await serve();

      const response = await server.inject({
        method: 'POST',
        url: '/api/query',
        headers: { 'content-type': 'application/json' },
        payload: '{"question":',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: 'Bad Request', code: 'BAD_REQUEST' });
    });

    it('should map application errors to their status', async () => {
      await serve({
        handle: async () => {
          throw new BadRequestError('Question references an unknown term', { term: 'xyz' });
        },
      });

      const response = await server.inject({ method: 'POST', url: '/api/query', payload: { question: 'xyz?' } });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: 'Bad Request',
        message: 'Question references an unknown term',
        code: 'BAD_REQUEST',
        details: { term: 'xyz' },
      });
    });

    it('should report unexpected failures as internal errors', async () => {
      await serve({
        handle: async () => {
          throw new Error('boom');
        },
      });

      const response = await server.inject({
        method: 'POST',
        url: '/api/query',
        headers: { 'x-request-id': 'req-42' },
        payload: { question: 'anything' },
      });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toMatchObject({
        error: 'Internal Server Error',
        message: 'boom',
        code: 'INTERNAL_ERROR',
        requestId: 'req-42',
      });
    });
  });

  // ---------------------------------------------------------------------------
  // GET /api/stats
  // ---------------------------------------------------------------------------

  describe('GET /api/stats', () => {
    it('should describe the index and its settings', async () => {
      await serve();

      const response = await server.inject({ method: 'GET', url: '/api/stats' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        vector_store: {
          backend: 'memory',
          collection: 'threadlens_chunks',
          record_count: 2,
          dimensions: 64,
          distance: 'cosine',
        },
        embedding_model: 'test-embedding',
        synthesis_model: 'test-model',
        chunking: { max_size: 1000, overlap: 200, min_size: 50, context_depth: 2 },
        retrieval: { retrieve_k: 10, final_k: 5 },
      });
    });

    it('should return 503 when the store is unavailable', async () => {
      await serve();
      await store.close();

      const response = await server.inject({ method: 'GET', url: '/api/stats' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ code: 'VECTOR_STORE_UNAVAILABLE', error: 'Service Unavailable' });
    });
  });

  // ---------------------------------------------------------------------------
  // GET /health
  // ---------------------------------------------------------------------------

  describe('GET /health', () => {
    it('should report healthy with a reachable store', async () => {
      await serve();

      const response = await server.inject({ method: 'GET', url: '/health' });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.status).toBe('healthy');
      expect(body.version).toBe('0.1.0');
      expect(body.checks.map((c: { name: string }) => c.name)).toEqual(['vector-store:memory', 'answer-synthesis']);
      expect(body.checks[0].message).toBe('2 records');
    });

    it('should report degraded without synthesis', async () => {
      await serve({ synthesisEnabled: false });

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('degraded');
    });

    it('should report unhealthy when the store fails', async () => {
      await serve();
      await store.close();

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json().checks[0]).toMatchObject({
        status: 'fail',
        message: 'Memory vector store is not open',
      });
    });
  });

  it('should answer unknown routes with 404', async () => {
    await serve();

    const response = await server.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({ code: 'NOT_FOUND', message: 'Route GET /nope not found' });
  });
});
