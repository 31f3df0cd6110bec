/**
 * Query API Routes
 * POST /api/query answers a question; GET /api/stats describes the index
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type {
  ClarificationQuestionDto,
  QueryResponseBody,
  SourceDto,
  StatsResponseBody,
} from '@threadlens/shared';
import type { AppConfig } from '../../lib/config.js';
import type { QueryOutcome } from '../../models/Query.js';
import type { QueryAnalyzer } from '../../services/assistant/queryAnalyzer.js';
import type { VectorStore } from '../../services/vector/vectorStore.js';

// =============================================================================
// Validation Schemas
// =============================================================================

export const queryBodySchema = z.object({
  question: z.string().trim().min(1, 'Question must not be empty').max(2000),
  prior_answers: z.record(z.string().max(200)).optional(),
});

// =============================================================================
// Mapping
// =============================================================================

export function toQueryResponse(outcome: QueryOutcome): QueryResponseBody {
  const clarification: ClarificationQuestionDto[] = outcome.analysis.clarificationQuestions.map((q) => ({
    question: q.question,
    options: q.options,
    context: q.context,
    field_name: q.fieldName,
  }));

  const sources: SourceDto[] = outcome.sources.map((source) => ({
    title: source.title,
    url: source.url,
    score: source.score,
    content_preview: source.contentPreview,
    source: source.source,
  }));

  return {
    answer: outcome.answer,
    confidence_score: outcome.confidenceScore,
    confidence_tier: outcome.confidenceTier,
    category: outcome.analysis.category,
    clarification_questions: clarification,
    follow_up_questions: outcome.analysis.followUpQuestions,
    action_items: outcome.analysis.actionItems,
    related_topics: outcome.analysis.relatedTopics,
    sources,
    incomplete: outcome.incomplete,
    notes: outcome.notes,
  };
}

// =============================================================================
// Routes
// =============================================================================

export interface QueryRoutesOptions {
  analyzer: Pick<QueryAnalyzer, 'handle'>;
  store: VectorStore;
  config: Pick<AppConfig, 'embedding' | 'chunking' | 'retrieval'>;
  synthesisModel: string;
}

export default async function queryRoutes(fastify: FastifyInstance, options: QueryRoutesOptions) {
  const { analyzer, store, config, synthesisModel } = options;

  /**
   * POST /api/query
   */
  fastify.post('/api/query', async (request) => {
    const body = queryBodySchema.parse(request.body);

    const outcome = await analyzer.handle({
      question: body.question,
      priorAnswers: body.prior_answers,
    });

    return toQueryResponse(outcome);
  });

  /**
   * GET /api/stats
   */
  fastify.get('/api/stats', async (): Promise<StatsResponseBody> => {
    const stats = await store.stats();

    return {
      vector_store: {
        backend: stats.backend,
        collection: stats.collection,
        record_count: stats.recordCount,
        dimensions: stats.dimensions,
        distance: stats.distance,
      },
      embedding_model: config.embedding.model,
      synthesis_model: synthesisModel,
      chunking: {
        max_size: config.chunking.maxSize,
        overlap: config.chunking.overlapSize,
        min_size: config.chunking.minSize,
        context_depth: config.chunking.contextDepth,
      },
      retrieval: {
        retrieve_k: config.retrieval.retrieveK,
        final_k: config.retrieval.finalK,
      },
    };
  });
}
