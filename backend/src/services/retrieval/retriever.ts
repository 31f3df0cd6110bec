/**
 * Retriever
 * Embeds the question, over-fetches neighbours and reranks them
 */

import { createLogger } from '../../lib/logger.js';
import { EmbeddingUnavailableError } from '../../lib/errors.js';
import type { AppConfig } from '../../lib/config.js';
import type { MetadataFilter, Vector } from '../../models/Embedding.js';
import type { RetrievalResult } from '../../models/Query.js';
import type { EmbeddingProvider } from '../vector/embeddingProvider.js';
import type { VectorStore } from '../vector/vectorStore.js';
import { rerank } from './reranker.js';

const log = createLogger('retriever');

export type RetrieverOptions = AppConfig['retrieval'];

export class Retriever {
  constructor(
    private readonly store: VectorStore,
    private readonly provider: EmbeddingProvider,
    private readonly options: RetrieverOptions,
    private readonly clock: () => number = Date.now
  ) {}

  /**
   * Embed the question with the ingestion model
   */
  async embedQuestion(question: string): Promise<Vector> {
    const [outcome] = await this.provider.embedBatch([question]);

    if (!outcome || outcome.kind !== 'success') {
      const reason = outcome ? outcome.reason : 'no outcome';
      throw new EmbeddingUnavailableError(`Could not embed question: ${reason}`);
    }
    return outcome.vector;
  }

  /**
   * Retrieve up to finalK reranked chunks. An empty store yields an empty result.
   * Candidates are restricted to vectors produced by the same embedding model.
   */
  async retrieve(question: string, filter: MetadataFilter = {}): Promise<RetrievalResult> {
    const startTime = this.clock();
    const vector = await this.embedQuestion(question);

    const candidates = await this.store.query(vector, this.options.retrieveK, {
      ...filter,
      embeddingModel: this.provider.model,
    });

    if (candidates.length === 0) {
      log.info({ retrieveK: this.options.retrieveK }, 'No candidates retrieved');
      return [];
    }

    const result = rerank(question, candidates, {
      weights: this.options.rerankWeights,
      recencyHalfLifeDays: this.options.recencyHalfLifeDays,
      finalK: this.options.finalK,
      now: this.clock(),
    });

    log.debug(
      {
        candidates: candidates.length,
        returned: result.length,
        topRerankScore: result[0]?.rerankScore,
        durationMs: this.clock() - startTime,
      },
      'Retrieval complete'
    );

    return result;
  }
}
