/**
 * Runtime Wiring
 * Builds store, provider, synthesizer and analyzer handles from AppConfig.
 * Nothing here is global: entry points construct what they need and own its lifecycle.
 */

import { createLogger } from '../lib/logger.js';
import type { AppConfig } from '../lib/config.js';
import { createOpenAIClient } from '../lib/openai.js';
import { createAnthropicClient } from '../lib/anthropic.js';
import { createQdrantClient } from '../lib/qdrant.js';
import { MemoryVectorStore } from './vector/memoryStore.js';
import { QdrantVectorStore } from './vector/qdrantStore.js';
import type { VectorStore } from './vector/vectorStore.js';
import { OpenAIEmbeddingProvider, type EmbeddingProvider } from './vector/embeddingProvider.js';
import { EmbeddingDispatcher, type DispatcherHooks } from './vector/embeddingDispatcher.js';
import { Retriever } from './retrieval/retriever.js';
import { loadCategoryCatalog, type CategoryCatalog } from './assistant/categoryCatalog.js';
import { KeywordClassifier, type TopicClassifier } from './assistant/classifier.js';
import {
  AnthropicAnswerSynthesizer,
  DisabledAnswerSynthesizer,
  type AnswerSynthesizer,
} from './assistant/responseGenerator.js';
import { QueryAnalyzer } from './assistant/queryAnalyzer.js';
import type { IngestionDeps } from './ingestion/pipeline.js';

const log = createLogger('runtime');

export function createVectorStore(config: AppConfig): VectorStore {
  if (config.vectorStore.backend === 'memory') {
    return new MemoryVectorStore(config.vectorStore.collection);
  }
  return new QdrantVectorStore(createQdrantClient(config), {
    collection: config.vectorStore.collection,
    dimensions: config.embedding.dimensions,
  });
}

export function createEmbeddingProvider(config: AppConfig): EmbeddingProvider {
  return new OpenAIEmbeddingProvider(
    createOpenAIClient(config),
    config.embedding.model,
    config.embedding.dimensions
  );
}

/**
 * Synthesis falls back to the disabled implementation when switched off
 * or when no key is configured; queries then return raw retrieval.
 */
export function createSynthesizer(config: AppConfig): AnswerSynthesizer {
  if (!config.synthesis.enabled || !config.synthesis.apiKey) {
    log.warn({ enabled: config.synthesis.enabled }, 'Answer synthesis disabled');
    return new DisabledAnswerSynthesizer();
  }
  return new AnthropicAnswerSynthesizer(createAnthropicClient(config), {
    model: config.synthesis.model,
    maxTokens: config.synthesis.maxTokens,
    timeoutMs: config.synthesis.timeoutMs,
  });
}

export interface QueryComponents {
  store: VectorStore;
  provider: EmbeddingProvider;
  synthesizer: AnswerSynthesizer;
  catalog?: CategoryCatalog;
  classifier?: TopicClassifier;
}

export function createQueryAnalyzer(config: AppConfig, components: QueryComponents): QueryAnalyzer {
  const catalog = components.catalog ?? loadCategoryCatalog(config.query.categoriesFile);
  return new QueryAnalyzer({
    classifier: components.classifier ?? new KeywordClassifier(catalog),
    catalog,
    retriever: new Retriever(components.store, components.provider, config.retrieval),
    synthesizer: components.synthesizer,
    options: {
      confidence: config.confidence,
      finalK: config.retrieval.finalK,
      timeoutMs: config.query.timeoutMs,
    },
  });
}

export function createIngestionDeps(
  config: AppConfig,
  components: { store: VectorStore; provider?: EmbeddingProvider; workers?: number },
  hooks: DispatcherHooks = {}
): IngestionDeps {
  const settings = {
    ...config.embedding,
    workers: components.workers ?? config.embedding.workers,
  };
  return {
    store: components.store,
    dispatcher: components.provider
      ? new EmbeddingDispatcher(components.provider, settings, hooks)
      : undefined,
    chunking: config.chunking,
  };
}
