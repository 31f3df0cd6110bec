/**
 * Application Configuration
 * Environment-driven settings validated with zod into a typed, frozen AppConfig
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

const WEIGHT_TOLERANCE = 1e-6;

const numberFromEnv = (defaultValue: number) => z.coerce.number().default(defaultValue);
const intFromEnv = (defaultValue: number, min = 0) =>
  z.coerce.number().int().min(min).default(defaultValue);
const weight = (defaultValue: number) => z.coerce.number().min(0).max(1).default(defaultValue);

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

/**
 * Raw environment schema. Every key is optional and carries a default.
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  // External services
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  SYNTHESIS_ENABLED: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  SYNTHESIS_MODEL: z.string().default('claude-3-5-sonnet-20241022'),
  SYNTHESIS_MAX_TOKENS: intFromEnv(1024, 1),
  SYNTHESIS_TIMEOUT_MS: intFromEnv(20000, 1),

  // Vector store
  VECTOR_BACKEND: z.enum(['memory', 'qdrant']).default('qdrant'),
  QDRANT_URL: z.string().url().default('http://localhost:6333'),
  QDRANT_API_KEY: optionalString,
  QDRANT_COLLECTION: z.string().min(1).default('threadlens_chunks'),

  // Embeddings
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: intFromEnv(1536, 1),
  EMBEDDING_WORKERS: intFromEnv(8, 1),
  EMBEDDING_BATCH_SIZE: intFromEnv(16, 1),
  EMBEDDING_MAX_ATTEMPTS: intFromEnv(4, 1),
  EMBEDDING_BASE_DELAY_MS: intFromEnv(500),
  EMBEDDING_MAX_DELAY_MS: intFromEnv(15000),

  // Chunking
  CHUNK_MAX_SIZE: intFromEnv(1000, 1),
  CHUNK_OVERLAP: intFromEnv(200),
  CHUNK_MIN_SIZE: intFromEnv(50),
  CHUNK_CONTEXT_DEPTH: intFromEnv(2),
  CHUNK_CONTEXT_MAX_CHARS: intFromEnv(200, 1),

  // Retrieval
  RETRIEVE_K: intFromEnv(10, 1),
  FINAL_K: intFromEnv(5, 1),
  RERANK_WEIGHT_SIMILARITY: weight(0.6),
  RERANK_WEIGHT_LEXICAL: weight(0.25),
  RERANK_WEIGHT_RECENCY: weight(0.1),
  RERANK_WEIGHT_QUALITY: weight(0.05),
  RECENCY_HALF_LIFE_DAYS: numberFromEnv(180),

  // Confidence scoring
  CONFIDENCE_WEIGHT_SIMILARITY: weight(0.5),
  CONFIDENCE_WEIGHT_COVERAGE: weight(0.3),
  CONFIDENCE_WEIGHT_CATEGORY: weight(0.2),
  CONFIDENCE_RELEVANCE_THRESHOLD: weight(0.5),
  CONFIDENCE_VAGUE_PENALTY: weight(0.15),
  CONFIDENCE_NO_SOURCE_CAP: z.coerce.number().min(0).max(0.29).default(0.2),
  CONFIDENCE_SYNTHESIS_CAP: weight(0.5),
  CONFIDENCE_TIMEOUT_PENALTY: weight(0.2),

  // Query handling
  QUERY_TIMEOUT_MS: intFromEnv(30000, 1),
  CATEGORIES_FILE: optionalString,

  // Infrastructure
  REDIS_URL: z.string().default('redis://localhost:6379'),
  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: intFromEnv(3001, 1),
});

export type RawEnv = z.infer<typeof envSchema>;

export interface RerankWeights {
  similarity: number;
  lexical: number;
  recency: number;
  quality: number;
}

/**
 * Weights for combining retrieval quality and classification certainty.
 * Tier boundaries: >= 0.8 high, 0.6 - 0.8 medium, < 0.6 low.
 */
export interface ConfidenceWeights {
  similarity: number;
  coverage: number;
  category: number;
}

export interface ConfidenceConfig {
  weights: ConfidenceWeights;
  relevanceThreshold: number;
  vaguePenalty: number;
  noSourceCap: number;
  synthesisCap: number;
  timeoutPenalty: number;
}

export interface ChunkingSettings {
  maxSize: number;
  overlapSize: number;
  minSize: number;
  contextDepth: number;
  contextMaxChars: number;
}

export interface EmbeddingSettings {
  model: string;
  dimensions: number;
  workers: number;
  batchSize: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  env: RawEnv['NODE_ENV'];
  openai: {
    apiKey?: string;
    baseUrl?: string;
  };
  synthesis: {
    enabled: boolean;
    apiKey?: string;
    model: string;
    maxTokens: number;
    timeoutMs: number;
  };
  vectorStore: {
    backend: RawEnv['VECTOR_BACKEND'];
    qdrantUrl: string;
    qdrantApiKey?: string;
    collection: string;
  };
  embedding: EmbeddingSettings;
  chunking: ChunkingSettings;
  retrieval: {
    retrieveK: number;
    finalK: number;
    rerankWeights: RerankWeights;
    recencyHalfLifeDays: number;
  };
  confidence: ConfidenceConfig;
  query: {
    timeoutMs: number;
    categoriesFile?: string;
  };
  redis: {
    url: string;
  };
  api: {
    host: string;
    port: number;
  };
}

function sumsToOne(weights: object): boolean {
  const total = Object.values(weights).reduce<number>(
    (sum, value) => sum + (typeof value === 'number' ? value : 0),
    0
  );
  return Math.abs(total - 1) <= WEIGHT_TOLERANCE;
}

/**
 * Cross-field checks that zod's per-key schema cannot express
 */
function validateConfig(config: AppConfig): string[] {
  const issues: string[] = [];

  if (config.chunking.overlapSize >= config.chunking.maxSize) {
    issues.push('CHUNK_OVERLAP must be smaller than CHUNK_MAX_SIZE');
  }
  if (config.chunking.minSize > config.chunking.maxSize) {
    issues.push('CHUNK_MIN_SIZE must not exceed CHUNK_MAX_SIZE');
  }
  if (config.retrieval.retrieveK <= config.retrieval.finalK) {
    issues.push('RETRIEVE_K must be greater than FINAL_K');
  }
  if (config.embedding.maxDelayMs < config.embedding.baseDelayMs) {
    issues.push('EMBEDDING_MAX_DELAY_MS must be at least EMBEDDING_BASE_DELAY_MS');
  }
  if (!sumsToOne(config.retrieval.rerankWeights)) {
    issues.push('RERANK_WEIGHT_* must sum to 1');
  }
  if (!sumsToOne(config.confidence.weights)) {
    issues.push('CONFIDENCE_WEIGHT_* must sum to 1');
  }

  return issues;
}

/**
 * Build an AppConfig from an environment map.
 * Pure: callers (and tests) pass the env explicitly.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }

  const e = parsed.data;

  const config: AppConfig = {
    env: e.NODE_ENV,
    openai: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL,
    },
    synthesis: {
      enabled: e.SYNTHESIS_ENABLED,
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.SYNTHESIS_MODEL,
      maxTokens: e.SYNTHESIS_MAX_TOKENS,
      timeoutMs: e.SYNTHESIS_TIMEOUT_MS,
    },
    vectorStore: {
      backend: e.VECTOR_BACKEND,
      qdrantUrl: e.QDRANT_URL,
      qdrantApiKey: e.QDRANT_API_KEY,
      collection: e.QDRANT_COLLECTION,
    },
    embedding: {
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
      workers: e.EMBEDDING_WORKERS,
      batchSize: e.EMBEDDING_BATCH_SIZE,
      maxAttempts: e.EMBEDDING_MAX_ATTEMPTS,
      baseDelayMs: e.EMBEDDING_BASE_DELAY_MS,
      maxDelayMs: e.EMBEDDING_MAX_DELAY_MS,
    },
    chunking: {
      maxSize: e.CHUNK_MAX_SIZE,
      overlapSize: e.CHUNK_OVERLAP,
      minSize: e.CHUNK_MIN_SIZE,
      contextDepth: e.CHUNK_CONTEXT_DEPTH,
      contextMaxChars: e.CHUNK_CONTEXT_MAX_CHARS,
    },
    retrieval: {
      retrieveK: e.RETRIEVE_K,
      finalK: e.FINAL_K,
      rerankWeights: {
        similarity: e.RERANK_WEIGHT_SIMILARITY,
        lexical: e.RERANK_WEIGHT_LEXICAL,
        recency: e.RERANK_WEIGHT_RECENCY,
        quality: e.RERANK_WEIGHT_QUALITY,
      },
      recencyHalfLifeDays: e.RECENCY_HALF_LIFE_DAYS,
    },
    confidence: {
      weights: {
        similarity: e.CONFIDENCE_WEIGHT_SIMILARITY,
        coverage: e.CONFIDENCE_WEIGHT_COVERAGE,
        category: e.CONFIDENCE_WEIGHT_CATEGORY,
      },
      relevanceThreshold: e.CONFIDENCE_RELEVANCE_THRESHOLD,
      vaguePenalty: e.CONFIDENCE_VAGUE_PENALTY,
      noSourceCap: e.CONFIDENCE_NO_SOURCE_CAP,
      synthesisCap: e.CONFIDENCE_SYNTHESIS_CAP,
      timeoutPenalty: e.CONFIDENCE_TIMEOUT_PENALTY,
    },
    query: {
      timeoutMs: e.QUERY_TIMEOUT_MS,
      categoriesFile: e.CATEGORIES_FILE,
    },
    redis: {
      url: e.REDIS_URL,
    },
    api: {
      host: e.API_HOST,
      port: e.API_PORT,
    },
  };

  const issues = validateConfig(config);
  if (issues.length > 0) {
    throw new ConfigError('Invalid configuration', issues);
  }

  return Object.freeze(config);
}
