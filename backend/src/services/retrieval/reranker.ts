/**
 * Reranker
 * Re-orders vector candidates with signals independent of vector distance
 */

import type { RerankWeights } from '../../lib/config.js';
import type { VectorMatch } from '../../models/Embedding.js';
import type { RetrievedChunk } from '../../models/Query.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_QUALITY = 10;

const STOPWORDS = new Set([
  'the', 'and', 'for', 'are', 'but', 'not', 'you', 'your', 'with', 'this',
  'that', 'what', 'which', 'who', 'how', 'when', 'where', 'why', 'can', 'does',
  'any', 'there', 'from', 'have', 'has', 'was', 'were', 'will', 'would', 'should',
  'about', 'into', 'some', 'get', 'want',
]);

export interface RerankOptions {
  weights: RerankWeights;
  recencyHalfLifeDays: number;
  finalK: number;
  /** Reference time for recency, epoch ms */
  now?: number;
}

export interface ScoreBreakdown {
  similarity: number;
  lexical: number;
  recency: number;
  quality: number;
  total: number;
}

/**
 * Lower-cased query terms longer than two characters, stopwords removed
 */
export function extractKeywords(text: string): string[] {
  const terms = text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((term) => term.length > 2 && !STOPWORDS.has(term));
  return [...new Set(terms)];
}

/**
 * Share of query keywords present as words in the text
 */
export function calculateKeywordScore(text: string, keywords: string[]): number {
  if (keywords.length === 0) return 0;
  const words = new Set(text.toLowerCase().split(/[^\p{L}\p{N}]+/u));
  const matches = keywords.filter((keyword) => words.has(keyword)).length;
  return matches / keywords.length;
}

/**
 * Exponential decay: 1 for now, 0.5 after one half-life, 0 for unknown dates
 */
export function calculateRecencyScore(modifiedAt: number, halfLifeDays: number, now: number): number {
  if (modifiedAt <= 0 || halfLifeDays <= 0) return 0;
  const ageDays = Math.max(0, now - modifiedAt) / DAY_MS;
  return Math.exp((-Math.LN2 * ageDays) / halfLifeDays);
}

export function scoreCandidate(
  match: VectorMatch,
  keywords: string[],
  options: RerankOptions,
  now: number
): ScoreBreakdown {
  const { weights } = options;
  const similarity = Math.min(1, Math.max(0, match.score));
  const lexical = calculateKeywordScore(match.text, keywords);
  const recency = calculateRecencyScore(match.metadata.modifiedAt, options.recencyHalfLifeDays, now);
  const quality = Math.min(MAX_QUALITY, Math.max(0, match.metadata.qualityScore)) / MAX_QUALITY;

  const total =
    similarity * weights.similarity +
    lexical * weights.lexical +
    recency * weights.recency +
    quality * weights.quality;

  return { similarity, lexical, recency, quality, total };
}

function isNewer(a: VectorMatch['metadata'], b: VectorMatch['metadata']): boolean {
  return a.modifiedAt > b.modifiedAt || (a.modifiedAt === b.modifiedAt && a.revision > b.revision);
}

/**
 * Drop candidates of a record when a newer revision of the same record is among the candidates.
 * A new revision gets new chunk ids, so older points can remain in the store.
 */
export function keepLatestRevisions(candidates: VectorMatch[]): VectorMatch[] {
  const latest = new Map<string, VectorMatch['metadata']>();
  for (const match of candidates) {
    const current = latest.get(match.metadata.recordId);
    if (!current || isNewer(match.metadata, current)) {
      latest.set(match.metadata.recordId, match.metadata);
    }
  }

  return candidates.filter((match) => {
    const newest = latest.get(match.metadata.recordId);
    return newest === undefined || !isNewer(newest, match.metadata);
  });
}

/**
 * Rerank candidates and keep the top `finalK`.
 * Superseded revisions are dropped first.
 * Ties go to higher raw similarity, then the more recent record.
 */
export function rerank(question: string, candidates: VectorMatch[], options: RerankOptions): RetrievedChunk[] {
  const now = options.now ?? Date.now();
  const keywords = extractKeywords(question);

  const ranked = keepLatestRevisions(candidates).map((match) => {
    const scores = scoreCandidate(match, keywords, options, now);
    return {
      chunkId: match.chunkId,
      similarityScore: match.score,
      rerankScore: scores.total,
      lexicalScore: scores.lexical,
      metadata: match.metadata,
      text: match.text,
    };
  });

  ranked.sort(
    (a, b) =>
      b.rerankScore - a.rerankScore ||
      b.similarityScore - a.similarityScore ||
      b.metadata.modifiedAt - a.metadata.modifiedAt ||
      a.chunkId.localeCompare(b.chunkId)
  );

  return ranked.slice(0, options.finalK);
}
