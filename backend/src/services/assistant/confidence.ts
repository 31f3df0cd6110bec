/**
 * Confidence Scoring
 * Combines retrieval quality and category certainty into a score in [0, 1]
 */

import type { ConfidenceConfig } from '../../lib/config.js';
import type { ConfidenceTier, RetrievalResult } from '../../models/Query.js';

// Tier boundaries
export const HIGH_CONFIDENCE = 0.8;
export const MEDIUM_CONFIDENCE = 0.6;
// Scores below this are reported as "insufficient information"
export const LOW_CONFIDENCE_THRESHOLD = 0.3;

export interface ConfidenceInput {
  retrieval: RetrievalResult;
  finalK: number;
  categoryConfidence: number;
  vague: boolean;
  synthesisUnavailable?: boolean;
  timedOut?: boolean;
}

export interface ConfidenceBreakdown {
  similarity: number;
  coverage: number;
  category: number;
  score: number;
  tier: ConfidenceTier;
}

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

export function confidenceTier(score: number): ConfidenceTier {
  if (score >= HIGH_CONFIDENCE) return 'high';
  if (score >= MEDIUM_CONFIDENCE) return 'medium';
  return 'low';
}

/**
 * score = wS * mean similarity + wC * share above threshold + wCat * certainty,
 * minus penalties for vagueness and timeouts, with caps for an empty
 * retrieval and a missing synthesized answer.
 */
export function scoreConfidence(input: ConfidenceInput, config: ConfidenceConfig): ConfidenceBreakdown {
  const { weights } = config;
  const top = input.retrieval.slice(0, Math.max(1, input.finalK));
  const similarities = top.map((chunk) => clamp01(chunk.similarityScore));

  const similarity = similarities.length > 0
    ? similarities.reduce((sum, value) => sum + value, 0) / similarities.length
    : 0;
  const coverage = input.finalK > 0
    ? clamp01(similarities.filter((value) => value >= config.relevanceThreshold).length / input.finalK)
    : 0;
  const category = clamp01(input.categoryConfidence);

  let score =
    weights.similarity * similarity +
    weights.coverage * coverage +
    weights.category * category;

  if (input.vague) {
    score -= config.vaguePenalty;
  }
  if (input.timedOut) {
    score -= config.timeoutPenalty;
  }
  if (top.length === 0) {
    score = Math.min(score, config.noSourceCap);
  }
  if (input.synthesisUnavailable) {
    score = Math.min(score, config.synthesisCap);
  }

  score = Math.round(clamp01(score) * 1000) / 1000;

  return { similarity, coverage, category, score, tier: confidenceTier(score) };
}
