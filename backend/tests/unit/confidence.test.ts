// =============================================================================
// Confidence Scoring Tests
// =============================================================================

import { describe, it, expect } from 'vitest';
import { confidenceTier, scoreConfidence } from '../../src/services/assistant/confidence.js';
import { makeRetrievedChunk, testConfig } from '../utils/testHelpers.js';

const config = testConfig().confidence;

function retrieval(...similarities: number[]) {
  return similarities.map((similarity, i) => makeRetrievedChunk(`c${i}`, similarity));
}

describe('confidenceTier', () => {
  it('should map scores to tiers at 0.8 and 0.6', () => {
    expect(confidenceTier(0.8)).toBe('high');
    expect(confidenceTier(0.79)).toBe('medium');
    expect(confidenceTier(0.6)).toBe('medium');
    expect(confidenceTier(0.59)).toBe('low');
  });
});

describe('scoreConfidence', () => {
  it('should combine similarity, coverage and category certainty', () => {
    const result = scoreConfidence(
      { retrieval: retrieval(0.9, 0.8, 0.7, 0.6, 0.4), finalK: 5, categoryConfidence: 1, vague: false },
      config
    );

    expect(result.similarity).toBeCloseTo(0.68);
    expect(result.coverage).toBe(0.8);
    expect(result.score).toBe(0.78);
    expect(result.tier).toBe('medium');
  });

  it('should reach high confidence for strong, classified retrieval', () => {
    const result = scoreConfidence(
      { retrieval: retrieval(1, 1, 1, 1, 1), finalK: 5, categoryConfidence: 1, vague: false },
      config
    );

    expect(result).toMatchObject({ score: 1, tier: 'high' });
  });

  it('should count missing results against coverage', () => {
    const result = scoreConfidence(
      { retrieval: retrieval(1), finalK: 5, categoryConfidence: 0, vague: false },
      config
    );

    expect(result.coverage).toBe(0.2);
    expect(result.score).toBe(0.56);
  });

  it('should cap an empty retrieval below the low threshold', () => {
    const classified = scoreConfidence({ retrieval: [], finalK: 5, categoryConfidence: 1, vague: false }, config);
    const unclassified = scoreConfidence({ retrieval: [], finalK: 5, categoryConfidence: 0.6, vague: false }, config);

    expect(classified.score).toBe(0.2);
    expect(unclassified.score).toBe(0.12);
    expect(classified.tier).toBe('low');
  });

  it('should apply vagueness and timeout penalties', () => {
    const base = { retrieval: retrieval(0.9, 0.8, 0.7, 0.6, 0.4), finalK: 5, categoryConfidence: 1 };

    expect(scoreConfidence({ ...base, vague: true }, config).score).toBe(0.63);
    expect(scoreConfidence({ ...base, vague: false, timedOut: true }, config).score).toBe(0.58);
  });

  it('should cap the score when no answer was synthesized', () => {
    const result = scoreConfidence(
      {
        retrieval: retrieval(1, 1, 1, 1, 1),
        finalK: 5,
        categoryConfidence: 1,
        vague: false,
        synthesisUnavailable: true,
      },
      config
    );

    expect(result.score).toBe(0.5);
    expect(result.tier).toBe('low');
  });

  it('should stay within zero and one', () => {
    const result = scoreConfidence(
      { retrieval: retrieval(0), finalK: 5, categoryConfidence: 0, vague: true, timedOut: true },
      config
    );

    expect(result.score).toBe(0);
  });
});
