/**
 * Topic Classifier
 * Maps a question to one catalog category with a certainty in [0, 1]
 */

import { UNCLASSIFIED, type Classification } from '../../models/Query.js';
import type { CategoryCatalog } from './categoryCatalog.js';

export interface TopicClassifier {
  classify(text: string): Promise<Classification>;
}

// Certainty of a single keyword hit; each further hit adds STEP up to 1
const BASE_CERTAINTY = 0.6;
const CERTAINTY_STEP = 0.2;

/**
 * Keyword-table classifier.
 *
 * Each category scores the number of its keyword patterns present in the
 * text. The winner's certainty is its share of all hits, scaled by how
 * many distinct keywords it matched. Ties go to the category listed first.
 */
export class KeywordClassifier implements TopicClassifier {
  constructor(private readonly catalog: CategoryCatalog) {}

  async classify(text: string): Promise<Classification> {
    return this.classifySync(text);
  }

  classifySync(text: string): Classification {
    const hits = this.catalog.categories.map((category) => ({
      name: category.name,
      count: category.keywords.filter((pattern) => pattern.test(text)).length,
    }));

    const totalHits = hits.reduce((sum, entry) => sum + entry.count, 0);
    if (totalHits === 0) {
      return { category: UNCLASSIFIED, confidence: 0 };
    }

    let best = hits[0];
    for (const entry of hits) {
      if (!best || entry.count > best.count) {
        best = entry;
      }
    }
    if (!best || best.count === 0) {
      return { category: UNCLASSIFIED, confidence: 0 };
    }

    const share = best.count / totalHits;
    const strength = Math.min(1, BASE_CERTAINTY + CERTAINTY_STEP * (best.count - 1));

    return {
      category: best.name,
      confidence: Math.round(share * strength * 1000) / 1000,
    };
  }
}
