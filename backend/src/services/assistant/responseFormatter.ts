/**
 * Response Formatter Service
 * Source references, synthesis context and fallback answers
 */

import type { RetrievalResult, RetrievedChunk, SourceReference } from '../../models/Query.js';
import { generateContentPreview } from '../vector/chunking.js';

// =============================================================================
// Messages
// =============================================================================

export const MESSAGES = {
  noInformation:
    "I don't have enough information to answer that yet. Try rephrasing your question or adding more detail.",
  storeUnavailable:
    'No answer is available right now because the knowledge base could not be reached. Please try again shortly.',
  synthesisUnavailable:
    'A written answer could not be generated right now. These are the most relevant passages found:',
  incomplete: 'The request ran out of time, so this answer may be incomplete.',
} as const;

export const CONTENT_PREVIEW_LENGTH = 200;

// =============================================================================
// Sources
// =============================================================================

function sourceTitle(chunk: RetrievedChunk): string {
  return chunk.metadata.title ?? generateContentPreview(chunk.text, 60);
}

/**
 * One reference per record, in retrieval order
 */
export function toSourceReferences(retrieval: RetrievalResult): SourceReference[] {
  const seen = new Set<string>();
  const sources: SourceReference[] = [];

  for (const chunk of retrieval) {
    if (seen.has(chunk.metadata.recordId)) continue;
    seen.add(chunk.metadata.recordId);

    sources.push({
      title: sourceTitle(chunk),
      url: chunk.metadata.url ?? '',
      score: Math.round(chunk.rerankScore * 1000) / 1000,
      contentPreview: generateContentPreview(chunk.text, CONTENT_PREVIEW_LENGTH),
      source: chunk.metadata.sourceType,
    });
  }

  return sources;
}

/**
 * Source-attributed context block handed to answer synthesis
 */
export function buildSourceContext(retrieval: RetrievalResult): string {
  return retrieval
    .map((chunk, index) => {
      const url = chunk.metadata.url ? ` [URL: ${chunk.metadata.url}]` : '';
      return `Source ${index + 1} (${chunk.metadata.sourceType}): ${sourceTitle(chunk)}${url}\n${chunk.text}`;
    })
    .join('\n\n');
}

// =============================================================================
// Fallback answers
// =============================================================================

/**
 * Best-effort answer built from raw retrieval when synthesis is unavailable
 */
export function formatRetrievalAnswer(retrieval: RetrievalResult): string {
  if (retrieval.length === 0) {
    return MESSAGES.noInformation;
  }

  const passages = toSourceReferences(retrieval).map(
    (source, index) => `${index + 1}. ${source.title}: ${source.contentPreview}`
  );
  return [MESSAGES.synthesisUnavailable, '', ...passages].join('\n');
}
