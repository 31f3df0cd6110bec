/**
 * Query Model Types
 * Per-request retrieval and analysis state
 */

import type { VectorMetadata } from './Embedding.js';

export type PriorAnswers = Record<string, string>;

export interface QueryRequest {
  question: string;
  priorAnswers?: PriorAnswers;
  /** Overrides the configured overall timeout */
  timeoutMs?: number;
}

export interface RetrievedChunk {
  chunkId: string;
  similarityScore: number;
  rerankScore: number;
  lexicalScore: number;
  metadata: VectorMetadata;
  text: string;
}

export type RetrievalResult = RetrievedChunk[];

export const UNCLASSIFIED = 'unclassified';

export interface Classification {
  category: string;
  confidence: number;
}

export interface ClarificationQuestion {
  question: string;
  options: string[];
  context: string;
  fieldName: string;
}

export type ConfidenceTier = 'high' | 'medium' | 'low';

export interface QueryAnalysis {
  category: string;
  categoryConfidence: number;
  vague: boolean;
  unresolvedFields: string[];
  clarificationQuestions: ClarificationQuestion[];
  followUpQuestions: string[];
  actionItems: string[];
  relatedTopics: string[];
}

export interface SourceReference {
  title: string;
  url: string;
  score: number;
  contentPreview: string;
  source: string;
}

export interface QueryOutcome {
  answer: string;
  confidenceScore: number;
  confidenceTier: ConfidenceTier;
  analysis: QueryAnalysis;
  retrieval: RetrievalResult;
  sources: SourceReference[];
  synthesized: boolean;
  incomplete: boolean;
  notes: string[];
}
