/**
 * Query API Types
 * Request and response bodies of POST /api/query and GET /api/stats
 */

export type ConfidenceTier = 'high' | 'medium' | 'low';

export interface QueryRequestBody {
  question: string;
  /** Answers to earlier clarification questions, keyed by field name */
  prior_answers?: Record<string, string>;
}

export interface ClarificationQuestionDto {
  question: string;
  options: string[];
  context: string;
  field_name: string;
}

export interface SourceDto {
  title: string;
  url: string;
  score: number;
  content_preview: string;
  source: string;
}

export interface QueryResponseBody {
  answer: string;
  /** 0 to 1, three decimals */
  confidence_score: number;
  confidence_tier: ConfidenceTier;
  category: string;
  clarification_questions: ClarificationQuestionDto[];
  follow_up_questions: string[];
  action_items: string[];
  related_topics: string[];
  sources: SourceDto[];
  /** True when the overall deadline cut the request short */
  incomplete: boolean;
  notes: string[];
}

export interface StatsResponseBody {
  vector_store: {
    backend: string;
    collection: string;
    record_count: number;
    dimensions: number | null;
    distance: string;
  };
  embedding_model: string;
  synthesis_model: string;
  chunking: {
    max_size: number;
    overlap: number;
    min_size: number;
    context_depth: number;
  };
  retrieval: {
    retrieve_k: number;
    final_k: number;
  };
}
