/**
 * Query Analyzer
 * Per-request flow: classify, retrieve, clarify, synthesize, score.
 * Clarification never blocks the answer. Store, embedding and synthesis
 * failures and the overall deadline produce a partial result.
 */

import { createLogger } from '../../lib/logger.js';
import {
  EmbeddingUnavailableError,
  SynthesisUnavailableError,
  VectorStoreUnavailableError,
  errorMessage,
} from '../../lib/errors.js';
import type { ConfidenceConfig } from '../../lib/config.js';
import type { MetadataFilter } from '../../models/Embedding.js';
import type {
  QueryOutcome,
  QueryRequest,
  RetrievalResult,
} from '../../models/Query.js';
import type { CategoryCatalog } from './categoryCatalog.js';
import type { TopicClassifier } from './classifier.js';
import { analyzeQuestion } from './clarifier.js';
import { scoreConfidence } from './confidence.js';
import type { AnswerSynthesizer } from './responseGenerator.js';
import {
  MESSAGES,
  buildSourceContext,
  formatRetrievalAnswer,
  toSourceReferences,
} from './responseFormatter.js';

const log = createLogger('query-analyzer');

export interface RetrievalPort {
  retrieve(question: string, filter?: MetadataFilter): Promise<RetrievalResult>;
}

export interface QueryAnalyzerOptions {
  confidence: ConfidenceConfig;
  finalK: number;
  timeoutMs: number;
}

export interface QueryAnalyzerDeps {
  classifier: TopicClassifier;
  catalog: CategoryCatalog;
  retriever: RetrievalPort;
  synthesizer: AnswerSynthesizer;
  options: QueryAnalyzerOptions;
}

type DeadlineResult<T> = { timedOut: false; value: T } | { timedOut: true };

/**
 * Resolve with the task's value, or with a timeout marker once `ms` elapse.
 * A task that fails after the deadline is reported through `onLate`.
 */
function raceDeadline<T>(
  task: Promise<T>,
  ms: number,
  onLate: (error: unknown) => void
): Promise<DeadlineResult<T>> {
  return new Promise((resolve, reject) => {
    let settled = false;
    const timer = setTimeout(() => {
      settled = true;
      resolve({ timedOut: true });
    }, Math.max(0, ms));

    task.then(
      (value) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({ timedOut: false, value });
      },
      (error: unknown) => {
        if (settled) {
          onLate(error);
          return;
        }
        settled = true;
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

export class QueryAnalyzer {
  constructor(private readonly deps: QueryAnalyzerDeps) {}

  async handle(request: QueryRequest): Promise<QueryOutcome> {
    const { classifier, catalog, retriever, synthesizer, options } = this.deps;
    const startTime = Date.now();
    const timeoutMs = request.timeoutMs ?? options.timeoutMs;
    const deadline = startTime + timeoutMs;
    const remaining = (): number => deadline - Date.now();
    const priorAnswers = request.priorAnswers ?? {};
    const question = request.question.trim();

    const notes: string[] = [];
    let timedOut = false;
    let storeUnavailable = false;
    let synthesisUnavailable = false;
    let synthesized = false;

    const onLate = (stage: string) => (error: unknown): void => {
      log.debug({ stage, error: errorMessage(error) }, 'Stage failed after deadline');
    };

    // Classify
    const classification = await classifier.classify(question);
    const analysis = analyzeQuestion(question, classification, catalog, priorAnswers);

    // Retrieve
    let retrieval: RetrievalResult = [];
    try {
      const result = await raceDeadline(retriever.retrieve(question), remaining(), onLate('retrieval'));
      if (result.timedOut) {
        timedOut = true;
      } else {
        retrieval = result.value;
      }
    } catch (error) {
      if (!(error instanceof VectorStoreUnavailableError || error instanceof EmbeddingUnavailableError)) {
        throw error;
      }
      storeUnavailable = true;
      notes.push(error.message);
      log.warn({ error: error.message }, 'Retrieval unavailable, answering without sources');
    }

    // Answer
    let answer: string;
    if (storeUnavailable) {
      answer = MESSAGES.storeUnavailable;
    } else if (retrieval.length === 0) {
      answer = MESSAGES.noInformation;
    } else {
      const controller = new AbortController();
      try {
        const result = await raceDeadline(
          synthesizer.synthesize({
            question,
            context: buildSourceContext(retrieval),
            signal: controller.signal,
          }),
          remaining(),
          onLate('synthesis')
        );
        if (result.timedOut) {
          controller.abort();
          timedOut = true;
          answer = formatRetrievalAnswer(retrieval);
        } else {
          answer = result.value;
          synthesized = true;
        }
      } catch (error) {
        if (!(error instanceof SynthesisUnavailableError)) {
          throw error;
        }
        synthesisUnavailable = true;
        notes.push('Answer synthesis unavailable; showing the most relevant sources instead.');
        answer = formatRetrievalAnswer(retrieval);
      }
    }

    if (timedOut) {
      notes.push(MESSAGES.incomplete);
    }
    if (analysis.clarificationQuestions.length > 0) {
      notes.push('The question is broad; answering the clarification questions will sharpen the answer.');
    }

    const confidence = scoreConfidence(
      {
        retrieval,
        finalK: options.finalK,
        categoryConfidence: analysis.categoryConfidence,
        vague: analysis.vague,
        synthesisUnavailable: synthesisUnavailable || (retrieval.length > 0 && !synthesized),
        timedOut,
      },
      options.confidence
    );

    log.info(
      {
        category: analysis.category,
        vague: analysis.vague,
        results: retrieval.length,
        synthesized,
        timedOut,
        confidence: confidence.score,
        durationMs: Date.now() - startTime,
      },
      'Query handled'
    );

    return {
      answer,
      confidenceScore: confidence.score,
      confidenceTier: confidence.tier,
      analysis,
      retrieval,
      sources: toSourceReferences(retrieval),
      synthesized,
      incomplete: timedOut,
      notes,
    };
  }
}
