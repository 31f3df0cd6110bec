/**
 * Response Generator Service
 * Answer synthesis over retrieved, source-attributed context
 */

import { createLogger } from '../../lib/logger.js';
import { SynthesisUnavailableError, errorMessage } from '../../lib/errors.js';
import {
  CircuitBreaker,
  CircuitOpenError,
  SYNTHESIS_BREAKER_DEFAULTS,
} from '../../lib/circuitBreaker.js';

const log = createLogger('response-generator');

const SERVICE_FAILURE_STATUSES = new Set([408, 429]);

function statusOf(error: Error): number | undefined {
  const status: unknown = 'status' in error ? Reflect.get(error, 'status') : undefined;
  return typeof status === 'number' ? status : undefined;
}

/**
 * Whether a synthesis error reflects the health of the service. A 4xx caused by
 * one request (oversized context, bad parameters) does not.
 */
export function isSynthesisServiceFailure(error: Error): boolean {
  const status = statusOf(error);
  if (status === undefined) {
    return true;
  }
  return SERVICE_FAILURE_STATUSES.has(status) || status >= 500;
}

// =============================================================================
// Types
// =============================================================================

export interface SynthesisRequest {
  question: string;
  context: string;
  signal?: AbortSignal;
}

export interface AnswerSynthesizer {
  readonly model: string;
  /** Throws SynthesisUnavailableError when no answer can be produced */
  synthesize(request: SynthesisRequest): Promise<string>;
}

export interface MessagesResponse {
  content: Array<{ type: string; text?: string }>;
}

/**
 * The slice of the Anthropic client used here
 */
export interface MessagesClient {
  messages: {
    create(
      body: {
        model: string;
        max_tokens: number;
        system: string;
        messages: Array<{ role: 'user' | 'assistant'; content: string }>;
      },
      options?: { signal?: AbortSignal }
    ): Promise<MessagesResponse>;
  };
}

export interface GeneratorOptions {
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

// =============================================================================
// System Prompt
// =============================================================================

export const SYSTEM_PROMPT = `You are a helpful assistant answering questions from students using community discussions, official web pages and course records.

Guidelines:
- Answer only from the provided sources; if they do not contain the answer, say so clearly
- Cite sources by their number, e.g. (Source 2)
- Prefer recent and widely confirmed information when sources disagree
- Be concise and practical`;

export function buildUserPrompt(question: string, context: string): string {
  return `Relevant Context:
${context}

User Question:
${question}`;
}

// =============================================================================
// Implementations
// =============================================================================

export class AnthropicAnswerSynthesizer implements AnswerSynthesizer {
  readonly model: string;
  private readonly breaker: CircuitBreaker;

  constructor(
    private readonly client: MessagesClient,
    private readonly options: GeneratorOptions,
    breaker?: CircuitBreaker
  ) {
    this.model = options.model;
    this.breaker =
      breaker ??
      new CircuitBreaker({
        name: 'answer-synthesis',
        ...SYNTHESIS_BREAKER_DEFAULTS,
        requestTimeout: options.timeoutMs,
        isFailure: isSynthesisServiceFailure,
        onOpen: () => log.warn({ model: options.model }, 'Answer synthesis circuit opened'),
        onClose: () => log.info({ model: options.model }, 'Answer synthesis circuit closed'),
      });
  }

  async synthesize({ question, context, signal }: SynthesisRequest): Promise<string> {
    let response: MessagesResponse;
    try {
      response = await this.breaker.execute(
        (callSignal) =>
          this.client.messages.create(
            {
              model: this.options.model,
              max_tokens: this.options.maxTokens,
              system: SYSTEM_PROMPT,
              messages: [{ role: 'user', content: buildUserPrompt(question, context) }],
            },
            { signal: callSignal }
          ),
        signal
      );
    } catch (error) {
      const reason = error instanceof CircuitOpenError
        ? 'circuit open'
        : errorMessage(error);
      log.warn({ model: this.model, reason }, 'Answer synthesis failed');
      throw new SynthesisUnavailableError(`Answer synthesis failed: ${reason}`, error);
    }

    const text = response.content
      .map((block) => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
      .join('\n')
      .trim();

    if (!text) {
      throw new SynthesisUnavailableError('Answer synthesis returned no text');
    }

    log.debug({ model: this.model, answerLength: text.length }, 'Answer synthesized');
    return text;
  }
}

/**
 * Used when synthesis is switched off or has no credentials
 */
export class DisabledAnswerSynthesizer implements AnswerSynthesizer {
  readonly model = 'none';

  async synthesize(): Promise<string> {
    throw new SynthesisUnavailableError('Answer synthesis is disabled');
  }
}
