/**
 * Embedding Provider
 * Converts batches of texts into vectors, reporting a tagged outcome per text
 */

import { OpenAI } from '../../lib/openai.js';
import { createLogger } from '../../lib/logger.js';
import { errorMessage } from '../../lib/errors.js';
import { EmbeddingOutcomes, type EmbeddingOutcome, type Vector } from '../../models/Embedding.js';

const log = createLogger('embedding-provider');

export interface EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  /**
   * One outcome per input text, in input order. Implementations report
   * failures as outcomes rather than throwing.
   */
  embedBatch(texts: string[]): Promise<EmbeddingOutcome[]>;
}

/**
 * The slice of the OpenAI client the provider calls
 */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: Array<{ index: number; embedding: number[] }>;
    }>;
  };
}

export type FailureKind = 'transient' | 'permanent';

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
]);

function readNumber(value: unknown, key: string): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

/**
 * Rate limits, server errors, timeouts and dropped connections are transient.
 * Everything else (bad request, auth, unknown model) is permanent.
 */
export function classifyEmbeddingError(error: unknown): FailureKind {
  if (error instanceof OpenAI.APIConnectionError) {
    return 'transient';
  }

  const status = readNumber(error, 'status');
  if (status !== undefined) {
    return TRANSIENT_STATUSES.has(status) || status >= 500 ? 'transient' : 'permanent';
  }

  const code = readString(error, 'code');
  if (code !== undefined && TRANSIENT_NETWORK_CODES.has(code)) {
    return 'transient';
  }

  if (error instanceof Error && /timed? ?out/i.test(error.message)) {
    return 'transient';
  }

  return 'permanent';
}

/**
 * Embedding provider backed by the OpenAI embeddings endpoint
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly client: EmbeddingsClient,
    readonly model: string,
    readonly dimensions: number
  ) {}

  async embedBatch(texts: string[]): Promise<EmbeddingOutcome[]> {
    const outcomes: Array<EmbeddingOutcome | undefined> = texts.map((text) =>
      text.trim() === '' ? EmbeddingOutcomes.permanent('empty input') : undefined
    );
    const pending = texts
      .map((text, index) => ({ text, index }))
      .filter((entry) => outcomes[entry.index] === undefined);

    if (pending.length > 0) {
      const results = await this.request(pending.map((entry) => entry.text));
      pending.forEach((entry, i) => {
        outcomes[entry.index] = results[i];
      });
    }

    return outcomes.map((outcome) => outcome ?? EmbeddingOutcomes.permanent('no outcome'));
  }

  private async request(texts: string[]): Promise<EmbeddingOutcome[]> {
    try {
      const response = await this.client.embeddings.create({ model: this.model, input: texts });
      const byIndex = new Map(response.data.map((item) => [item.index, item.embedding]));

      return texts.map((_, index) => {
        const vector = byIndex.get(index);
        if (!vector) {
          return EmbeddingOutcomes.transient('missing embedding in response');
        }
        return this.checkDimensions(vector);
      });
    } catch (error) {
      const kind = classifyEmbeddingError(error);
      const reason = errorMessage(error);

      // A permanent batch failure may come from a single bad input; isolate it
      if (kind === 'permanent' && texts.length > 1) {
        log.debug({ batchSize: texts.length, reason }, 'Batch rejected, retrying items individually');
        const isolated: EmbeddingOutcome[] = [];
        for (const text of texts) {
          isolated.push(...(await this.request([text])));
        }
        return isolated;
      }

      log.debug({ batchSize: texts.length, kind, reason }, 'Embedding request failed');
      return texts.map(() =>
        kind === 'transient' ? EmbeddingOutcomes.transient(reason) : EmbeddingOutcomes.permanent(reason)
      );
    }
  }

  private checkDimensions(vector: Vector): EmbeddingOutcome {
    if (vector.length !== this.dimensions) {
      return EmbeddingOutcomes.permanent(
        `expected ${this.dimensions} dimensions, got ${vector.length}`
      );
    }
    return EmbeddingOutcomes.success(vector);
  }
}
