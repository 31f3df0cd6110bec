/**
 * Embedding Dispatcher
 * Fans chunk sub-batches out to a bounded worker pool and collects vectors by chunk id
 */

import { createLogger } from '../../lib/logger.js';
import { errorMessage } from '../../lib/errors.js';
import type { EmbeddingSettings } from '../../lib/config.js';
import {
  EmbeddingOutcomes,
  type EmbeddingOutcome,
  type EmbeddingRunReport,
  type FailedChunk,
  type Vector,
} from '../../models/Embedding.js';
import type { EmbeddingProvider } from './embeddingProvider.js';

const log = createLogger('embedding-dispatcher');

export interface EmbeddingInput {
  chunkId: string;
  text: string;
}

export type DispatcherSettings = Pick<
  EmbeddingSettings,
  'workers' | 'batchSize' | 'maxAttempts' | 'baseDelayMs' | 'maxDelayMs'
>;

export interface DispatcherHooks {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onProgress?: (completed: number, total: number) => void;
}

interface PendingItem extends EmbeddingInput {
  attempts: number;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff with equal jitter: half the capped delay is fixed,
 * the other half random.
 */
export function backoffDelay(
  attempt: number,
  settings: Pick<DispatcherSettings, 'baseDelayMs' | 'maxDelayMs'>,
  random: () => number = Math.random
): number {
  const exponential = settings.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(settings.maxDelayMs, exponential);
  return Math.round(capped / 2 + random() * (capped / 2));
}

export class EmbeddingDispatcher {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly onProgress?: (completed: number, total: number) => void;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly settings: DispatcherSettings,
    hooks: DispatcherHooks = {}
  ) {
    this.sleep = hooks.sleep ?? defaultSleep;
    this.random = hooks.random ?? Math.random;
    this.onProgress = hooks.onProgress;
  }

  get model(): string {
    return this.provider.model;
  }

  /**
   * Embed every input. Never throws for per-chunk failures: they are listed
   * in the report and the run continues.
   */
  async embedAll(inputs: EmbeddingInput[]): Promise<EmbeddingRunReport> {
    const startTime = Date.now();
    const embeddings = new Map<string, Vector>();
    const failed: FailedChunk[] = [];
    let retryCount = 0;
    let completed = 0;

    // Results are keyed by chunk id, so duplicate ids are embedded once
    const unique = new Map<string, EmbeddingInput>();
    for (const input of inputs) {
      if (!unique.has(input.chunkId)) {
        unique.set(input.chunkId, input);
      }
    }
    if (unique.size < inputs.length) {
      log.warn({ duplicates: inputs.length - unique.size }, 'Duplicate chunk ids in embedding input');
    }

    const items = [...unique.values()];
    const total = items.length;
    const queue: PendingItem[][] = [];
    for (let i = 0; i < items.length; i += this.settings.batchSize) {
      queue.push(
        items.slice(i, i + this.settings.batchSize).map((item) => ({ ...item, attempts: 0 }))
      );
    }

    const settle = (): void => {
      completed++;
      this.onProgress?.(completed, total);
    };

    const runWorker = async (workerId: number): Promise<void> => {
      for (let batch = queue.shift(); batch; batch = queue.shift()) {
        let pending = batch;

        while (pending.length > 0) {
          const outcomes = await this.attempt(pending);
          const retry: PendingItem[] = [];

          pending.forEach((item, index) => {
            const outcome = outcomes[index] ?? EmbeddingOutcomes.transient('no outcome');
            const attempts = item.attempts + 1;

            switch (outcome.kind) {
              case 'success':
                embeddings.set(item.chunkId, outcome.vector);
                settle();
                break;
              case 'permanent':
                failed.push({ chunkId: item.chunkId, reason: outcome.reason, attempts });
                settle();
                break;
              case 'transient':
                if (attempts >= this.settings.maxAttempts) {
                  failed.push({
                    chunkId: item.chunkId,
                    reason: `retries exhausted: ${outcome.reason}`,
                    attempts,
                  });
                  settle();
                } else {
                  retry.push({ ...item, attempts });
                }
                break;
            }
          });

          if (retry.length > 0) {
            retryCount += retry.length;
            const attempt = retry[0]?.attempts ?? 1;
            const delay = backoffDelay(attempt, this.settings, this.random);
            log.debug({ workerId, retrying: retry.length, attempt, delay }, 'Retrying embedding batch');
            await this.sleep(delay);
          }

          pending = retry;
        }
      }
    };

    const workerCount = Math.max(1, Math.min(this.settings.workers, queue.length));
    await Promise.all(Array.from({ length: workerCount }, (_, id) => runWorker(id)));

    const report: EmbeddingRunReport = {
      embeddings,
      failed,
      totalChunks: total,
      successCount: embeddings.size,
      failureCount: failed.length,
      retryCount,
      durationMs: Date.now() - startTime,
    };

    log.info(
      {
        model: this.provider.model,
        workers: workerCount,
        totalChunks: report.totalChunks,
        successCount: report.successCount,
        failureCount: report.failureCount,
        retryCount: report.retryCount,
        durationMs: report.durationMs,
      },
      'Embedding run complete'
    );

    return report;
  }

  /**
   * One provider call. A thrown error becomes a transient outcome for every item.
   */
  private async attempt(items: PendingItem[]): Promise<EmbeddingOutcome[]> {
    try {
      return await this.provider.embedBatch(items.map((item) => item.text));
    } catch (error) {
      const reason = errorMessage(error);
      return items.map(() => EmbeddingOutcomes.transient(reason));
    }
  }
}
