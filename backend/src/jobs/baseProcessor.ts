/**
 * Base Job Processor Class
 * Worker lifecycle, per-job logging and progress reporting shared by all processors
 */

import { Worker, type Job, type Processor } from 'bullmq';
import type { Redis } from 'ioredis';
import { createLogger, type Logger } from '../lib/logger.js';
import type { QueueName } from './queue.js';

export interface ProcessorContext {
  logger: Logger;
  reportProgress: (progress: JobProgress) => Promise<void>;
}

export interface JobProgress {
  current: number;
  total: number;
  stage?: string;
  message?: string;
}

export abstract class BaseProcessor<TData, TResult> {
  protected worker: Worker<TData, TResult> | null = null;
  protected readonly logger: Logger;

  constructor(
    protected readonly queueName: QueueName,
    protected readonly connection: Redis
  ) {
    this.logger = createLogger(`processor:${queueName}`);
  }

  /**
   * Process a job - must be implemented by subclasses
   */
  protected abstract process(job: Job<TData, TResult>, context: ProcessorContext): Promise<TResult>;

  /**
   * Start the worker
   */
  start(concurrency = 1): void {
    if (this.worker) {
      return;
    }

    const processor: Processor<TData, TResult> = async (job) => {
      const context: ProcessorContext = {
        logger: this.logger.child({ jobId: job.id }),
        reportProgress: (progress) => this.updateProgress(job, progress),
      };

      try {
        context.logger.info({ name: job.name }, 'Starting job');
        const result = await this.process(job, context);
        context.logger.info({ name: job.name }, 'Completed job');
        return result;
      } catch (error) {
        context.logger.error({ name: job.name, attempt: job.attemptsMade, err: error }, 'Failed job');
        throw error;
      }
    };

    this.worker = new Worker<TData, TResult>(this.queueName, processor, {
      connection: this.connection,
      concurrency,
    });

    this.setupEventHandlers(this.worker);

    this.logger.info({ concurrency }, 'Worker started');
  }

  /**
   * Stop the worker
   */
  async stop(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
      this.worker = null;
      this.logger.info('Worker stopped');
    }
  }

  /**
   * Update job progress
   */
  protected async updateProgress(job: Job<TData, TResult>, progress: JobProgress): Promise<void> {
    const percentage = progress.total > 0 ? Math.round((progress.current / progress.total) * 100) : 0;
    await job.updateProgress({ ...progress, percentage });
  }

  private setupEventHandlers(worker: Worker<TData, TResult>): void {
    worker.on('failed', (job, error) => {
      this.logger.error({ jobId: job?.id, error: error.message }, 'Job failed');
    });

    worker.on('error', (error) => {
      this.logger.error({ error: error.message }, 'Worker error');
    });

    worker.on('stalled', (jobId) => {
      this.logger.warn({ jobId }, 'Job stalled');
    });
  }
}
