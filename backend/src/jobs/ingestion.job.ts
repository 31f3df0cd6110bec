/**
 * Ingestion Background Job
 * Runs the ingestion pipeline for a set of capture files taken from the queue
 */

import type { Job } from 'bullmq';
import type { Redis } from 'ioredis';
import { z } from 'zod';
import { BadRequestError, errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import {
  runIngestion,
  type IngestionDeps,
  type IngestionReport,
  type IngestionStage,
} from '../services/ingestion/pipeline.js';
import { BaseProcessor, type JobProgress, type ProcessorContext } from './baseProcessor.js';
import { QueueNames } from './queue.js';

const log = createLogger('ingestion-job');

const sourceTypeSchema = z.enum(['forum', 'web', 'tabular', 'generic']);

export const ingestionJobSchema = z.object({
  files: z
    .array(
      z.object({
        path: z.string().min(1),
        sourceType: sourceTypeSchema,
        label: z.string().optional(),
      })
    )
    .min(1),
  dryRun: z.boolean().optional(),
  mergedOutputPath: z.string().optional(),
});

export type IngestionJobData = z.infer<typeof ingestionJobSchema>;

export const INGESTION_JOB_NAME = 'ingest';

const STAGES: readonly IngestionStage[] = ['read', 'merge', 'chunk', 'embed', 'upsert', 'done'];

export function stageProgress(stage: IngestionStage): JobProgress {
  return { current: STAGES.indexOf(stage) + 1, total: STAGES.length, stage };
}

/**
 * Validate job data and run ingestion, reporting one progress step per stage.
 * An aborted run is returned as a report with status `aborted`, not thrown.
 */
export async function runIngestionJob(
  data: unknown,
  deps: IngestionDeps,
  reportProgress: (progress: JobProgress) => Promise<void>
): Promise<IngestionReport> {
  const parsed = ingestionJobSchema.safeParse(data);
  if (!parsed.success) {
    throw new BadRequestError('Invalid ingestion job data', {
      issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    });
  }

  const progressUpdates: Array<Promise<void>> = [];
  const report = await runIngestion(
    {
      sources: parsed.data.files,
      dryRun: parsed.data.dryRun,
      mergedOutputPath: parsed.data.mergedOutputPath,
    },
    deps,
    {
      onStage: (stage) => {
        progressUpdates.push(
          reportProgress(stageProgress(stage)).catch((error: unknown) => {
            log.warn({ stage, error: errorMessage(error) }, 'Progress update failed');
          })
        );
      },
    }
  );
  await Promise.all(progressUpdates);

  return report;
}

export class IngestionProcessor extends BaseProcessor<IngestionJobData, IngestionReport> {
  constructor(
    connection: Redis,
    private readonly deps: IngestionDeps
  ) {
    super(QueueNames.INGESTION, connection);
  }

  protected async process(
    job: Job<IngestionJobData, IngestionReport>,
    context: ProcessorContext
  ): Promise<IngestionReport> {
    context.logger.info(
      { files: job.data.files.length, dryRun: job.data.dryRun ?? false },
      'Processing ingestion job'
    );

    const report = await runIngestionJob(job.data, this.deps, context.reportProgress);

    context.logger.info(
      { status: report.status, upserted: report.upserted, durationMs: report.durationMs },
      'Ingestion job finished'
    );
    return report;
  }
}
