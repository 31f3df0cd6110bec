/**
 * Ingestion CLI
 *
 * Usage:
 *   ingest --input forum.jsonl:forum --input pages.jsonl:web [--workers 8] [--dry-run] [--out merged.jsonl]
 *   ingest --input forum.jsonl:forum --enqueue
 *
 * Inputs are given in priority order: on equal timestamp and revision the later file wins.
 * With --enqueue the run is submitted to the ingestion queue for the worker instead.
 * Exits non-zero when the vector store cannot be opened or the run aborts.
 */

import { parseArgs } from 'node:util';
import { resolve } from 'path';
import { pathToFileURL } from 'url';
import { INGESTION_JOB_NAME, type IngestionJobData } from '../jobs/ingestion.job.js';
import { QueueNames, addJob, closeQueues, getQueue, getRedisConnection } from '../jobs/queue.js';
import { loadConfig } from '../lib/config.js';
import { BadRequestError, errorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { SourceType } from '../models/Record.js';
import { SOURCE_TYPES } from '../models/Record.js';
import type { CaptureSource } from '../services/ingestion/captureFile.js';
import { runIngestion, type IngestionReport } from '../services/ingestion/pipeline.js';
import { createEmbeddingProvider, createIngestionDeps, createVectorStore } from '../services/runtime.js';

export interface IngestArgs {
  sources: CaptureSource[];
  workers?: number;
  dryRun: boolean;
  out?: string;
  enqueue: boolean;
  help: boolean;
}

export const USAGE = `Usage: ingest --input <path:sourceType> [--input ...] [--workers N] [--dry-run] [--out merged.jsonl] [--enqueue]

Source types: ${SOURCE_TYPES.join(', ')}`;

function isSourceType(value: string): value is SourceType {
  return SOURCE_TYPES.some((type) => type === value);
}

/**
 * Parse `path:sourceType`. The last colon separates the type so paths may contain colons.
 */
export function parseInputArg(arg: string): CaptureSource {
  const separator = arg.lastIndexOf(':');
  if (separator <= 0 || separator === arg.length - 1) {
    throw new BadRequestError(`Invalid --input "${arg}", expected path:sourceType`);
  }

  const path = arg.slice(0, separator);
  const sourceType = arg.slice(separator + 1);
  if (!isSourceType(sourceType)) {
    throw new BadRequestError(`Unknown source type "${sourceType}" in --input "${arg}"`);
  }
  return { path, sourceType };
}

export function parseIngestArgs(argv: string[]): IngestArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: 'string', short: 'i', multiple: true },
      workers: { type: 'string', short: 'w' },
      'dry-run': { type: 'boolean', default: false },
      out: { type: 'string', short: 'o' },
      enqueue: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  const help = values.help ?? false;
  const inputs = values.input ?? [];
  if (!help && inputs.length === 0) {
    throw new BadRequestError('At least one --input is required');
  }

  let workers: number | undefined;
  if (values.workers !== undefined) {
    workers = Number(values.workers);
    if (!Number.isInteger(workers) || workers < 1) {
      throw new BadRequestError(`--workers must be a positive integer, got "${values.workers}"`);
    }
  }

  return {
    sources: inputs.map(parseInputArg),
    workers,
    dryRun: values['dry-run'] ?? false,
    out: values.out,
    enqueue: values.enqueue ?? false,
    help,
  };
}

/**
 * Job payload for the queue. Paths are made absolute since the worker may run elsewhere.
 */
export function toJobData(args: IngestArgs, cwd = process.cwd()): IngestionJobData {
  return {
    files: args.sources.map((source) => ({ path: resolve(cwd, source.path), sourceType: source.sourceType })),
    dryRun: args.dryRun,
    mergedOutputPath: args.out === undefined ? undefined : resolve(cwd, args.out),
  };
}

export function exitCodeFor(report: IngestionReport): number {
  return report.status === 'aborted' ? 1 : 0;
}

async function main(): Promise<number> {
  let args: IngestArgs;
  try {
    args = parseIngestArgs(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 2;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig();

  if (args.enqueue) {
    try {
      const queue = getQueue(QueueNames.INGESTION, getRedisConnection(config.redis.url));
      const job = await addJob(queue, INGESTION_JOB_NAME, toJobData(args));
      console.log(JSON.stringify({ queued: true, jobId: job.id }));
      return 0;
    } finally {
      await closeQueues();
    }
  }

  const store = createVectorStore(config);

  if (!args.dryRun) {
    try {
      await store.open();
    } catch (error) {
      logger.fatal({ error: errorMessage(error) }, 'Vector store unavailable, ingestion not started');
      return 1;
    }
  }

  try {
    const deps = createIngestionDeps(
      config,
      {
        store,
        provider: args.dryRun ? undefined : createEmbeddingProvider(config),
        workers: args.workers,
      },
      {
        onProgress: (completed, total) => {
          logger.debug({ completed, total }, 'Embedding progress');
        },
      }
    );

    const report = await runIngestion(
      { sources: args.sources, dryRun: args.dryRun, mergedOutputPath: args.out },
      deps,
      { onStage: (stage) => logger.info({ stage }, 'Ingestion stage') }
    );

    console.log(JSON.stringify(report, null, 2));
    return exitCodeFor(report);
  } finally {
    if (!args.dryRun) {
      await store.close();
    }
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      logger.fatal({ err: error }, 'Ingestion failed');
      process.exit(1);
    }
  );
}
