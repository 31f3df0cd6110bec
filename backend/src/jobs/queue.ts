/**
 * BullMQ Queue Configuration
 * Ingestion runs as background jobs on a Redis-backed queue
 */

import { Queue, type Job } from 'bullmq';
import { Redis } from 'ioredis';
import { createLogger } from '../lib/logger.js';

const log = createLogger('queue');

export const QueueNames = {
  INGESTION: 'ingestion',
} as const;

export type QueueName = (typeof QueueNames)[keyof typeof QueueNames];

let redisConnection: Redis | null = null;

/**
 * Shared connection for queues and workers.
 * BullMQ requires maxRetriesPerRequest to be null on worker connections.
 */
export function getRedisConnection(url: string): Redis {
  if (!redisConnection) {
    redisConnection = new Redis(url, {
      maxRetriesPerRequest: null,
      enableReadyCheck: false,
    });

    redisConnection.on('error', (error) => {
      log.error({ error: error.message }, 'Redis connection error');
    });

    redisConnection.on('connect', () => {
      log.info('Redis connected');
    });
  }

  return redisConnection;
}

export const DEFAULT_JOB_OPTIONS = {
  attempts: 3,
  backoff: {
    type: 'exponential',
    delay: 1000,
  },
  removeOnComplete: {
    age: 24 * 60 * 60, // 24 hours
    count: 1000,
  },
  removeOnFail: {
    age: 7 * 24 * 60 * 60, // 7 days
  },
} as const;

const queues: Map<QueueName, Queue> = new Map();

/**
 * Get or create a queue
 */
export function getQueue(name: QueueName, connection: Redis): Queue {
  let queue = queues.get(name);

  if (!queue) {
    queue = new Queue(name, {
      connection,
      defaultJobOptions: DEFAULT_JOB_OPTIONS,
    });
    queues.set(name, queue);
  }

  return queue;
}

export interface AddJobOptions {
  jobId?: string;
  attempts?: number;
}

/**
 * Add a job to a queue. Options left unset keep the queue's defaults.
 */
export async function addJob<T>(
  queue: Pick<Queue, 'add'>,
  name: string,
  data: T,
  options: AddJobOptions = {}
): Promise<Job> {
  const overrides: AddJobOptions = {};
  if (options.jobId !== undefined) overrides.jobId = options.jobId;
  if (options.attempts !== undefined) overrides.attempts = options.attempts;

  return queue.add(name, data, overrides);
}

/**
 * Close all queues and the shared connection
 */
export async function closeQueues(): Promise<void> {
  await Promise.all(Array.from(queues.values()).map((queue) => queue.close()));
  queues.clear();

  if (redisConnection) {
    await redisConnection.quit();
    redisConnection = null;
  }
}
