/**
 * Health Check Endpoints
 * Liveness of the process and reachability of the vector store
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { HealthCheck, HealthStatus } from '@threadlens/shared';
import { errorMessage } from '../../lib/errors.js';
import type { VectorStore } from '../../services/vector/vectorStore.js';

// Application start time for uptime calculation
const startTime = Date.now();

const APP_VERSION = process.env.APP_VERSION || '0.1.0';

export interface HealthRoutesOptions {
  store: Pick<VectorStore, 'stats' | 'backend'>;
  synthesisEnabled: boolean;
}

async function checkVectorStore(store: HealthRoutesOptions['store']): Promise<HealthCheck> {
  const start = Date.now();
  try {
    const stats = await store.stats();
    return {
      name: `vector-store:${store.backend}`,
      status: 'pass',
      responseTime: Date.now() - start,
      message: `${stats.recordCount} records`,
    };
  } catch (error) {
    return {
      name: `vector-store:${store.backend}`,
      status: 'fail',
      responseTime: Date.now() - start,
      message: errorMessage(error),
    };
  }
}

export default async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions) {
  /**
   * GET /health
   * A failing store is unhealthy; disabled synthesis only degrades answers.
   */
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const checks: HealthCheck[] = [
      await checkVectorStore(options.store),
      {
        name: 'answer-synthesis',
        status: options.synthesisEnabled ? 'pass' : 'warn',
        message: options.synthesisEnabled ? undefined : 'disabled, answers fall back to raw retrieval',
      },
    ];

    let status: HealthStatus['status'];
    if (checks.some((c) => c.status === 'fail')) {
      status = 'unhealthy';
    } else if (checks.some((c) => c.status === 'warn')) {
      status = 'degraded';
    } else {
      status = 'healthy';
    }

    const healthStatus: HealthStatus = {
      status,
      version: APP_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks,
    };

    return reply.status(status === 'unhealthy' ? 503 : 200).send(healthStatus);
  });
}
