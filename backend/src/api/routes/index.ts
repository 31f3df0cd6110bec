/**
 * API Routes Registry
 */

import type { FastifyInstance } from 'fastify';
import healthRoutes from './health.js';
import queryRoutes, { type QueryRoutesOptions } from './query.js';

export interface RouteDeps extends QueryRoutesOptions {
  synthesisEnabled: boolean;
}

export async function registerRoutes(server: FastifyInstance, deps: RouteDeps): Promise<void> {
  await server.register(healthRoutes, {
    store: deps.store,
    synthesisEnabled: deps.synthesisEnabled,
  });
  await server.register(queryRoutes, deps);
}
