/**
 * Route Aggregator
 *
 * Combines all API routes.
 */

import { Router } from 'express';
import type { StatsAggregator } from '../../stats/aggregator.js';
import { createHealthRouter } from './health.js';
import { createStatsRouter } from './stats.js';

export function createRoutes(stats: StatsAggregator): Router {
  const router = Router();

  router.use('/stats', createStatsRouter(stats));
  router.use('/health', createHealthRouter(stats));

  return router;
}
