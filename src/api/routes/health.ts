/**
 * GET /api/health - Liveness plus the time of the last recorded scan
 */

import { Router, type Request, type Response } from 'express';
import type { StatsAggregator } from '../../stats/aggregator.js';
import { getHealth } from '../processors/stats.processor.js';

export function createHealthRouter(stats: StatsAggregator): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response) => {
    res.json(await getHealth(stats));
  });

  return router;
}
