/**
 * Stats Route
 *
 * GET /api/stats        - Full stats store (null until the first scan)
 * GET /api/stats/latest - Most recent scan record
 */

import { Router, type Request, type Response } from 'express';
import type { StatsAggregator } from '../../stats/aggregator.js';
import { getLatestScan, getStats } from '../processors/stats.processor.js';

export function createStatsRouter(stats: StatsAggregator): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json(await getStats(stats));
    } catch (error) {
      console.error('[StatsRoute] Error:', error);
      res.status(500).json({
        error: 'Failed to read stats',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  router.get('/latest', async (_req: Request, res: Response) => {
    try {
      res.json(await getLatestScan(stats));
    } catch (error) {
      console.error('[StatsRoute] Error:', error);
      res.status(500).json({
        error: 'Failed to read stats',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  return router;
}
