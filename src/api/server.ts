/**
 * Stats API Server
 *
 * Read-only Express API over the stats store for the dashboard.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { StatsAggregator } from '../stats/aggregator.js';
import { createRoutes } from './routes/index.js';

export function createApp(stats: StatsAggregator): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Request logging
  app.use((req, _res, next) => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
    next();
  });

  // Routes
  app.use('/api', createRoutes(stats));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('[Server] Unhandled error:', err);
    res.status(500).json({
      error: 'Internal server error',
      message: err.message,
    });
  });

  return app;
}

export function startServer(stats: StatsAggregator, port: number): Server {
  return createApp(stats).listen(port, () => {
    console.log(`[Server] Stats API running on http://localhost:${port}`);
    console.log('');
    console.log('Available endpoints:');
    console.log(`  GET /api/health        - Health check`);
    console.log(`  GET /api/stats         - Scan history and totals`);
    console.log(`  GET /api/stats/latest  - Most recent scan`);
    console.log('');
  });
}
