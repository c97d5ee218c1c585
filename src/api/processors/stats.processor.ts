/**
 * Stats Processor
 *
 * Shapes the stats store into API responses. A missing store is reported as
 * null ("no data yet"), never as an error.
 */

import type { StatsAggregator } from '../../stats/aggregator.js';
import type { ScanRecord, StatsStore } from '../../stats/types.js';

// ============ API Response Types ============

export interface StatsResponse {
  stats: StatsStore | null;
}

export interface HealthResponse {
  status: 'ok';
  service: string;
  timestamp: string;
  /** Timestamp of the newest scan, null before the first one */
  lastScanAt: string | null;
}

export interface LatestScanResponse {
  scan: ScanRecord | null;
  totalScans: number;
}

// ============ Processor Functions ============

export async function getStats(stats: StatsAggregator): Promise<StatsResponse> {
  return { stats: await stats.read() };
}

export async function getLatestScan(stats: StatsAggregator): Promise<LatestScanResponse> {
  const store = await stats.read();
  return {
    scan: store?.last_scan ?? null,
    totalScans: store?.total_scans ?? 0,
  };
}

export async function getHealth(stats: StatsAggregator, now: Date = new Date()): Promise<HealthResponse> {
  const { scan } = await getLatestScan(stats);
  return {
    status: 'ok',
    service: 'arb-scanner-api',
    timestamp: now.toISOString(),
    lastScanAt: scan?.timestamp ?? null,
  };
}
