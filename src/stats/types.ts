/**
 * Stats Types
 *
 * On-disk layout of the stats store read by the dashboard. Keys are
 * snake_case because the file is the contract with the viewer.
 */

import type { Direction } from '../arbitrage/types.js';
import type { Platform } from '../types/unified.js';

// ============ Scan Record ============

/** One opportunity as shown in the scan history */
export interface OpportunitySummary {
  /** Source A event title, truncated */
  title: string;
  direction: Direction;
  profit_pct: number;
  profit: number;
  fee_adjusted_cost: number;
  a_yes: number;
  a_no: number;
  b_yes: number;
  b_no: number;
}

/** Truncated event preview */
export interface EventSample {
  title: string;
  end_date: string;
  markets_count: number;
}

/** Truncated matched-pair preview */
export interface MatchPreview {
  a_title: string;
  b_title: string;
  a_end_date: string;
  b_end_date: string;
  similarity: number;
}

/** Snapshot of one scan cycle */
export interface ScanRecord {
  /** ISO-8601 UTC */
  timestamp: string;
  source_a: Platform;
  source_b: Platform;
  source_a_events: number;
  source_b_events: number;
  matched: number;
  opportunities_count: number;
  alerts_sent: number;
  opportunities: OpportunitySummary[];
  source_a_sample?: EventSample[];
  source_b_sample?: EventSample[];
  matched_details?: MatchPreview[];
}

// ============ Store ============

export interface BestOpportunity {
  title: string;
  direction: Direction;
  profit_pct: number;
  profit: number;
  timestamp: string;
}

export interface StatsStore {
  /** Newest last, bounded */
  scan_history: ScanRecord[];
  /** Every recorded scan since the store was created */
  total_scans: number;
  total_opportunities: number;
  total_alerts: number;
  best_opportunity: BestOpportunity | null;
  /** Copy of the newest history entry */
  last_scan: ScanRecord | null;
}

// ============ Validation ============

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isScanRecord(value: unknown): value is ScanRecord {
  return (
    isRecord(value) &&
    typeof value.timestamp === 'string' &&
    isCount(value.opportunities_count) &&
    isCount(value.alerts_sent) &&
    Array.isArray(value.opportunities)
  );
}

function isBestOpportunity(value: unknown): value is BestOpportunity {
  return isRecord(value) && typeof value.profit_pct === 'number' && typeof value.title === 'string';
}

/**
 * Structural check of a parsed store. Anything failing it is treated as corrupt.
 */
export function isStatsStore(value: unknown): value is StatsStore {
  if (!isRecord(value)) return false;

  return (
    Array.isArray(value.scan_history) &&
    value.scan_history.every(isScanRecord) &&
    isCount(value.total_scans) &&
    isCount(value.total_opportunities) &&
    isCount(value.total_alerts) &&
    (value.best_opportunity === null || isBestOpportunity(value.best_opportunity)) &&
    (value.last_scan === null || isScanRecord(value.last_scan))
  );
}
