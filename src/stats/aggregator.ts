/**
 * Stats Aggregator
 *
 * Maintains the bounded scan history and running totals behind the
 * dashboard. Each record is a read-modify-write of the whole store.
 */

import type { ArbitrageOpportunity } from '../arbitrage/types.js';
import { DISPLAY } from '../config/api.js';
import { getErrorMessage } from '../errors/index.js';
import { truncate } from '../helpers/helpers.js';
import type { MatchedPair } from '../matching/types.js';
import type { Platform, UnifiedEvent } from '../types/unified.js';
import type { StatsPersistence } from './stats-store.js';
import type {
  BestOpportunity,
  EventSample,
  MatchPreview,
  OpportunitySummary,
  ScanRecord,
  StatsStore,
} from './types.js';

// ============ Constants ============

export const HISTORY_LIMIT = 100;

// ============ Store Helpers ============

export function createEmptyStore(): StatsStore {
  return {
    scan_history: [],
    total_scans: 0,
    total_opportunities: 0,
    total_alerts: 0,
    best_opportunity: null,
    last_scan: null,
  };
}

/**
 * Highest-profit opportunity of a scan as a best-opportunity candidate.
 * The first of equal maxima wins.
 */
function bestOfScan(scan: ScanRecord): BestOpportunity | null {
  let best: OpportunitySummary | null = null;
  for (const opp of scan.opportunities) {
    if (best === null || opp.profit_pct > best.profit_pct) best = opp;
  }
  if (!best) return null;

  return {
    title: best.title,
    direction: best.direction,
    profit_pct: best.profit_pct,
    profit: best.profit,
    timestamp: scan.timestamp,
  };
}

/**
 * Fold one scan into a store, returning the new store.
 */
export function applyScan(store: StatsStore, scan: ScanRecord, historyLimit = HISTORY_LIMIT): StatsStore {
  const candidate = bestOfScan(scan);
  const current = store.best_opportunity;

  return {
    scan_history: [...store.scan_history, scan].slice(-historyLimit),
    total_scans: store.total_scans + 1,
    total_opportunities: store.total_opportunities + scan.opportunities_count,
    total_alerts: store.total_alerts + scan.alerts_sent,
    best_opportunity:
      candidate && (current === null || candidate.profit_pct > current.profit_pct) ? candidate : current,
    last_scan: scan,
  };
}

// ============ Scan Record ============

export interface ScanResults {
  timestamp: Date;
  sourceA: Platform;
  sourceB: Platform;
  eventsA: readonly UnifiedEvent[];
  eventsB: readonly UnifiedEvent[];
  pairs: readonly MatchedPair[];
  opportunities: readonly ArbitrageOpportunity[];
  alertsSent: number;
}

export function summarizeOpportunity(opp: ArbitrageOpportunity): OpportunitySummary {
  return {
    title: truncate(opp.pair.eventA.title, DISPLAY.TITLE_LIMIT),
    direction: opp.direction,
    profit_pct: opp.profitPct,
    profit: opp.profit,
    fee_adjusted_cost: opp.feeAdjustedCost,
    a_yes: opp.marketA.yesPrice ?? 0,
    a_no: opp.marketA.noPrice ?? 0,
    b_yes: opp.marketB.yesPrice ?? 0,
    b_no: opp.marketB.noPrice ?? 0,
  };
}

function sampleEvents(events: readonly UnifiedEvent[]): EventSample[] {
  return events.slice(0, DISPLAY.SAMPLE_LIMIT).map((e) => ({
    title: truncate(e.title, DISPLAY.TITLE_LIMIT),
    end_date: e.resolutionTime.toISOString(),
    markets_count: e.markets.length,
  }));
}

function previewPairs(pairs: readonly MatchedPair[]): MatchPreview[] {
  return pairs.slice(0, DISPLAY.MATCH_PREVIEW_LIMIT).map(({ eventA, eventB, similarity }) => ({
    a_title: truncate(eventA.title, DISPLAY.MATCH_TITLE_LIMIT),
    b_title: truncate(eventB.title, DISPLAY.MATCH_TITLE_LIMIT),
    a_end_date: eventA.resolutionTime.toISOString(),
    b_end_date: eventB.resolutionTime.toISOString(),
    similarity,
  }));
}

/**
 * Build the persisted snapshot of one cycle. Samples and previews are only
 * included when there is something to show.
 */
export function buildScanRecord(results: ScanResults): ScanRecord {
  const record: ScanRecord = {
    timestamp: results.timestamp.toISOString(),
    source_a: results.sourceA,
    source_b: results.sourceB,
    source_a_events: results.eventsA.length,
    source_b_events: results.eventsB.length,
    matched: results.pairs.length,
    opportunities_count: results.opportunities.length,
    alerts_sent: results.alertsSent,
    opportunities: results.opportunities.map(summarizeOpportunity),
  };

  if (results.eventsA.length > 0) record.source_a_sample = sampleEvents(results.eventsA);
  if (results.eventsB.length > 0) record.source_b_sample = sampleEvents(results.eventsB);
  if (results.pairs.length > 0) record.matched_details = previewPairs(results.pairs);

  return record;
}

// ============ Aggregator ============

export class StatsAggregator {
  constructor(
    private readonly persistence: StatsPersistence,
    private readonly historyLimit: number = HISTORY_LIMIT
  ) {}

  /**
   * Append a scan. An unreadable store is replaced by a fresh one; a failed
   * save is logged and the scan is lost.
   */
  async record(scan: ScanRecord): Promise<void> {
    let store: StatsStore;
    try {
      store = (await this.persistence.load()) ?? createEmptyStore();
    } catch (error: unknown) {
      console.warn(`[Stats] Starting a fresh store: ${getErrorMessage(error)}`);
      store = createEmptyStore();
    }

    try {
      await this.persistence.save(applyScan(store, scan, this.historyLimit));
    } catch (error: unknown) {
      console.error(`[Stats] Error writing stats: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Current store, or null when there is no data yet or it cannot be read.
   */
  async read(): Promise<StatsStore | null> {
    try {
      return await this.persistence.load();
    } catch (error: unknown) {
      console.warn(`[Stats] Error reading stats: ${getErrorMessage(error)}`);
      return null;
    }
  }
}
