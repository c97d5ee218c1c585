import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { detectOpportunities } from '../src/arbitrage/calculator.js';
import {
  HISTORY_LIMIT,
  StatsAggregator,
  applyScan,
  buildScanRecord,
  createEmptyStore,
} from '../src/stats/aggregator.js';
import type { OpportunitySummary, ScanRecord } from '../src/stats/types.js';
import { BASE_TIME, MemoryStatsPersistence, makeEvent, pricedEvent } from './helpers/fixtures.js';

function summary(title: string, profitPct: number): OpportunitySummary {
  return {
    title,
    direction: 'yesA_noB',
    profit_pct: profitPct,
    profit: profitPct / 100,
    fee_adjusted_cost: 0.9,
    a_yes: 0.4,
    a_no: 0.6,
    b_yes: 0.5,
    b_no: 0.5,
  };
}

function scan(index: number, opportunities: OpportunitySummary[] = [], alertsSent = 0): ScanRecord {
  return {
    timestamp: new Date(BASE_TIME.getTime() + index * 60_000).toISOString(),
    source_a: 'polymarket',
    source_b: 'manifold',
    source_a_events: 0,
    source_b_events: 0,
    matched: 0,
    opportunities_count: opportunities.length,
    alerts_sent: alertsSent,
    opportunities,
  };
}

describe('applyScan', () => {
  it('accumulates totals and keeps the newest scan', () => {
    const first = applyScan(createEmptyStore(), scan(0, [summary('a', 2)], 1));
    const second = applyScan(first, scan(1, [summary('b', 1), summary('c', 3)], 2));

    expect(second.total_scans).toBe(2);
    expect(second.total_opportunities).toBe(3);
    expect(second.total_alerts).toBe(3);
    expect(second.scan_history).toHaveLength(2);
    expect(second.last_scan).toEqual(scan(1, [summary('b', 1), summary('c', 3)], 2));
  });

  it('bounds the history but keeps counting scans', () => {
    let store = createEmptyStore();
    for (let i = 0; i < HISTORY_LIMIT + 5; i++) {
      store = applyScan(store, scan(i));
    }

    expect(store.scan_history).toHaveLength(HISTORY_LIMIT);
    expect(store.scan_history[0].timestamp).toBe(scan(5).timestamp);
    expect(store.total_scans).toBe(HISTORY_LIMIT + 5);
    expect(store.last_scan).toEqual(store.scan_history[HISTORY_LIMIT - 1]);
  });

  it('replaces the best opportunity only on a strictly higher profit', () => {
    let store = applyScan(createEmptyStore(), scan(0, [summary('first', 5)]));
    store = applyScan(store, scan(1, [summary('tie', 5)]));

    expect(store.best_opportunity).toEqual({
      title: 'first',
      direction: 'yesA_noB',
      profit_pct: 5,
      profit: 0.05,
      timestamp: scan(0).timestamp,
    });

    store = applyScan(store, scan(2, [summary('lower', 1), summary('higher', 6)]));
    expect(store.best_opportunity?.title).toBe('higher');
    expect(store.best_opportunity?.timestamp).toBe(scan(2).timestamp);
  });

  it('keeps the first of equal maxima within a scan', () => {
    const store = applyScan(createEmptyStore(), scan(0, [summary('one', 4), summary('two', 4)]));

    expect(store.best_opportunity?.title).toBe('one');
  });

  it('leaves the best opportunity unset without opportunities', () => {
    expect(applyScan(createEmptyStore(), scan(0)).best_opportunity).toBeNull();
  });
});

describe('buildScanRecord', () => {
  it('summarizes opportunities with all four prices', () => {
    const pair = {
      eventA: pricedEvent('pm-1', 'polymarket', 'Will the Fed cut rates in March?', 0.4, 0.62),
      eventB: pricedEvent('mf-1', 'manifold', 'Will the Fed cut rates in March?', 0.57, 0.45),
      similarity: 1,
    };
    const opportunities = detectOpportunities([pair], 0, 0, 0);

    const record = buildScanRecord({
      timestamp: BASE_TIME,
      sourceA: 'polymarket',
      sourceB: 'manifold',
      eventsA: [pair.eventA],
      eventsB: [pair.eventB],
      pairs: [pair],
      opportunities,
      alertsSent: 1,
    });

    expect(record.timestamp).toBe('2026-03-01T12:00:00.000Z');
    expect(record.opportunities_count).toBe(1);
    expect(record.opportunities[0]).toMatchObject({
      title: 'Will the Fed cut rates in March?',
      direction: 'yesA_noB',
      a_yes: 0.4,
      a_no: 0.62,
      b_yes: 0.57,
      b_no: 0.45,
    });
    expect(record.source_a_sample).toEqual([
      { title: 'Will the Fed cut rates in March?', end_date: '2026-03-01T12:00:00.000Z', markets_count: 1 },
    ]);
    expect(record.matched_details).toEqual([
      {
        a_title: 'Will the Fed cut rates in March?',
        b_title: 'Will the Fed cut rates in March?',
        a_end_date: '2026-03-01T12:00:00.000Z',
        b_end_date: '2026-03-01T12:00:00.000Z',
        similarity: 1,
      },
    ]);
  });

  it('truncates titles and caps samples', () => {
    const longTitle = 'x'.repeat(80);
    const events = Array.from({ length: 7 }, (_, i) => makeEvent({ id: `e${i}`, title: longTitle }));

    const record = buildScanRecord({
      timestamp: BASE_TIME,
      sourceA: 'polymarket',
      sourceB: 'kalshi',
      eventsA: events,
      eventsB: [],
      pairs: [],
      opportunities: [],
      alertsSent: 0,
    });

    expect(record.source_a_sample).toHaveLength(5);
    expect(record.source_a_sample?.[0].title).toBe('x'.repeat(60));
    expect(record.source_b).toBe('kalshi');
    expect(record).not.toHaveProperty('source_b_sample');
    expect(record).not.toHaveProperty('matched_details');
  });
});

describe('StatsAggregator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates the store on first record', async () => {
    const persistence = new MemoryStatsPersistence();
    const aggregator = new StatsAggregator(persistence);

    await aggregator.record(scan(0, [summary('a', 2)], 1));

    expect(persistence.store?.total_scans).toBe(1);
    expect(await aggregator.read()).toEqual(persistence.store);
  });

  it('starts over when the existing store cannot be loaded', async () => {
    const persistence = new MemoryStatsPersistence();
    persistence.store = applyScan(applyScan(createEmptyStore(), scan(0)), scan(1));
    persistence.loadError = new Error('corrupt');
    const aggregator = new StatsAggregator(persistence);

    await aggregator.record(scan(2));

    expect(persistence.store?.total_scans).toBe(1);
    expect(persistence.store?.scan_history).toEqual([scan(2)]);
    expect(console.warn).toHaveBeenCalledWith('[Stats] Starting a fresh store: corrupt');
  });

  it('logs and swallows save failures', async () => {
    const persistence = new MemoryStatsPersistence();
    vi.spyOn(persistence, 'save').mockRejectedValue(new Error('disk full'));
    const aggregator = new StatsAggregator(persistence);

    await expect(aggregator.record(scan(0))).resolves.toBeUndefined();
    expect(console.error).toHaveBeenCalledWith('[Stats] Error writing stats: disk full');
  });

  it('reads null when the store is unreadable', async () => {
    const persistence = new MemoryStatsPersistence();
    persistence.loadError = new Error('corrupt');

    expect(await new StatsAggregator(persistence).read()).toBeNull();
  });

  it('honours a custom history limit', async () => {
    const persistence = new MemoryStatsPersistence();
    const aggregator = new StatsAggregator(persistence, 2);

    for (let i = 0; i < 4; i++) await aggregator.record(scan(i));

    expect(persistence.store?.scan_history.map((s) => s.timestamp)).toEqual([scan(2).timestamp, scan(3).timestamp]);
    expect(persistence.store?.total_scans).toBe(4);
  });
});
