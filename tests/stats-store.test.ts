import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { StatsStoreError } from '../src/errors/index.js';
import { StatsAggregator, applyScan, createEmptyStore } from '../src/stats/aggregator.js';
import { JsonFileStatsStore } from '../src/stats/stats-store.js';
import type { ScanRecord } from '../src/stats/types.js';

const SCAN: ScanRecord = {
  timestamp: '2026-03-01T12:00:00.000Z',
  source_a: 'polymarket',
  source_b: 'manifold',
  source_a_events: 3,
  source_b_events: 4,
  matched: 1,
  opportunities_count: 0,
  alerts_sent: 0,
  opportunities: [],
};

describe('JsonFileStatsStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'arb-stats-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('loads null when the file does not exist', async () => {
    expect(await new JsonFileStatsStore(join(dir, 'missing.json')).load()).toBeNull();
  });

  it('creates parent directories and round-trips the store', async () => {
    const file = join(dir, 'nested', 'stats.json');
    const store = new JsonFileStatsStore(file);
    const data = applyScan(createEmptyStore(), SCAN);

    await store.save(data);

    expect(await store.load()).toEqual(data);
    expect(await readFile(file, 'utf-8')).toBe(JSON.stringify(data, null, 2));
  });

  it('replaces an existing file without leaving temp files behind', async () => {
    const file = join(dir, 'stats.json');
    const store = new JsonFileStatsStore(file);
    await store.save(createEmptyStore());

    await store.save(applyScan(createEmptyStore(), SCAN));

    expect(await readdir(dir)).toEqual(['stats.json']);
    expect((await store.load())?.total_scans).toBe(1);
  });

  it('rejects a file that is not JSON', async () => {
    const file = join(dir, 'stats.json');
    await writeFile(file, '{"scan_history": [', 'utf-8');

    await expect(new JsonFileStatsStore(file).load()).rejects.toBeInstanceOf(StatsStoreError);
  });

  it('rejects JSON with the wrong shape', async () => {
    const file = join(dir, 'stats.json');
    await writeFile(file, JSON.stringify({ scan_history: 'nope', total_scans: 1 }), 'utf-8');

    await expect(new JsonFileStatsStore(file).load()).rejects.toThrow('Stats file has an unexpected shape');
  });

  it('lets the aggregator replace a corrupt file', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const file = join(dir, 'stats.json');
    await writeFile(file, 'not json at all', 'utf-8');
    const aggregator = new StatsAggregator(new JsonFileStatsStore(file));

    await aggregator.record(SCAN);

    const stored: unknown = JSON.parse(await readFile(file, 'utf-8'));
    expect(stored).toEqual(applyScan(createEmptyStore(), SCAN));
  });
});
