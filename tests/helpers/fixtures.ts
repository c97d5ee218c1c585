/**
 * Test fixtures: event builders and in-process stand-ins for providers,
 * alert sinks and stats persistence.
 */

import type { AlertSink } from '../../src/notifications/alert-sink.js';
import type { StatsPersistence } from '../../src/stats/stats-store.js';
import type { StatsStore } from '../../src/stats/types.js';
import type {
  MarketDataProvider,
  Platform,
  UnifiedEvent,
  UnifiedMarket,
} from '../../src/types/unified.js';

export const BASE_TIME = new Date('2026-03-01T12:00:00.000Z');

export const DAY_MS = 24 * 60 * 60 * 1000;

export function makeMarket(overrides: Partial<UnifiedMarket> = {}): UnifiedMarket {
  return {
    id: 'market-1',
    question: 'Will it happen?',
    yesPrice: 0.5,
    noPrice: 0.5,
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<UnifiedEvent> = {}): UnifiedEvent {
  return {
    id: 'event-1',
    title: 'Will it happen?',
    resolutionTime: BASE_TIME,
    source: 'polymarket',
    markets: [makeMarket()],
    url: null,
    ...overrides,
  };
}

/**
 * Event priced by a single market.
 */
export function pricedEvent(
  id: string,
  source: Platform,
  title: string,
  yesPrice: number | null,
  noPrice: number | null,
  resolutionTime: Date = BASE_TIME
): UnifiedEvent {
  return makeEvent({
    id,
    source,
    title,
    resolutionTime,
    markets: [makeMarket({ id: `${id}-m`, question: title, yesPrice, noPrice })],
  });
}

export class FakeProvider implements MarketDataProvider {
  constructor(
    readonly name: Platform,
    public events: UnifiedEvent[] | Error,
    private readonly fee: number = 0
  ) {}

  async fetchEvents(): Promise<UnifiedEvent[]> {
    if (this.events instanceof Error) throw this.events;
    return this.events;
  }

  feeRate(): number {
    return this.fee;
  }
}

export class RecordingSink implements AlertSink {
  readonly sent: string[] = [];

  async send(text: string): Promise<void> {
    this.sent.push(text);
  }
}

export class MemoryStatsPersistence implements StatsPersistence {
  store: StatsStore | null = null;
  saves = 0;
  loadError: Error | null = null;

  async load(): Promise<StatsStore | null> {
    if (this.loadError) throw this.loadError;
    return this.store === null ? null : structuredClone(this.store);
  }

  async save(store: StatsStore): Promise<void> {
    this.saves++;
    this.store = structuredClone(store);
  }
}
