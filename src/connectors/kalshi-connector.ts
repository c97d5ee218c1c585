/**
 * Kalshi Connector
 *
 * Fetches open events with nested markets from Kalshi's public trade API.
 * Market data endpoints need no authentication.
 *
 * Key API quirks handled:
 * - Prices are integer cents (0-100)
 * - Events carry no close time; the earliest market close is used
 * - A zero quote means no resting order on that side
 */

import { KALSHI } from '../config/api.js';
import { DataValidationError } from '../errors/index.js';
import { fetchJson, withRetry } from '../helpers/helpers.js';
import type { KalshiEvent, KalshiEventsResponse, KalshiMarket } from '../types/kalshi.js';
import {
  horizonCutoff,
  isNonEmptyString,
  isValidDateString,
  type MarketDataProvider,
  type UnifiedEvent,
  type UnifiedMarket,
} from '../types/unified.js';

// ============ Price Helpers ============

function centsToDecimal(cents: number | undefined): number | null {
  if (typeof cents !== 'number' || !Number.isFinite(cents) || cents <= 0 || cents > 100) return null;
  return cents / 100;
}

/**
 * Normalize a market's buy prices: ask, else bid, else the complement of the
 * other side. Null when neither side can be priced.
 */
export function normalizeKalshiMarket(market: KalshiMarket): UnifiedMarket | null {
  if (!isNonEmptyString(market.ticker)) return null;

  let yesPrice = centsToDecimal(market.yes_ask) ?? centsToDecimal(market.yes_bid);
  let noPrice = centsToDecimal(market.no_ask) ?? centsToDecimal(market.no_bid);

  if (yesPrice === null && noPrice !== null) yesPrice = 1 - noPrice;
  if (noPrice === null && yesPrice !== null) noPrice = 1 - yesPrice;
  if (yesPrice === null || noPrice === null) return null;

  return { id: market.ticker, question: market.title ?? '', yesPrice, noPrice };
}

/**
 * Earliest valid market close time, or null.
 */
function earliestClose(markets: readonly KalshiMarket[]): Date | null {
  let earliest: Date | null = null;
  for (const { close_time } of markets) {
    if (!isValidDateString(close_time)) continue;
    const close = new Date(close_time);
    if (earliest === null || close < earliest) earliest = close;
  }
  return earliest;
}

export function normalizeKalshiEvent(event: KalshiEvent, cutoff: Date): UnifiedEvent | null {
  if (!isNonEmptyString(event.event_ticker)) return null;

  const rawMarkets = event.markets ?? [];
  const resolutionTime = earliestClose(rawMarkets);
  if (!resolutionTime || resolutionTime > cutoff) return null;

  const markets: UnifiedMarket[] = [];
  for (const market of rawMarkets) {
    const normalized = normalizeKalshiMarket(market);
    if (normalized) markets.push(normalized);
  }
  if (markets.length === 0) return null;

  return {
    id: event.event_ticker,
    title: event.title ?? '',
    resolutionTime,
    source: 'kalshi',
    markets,
    url: isNonEmptyString(event.series_ticker)
      ? `${KALSHI.SITE_URL}/markets/${event.series_ticker.toLowerCase()}`
      : null,
  };
}

// ============ Connector ============

export class KalshiConnector implements MarketDataProvider {
  readonly name = 'kalshi' as const;

  feeRate(): number {
    return KALSHI.FEE_RATE;
  }

  async fetchEvents(limit: number, maxResolutionDays: number): Promise<UnifiedEvent[]> {
    const cutoff = horizonCutoff(maxResolutionDays);
    const params = new URLSearchParams({
      status: 'open',
      with_nested_markets: 'true',
      limit: String(Math.min(limit, KALSHI.BATCH_SIZE)),
    });

    const response = await withRetry(() =>
      fetchJson<KalshiEventsResponse>(`${KALSHI.API_URL}/events?${params}`, 'kalshi', {
        timeoutMs: KALSHI.TIMEOUT_MS,
      })
    );

    if (!Array.isArray(response.events)) {
      throw new DataValidationError('Events response has no events array', 'events');
    }

    const events: UnifiedEvent[] = [];
    for (const event of response.events) {
      const normalized = normalizeKalshiEvent(event, cutoff);
      if (normalized) events.push(normalized);
    }
    return events;
  }
}
