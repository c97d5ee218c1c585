/**
 * Polymarket Connector
 *
 * Fetches events from Polymarket's Gamma API and prices each tradeable market
 * from the CLOB order books.
 *
 * API Documentation: https://docs.polymarket.com/
 *
 * Key API quirks handled:
 * - `clobTokenIds` is a JSON-encoded string (sometimes already an array)
 * - YES and NO are separate tokens, each with its own order book
 * - Order book levels are strings and not guaranteed to be sorted
 */

import { POLYMARKET, RETRY } from '../config/api.js';
import { DataValidationError, getErrorMessage } from '../errors/index.js';
import { fetchJson, withRetry } from '../helpers/helpers.js';
import type { ClobOrderBook, PolymarketEvent, PolymarketMarket } from '../types/polymarket.js';
import {
  horizonCutoff,
  isNonEmptyString,
  isValidDateString,
  type MarketDataProvider,
  type UnifiedEvent,
  type UnifiedMarket,
} from '../types/unified.js';

// ============ Types ============

export interface OrderBookLevel {
  price: number;
  size: number;
}

export interface PolymarketConnectorOptions {
  /** Order size used for the depth-weighted price */
  orderSizeUsd: number;
  /** First backoff delay for rate-limited requests */
  retryDelayMs?: number;
}

// ============ Parsing Helpers ============

/**
 * Parse `clobTokenIds`; returns [yesToken, noToken] or null.
 *
 * @example
 * parseClobTokenIds('["111", "222"]') // ['111', '222']
 * parseClobTokenIds(undefined) // null
 */
export function parseClobTokenIds(raw: string | string[] | undefined): [string, string] | null {
  let ids: unknown = raw;
  if (typeof raw === 'string') {
    try {
      ids = JSON.parse(raw);
    } catch {
      return null;
    }
  }

  if (!Array.isArray(ids) || ids.length < 2) return null;
  const [yes, no] = ids;
  return isNonEmptyString(yes) && isNonEmptyString(no) ? [yes, no] : null;
}

/**
 * Parse asks into ascending price levels, dropping unusable ones.
 */
export function parseAsks(levels: ClobOrderBook['asks']): OrderBookLevel[] {
  if (!levels) return [];

  return levels
    .map((level) => ({ price: parseFloat(level.price), size: parseFloat(level.size) }))
    .filter((l) => l.size > 0 && l.price > 0 && l.price < 1)
    .sort((a, b) => a.price - b.price);
}

/**
 * Average price paid when spending `amountUsd` up the ask side.
 * Falls back to the best ask when the book is too thin; null for an empty book.
 */
export function impactPrice(asks: readonly OrderBookLevel[], amountUsd: number): number | null {
  if (asks.length === 0) return null;
  if (amountUsd <= 0) return asks[0].price;

  let filledUsd = 0;
  let shares = 0;

  for (const { price, size } of asks) {
    const available = price * size;
    if (filledUsd + available >= amountUsd) {
      shares += (amountUsd - filledUsd) / price;
      return amountUsd / shares;
    }
    shares += size;
    filledUsd += available;
  }

  return asks[0].price;
}

function isTradeable(market: PolymarketMarket): boolean {
  return market.enableOrderBook === true && market.closed !== true && market.acceptingOrders !== false;
}

// ============ Connector ============

export class PolymarketConnector implements MarketDataProvider {
  readonly name = 'polymarket' as const;
  private readonly orderSizeUsd: number;
  private readonly retryDelayMs: number;

  constructor(options: PolymarketConnectorOptions) {
    this.orderSizeUsd = options.orderSizeUsd;
    this.retryDelayMs = options.retryDelayMs ?? RETRY.BASE_DELAY_MS;
  }

  feeRate(): number {
    return POLYMARKET.FEE_RATE;
  }

  async fetchEvents(limit: number, maxResolutionDays: number): Promise<UnifiedEvent[]> {
    const cutoff = horizonCutoff(maxResolutionDays);
    const url = `${POLYMARKET.GAMMA_API_URL}/events?closed=false&limit=${limit}`;

    const events = await withRetry(
      () => fetchJson<PolymarketEvent[]>(url, 'polymarket', { timeoutMs: POLYMARKET.TIMEOUT_MS }),
      RETRY.MAX_RETRIES,
      this.retryDelayMs
    );

    if (!Array.isArray(events)) {
      throw new DataValidationError('Gamma events response is not an array', 'events', { url });
    }

    const normalized: UnifiedEvent[] = [];
    for (const event of events) {
      const unified = await this.normalizeEvent(event, cutoff);
      if (unified) normalized.push(unified);
    }
    return normalized;
  }

  /**
   * Normalize one Gamma event; null when it is out of horizon or has no
   * priceable market.
   */
  private async normalizeEvent(event: PolymarketEvent, cutoff: Date): Promise<UnifiedEvent | null> {
    const id = event.id || event.slug;
    if (!id || !isValidDateString(event.endDate)) return null;

    const resolutionTime = new Date(event.endDate);
    if (resolutionTime > cutoff) return null;

    const markets: UnifiedMarket[] = [];
    for (const market of (event.markets ?? []).filter(isTradeable)) {
      const priced = await this.priceMarket(market);
      if (priced) markets.push(priced);
    }
    if (markets.length === 0) return null;

    return {
      id,
      title: event.title ?? '',
      resolutionTime,
      source: this.name,
      markets,
      url: event.slug ? `${POLYMARKET.SITE_URL}/event/${event.slug}` : null,
    };
  }

  /**
   * Price a market from its YES and NO books. NO is inferred from YES when
   * its book is empty; markets without a YES price are dropped.
   */
  private async priceMarket(market: PolymarketMarket): Promise<UnifiedMarket | null> {
    const tokens = parseClobTokenIds(market.clobTokenIds);
    if (!tokens) return null;

    const [yesAsks, noAsks] = await Promise.all(tokens.map((token) => this.fetchAsks(token)));
    const yesPrice = impactPrice(yesAsks, this.orderSizeUsd);
    if (yesPrice === null) return null;

    const noPrice = impactPrice(noAsks, this.orderSizeUsd) ?? 1 - yesPrice;

    return {
      id: market.id || market.slug || tokens[0],
      question: market.question ?? '',
      yesPrice,
      noPrice,
    };
  }

  /**
   * Ask side of one token's book; empty when the book is unavailable.
   */
  private async fetchAsks(tokenId: string): Promise<OrderBookLevel[]> {
    const url = `${POLYMARKET.CLOB_API_URL}/book?token_id=${encodeURIComponent(tokenId)}`;

    try {
      const book = await withRetry(
        () => fetchJson<ClobOrderBook>(url, 'polymarket', { timeoutMs: POLYMARKET.TIMEOUT_MS }),
        RETRY.MAX_RETRIES,
        this.retryDelayMs
      );
      return parseAsks(book.asks);
    } catch (error: unknown) {
      console.warn(`[Polymarket] Order book unavailable for ${tokenId}: ${getErrorMessage(error)}`);
      return [];
    }
  }
}
