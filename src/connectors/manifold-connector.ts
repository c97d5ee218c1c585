/**
 * Manifold Connector
 *
 * Fetches open binary markets from Manifold. Each market is its own event,
 * priced from its current probability.
 */

import { MANIFOLD } from '../config/api.js';
import { DataValidationError } from '../errors/index.js';
import { fetchJson, withRetry } from '../helpers/helpers.js';
import type { ManifoldMarket } from '../types/manifold.js';
import {
  horizonCutoff,
  isNonEmptyString,
  isValidPrice,
  type MarketDataProvider,
  type UnifiedEvent,
} from '../types/unified.js';

export interface ManifoldConnectorOptions {
  /** Optional; reading market data needs no key */
  apiKey?: string | null;
}

/**
 * Deep link: creator/slug when known, otherwise the bare market id.
 */
export function manifoldUrl(market: ManifoldMarket): string | null {
  if (isNonEmptyString(market.creatorUsername) && isNonEmptyString(market.slug)) {
    return `${MANIFOLD.SITE_URL}/${market.creatorUsername}/${market.slug}`;
  }
  return isNonEmptyString(market.id) ? `${MANIFOLD.SITE_URL}/${market.id}` : null;
}

/**
 * Normalize one market; null when unresolvable within the horizon.
 * A market without a probability keeps null prices.
 */
export function normalizeManifoldMarket(market: ManifoldMarket, cutoff: Date): UnifiedEvent | null {
  if (!isNonEmptyString(market.id) || market.isResolved === true) return null;
  if (typeof market.closeTime !== 'number' || !Number.isFinite(market.closeTime)) return null;

  const resolutionTime = new Date(market.closeTime);
  if (isNaN(resolutionTime.getTime()) || resolutionTime > cutoff) return null;

  const probability = isValidPrice(market.probability) ? market.probability : null;
  const question = market.question ?? '';

  return {
    id: market.id,
    title: question,
    resolutionTime,
    source: 'manifold',
    markets: [
      {
        id: market.id,
        question,
        yesPrice: probability,
        noPrice: probability === null ? null : 1 - probability,
      },
    ],
    url: manifoldUrl(market),
  };
}

export class ManifoldConnector implements MarketDataProvider {
  readonly name = 'manifold' as const;
  private readonly headers: Record<string, string>;

  constructor(options: ManifoldConnectorOptions = {}) {
    this.headers = options.apiKey ? { Authorization: `Key ${options.apiKey}` } : {};
  }

  feeRate(): number {
    return MANIFOLD.FEE_RATE;
  }

  async fetchEvents(limit: number, maxResolutionDays: number): Promise<UnifiedEvent[]> {
    const cutoff = horizonCutoff(maxResolutionDays);
    const params = new URLSearchParams({
      limit: String(Math.min(limit, MANIFOLD.MAX_LIMIT)),
      sort: 'close-date',
      filter: 'open',
      contractType: 'BINARY',
      term: '',
    });

    const markets = await withRetry(() =>
      fetchJson<ManifoldMarket[]>(`${MANIFOLD.API_URL}/search-markets?${params}`, 'manifold', {
        timeoutMs: MANIFOLD.TIMEOUT_MS,
        headers: this.headers,
      })
    );

    if (!Array.isArray(markets)) {
      throw new DataValidationError('search-markets response is not an array', 'markets');
    }

    const events: UnifiedEvent[] = [];
    for (const market of markets) {
      const event = normalizeManifoldMarket(market, cutoff);
      if (event) events.push(event);
    }
    return events;
  }
}
