/**
 * API Configuration
 *
 * Centralized configuration for all external API endpoints,
 * timeouts, fees and display limits.
 */

// ============ Polymarket ============

export const POLYMARKET = {
  /** Discovery API for events and markets */
  GAMMA_API_URL: 'https://gamma-api.polymarket.com',

  /** Trading API for order books */
  CLOB_API_URL: 'https://clob.polymarket.com',

  /** Public site, used for deep links */
  SITE_URL: 'https://polymarket.com',

  /** Trading fee as a decimal (0.2%) */
  FEE_RATE: 0.002,

  /** Request timeout in milliseconds */
  TIMEOUT_MS: 30_000,
} as const;

// ============ Manifold ============

export const MANIFOLD = {
  API_URL: 'https://api.manifold.markets/v0',

  SITE_URL: 'https://manifold.markets',

  /** No trading fee; CPMM slippage is not modelled */
  FEE_RATE: 0,

  /** search-markets caps `limit` at this value */
  MAX_LIMIT: 1000,

  TIMEOUT_MS: 30_000,
} as const;

// ============ Kalshi ============

export const KALSHI = {
  /** Main trading API (public market data needs no auth) */
  API_URL: 'https://api.elections.kalshi.com/trade-api/v2',

  SITE_URL: 'https://kalshi.com',

  /** Trading fee as a decimal (10%) */
  FEE_RATE: 0.1,

  /** Maximum events per request */
  BATCH_SIZE: 200,

  TIMEOUT_MS: 30_000,
} as const;

// ============ Telegram ============

export const TELEGRAM = {
  API_URL: 'https://api.telegram.org',

  TIMEOUT_MS: 10_000,
} as const;

// ============ Retry ============

export const RETRY = {
  /** Attempts for rate-limited (HTTP 429) requests */
  MAX_RETRIES: 3,

  /** First backoff delay; doubles per attempt */
  BASE_DELAY_MS: 500,
} as const;

// ============ Display Formatting ============

export const DISPLAY = {
  /** Title length kept in persisted opportunity summaries and samples */
  TITLE_LIMIT: 60,

  /** Title length kept in matched-pair previews */
  MATCH_TITLE_LIMIT: 50,

  /** Events kept per source sample */
  SAMPLE_LIMIT: 5,

  /** Matched pairs kept per scan record */
  MATCH_PREVIEW_LIMIT: 10,

  /** Entries shown in debug listings */
  PREVIEW_LIMIT: 3,
} as const;

/** Human-readable platform names for logs and alerts */
export const PLATFORM_LABELS = {
  polymarket: 'Polymarket',
  manifold: 'Manifold',
  kalshi: 'Kalshi',
} as const;
