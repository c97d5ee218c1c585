/**
 * Kalshi API Type Definitions
 * Based on https://api.elections.kalshi.com/trade-api/v2
 */

// ============ Event Types ============

export interface KalshiEvent {
  event_ticker?: string;
  series_ticker?: string;
  title?: string;
  markets?: KalshiMarket[];
}

// ============ Market Types ============

export interface KalshiMarket {
  ticker?: string;
  title?: string;
  status?: string;

  // Pricing (in cents, 0-100)
  yes_bid?: number;
  yes_ask?: number;
  no_bid?: number;
  no_ask?: number;

  close_time?: string;
}

// ============ API Response Wrappers ============

export interface KalshiEventsResponse {
  events?: KalshiEvent[];
  cursor?: string;
}
