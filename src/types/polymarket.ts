/**
 * Polymarket API Type Definitions
 * Based on Gamma API and CLOB API documentation
 *
 * Fields are optional where the API omits them on some records; the
 * connector drops records missing what it needs.
 */

// ============ Gamma API Types ============

export interface PolymarketEvent {
  id?: string;
  slug?: string;
  title?: string;
  endDate?: string;
  closed?: boolean;
  markets?: PolymarketMarket[];
}

export interface PolymarketMarket {
  id?: string;
  question?: string;
  slug?: string;
  closed?: boolean;
  enableOrderBook?: boolean;
  acceptingOrders?: boolean;
  clobTokenIds?: string | string[]; // JSON string: "[\"tokenId1\", \"tokenId2\"]"
}

// ============ CLOB API Types ============

export interface ClobOrderBook {
  market?: string;
  asset_id?: string;
  bids?: ClobOrderBookLevel[];
  asks?: ClobOrderBookLevel[];
}

export interface ClobOrderBookLevel {
  price: string; // Price as string (0-1)
  size: string; // Size in shares
}
