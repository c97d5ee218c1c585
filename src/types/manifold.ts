/**
 * Manifold API Type Definitions
 * Based on https://docs.manifold.markets/api
 */

export interface ManifoldMarket {
  id: string;
  question?: string;
  slug?: string;
  creatorUsername?: string;
  outcomeType?: string;
  /** Epoch milliseconds */
  closeTime?: number;
  isResolved?: boolean;
  /** Current YES probability (0-1) */
  probability?: number;
  url?: string;
}
