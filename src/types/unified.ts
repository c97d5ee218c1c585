/**
 * Unified Data Model for Prediction Markets
 *
 * Platform-agnostic types that normalize events from every supported source
 * into a common schema for matching and arbitrage detection.
 *
 * All prices are normalized to 0-1 probability scale:
 * - 0.45 = 45% implied probability, i.e. $0.45 to buy one share paying $1
 * - YES price + NO price should approximately equal 1.0 (plus spread)
 */

// ============ Platform Identifier ============

/**
 * Supported prediction market platforms
 */
export const PLATFORMS = ['polymarket', 'manifold', 'kalshi'] as const;

export type Platform = (typeof PLATFORMS)[number];

export function isPlatform(value: unknown): value is Platform {
  return typeof value === 'string' && (PLATFORMS as readonly string[]).includes(value);
}

// ============ Unified Market Types ============

/**
 * A normalized binary market from any platform.
 *
 * Prices represent the cost to buy one share that pays $1 if correct.
 * Either side may be null when the upstream quote is unavailable.
 */
export interface UnifiedMarket {
  /** Platform-specific market identifier */
  readonly id: string;

  /** The market question (e.g., "Will Bitcoin reach $100k in 2025?") */
  readonly question: string;

  /** Cost to acquire one YES share */
  readonly yesPrice: number | null;

  /** Cost to acquire one NO share */
  readonly noPrice: number | null;
}

/**
 * A normalized event containing one or more markets.
 *
 * Events are immutable once fetched and only live for one scan cycle.
 */
export interface UnifiedEvent {
  /** Platform-specific event identifier */
  readonly id: string;

  /** Event title used for cross-platform matching */
  readonly title: string;

  /** When the outcome is determined */
  readonly resolutionTime: Date;

  /** Source platform */
  readonly source: Platform;

  /** Markets within this event; only the first is priced against the other side */
  readonly markets: readonly UnifiedMarket[];

  /** Deep link derived from platform metadata, null when not derivable */
  readonly url: string | null;
}

// ============ Provider Interface ============

/**
 * Interface that all market-data providers implement.
 * Callers depend only on this capability, never on a concrete platform.
 */
export interface MarketDataProvider {
  /** Platform this provider fetches from */
  readonly name: Platform;

  /**
   * Fetch open events resolving within the horizon.
   * @param limit Maximum number of events to request upstream
   * @param maxResolutionDays Horizon in days from now
   */
  fetchEvents(limit: number, maxResolutionDays: number): Promise<UnifiedEvent[]>;

  /** Proportional trading fee as a decimal (0.002 = 0.2%), constant per instance */
  feeRate(): number;
}

// ============ Validation Helpers ============

/**
 * Check if a price is usable (a finite number in [0, 1]).
 */
export function isValidPrice(price: unknown): price is number {
  return typeof price === 'number' && Number.isFinite(price) && price >= 0 && price <= 1;
}

/**
 * Check if a string is non-empty after trimming whitespace.
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Check if a date string parses to a valid date.
 */
export function isValidDateString(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  const date = new Date(value);
  return !isNaN(date.getTime());
}

/**
 * Resolution horizon cutoff, `days` from `now`.
 */
export function horizonCutoff(days: number, now: Date = new Date()): Date {
  return new Date(now.getTime() + days * 24 * 60 * 60 * 1000);
}
