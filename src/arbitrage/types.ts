/**
 * Arbitrage Types
 *
 * Shared types for fee-adjusted two-market arbitrage detection.
 */

import type { UnifiedMarket } from '../types/unified.js';
import type { MatchedPair } from '../matching/types.js';

// ============ Direction ============

/**
 * The two hedges that pay out 1.0 whichever way the event resolves:
 * - yesA_noB: buy YES on source A + NO on source B
 * - noA_yesB: buy NO on source A + YES on source B
 */
export type Direction = 'yesA_noB' | 'noA_yesB';

export const DIRECTIONS: readonly Direction[] = ['yesA_noB', 'noA_yesB'];

// ============ Fees ============

export interface FeeRates {
  /** Source A fee as a decimal */
  a: number;
  /** Source B fee as a decimal */
  b: number;
}

// ============ Arbitrage Opportunity ============

/**
 * A detected opportunity for one direction of one matched pair.
 * Recomputed every cycle and never mutated.
 */
export interface ArbitrageOpportunity {
  readonly pair: MatchedPair;
  readonly direction: Direction;

  /** First market of each event, the ones priced */
  readonly marketA: UnifiedMarket;
  readonly marketB: UnifiedMarket;

  /** Price paid on source A (YES or NO depending on direction) */
  readonly priceA: number;
  /** Price paid on source B */
  readonly priceB: number;

  /** priceA + priceB */
  readonly rawCost: number;
  /** Cost including each platform's proportional fee; always >= rawCost */
  readonly feeAdjustedCost: number;
  readonly payout: 1;
  /** payout - feeAdjustedCost */
  readonly profit: number;
  /** profit as a percentage of feeAdjustedCost */
  readonly profitPct: number;
}
