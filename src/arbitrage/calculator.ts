/**
 * Arbitrage Calculator
 *
 * Calculates fee-adjusted hedge costs for matched event pairs.
 */

import type { MatchedPair } from '../matching/types.js';
import type { UnifiedMarket } from '../types/unified.js';
import { DIRECTIONS, type ArbitrageOpportunity, type Direction, type FeeRates } from './types.js';

// ============ Constants ============

/** Every complete hedge pays exactly one unit */
export const PAYOUT = 1;

// ============ Pricing ============

interface PricedMarkets {
  marketA: UnifiedMarket;
  marketB: UnifiedMarket;
  yesA: number;
  noA: number;
  yesB: number;
  noB: number;
}

/**
 * First market of each event with all four prices, or null when any is missing.
 * Multi-market events are only priced by their first listed market.
 */
function priceFirstMarkets(pair: MatchedPair): PricedMarkets | null {
  const marketA = pair.eventA.markets[0];
  const marketB = pair.eventB.markets[0];
  if (!marketA || !marketB) return null;

  const { yesPrice: yesA, noPrice: noA } = marketA;
  const { yesPrice: yesB, noPrice: noB } = marketB;
  if (yesA === null || noA === null || yesB === null || noB === null) return null;

  return { marketA, marketB, yesA, noA, yesB, noB };
}

/**
 * Cost figures for buying `priceA` on A and `priceB` on B.
 */
export function calculateHedge(
  priceA: number,
  priceB: number,
  fees: FeeRates
): Pick<ArbitrageOpportunity, 'rawCost' | 'feeAdjustedCost' | 'profit' | 'profitPct'> {
  const rawCost = priceA + priceB;
  const feeAdjustedCost = priceA * (1 + fees.a) + priceB * (1 + fees.b);
  const profit = PAYOUT - feeAdjustedCost;
  const profitPct = feeAdjustedCost > 0 ? (profit / feeAdjustedCost) * 100 : 0;

  return { rawCost, feeAdjustedCost, profit, profitPct };
}

// ============ Calculator ============

/**
 * Calculate the opportunities of one pair, at most one per direction.
 */
export function calculateArbitrage(
  pair: MatchedPair,
  fees: FeeRates,
  minProfitPct: number
): ArbitrageOpportunity[] {
  const priced = priceFirstMarkets(pair);
  if (!priced) return [];

  const legs: Record<Direction, [number, number]> = {
    yesA_noB: [priced.yesA, priced.noB],
    noA_yesB: [priced.noA, priced.yesB],
  };

  const opportunities: ArbitrageOpportunity[] = [];

  for (const direction of DIRECTIONS) {
    const [priceA, priceB] = legs[direction];
    const hedge = calculateHedge(priceA, priceB, fees);

    if (hedge.profitPct >= minProfitPct) {
      opportunities.push({
        pair,
        direction,
        marketA: priced.marketA,
        marketB: priced.marketB,
        priceA,
        priceB,
        ...hedge,
        payout: PAYOUT,
      });
    }
  }

  return opportunities;
}

/**
 * Detect opportunities across all matched pairs.
 *
 * @returns Opportunities in pair order, direction yesA_noB before noA_yesB
 */
export function detectOpportunities(
  pairs: readonly MatchedPair[],
  feeRateA: number,
  feeRateB: number,
  minProfitPct: number
): ArbitrageOpportunity[] {
  const fees: FeeRates = { a: feeRateA, b: feeRateB };
  return pairs.flatMap((pair) => calculateArbitrage(pair, fees, minProfitPct));
}
