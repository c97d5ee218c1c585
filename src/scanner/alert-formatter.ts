/**
 * Alert Formatting
 *
 * Human-readable text for opportunities: Markdown alerts for the sink and
 * console lines for the scan log.
 */

import type { ArbitrageOpportunity, Direction } from '../arbitrage/types.js';
import { PLATFORM_LABELS } from '../config/api.js';
import { truncate } from '../helpers/helpers.js';
import type { Platform } from '../types/unified.js';

function price(value: number | null): string {
  return value === null ? 'n/a' : `$${value.toFixed(4)}`;
}

/**
 * e.g. "Buy YES on Polymarket + NO on Manifold"
 */
export function describeDirection(direction: Direction, sourceA: Platform, sourceB: Platform): string {
  const a = PLATFORM_LABELS[sourceA];
  const b = PLATFORM_LABELS[sourceB];
  return direction === 'yesA_noB' ? `Buy YES on ${a} + NO on ${b}` : `Buy NO on ${a} + YES on ${b}`;
}

/**
 * Markdown alert with quotes, costs, profit and deep links.
 */
export function formatAlert(opp: ArbitrageOpportunity): string {
  const { eventA, eventB } = opp.pair;
  const labelA = PLATFORM_LABELS[eventA.source];
  const labelB = PLATFORM_LABELS[eventB.source];

  const lines = [
    '*CROSS-PLATFORM ARB*',
    eventA.title,
    '',
    `Direction: \`${describeDirection(opp.direction, eventA.source, eventB.source)}\``,
    `${labelA} YES/NO: \`${price(opp.marketA.yesPrice)}\`/\`${price(opp.marketA.noPrice)}\``,
    `${labelB} YES/NO: \`${price(opp.marketB.yesPrice)}\`/\`${price(opp.marketB.noPrice)}\``,
    `Cost (after fees)=\`$${opp.feeAdjustedCost.toFixed(4)}\` Payout=\`$${opp.payout.toFixed(1)}\``,
    `Profit=\`$${opp.profit.toFixed(4)}\` (\`${opp.profitPct.toFixed(2)}%\`)`,
  ];

  const links = [
    eventA.url ? `${labelA}: ${eventA.url}` : null,
    eventB.url ? `${labelB}: ${eventB.url}` : null,
  ].filter((link): link is string => link !== null);

  if (links.length > 0) {
    lines.push('', ...links);
  }

  return lines.join('\n');
}

/**
 * Three-line console summary of an opportunity.
 */
export function formatOpportunityLine(opp: ArbitrageOpportunity): string {
  const { eventA, eventB } = opp.pair;
  return [
    `  | ${truncate(eventA.title, 50)} | ${describeDirection(opp.direction, eventA.source, eventB.source)}`,
    `    ${PLATFORM_LABELS[eventA.source]}: YES=${price(opp.marketA.yesPrice)} NO=${price(opp.marketA.noPrice)} | ` +
      `${PLATFORM_LABELS[eventB.source]}: YES=${price(opp.marketB.yesPrice)} NO=${price(opp.marketB.noPrice)}`,
    `    Cost=$${opp.rawCost.toFixed(4)} Cost+fees=$${opp.feeAdjustedCost.toFixed(4)} ` +
      `Profit=$${opp.profit.toFixed(4)} (${opp.profitPct.toFixed(2)}%)`,
  ].join('\n');
}
