import { describe, it, expect } from 'vitest';
import { detectOpportunities } from '../src/arbitrage/calculator.js';
import { describeDirection, formatAlert, formatOpportunityLine } from '../src/scanner/alert-formatter.js';
import { pricedEvent } from './helpers/fixtures.js';

function opportunity(withLinks: boolean) {
  const title = 'Will the Fed cut rates in March?';
  const pair = {
    eventA: {
      ...pricedEvent('pm-1', 'polymarket', title, 0.4, 0.62),
      url: withLinks ? 'https://polymarket.com/event/fed-march' : null,
    },
    eventB: {
      ...pricedEvent('mf-1', 'manifold', title, 0.57, 0.45),
      url: withLinks ? 'https://manifold.markets/alice/fed-march' : null,
    },
    similarity: 1,
  };
  const [opp] = detectOpportunities([pair], 0.002, 0, 0.5);
  return opp;
}

describe('describeDirection', () => {
  it('names the leg bought on each platform', () => {
    expect(describeDirection('yesA_noB', 'polymarket', 'kalshi')).toBe('Buy YES on Polymarket + NO on Kalshi');
    expect(describeDirection('noA_yesB', 'polymarket', 'kalshi')).toBe('Buy NO on Polymarket + YES on Kalshi');
  });
});

describe('formatAlert', () => {
  it('renders prices, cost, profit and links', () => {
    expect(formatAlert(opportunity(true)).split('\n')).toEqual([
      '*CROSS-PLATFORM ARB*',
      'Will the Fed cut rates in March?',
      '',
      'Direction: `Buy YES on Polymarket + NO on Manifold`',
      'Polymarket YES/NO: `$0.4000`/`$0.6200`',
      'Manifold YES/NO: `$0.5700`/`$0.4500`',
      'Cost (after fees)=`$0.8508` Payout=`$1.0`',
      'Profit=`$0.1492` (`17.54%`)',
      '',
      'Polymarket: https://polymarket.com/event/fed-march',
      'Manifold: https://manifold.markets/alice/fed-march',
    ]);
  });

  it('omits the link block when neither event has a url', () => {
    const lines = formatAlert(opportunity(false)).split('\n');

    expect(lines).toHaveLength(8);
    expect(lines[7]).toBe('Profit=`$0.1492` (`17.54%`)');
  });
});

describe('formatOpportunityLine', () => {
  it('summarizes the opportunity on three lines', () => {
    expect(formatOpportunityLine(opportunity(false)).split('\n')).toEqual([
      '  | Will the Fed cut rates in March? | Buy YES on Polymarket + NO on Manifold',
      '    Polymarket: YES=$0.4000 NO=$0.6200 | Manifold: YES=$0.5700 NO=$0.4500',
      '    Cost=$0.8500 Cost+fees=$0.8508 Profit=$0.1492 (17.54%)',
    ]);
  });
});
