/**
 * Scanner
 *
 * Long-running scan loop: fetch both sources, match, detect, dispatch
 * deduplicated alerts, record stats, sleep, repeat. A failed cycle is
 * logged and retried after a short constant delay; the loop never exits on
 * its own unless a cycle limit is given.
 */

import { detectOpportunities } from '../arbitrage/calculator.js';
import type { ArbitrageOpportunity } from '../arbitrage/types.js';
import { DISPLAY, PLATFORM_LABELS } from '../config/api.js';
import type { ScannerConfig } from '../config/scanner.js';
import { getErrorMessage } from '../errors/index.js';
import { sleep, truncate } from '../helpers/helpers.js';
import { matchEvents } from '../matching/event-matcher.js';
import type { AlertSink } from '../notifications/alert-sink.js';
import { buildScanRecord, type StatsAggregator } from '../stats/aggregator.js';
import type { MarketDataProvider, UnifiedEvent } from '../types/unified.js';
import { formatAlert, formatOpportunityLine } from './alert-formatter.js';
import {
  cooldownKey,
  createCooldownState,
  isCoolingDown,
  pruneExpired,
  stampAlert,
  type CooldownState,
} from './cooldown.js';

// ============ Types ============

export type ScannerSettings = Pick<
  ScannerConfig,
  | 'scanIntervalSeconds'
  | 'recoveryDelaySeconds'
  | 'minProfitPct'
  | 'alertCooldownSeconds'
  | 'similarityThreshold'
  | 'dateToleranceDays'
  | 'maxResolutionDays'
  | 'eventLimit'
  | 'debug'
>;

export interface ScannerDeps {
  providerA: MarketDataProvider;
  providerB: MarketDataProvider;
  alerts: AlertSink;
  stats: StatsAggregator;
  /** Epoch milliseconds */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/** State carried from one cycle to the next */
export interface ScanState {
  cooldowns: CooldownState;
}

export interface CycleSummary {
  eventsA: number;
  eventsB: number;
  matched: number;
  opportunities: number;
  alertsSent: number;
}

export interface CycleResult {
  state: ScanState;
  summary: CycleSummary;
}

export interface RunOptions {
  /** Stop after this many cycles (failed ones included) */
  maxCycles?: number;
  initialState?: ScanState;
}

export function createScanState(): ScanState {
  return { cooldowns: createCooldownState() };
}

// ============ Scanner ============

export class Scanner {
  private readonly providerA: MarketDataProvider;
  private readonly providerB: MarketDataProvider;
  private readonly alerts: AlertSink;
  private readonly stats: StatsAggregator;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly settings: ScannerSettings,
    deps: ScannerDeps
  ) {
    this.providerA = deps.providerA;
    this.providerB = deps.providerB;
    this.alerts = deps.alerts;
    this.stats = deps.stats;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? sleep;
  }

  // ============ Loop ============

  /**
   * Run cycles until the process is stopped (or `maxCycles` is reached).
   *
   * @returns The final state, only reached with a cycle limit
   */
  async run(options: RunOptions = {}): Promise<ScanState> {
    const { maxCycles } = options;
    let state = options.initialState ?? createScanState();
    let cycles = 0;

    while (maxCycles === undefined || cycles < maxCycles) {
      cycles++;
      const more = maxCycles === undefined || cycles < maxCycles;

      try {
        ({ state } = await this.runCycle(state));
        if (more) await this.sleep(this.settings.scanIntervalSeconds * 1000);
      } catch (error: unknown) {
        console.error(`[Scanner] Loop error: ${getErrorMessage(error)}`);
        if (this.settings.debug && error instanceof Error && error.stack) {
          console.error(error.stack);
        }
        if (more) await this.sleep(this.settings.recoveryDelaySeconds * 1000);
      }
    }

    return state;
  }

  /**
   * Log the active settings and send the startup notice.
   */
  async announce(): Promise<void> {
    const s = this.settings;
    const cooldownMinutes = Math.floor(s.alertCooldownSeconds / 60);
    const nameA = PLATFORM_LABELS[this.providerA.name];
    const nameB = PLATFORM_LABELS[this.providerB.name];

    console.log(`[Scanner] Cross-platform arbitrage scanner active: ${nameA} vs ${nameB}`);
    console.log(`[Scanner] Resolution horizon: ${s.maxResolutionDays} days | Interval: ${s.scanIntervalSeconds}s`);
    console.log(`[Scanner] Min profit after fees: ${s.minProfitPct}% | Alert cooldown: ${cooldownMinutes} min`);
    console.log(`[Scanner] Title similarity threshold: ${s.similarityThreshold} | Date tolerance: ${s.dateToleranceDays} days`);

    await this.deliver(
      `Cross-Platform Arb Scanner Online (${nameA} vs ${nameB})\n` +
        `Min profit: ${s.minProfitPct}% (after fees) | Cooldown: ${cooldownMinutes} min`
    );
  }

  // ============ Cycle ============

  /**
   * One full scan. Provider, notification and stats failures are contained;
   * anything else propagates to the loop.
   */
  async runCycle(state: ScanState): Promise<CycleResult> {
    const s = this.settings;

    const [eventsA, eventsB] = await Promise.all([
      this.fetchSafely(this.providerA),
      this.fetchSafely(this.providerB),
    ]);

    if (s.debug) {
      this.logSample(this.providerA, eventsA);
      this.logSample(this.providerB, eventsB);
    }

    const pairs = matchEvents(eventsA, eventsB, {
      similarityThreshold: s.similarityThreshold,
      dateToleranceDays: s.dateToleranceDays,
      debug: s.debug,
    });

    const opportunities = detectOpportunities(
      pairs,
      this.providerA.feeRate(),
      this.providerB.feeRate(),
      s.minProfitPct
    );

    const { cooldowns, alertsSent } = await this.dispatch(opportunities, state.cooldowns);

    const summary: CycleSummary = {
      eventsA: eventsA.length,
      eventsB: eventsB.length,
      matched: pairs.length,
      opportunities: opportunities.length,
      alertsSent,
    };

    const time = new Date(this.now());
    console.log(
      `[${time.toISOString().slice(11, 19)}] Scanned ${summary.eventsA} ${this.providerA.name} events, ` +
        `${summary.eventsB} ${this.providerB.name} events, ${summary.matched} matched, ` +
        `${summary.opportunities} opportunity(ies), ${summary.alertsSent} alerted`
    );

    await this.stats.record(
      buildScanRecord({
        timestamp: time,
        sourceA: this.providerA.name,
        sourceB: this.providerB.name,
        eventsA,
        eventsB,
        pairs,
        opportunities,
        alertsSent,
      })
    );

    return { state: { ...state, cooldowns }, summary };
  }

  // ============ Steps ============

  /**
   * Fetch boundary: a provider failure counts as zero events for that source.
   */
  private async fetchSafely(provider: MarketDataProvider): Promise<UnifiedEvent[]> {
    try {
      return await provider.fetchEvents(this.settings.eventLimit, this.settings.maxResolutionDays);
    } catch (error: unknown) {
      console.warn(`[${PLATFORM_LABELS[provider.name]}] Fetch failed: ${getErrorMessage(error)}`);
      return [];
    }
  }

  /**
   * Alert every opportunity outside its cooldown window and stamp it.
   */
  private async dispatch(
    opportunities: readonly ArbitrageOpportunity[],
    initial: CooldownState
  ): Promise<{ cooldowns: CooldownState; alertsSent: number }> {
    const windowMs = this.settings.alertCooldownSeconds * 1000;
    let cooldowns = pruneExpired(initial, this.now(), windowMs);
    let alertsSent = 0;

    for (const opp of opportunities) {
      console.log(formatOpportunityLine(opp));

      const key = cooldownKey(opp);
      const nowMs = this.now();
      if (isCoolingDown(cooldowns, key, nowMs, windowMs)) {
        if (this.settings.debug) console.log(`  [Scanner] Cooldown active for ${key}`);
        continue;
      }

      cooldowns = stampAlert(cooldowns, key, nowMs);
      alertsSent++;
      await this.deliver(formatAlert(opp));
    }

    return { cooldowns, alertsSent };
  }

  /**
   * Send through the sink; a misbehaving sink never breaks the cycle.
   */
  private async deliver(text: string): Promise<void> {
    try {
      await this.alerts.send(text);
    } catch (error: unknown) {
      console.warn(`[Scanner] Alert delivery failed: ${getErrorMessage(error)}`);
    }
  }

  private logSample(provider: MarketDataProvider, events: readonly UnifiedEvent[]): void {
    console.log(`  [Scanner] Fetched ${events.length} ${PLATFORM_LABELS[provider.name]} events`);
    events.slice(0, DISPLAY.PREVIEW_LIMIT).forEach((e, i) => {
      const resolves = e.resolutionTime.toISOString().slice(0, 16).replace('T', ' ');
      console.log(`    ${i + 1}. '${truncate(e.title, DISPLAY.TITLE_LIMIT)}' | Resolves: ${resolves}`);
    });
  }
}
