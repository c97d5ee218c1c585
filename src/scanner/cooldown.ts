/**
 * Alert Cooldowns
 *
 * Immutable map of cooldown key -> last alert time (epoch ms). The scanner
 * owns one value and threads it through its cycles.
 */

import type { ArbitrageOpportunity } from '../arbitrage/types.js';

export type CooldownState = ReadonlyMap<string, number>;

export function createCooldownState(): CooldownState {
  return new Map();
}

/**
 * Stable key for one pair and direction.
 */
export function cooldownKey(opp: ArbitrageOpportunity): string {
  return `${opp.pair.eventA.id}|${opp.pair.eventB.id}|${opp.direction}`;
}

/**
 * True when an alert for `key` was sent within the window.
 */
export function isCoolingDown(state: CooldownState, key: string, nowMs: number, windowMs: number): boolean {
  const last = state.get(key);
  return last !== undefined && nowMs - last < windowMs;
}

export function stampAlert(state: CooldownState, key: string, nowMs: number): CooldownState {
  const next = new Map(state);
  next.set(key, nowMs);
  return next;
}

/**
 * Drop entries whose window has already elapsed. A dropped key behaves
 * exactly like an expired one, so suppression is unchanged.
 */
export function pruneExpired(state: CooldownState, nowMs: number, windowMs: number): CooldownState {
  const next = new Map<string, number>();
  for (const [key, last] of state) {
    if (nowMs - last < windowMs) next.set(key, last);
  }
  return next.size === state.size ? state : next;
}
