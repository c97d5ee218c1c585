/**
 * Scanner Configuration
 *
 * Runtime settings read from the environment (`.env` is loaded by dotenv in
 * the entry point). Every value has a default; invalid values are rejected
 * up front with a ConfigError.
 */

import { ConfigError } from '../errors/index.js';
import { isPlatform, type Platform } from '../types/unified.js';

// ============ Types ============

export interface ScannerConfig {
  sourceA: Platform;
  sourceB: Platform;

  /** Delay between successful cycles (seconds) */
  scanIntervalSeconds: number;
  /** Delay after a failed cycle (seconds), shorter than the scan interval unless both are 0 */
  recoveryDelaySeconds: number;

  /** Minimum profit percentage after fees */
  minProfitPct: number;
  /** Minimum time between two alerts for the same pair and direction */
  alertCooldownSeconds: number;

  /** Title similarity threshold (0-1) */
  similarityThreshold: number;
  /** Maximum resolution-date difference for a match */
  dateToleranceDays: number;
  /** Only events resolving within this many days are fetched */
  maxResolutionDays: number;
  /** Events requested per source per cycle */
  eventLimit: number;
  /** Order size used for depth-weighted prices */
  orderSizeUsd: number;

  statsFile: string;
  /** Read-only stats API port; API disabled when null */
  apiPort: number | null;

  debug: boolean;
  /** Run a single cycle and exit */
  once: boolean;

  telegramBotToken: string | null;
  telegramChatId: string | null;
  manifoldApiKey: string | null;
}

export type Env = Record<string, string | undefined>;

// ============ Defaults ============

export const DEFAULT_CONFIG: ScannerConfig = {
  sourceA: 'polymarket',
  sourceB: 'manifold',
  scanIntervalSeconds: 60,
  recoveryDelaySeconds: 10,
  minProfitPct: 0.5,
  alertCooldownSeconds: 30 * 60,
  similarityThreshold: 0.5,
  dateToleranceDays: 3,
  maxResolutionDays: 3,
  eventLimit: 50,
  orderSizeUsd: 1,
  statsFile: 'data/dashboard_stats.json',
  apiPort: null,
  debug: false,
  once: false,
  telegramBotToken: null,
  telegramChatId: null,
  manifoldApiKey: null,
};

// ============ Parsing Helpers ============

const TRUTHY = new Set(['1', 'true', 'yes']);

export function parseBoolean(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

function readString(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  { min = -Infinity, max = Infinity, integer = false } = {}
): number {
  const raw = readString(env, name);
  if (raw === null) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new ConfigError(`${name} must be ${integer ? 'an integer' : 'a number'}, got "${raw}"`, name);
  }
  if (value < min || value > max) {
    throw new ConfigError(`${name} must be between ${min} and ${max}, got ${value}`, name);
  }
  return value;
}

function readPlatform(env: Env, name: string, fallback: Platform): Platform {
  const raw = readString(env, name);
  if (raw === null) return fallback;

  const value = raw.toLowerCase();
  if (!isPlatform(value)) {
    throw new ConfigError(`${name} must be one of polymarket, manifold, kalshi; got "${raw}"`, name);
  }
  return value;
}

// ============ Loader ============

/**
 * Build the scanner configuration from environment variables.
 */
export function loadConfig(env: Env = process.env): ScannerConfig {
  const d = DEFAULT_CONFIG;

  const config: ScannerConfig = {
    sourceA: readPlatform(env, 'SOURCE_A', d.sourceA),
    sourceB: readPlatform(env, 'SOURCE_B', d.sourceB),
    scanIntervalSeconds: readNumber(env, 'SCAN_INTERVAL_SECONDS', d.scanIntervalSeconds, { min: 0 }),
    recoveryDelaySeconds: readNumber(env, 'RECOVERY_DELAY_SECONDS', d.recoveryDelaySeconds, { min: 0 }),
    minProfitPct: readNumber(env, 'MIN_PROFIT_PCT', d.minProfitPct),
    alertCooldownSeconds: readNumber(env, 'ALERT_COOLDOWN_SECONDS', d.alertCooldownSeconds, { min: 0 }),
    similarityThreshold: readNumber(env, 'TITLE_SIMILARITY_THRESHOLD', d.similarityThreshold, { min: 0, max: 1 }),
    dateToleranceDays: readNumber(env, 'DATE_TOLERANCE_DAYS', d.dateToleranceDays, { min: 0, integer: true }),
    maxResolutionDays: readNumber(env, 'MAX_RESOLUTION_DAYS', d.maxResolutionDays, { min: 0 }),
    eventLimit: readNumber(env, 'EVENT_LIMIT', d.eventLimit, { min: 1, integer: true }),
    orderSizeUsd: readNumber(env, 'ORDER_SIZE_USD', d.orderSizeUsd, { min: 0 }),
    statsFile: readString(env, 'STATS_FILE') ?? d.statsFile,
    apiPort: readString(env, 'API_PORT') === null
      ? null
      : readNumber(env, 'API_PORT', 0, { min: 1, max: 65535, integer: true }),
    debug: parseBoolean(env.DEBUG),
    once: false,
    telegramBotToken: readString(env, 'TELEGRAM_BOT_TOKEN'),
    telegramChatId: readString(env, 'TELEGRAM_CHAT_ID'),
    manifoldApiKey: readString(env, 'MANIFOLD_API_KEY'),
  };

  if (config.sourceA === config.sourceB) {
    throw new ConfigError('SOURCE_A and SOURCE_B must name different platforms', 'SOURCE_B', {
      source: config.sourceA,
    });
  }

  // An interval of 0 means no wait, so only a recovery delay of 0 fits it
  if (config.recoveryDelaySeconds > 0 && config.recoveryDelaySeconds >= config.scanIntervalSeconds) {
    throw new ConfigError(
      'RECOVERY_DELAY_SECONDS must be shorter than SCAN_INTERVAL_SECONDS',
      'RECOVERY_DELAY_SECONDS'
    );
  }

  return config;
}

/**
 * Apply command-line flags (`--once`, `--debug`) on top of a loaded config.
 */
export function applyFlags(config: ScannerConfig, flags: { once?: boolean; debug?: boolean }): ScannerConfig {
  return {
    ...config,
    once: flags.once ?? config.once,
    debug: flags.debug === true ? true : config.debug,
  };
}
