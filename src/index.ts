#!/usr/bin/env node
/**
 * Cross-Platform Arbitrage Scanner
 *
 * Entry point: load configuration, wire providers, alerts and stats, then
 * scan forever (or once with --once).
 *
 * Usage:
 *   npm run dev
 *   npm run dev -- --once --debug
 */

import { config as loadEnv } from 'dotenv';
import { parseArgs } from 'util';
import { startServer } from './api/server.js';
import { applyFlags, loadConfig } from './config/scanner.js';
import { createProvider } from './connectors/index.js';
import { getErrorMessage, isScannerError } from './errors/index.js';
import { createAlertSink } from './notifications/alert-sink.js';
import { Scanner } from './scanner/scanner.js';
import { StatsAggregator } from './stats/aggregator.js';
import { JsonFileStatsStore } from './stats/stats-store.js';

// Load environment variables from .env file
loadEnv();

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      once: { type: 'boolean', default: false },
      debug: { type: 'boolean', default: false },
    },
  });

  const config = applyFlags(loadConfig(), values);

  const stats = new StatsAggregator(new JsonFileStatsStore(config.statsFile));
  const scanner = new Scanner(config, {
    providerA: createProvider(config.sourceA, config),
    providerB: createProvider(config.sourceB, config),
    alerts: createAlertSink(config),
    stats,
  });

  if (config.apiPort !== null && !config.once) {
    startServer(stats, config.apiPort);
  }

  await scanner.announce();
  await scanner.run(config.once ? { maxCycles: 1 } : {});
}

main().catch((error: unknown) => {
  const code = isScannerError(error) ? ` [${error.code}]` : '';
  console.error(`Fatal${code}: ${getErrorMessage(error)}`);
  process.exit(1);
});
