/**
 * Connector Module
 *
 * Market-data providers for each supported platform.
 */

import type { ScannerConfig } from '../config/scanner.js';
import type { MarketDataProvider, Platform } from '../types/unified.js';
import { KalshiConnector } from './kalshi-connector.js';
import { ManifoldConnector } from './manifold-connector.js';
import { PolymarketConnector } from './polymarket-connector.js';

export { KalshiConnector } from './kalshi-connector.js';
export { ManifoldConnector } from './manifold-connector.js';
export { PolymarketConnector } from './polymarket-connector.js';

/**
 * Build the provider for a platform from the scanner configuration.
 */
export function createProvider(
  platform: Platform,
  config: Pick<ScannerConfig, 'orderSizeUsd' | 'manifoldApiKey'>
): MarketDataProvider {
  switch (platform) {
    case 'polymarket':
      return new PolymarketConnector({ orderSizeUsd: config.orderSizeUsd });
    case 'manifold':
      return new ManifoldConnector({ apiKey: config.manifoldApiKey });
    case 'kalshi':
      return new KalshiConnector();
  }
}
