/**
 * Matching Types
 *
 * Type definitions for the cross-source event matcher.
 */

import type { UnifiedEvent } from '../types/unified.js';

// ============ Match Types ============

/**
 * Two events from different sources believed to describe the same outcome.
 *
 * Pairs are not one-to-one: several source-A events may match the same
 * source-B event.
 */
export interface MatchedPair {
  readonly eventA: UnifiedEvent;
  readonly eventB: UnifiedEvent;
  /** Title similarity that selected this pair (0-1) */
  readonly similarity: number;
}

// ============ Configuration ============

export interface MatcherConfig {
  /** Minimum title similarity for a match (0-1) */
  similarityThreshold: number;
  /** Maximum resolution-time difference, in whole days */
  dateToleranceDays: number;
  /** Log filtering counts, matches and near-misses */
  debug: boolean;
}

/**
 * Default matcher configuration.
 */
export const DEFAULT_MATCHER_CONFIG: MatcherConfig = {
  similarityThreshold: 0.5,
  dateToleranceDays: 3,
  debug: false,
};

// ============ Diagnostics ============

/**
 * A scored comparison that survived the date filter, tracked for debug output.
 */
export interface NearMiss {
  titleA: string;
  titleB: string;
  similarity: number;
  dateDiffDays: number;
}
