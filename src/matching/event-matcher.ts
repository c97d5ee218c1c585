/**
 * Event Matcher
 *
 * Pairs events across two sources by resolution-date proximity and title
 * similarity. Each source-A event is matched independently against the best
 * source-B candidate; there is no global assignment, so one B event can be
 * claimed by several A events.
 */

import type { UnifiedEvent } from '../types/unified.js';
import { DISPLAY } from '../config/api.js';
import { truncate } from '../helpers/helpers.js';
import { titleSimilarity } from './similarity.js';
import {
  DEFAULT_MATCHER_CONFIG,
  type MatchedPair,
  type MatcherConfig,
  type NearMiss,
} from './types.js';

// ============ Constants ============

const SECONDS_PER_DAY = 24 * 60 * 60;

/** Comparisons below this similarity are not worth showing as near-misses */
const NEAR_MISS_FLOOR = 0.3;

const NEAR_MISS_LIMIT = 5;

// ============ Helpers ============

/**
 * Absolute resolution-time difference in seconds.
 */
export function resolutionGapSeconds(a: UnifiedEvent, b: UnifiedEvent): number {
  return Math.abs(a.resolutionTime.getTime() - b.resolutionTime.getTime()) / 1000;
}

// ============ Matching ============

/**
 * Match source-A events against source-B events.
 *
 * @returns One pair per matched A event, in A iteration order
 */
export function matchEvents(
  sourceEvents: readonly UnifiedEvent[],
  targetEvents: readonly UnifiedEvent[],
  config: Partial<MatcherConfig> = {}
): MatchedPair[] {
  const { similarityThreshold, dateToleranceDays, debug } = { ...DEFAULT_MATCHER_CONFIG, ...config };
  const maxGapSeconds = dateToleranceDays * SECONDS_PER_DAY;

  if (debug) {
    console.log(`  [Matcher] Matching ${sourceEvents.length} events against ${targetEvents.length}`);
    console.log(`  [Matcher] Threshold: ${similarityThreshold.toFixed(2)}, date tolerance: ${dateToleranceDays} days`);
  }

  const pairs: MatchedPair[] = [];
  const nearMisses: NearMiss[] = [];

  for (const source of sourceEvents) {
    let best: UnifiedEvent | null = null;
    let bestSimilarity = 0;
    let dateFiltered = 0;
    let similarityFiltered = 0;

    for (const target of targetEvents) {
      const gapSeconds = resolutionGapSeconds(source, target);
      if (gapSeconds > maxGapSeconds) {
        dateFiltered++;
        continue;
      }

      const similarity = titleSimilarity(source.title, target.title);

      if (debug && similarity > NEAR_MISS_FLOOR) {
        nearMisses.push({
          titleA: truncate(source.title, DISPLAY.MATCH_TITLE_LIMIT),
          titleB: truncate(target.title, DISPLAY.MATCH_TITLE_LIMIT),
          similarity,
          dateDiffDays: gapSeconds / SECONDS_PER_DAY,
        });
      }

      if (similarity < similarityThreshold) {
        similarityFiltered++;
      } else if (similarity > bestSimilarity) {
        best = target;
        bestSimilarity = similarity;
      }
    }

    if (best !== null) {
      pairs.push({ eventA: source, eventB: best, similarity: bestSimilarity });
      if (debug) {
        const gapDays = resolutionGapSeconds(source, best) / SECONDS_PER_DAY;
        console.log(`    ✓ MATCH: '${truncate(source.title, 45)}' <-> '${truncate(best.title, 45)}'`);
        console.log(`      Similarity: ${bestSimilarity.toFixed(3)}, date diff: ${gapDays.toFixed(1)} days`);
      }
    } else if (debug && sourceEvents.length <= NEAR_MISS_LIMIT) {
      console.log(`    ✗ No match for: '${truncate(source.title, DISPLAY.MATCH_TITLE_LIMIT)}'`);
      console.log(`      Date filtered: ${dateFiltered}, similarity filtered: ${similarityFiltered}`);
    }
  }

  if (debug && nearMisses.length > 0) {
    nearMisses.sort((x, y) => y.similarity - x.similarity);
    console.log('  [Matcher] Top similarities:');
    nearMisses.slice(0, NEAR_MISS_LIMIT).forEach((miss, i) => {
      console.log(`    ${i + 1}. ${miss.similarity.toFixed(3)} | date diff: ${miss.dateDiffDays.toFixed(1)}d`);
      console.log(`       A: '${miss.titleA}'`);
      console.log(`       B: '${miss.titleB}'`);
    });
  }

  return pairs;
}
