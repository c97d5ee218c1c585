/**
 * Similarity Algorithms
 *
 * Title similarity via sequence alignment: the ratio of characters covered by
 * matching blocks, where blocks are found greedily by repeatedly taking the
 * longest common contiguous run and recursing on both sides of it.
 */

// ============ Types ============

/**
 * A run of identical characters: a[aStart..aStart+size) === b[bStart..bStart+size).
 */
export interface MatchingBlock {
  aStart: number;
  bStart: number;
  size: number;
}

// ============ Constants ============

/** Strings at least this long get the popular-character heuristic */
const AUTOJUNK_MIN_LENGTH = 200;

// ============ Index ============

/**
 * Map each character of `b` to its ascending positions.
 *
 * For long strings, characters occurring in more than 1% of positions (+1)
 * are dropped from the index so they never seed a block; they can still be
 * absorbed when a block is extended.
 */
function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();

  for (let j = 0; j < b.length; j++) {
    const ch = b[j];
    const list = positions.get(ch);
    if (list) {
      list.push(j);
    } else {
      positions.set(ch, [j]);
    }
  }

  if (b.length >= AUTOJUNK_MIN_LENGTH) {
    const popularThreshold = Math.floor(b.length / 100) + 1;
    for (const [ch, list] of positions) {
      if (list.length > popularThreshold) {
        positions.delete(ch);
      }
    }
  }

  return positions;
}

// ============ Longest Match ============

/**
 * Find the longest matching block in a[aLo..aHi) and b[bLo..bHi).
 * Ties go to the block starting earliest in `a`, then earliest in `b`.
 */
function findLongestMatch(
  a: string,
  b: string,
  positions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): MatchingBlock {
  let bestI = aLo;
  let bestJ = bLo;
  let bestSize = 0;

  // runLengths[j] = length of the match ending at a[i-1], b[j]
  let runLengths = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;

      const k = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    runLengths = next;
  }

  // Extend across characters the index left out
  while (bestI > aLo && bestJ > bLo && a[bestI - 1] === b[bestJ - 1]) {
    bestI--;
    bestJ--;
    bestSize++;
  }
  while (
    bestI + bestSize < aHi &&
    bestJ + bestSize < bHi &&
    a[bestI + bestSize] === b[bestJ + bestSize]
  ) {
    bestSize++;
  }

  return { aStart: bestI, bStart: bestJ, size: bestSize };
}

// ============ Matching Blocks ============

/**
 * All matching blocks between `a` and `b`, ordered by position.
 */
export function getMatchingBlocks(a: string, b: string): MatchingBlock[] {
  const positions = indexPositions(b);
  const blocks: MatchingBlock[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;

    const block = findLongestMatch(a, b, positions, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;

    blocks.push(block);
    if (aLo < block.aStart && bLo < block.bStart) {
      queue.push([aLo, block.aStart, bLo, block.bStart]);
    }
    if (block.aStart + block.size < aHi && block.bStart + block.size < bHi) {
      queue.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
    }
  }

  return blocks.sort((x, y) => x.aStart - y.aStart || x.bStart - y.bStart);
}

// ============ Ratios ============

/**
 * Sequence similarity ratio (0-1): 2 * matched characters / total length.
 * Two empty strings are identical.
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;

  const matched = getMatchingBlocks(a, b).reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / total;
}

/**
 * Case-insensitive title similarity (0-1).
 */
export function titleSimilarity(titleA: string, titleB: string): number {
  return sequenceRatio(titleA.toLowerCase(), titleB.toLowerCase());
}
