/**
 * Distribution and remap statistics over a sample of keys
 */

import { jumpBucket } from './jump-hash';
import type { DistributionReport, KeyInput, RemapReport } from './types';
import { parseBucketCount, parseKey } from './validators';

/**
 * Count how many keys land in each bucket
 */
export function bucketHistogram(keys: Iterable<KeyInput>, numBuckets: number): number[] {
  const buckets = parseBucketCount(numBuckets);
  const counts = new Array<number>(buckets).fill(0);

  for (const key of keys) {
    counts[jumpBucket(parseKey(key), buckets)]++;
  }

  return counts;
}

/**
 * Pearson chi-square statistic of the counts against a uniform expectation
 */
export function chiSquare(counts: number[]): number {
  const total = counts.reduce((a, b) => a + b, 0);
  if (total === 0) {
    return 0;
  }

  const expected = total / counts.length;
  return counts.reduce((sum, observed) => sum + (observed - expected) ** 2 / expected, 0);
}

export function analyzeDistribution(
  keys: Iterable<KeyInput>,
  numBuckets: number
): DistributionReport {
  const counts = bucketHistogram(keys, numBuckets);
  const sampleSize = counts.reduce((a, b) => a + b, 0);

  return {
    numBuckets: counts.length,
    sampleSize,
    counts,
    min: counts.reduce((a, b) => Math.min(a, b)),
    max: counts.reduce((a, b) => Math.max(a, b)),
    mean: sampleSize / counts.length,
    chiSquare: chiSquare(counts),
    degreesOfFreedom: counts.length - 1,
  };
}

/**
 * Compare bucket assignments before and after a resize
 */
export function analyzeRemap(
  keys: Iterable<KeyInput>,
  fromBuckets: number,
  toBuckets: number
): RemapReport {
  const from = parseBucketCount(fromBuckets, 'fromBuckets');
  const to = parseBucketCount(toBuckets, 'toBuckets');
  const boundary = Math.min(from, to);

  let sampleSize = 0;
  let moved = 0;
  let unexpectedMoves = 0;

  for (const key of keys) {
    sampleSize++;
    const state = parseKey(key);
    const before = jumpBucket(state, from);
    const after = jumpBucket(state, to);

    if (before !== after) {
      moved++;
      if (before < boundary && after < boundary) {
        unexpectedMoves++;
      }
    }
  }

  return {
    fromBuckets: from,
    toBuckets: to,
    sampleSize,
    moved,
    unexpectedMoves,
    movedFraction: sampleSize === 0 ? 0 : moved / sampleSize,
    expectedFraction: Math.abs(to - from) / Math.max(from, to),
  };
}
