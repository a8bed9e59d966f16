/**
 * Jump consistent hash implementation for key-to-bucket mapping
 * Provides minimal remapping when the number of buckets changes
 *
 * Lamping & Veach, "A Fast, Minimal Memory, Consistent Hash Algorithm" (2014)
 */

import { nextState } from './lcg';
import type { KeyInput } from './types';
import { parseBucketCount, parseKey } from './validators';

const TWO_POW_31 = 2147483648;

/**
 * Jump consistent hash algorithm
 * Maps a key to a bucket with minimal remapping on bucket count changes
 *
 * Growing from N to N + 1 buckets either leaves a key where it was or moves
 * it to bucket N.
 *
 * @param key - Unsigned 64-bit key
 * @param numBuckets - Total number of buckets, between 1 and 2^32 - 1
 * @returns Bucket number (0 to numBuckets-1)
 * @throws InvalidArgumentError when either argument is out of range
 */
export function jumpHash(key: KeyInput, numBuckets: number): number {
  const buckets = parseBucketCount(numBuckets);
  return jumpBucket(parseKey(key), buckets);
}

/**
 * The jump loop without validation; callers pass a 64-bit key and a
 * bucket count already checked by parseBucketCount
 */
export function jumpBucket(key: bigint, buckets: number): number {
  let state = key;
  let b = -1;
  let j = 0;

  while (j < buckets) {
    b = j;
    state = nextState(state);
    // The division must happen in double precision before the multiply
    // for outputs to agree with other implementations
    j = Math.trunc((b + 1) * (TWO_POW_31 / (Number(state >> 33n) + 1)));
  }

  return b;
}
