/**
 * String and byte keys, digested to 64 bits before jump hashing
 */

import { jumpBucket } from './jump-hash';
import type { StringKeyInput } from './types';
import { parseBucketCount } from './validators';

const FNV64_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV64_PRIME = 0x100000001b3n;

const encoder = new TextEncoder();

/**
 * 64-bit FNV-1a over the UTF-8 bytes of a string, or over raw bytes
 */
export function fnv1a64(input: StringKeyInput): bigint {
  const bytes = typeof input === 'string' ? encoder.encode(input) : input;

  let hash = FNV64_OFFSET_BASIS;
  for (const byte of bytes) {
    hash ^= BigInt(byte);
    hash = BigInt.asUintN(64, hash * FNV64_PRIME);
  }
  return hash;
}

/**
 * Map a string or byte key to a bucket in [0, numBuckets)
 */
export function jumpHashString(key: StringKeyInput, numBuckets: number): number {
  const buckets = parseBucketCount(numBuckets);
  return jumpBucket(fnv1a64(key), buckets);
}
