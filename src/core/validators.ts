/**
 * Input validation using Zod schemas
 */

import { z } from 'zod';
import { InvalidArgumentError } from './errors';
import { U64_MASK } from './lcg';

// Bucket counts are 32-bit unsigned, as in the reference implementation
export const MAX_BUCKETS = 0xffffffff;

export const BucketCountSchema = z.number().int().min(1).max(MAX_BUCKETS);

export const KeySchema = z.union([
  z.bigint().nonnegative().lte(U64_MASK),
  z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
]);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Validate a bucket count, throwing InvalidArgumentError on failure
 */
export function parseBucketCount(numBuckets: unknown, name = 'numBuckets'): number {
  const result = BucketCountSchema.safeParse(numBuckets);
  if (!result.success) {
    throw new InvalidArgumentError(`${name} must be an integer between 1 and ${MAX_BUCKETS}`, {
      [name]: describe(numBuckets),
      issues: result.error.issues.map((issue) => issue.message),
    });
  }
  return result.data;
}

/**
 * Validate a key and widen it to a 64-bit bigint
 */
export function parseKey(key: unknown): bigint {
  const result = KeySchema.safeParse(key);
  if (!result.success) {
    throw new InvalidArgumentError(
      'key must be an unsigned 64-bit bigint or a non-negative safe integer',
      { key: describe(key) }
    );
  }
  return BigInt(result.data);
}

// bigint is not JSON-serializable, so details carry its decimal text
function describe(value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
