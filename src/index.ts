/**
 * Jump consistent hash: key to bucket mapping with minimal remapping
 */

export { jumpHash } from './core/jump-hash';
export { fnv1a64, jumpHashString } from './core/key-hashing';
export { LCG_INCREMENT, LCG_MULTIPLIER, U64_MASK, lcgStream, nextState } from './core/lcg';
export { analyzeDistribution, analyzeRemap, bucketHistogram, chiSquare } from './core/analysis';
export {
  BucketCountSchema,
  KeySchema,
  MAX_BUCKETS,
  parseBucketCount,
  parseKey,
} from './core/validators';
export { InvalidArgumentError, JumpHashError, isJumpHashError } from './core/errors';
export type { ErrorCode, ErrorDetails } from './core/errors';
export type {
  AnalysisConfig,
  DistributionReport,
  KeyInput,
  LogLevel,
  RemapReport,
  StringKeyInput,
} from './core/types';
export { loadConfig } from './config';
export { createChildLogger, createLogger, logDistributionReport, logRemapReport } from './logging';
export { runDistributionReport, sampleKeys } from './report';
export type { ReportResult } from './report';
