/**
 * Configuration management using environment variables
 */

import { z } from 'zod';
import type { AnalysisConfig } from './core/types';
import { LogLevelSchema } from './core/validators';

// The report holds one counter per bucket and also analyzes buckets + 1
export const MAX_REPORT_BUCKETS = 1_000_000;

const IntegerTextSchema = z
  .string()
  .regex(/^\d+$/)
  .transform((text) => Number(text));

export const SampleKeysSchema = IntegerTextSchema.pipe(
  z.number().int().min(1).max(Number.MAX_SAFE_INTEGER)
);

export const ReportBucketsSchema = IntegerTextSchema.pipe(
  z.number().int().min(1).max(MAX_REPORT_BUCKETS)
);

/**
 * Load configuration from environment variables with sensible defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AnalysisConfig {
  const logLevel = LogLevelSchema.safeParse(env.LOG_LEVEL || 'info');
  if (!logLevel.success) {
    throw new Error(`LOG_LEVEL must be one of ${LogLevelSchema.options.join(', ')}`);
  }

  const sampleKeys = SampleKeysSchema.safeParse(env.SAMPLE_KEYS || '10000');
  if (!sampleKeys.success) {
    throw new Error('SAMPLE_KEYS must be a positive integer');
  }

  const buckets = ReportBucketsSchema.safeParse(env.BUCKETS || '100');
  if (!buckets.success) {
    throw new Error(`BUCKETS must be an integer between 1 and ${MAX_REPORT_BUCKETS}`);
  }

  return {
    logLevel: logLevel.data,
    sampleKeys: sampleKeys.data,
    buckets: buckets.data,
    keyPrefix: env.KEY_PREFIX ?? 'key-',
  };
}
