/**
 * Distribution report over a deterministic sample of string keys
 */

import type pino from 'pino';
import { analyzeDistribution, analyzeRemap } from './core/analysis';
import { fnv1a64 } from './core/key-hashing';
import type { AnalysisConfig, DistributionReport, RemapReport } from './core/types';
import { createChildLogger, logDistributionReport, logRemapReport } from './logging';

export interface ReportResult {
  distribution: DistributionReport;
  remap: RemapReport;
}

/**
 * Digests of `${prefix}0` .. `${prefix}${count - 1}`
 */
export function sampleKeys(count: number, prefix: string): bigint[] {
  const keys: bigint[] = [];
  for (let i = 0; i < count; i++) {
    keys.push(fnv1a64(`${prefix}${i}`));
  }
  return keys;
}

export function runDistributionReport(config: AnalysisConfig, logger: pino.Logger): ReportResult {
  const log = createChildLogger(logger, { component: 'report' });
  const keys = sampleKeys(config.sampleKeys, config.keyPrefix);

  const distribution = analyzeDistribution(keys, config.buckets);
  logDistributionReport(log, distribution);

  const remap = analyzeRemap(keys, config.buckets, config.buckets + 1);
  logRemapReport(log, remap);

  return { distribution, remap };
}
