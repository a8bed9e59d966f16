/**
 * Prints bucket distribution and remap statistics for a sample of keys
 *
 * SAMPLE_KEYS=100000 BUCKETS=64 npm run analyze
 */

import { loadConfig } from '../src/config';
import { createLogger } from '../src/logging';
import { runDistributionReport } from '../src/report';

function main() {
  const config = loadConfig();
  const logger = createLogger(config);

  const { remap } = runDistributionReport(config, logger);
  if (remap.unexpectedMoves > 0) {
    process.exitCode = 1;
  }
}

try {
  main();
} catch (error) {
  console.error('Distribution report failed:', error);
  process.exit(1);
}
