/**
 * Structured logging with Pino
 */

import pino from 'pino';
import type { AnalysisConfig, DistributionReport, RemapReport } from './core/types';

/**
 * Create the main application logger
 */
export function createLogger(
  config: Pick<AnalysisConfig, 'logLevel'>,
  destination?: pino.DestinationStream
) {
  const options: pino.LoggerOptions = {
    level: config.logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(logger: pino.Logger, context: Record<string, unknown>) {
  return logger.child(context);
}

/**
 * Log a bucket distribution summary; per-bucket counts only at debug
 */
export function logDistributionReport(logger: pino.Logger, report: DistributionReport) {
  const { counts, ...summary } = report;

  logger.info(
    {
      ...summary,
      chiSquare: Number(report.chiSquare.toFixed(2)),
    },
    `Distribution over ${report.numBuckets} buckets`
  );
  logger.debug({ counts }, 'Bucket counts');
}

/**
 * Log how many keys moved on a resize
 */
export function logRemapReport(logger: pino.Logger, report: RemapReport) {
  const message = `Remap ${report.fromBuckets} -> ${report.toBuckets}: ${report.moved} of ${report.sampleSize} keys moved`;

  if (report.unexpectedMoves > 0) {
    logger.error(report, `${message}, ${report.unexpectedMoves} between surviving buckets`);
  } else {
    logger.info(report, message);
  }
}
