/**
 * Core type definitions for the jump hash library
 */

/**
 * A 64-bit unsigned key. Numbers must be non-negative safe integers;
 * anything wider goes through bigint.
 */
export type KeyInput = bigint | number;

export type StringKeyInput = string | Uint8Array;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface DistributionReport {
  numBuckets: number;
  sampleSize: number;
  counts: number[];
  min: number;
  max: number;
  mean: number;
  chiSquare: number;
  degreesOfFreedom: number;
}

export interface RemapReport {
  fromBuckets: number;
  toBuckets: number;
  sampleSize: number;
  moved: number;
  // Moves where neither side is a bucket added or removed by the resize
  unexpectedMoves: number;
  movedFraction: number;
  expectedFraction: number;
}

export interface AnalysisConfig {
  logLevel: LogLevel;
  sampleKeys: number;
  buckets: number;
  keyPrefix: string;
}
