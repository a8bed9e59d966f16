/**
 * Unit tests for distribution and remap statistics
 */

import { describe, expect, it } from 'vitest';
import {
  analyzeDistribution,
  analyzeRemap,
  bucketHistogram,
  chiSquare,
} from '../src/core/analysis.js';
import { InvalidArgumentError } from '../src/core/errors.js';
import { sampleKeys } from '../src/report.js';

describe('bucketHistogram', () => {
  it('should count keys per bucket', () => {
    expect(bucketHistogram([0n, 1n, 2n, 3n, 4n, 5n, 6n, 7n], 4)).toEqual([3, 2, 1, 2]);
  });

  it('should accept any iterable', () => {
    const keys = new Set([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(bucketHistogram(keys, 2)).toEqual([5, 3]);
  });

  it('should return zeros for no keys', () => {
    expect(bucketHistogram([], 3)).toEqual([0, 0, 0]);
  });

  it('should reject invalid bucket counts', () => {
    expect(() => bucketHistogram([1n], 0)).toThrow(InvalidArgumentError);
  });

  it('should reject invalid keys in the sample', () => {
    expect(() => bucketHistogram([1n, -1n], 3)).toThrow(InvalidArgumentError);
    expect(() => analyzeRemap([2.5], 3, 4)).toThrow(InvalidArgumentError);
  });
});

describe('chiSquare', () => {
  it('should be zero for a perfectly even distribution', () => {
    expect(chiSquare([10, 10, 10, 10])).toBe(0);
  });

  it('should sum squared deviations over the expectation', () => {
    // expected 10: (20-10)^2/10 + (0-10)^2/10
    expect(chiSquare([20, 0])).toBe(20);
  });

  it('should be zero for empty counts', () => {
    expect(chiSquare([])).toBe(0);
    expect(chiSquare([0, 0])).toBe(0);
  });
});

describe('analyzeDistribution', () => {
  it('should summarize a uniform-looking sample', () => {
    const report = analyzeDistribution(sampleKeys(10000, 'key-'), 100);

    expect(report.numBuckets).toBe(100);
    expect(report.sampleSize).toBe(10000);
    expect(report.counts).toHaveLength(100);
    expect(report.min).toBe(75);
    expect(report.max).toBe(127);
    expect(report.mean).toBe(100);
    expect(report.degreesOfFreedom).toBe(99);
    expect(report.chiSquare).toBeCloseTo(118.88, 2);
  });
});

describe('analyzeRemap', () => {
  const keys = sampleKeys(10000, 'key-');

  it('should count keys moved to an added bucket', () => {
    const report = analyzeRemap(keys, 100, 101);

    expect(report).toEqual({
      fromBuckets: 100,
      toBuckets: 101,
      sampleSize: 10000,
      moved: 90,
      unexpectedMoves: 0,
      movedFraction: 0.009,
      expectedFraction: 1 / 101,
    });
  });

  it('should treat shrinking symmetrically', () => {
    const grow = analyzeRemap(keys, 8, 10);
    const shrink = analyzeRemap(keys, 10, 8);

    expect(grow.moved).toBe(2001);
    expect(shrink.moved).toBe(2001);
    expect(shrink.unexpectedMoves).toBe(0);
    expect(shrink.expectedFraction).toBe(0.2);
  });

  it('should report nothing moved for an unchanged count', () => {
    const report = analyzeRemap(keys.slice(0, 100), 7, 7);

    expect(report.moved).toBe(0);
    expect(report.expectedFraction).toBe(0);
  });

  it('should handle an empty sample', () => {
    expect(analyzeRemap([], 3, 4).movedFraction).toBe(0);
  });

  it('should name the invalid count', () => {
    expect(() => analyzeRemap(keys, 3, 0)).toThrow(
      'toBuckets must be an integer between 1 and 4294967295'
    );
  });
});
