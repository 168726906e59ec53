/**
 * Unit tests for math helper utilities
 */

import { describe, it, expect } from 'vitest';
import {
  averageOrNull,
  median,
  percentage,
  percentile,
  round,
  safeAverage,
  safeDivide,
} from '../../../src/utils/math-helpers.js';

describe('Math Helpers', () => {
  describe('safeAverage', () => {
    it('should return 0 for empty array', () => {
      expect(safeAverage([])).toBe(0);
    });

    it('should return custom default for empty array', () => {
      expect(safeAverage([], 100)).toBe(100);
    });

    it('should calculate correct average for array with values', () => {
      expect(safeAverage([1, 2, 3])).toBe(2);
      expect(safeAverage([-10, 10])).toBe(0);
    });
  });

  describe('averageOrNull', () => {
    it('should ignore null values', () => {
      expect(averageOrNull([10, null, 20])).toBe(15);
    });

    it('should return null when no value is present', () => {
      expect(averageOrNull([])).toBeNull();
      expect(averageOrNull([null, null])).toBeNull();
    });
  });

  describe('safeDivide', () => {
    it('should return 0 for division by zero', () => {
      expect(safeDivide(10, 0)).toBe(0);
      expect(safeDivide(10, 0, 100)).toBe(100);
    });

    it('should divide normally otherwise', () => {
      expect(safeDivide(10, 4)).toBe(2.5);
    });
  });

  describe('percentage', () => {
    it('should scale to 0-100', () => {
      expect(percentage(1, 4)).toBe(25);
      expect(percentage(0, 0)).toBe(0);
    });
  });

  describe('median', () => {
    it('should pick the middle element for odd lengths', () => {
      expect(median([3, 1, 2])).toBe(2);
    });

    it('should average the middle pair for even lengths', () => {
      expect(median([4, 1, 3, 2])).toBe(2.5);
    });

    it('should return 0 for empty input', () => {
      expect(median([])).toBe(0);
    });

    it('should not mutate the input', () => {
      const values = [3, 1, 2];
      median(values);
      expect(values).toEqual([3, 1, 2]);
    });
  });

  describe('percentile', () => {
    it('should use the nearest-rank index', () => {
      const values = [10, 9, 8, 7, 6, 5, 4, 3, 2, 1];
      expect(percentile(values, 0.95)).toBe(10);
      expect(percentile(values, 0.5)).toBe(6);
      expect(percentile(values, 0)).toBe(1);
    });

    it('should clamp to the last element', () => {
      expect(percentile([1, 2, 3], 1)).toBe(3);
    });

    it('should return 0 for empty input', () => {
      expect(percentile([], 0.95)).toBe(0);
    });
  });

  describe('round', () => {
    it('should round to two decimals by default', () => {
      expect(round(1.23456)).toBe(1.23);
      expect(round(66.666666)).toBe(66.67);
    });

    it('should honour an explicit precision', () => {
      expect(round(12.345, 1)).toBe(12.3);
      expect(round(7.5, 0)).toBe(8);
    });
  });
});
