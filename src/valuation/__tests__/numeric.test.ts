import { describe, expect, it } from 'vitest';
import { divideOrNull, isExactZero, toPercent } from '../numeric';

describe('numeric guard policy', () => {
  describe('isExactZero', () => {
    it('treats both signed zeros as zero', () => {
      expect(isExactZero(0)).toBe(true);
      expect(isExactZero(-0)).toBe(true);
    });

    it('does not use a tolerance', () => {
      expect(isExactZero(Number.MIN_VALUE)).toBe(false);
      expect(isExactZero(1e-300)).toBe(false);
    });

    it('is false for NaN', () => {
      expect(isExactZero(Number.NaN)).toBe(false);
    });
  });

  describe('divideOrNull', () => {
    it('divides by a non-zero divisor', () => {
      expect(divideOrNull(10, 4)).toBe(2.5);
      expect(divideOrNull(-10, 4)).toBe(-2.5);
    });

    it('returns null for a zero divisor', () => {
      expect(divideOrNull(10, 0)).toBeNull();
      expect(divideOrNull(0, 0)).toBeNull();
      expect(divideOrNull(10, -0)).toBeNull();
    });

    it('returns a huge value for a tiny divisor', () => {
      expect(divideOrNull(1, 1e-300)).toBeGreaterThan(1e299);
    });
  });

  describe('toPercent', () => {
    it('scales by 100 and passes null through', () => {
      expect(toPercent(0.25)).toBe(25);
      expect(toPercent(null)).toBeNull();
    });
  });
});
