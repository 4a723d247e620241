/**
 * Tests for number utilities
 */

import { isFiniteNumber, isInteger, isUint32, UINT32_MAX } from './index';

describe('number utilities', () => {
  describe('isFiniteNumber', () => {
    it('should accept finite numbers', () => {
      expect(isFiniteNumber(0)).toBe(true);
      expect(isFiniteNumber(-12.5)).toBe(true);
    });

    it('should reject NaN and Infinity', () => {
      expect(isFiniteNumber(NaN)).toBe(false);
      expect(isFiniteNumber(Infinity)).toBe(false);
    });

    it('should not coerce strings or null', () => {
      expect(isFiniteNumber('5')).toBe(false);
      expect(isFiniteNumber(null)).toBe(false);
    });
  });

  describe('isInteger', () => {
    it('should accept whole numbers', () => {
      expect(isInteger(24)).toBe(true);
      expect(isInteger(-3)).toBe(true);
    });

    it('should reject fractions', () => {
      expect(isInteger(1.5)).toBe(false);
    });
  });

  describe('isUint32', () => {
    it('should accept the full field range', () => {
      expect(isUint32(0)).toBe(true);
      expect(isUint32(UINT32_MAX)).toBe(true);
    });

    it('should reject values outside the field', () => {
      expect(isUint32(UINT32_MAX + 1)).toBe(false);
      expect(isUint32(-1)).toBe(false);
      expect(isUint32(2.5)).toBe(false);
    });
  });
});
