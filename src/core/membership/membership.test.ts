import { triangular, trapezoidal, evaluateMembership, categoryDegrees, fuzzifyVariable } from './membership';
import type { LinguisticVariable } from './types';

const soil: LinguisticVariable = {
  name: 'soil_moisture',
  unit: '%',
  universe: { min: 0, max: 100 },
  categories: {
    dry: { kind: 'trapezoidal', points: [0, 0, 20, 40] },
    moist: { kind: 'triangular', points: [30, 50, 70] },
    wet: { kind: 'trapezoidal', points: [60, 80, 100, 100] }
  }
};

describe('membership', () => {
  describe('triangular', () => {
    const warm = [15, 23, 30] as const;

    it('should peak at the middle breakpoint', () => {
      expect(triangular(23, warm)).toBe(1);
    });

    it('should rise linearly on the left side', () => {
      expect(triangular(19, warm)).toBe(0.5);
    });

    it('should fall linearly on the right side', () => {
      expect(triangular(26.5, warm)).toBe(0.5);
    });

    it('should be zero at and beyond the feet', () => {
      expect(triangular(15, warm)).toBe(0);
      expect(triangular(30, warm)).toBe(0);
      expect(triangular(10, warm)).toBe(0);
      expect(triangular(31, warm)).toBe(0);
    });

    it('should form a left shoulder when a equals b', () => {
      const none = [0, 0, 10] as const;
      expect(triangular(0, none)).toBe(1);
      expect(triangular(5, none)).toBe(0.5);
      expect(triangular(10, none)).toBe(0);
    });
  });

  describe('trapezoidal', () => {
    it('should be fully true on the plateau including a left shoulder', () => {
      expect(trapezoidal(0, [0, 0, 20, 40])).toBe(1);
      expect(trapezoidal(10, [0, 0, 20, 40])).toBe(1);
      expect(trapezoidal(20, [0, 0, 20, 40])).toBe(1);
    });

    it('should fall linearly after the plateau', () => {
      expect(trapezoidal(25, [0, 0, 20, 40])).toBe(0.75);
      expect(trapezoidal(40, [0, 0, 20, 40])).toBe(0);
    });

    it('should rise linearly before the plateau', () => {
      expect(trapezoidal(31, [27, 35, 45, 45])).toBe(0.5);
      expect(trapezoidal(27, [27, 35, 45, 45])).toBe(0);
    });

    it('should be fully true at a right shoulder', () => {
      expect(trapezoidal(45, [27, 35, 45, 45])).toBe(1);
    });

    it('should be zero outside the feet', () => {
      expect(trapezoidal(-1, [0, 0, 20, 40])).toBe(0);
      expect(trapezoidal(46, [27, 35, 45, 45])).toBe(0);
    });
  });

  describe('evaluateMembership', () => {
    it('should dispatch on the shape kind', () => {
      expect(evaluateMembership({ kind: 'triangular', points: [30, 50, 70] }, 40)).toBe(0.5);
      expect(evaluateMembership({ kind: 'trapezoidal', points: [60, 80, 100, 100] }, 70)).toBe(0.5);
    });
  });

  describe('categoryDegrees', () => {
    it('should evaluate every category', () => {
      expect(categoryDegrees(soil, 35)).toEqual({ dry: 0.25, moist: 0.25, wet: 0 });
    });
  });

  describe('fuzzifyVariable', () => {
    it('should fuzzify a reading inside the universe', () => {
      expect(fuzzifyVariable(soil, 65)).toEqual({
        value: 65,
        degrees: { dry: 0, moist: 0.25, wet: 0.25 }
      });
    });

    it('should clamp readings above the universe', () => {
      expect(fuzzifyVariable(soil, 110)).toEqual({
        value: 100,
        degrees: { dry: 0, moist: 0, wet: 1 }
      });
    });

    it('should clamp readings below the universe', () => {
      expect(fuzzifyVariable(soil, -5)).toEqual({
        value: 0,
        degrees: { dry: 1, moist: 0, wet: 0 }
      });
    });

    it('should treat NaN as the universe minimum', () => {
      expect(fuzzifyVariable(soil, NaN).value).toBe(0);
    });
  });
});
