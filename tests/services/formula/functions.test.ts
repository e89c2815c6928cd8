import { describe, expect, it } from 'vitest';

import { correl, intercept, linest, median, roundHalfEven, rsq, stdev, stdevp } from '@/services/formula/functions';
import { evaluateToleranceEquation } from '@/services/formula';



describe('statistics', () => {
   it('fits a straight line', () => {
      const ys = [2, 4, 6];
      const xs = [1, 2, 3];
      expect(linest(ys, xs)).toBe(2);
      expect(intercept(ys, xs)).toBe(0);
      expect(rsq(ys, xs)).toBe(1);
      expect(correl(ys, xs)).toBe(1);
   });

   it('returns 0 for degenerate input', () => {
      expect(linest([1, 2], [3])).toBe(0);
      expect(linest([1, 2], [5, 5])).toBe(0);
      expect(intercept([], [])).toBe(0);
      expect(correl([1, 1], [1, 2])).toBe(0);
      expect(stdev([5])).toBe(0);
      expect(stdevp([])).toBe(0);
      expect(median([])).toBe(0);
   });

   it('treats a flat y series as a perfect fit', () => {
      expect(rsq([3, 3], [1, 2])).toBe(1);
   });

   it('computes spread and middle', () => {
      const values = [2, 4, 4, 4, 5, 5, 7, 9];
      expect(stdevp(values)).toBe(2);
      expect(stdev(values)).toBeCloseTo(2.13809, 5);
      expect(median([3, 1, 2])).toBe(2);
      expect(median([4, 1, 3, 2])).toBe(2.5);
   });

   it('rounds half to even', () => {
      expect(roundHalfEven(0.5)).toBe(0);
      expect(roundHalfEven(1.5)).toBe(2);
      expect(roundHalfEven(-2.5)).toBe(-2);
      expect(roundHalfEven(2.4)).toBe(2);
   });

   it('is reachable from formulas with list literals', () => {
      expect(evaluateToleranceEquation('LINEST([2, 4, 6], [1, 2, 3])', {})).toBe(2);
      expect(evaluateToleranceEquation('STDEVP([val1, val2])', { val1: 1, val2: 3 })).toBe(1);
      expect(evaluateToleranceEquation('median([ref1, ref2, 10])', { val1: 1, val2: 3 })).toBe(3);
   });
});
