import { describe, expect, it } from 'vitest';

import { parseLookupRanges, resolveLookupTolerance } from '@utils/lookup';



const TABLE = '[{"range_low":0,"range_high":10,"tolerance":0.1},{"range_low":10,"range_high":100,"tolerance":0.5}]';

describe('resolveLookupTolerance', () => {
   it('takes the first range containing nominal, inclusive on both ends', () => {
      expect(resolveLookupTolerance(TABLE, 10)).toBe(0.1);
      expect(resolveLookupTolerance(TABLE, 0)).toBe(0.1);
      expect(resolveLookupTolerance(TABLE, 50)).toBe(0.5);
      expect(resolveLookupTolerance(TABLE, 100)).toBe(0.5);
   });

   it('returns 0 outside every range', () => {
      expect(resolveLookupTolerance(TABLE, 150)).toBe(0);
      expect(resolveLookupTolerance(TABLE, -1)).toBe(0);
   });

   it('is order-dependent, not narrowest-wins', () => {
      const wideFirst = [
         { range_low: 0, range_high: 100, tolerance: 0.5 },
         { range_low: 5, range_high: 15, tolerance: 0.1 },
      ];
      expect(resolveLookupTolerance(wideFirst, 10)).toBe(0.5);
      expect(resolveLookupTolerance([...wideFirst].reverse(), 10)).toBe(0.1);
   });

   it('returns |tolerance|', () => {
      expect(resolveLookupTolerance('[{"range_low":0,"range_high":10,"tolerance":-0.2}]', 5)).toBe(0.2);
   });

   it('never throws on malformed payloads', () => {
      expect(resolveLookupTolerance('not json', 5)).toBe(0);
      expect(resolveLookupTolerance('{"range_low":0}', 5)).toBe(0);
      expect(resolveLookupTolerance('', 5)).toBe(0);
      expect(resolveLookupTolerance(null, 5)).toBe(0);
      expect(resolveLookupTolerance(undefined, 5)).toBe(0);
   });

   it('skips rows that are not usable', () => {
      const rows = [
         'junk',
         { range_low: 'a', range_high: 10, tolerance: 1 },
         { range_low: '0', range_high: '10', tolerance: '0.3' },
      ];
      expect(resolveLookupTolerance(rows, 5)).toBe(0.3);
   });
});

describe('parseLookupRanges', () => {
   it('opens missing bounds', () => {
      expect(parseLookupRanges([{ tolerance: 0.7 }])).toEqual([{ rangeLow: -Infinity, rangeHigh: Infinity, tolerance: 0.7 }]);
   });

   it('keeps stored order', () => {
      expect(parseLookupRanges(TABLE)).toEqual([
         { rangeLow: 0, rangeHigh: 10, tolerance: 0.1 },
         { rangeLow: 10, rangeHigh: 100, tolerance: 0.5 },
      ]);
   });
});
