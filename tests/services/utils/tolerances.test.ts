import { describe, expect, it } from 'vitest';

import { evaluateCondition, evaluatePassFail, toleranceSpecFrom, toleranceSpecOf } from '@utils/tolerances';
import type { TemplateField } from '@/types/templateTypes';



const LOOKUP = '[{"range_low":0,"range_high":10,"tolerance":0.1},{"range_low":10,"range_high":100,"tolerance":0.5}]';

describe('evaluatePassFail', () => {
   it('percent: band is a share of |nominal|', () => {
      expect(evaluatePassFail({ kind: 'percent', percent: 2 }, { nominal: 100, reading: 101 })).toEqual({
         pass: true,
         toleranceUsed: 2,
         explanation: 'Tolerance = 2% of |nominal| = 2; |reading − nominal| = 1 → PASS',
      });
   });

   it('percent: zero nominal leaves a zero band', () => {
      expect(evaluatePassFail({ kind: 'percent', percent: 5 }, { nominal: 0, reading: 0 })).toMatchObject({ pass: true, toleranceUsed: 0 });
      expect(evaluatePassFail({ kind: 'percent', percent: 5 }, { nominal: 0, reading: 0.1 })).toMatchObject({ pass: false, toleranceUsed: 0 });
   });

   it('equation: a plain result is a tolerance band', () => {
      expect(evaluatePassFail({ kind: 'equation', equation: '0.02*abs(nominal)' }, { nominal: 100, reading: 101, vars: {} })).toEqual({
         pass: true,
         toleranceUsed: 2,
         explanation: 'Tolerance (from equation) = 2; |reading − nominal| = 1 → PASS',
      });
   });

   it('equation: a comparison decides directly', () => {
      expect(
         evaluatePassFail({ kind: 'equation', equation: 'abs(reading - nominal) <= 0.5' }, { nominal: 10, reading: 10.25 }),
      ).toEqual({
         pass: true,
         toleranceUsed: 1,
         explanation: 'Equation (condition) = 1 (1=pass, 0=fail) → PASS',
      });
      expect(
         evaluatePassFail({ kind: 'equation', equation: 'abs(reading - nominal) <= 0.5' }, { nominal: 10, reading: 11 }).pass,
      ).toBe(false);
   });

   it('equation: bindings passed in win over the point', () => {
      expect(evaluatePassFail({ kind: 'equation', equation: 'reading' }, { nominal: 0, reading: 5, vars: { reading: 1 } })).toEqual({
         pass: false,
         toleranceUsed: 1,
         explanation: 'Tolerance (from equation) = 1; |reading − nominal| = 5 → FAIL',
      });
   });

   it('equation: val aliases resolve from refs', () => {
      expect(
         evaluatePassFail({ kind: 'equation', equation: 'val1 * 0.1' }, { nominal: 100, reading: 101, vars: { ref1: 20 } }),
      ).toMatchObject({ pass: true, toleranceUsed: 2 });
   });

   it('equation: errors become a FAIL, never an exception', () => {
      expect(evaluatePassFail({ kind: 'equation', equation: 'reading / ref1' }, { nominal: 0, reading: 1, vars: { ref1: 0 } })).toEqual({
         pass: false,
         toleranceUsed: 0,
         explanation: 'Division by zero in equation → FAIL',
      });
      expect(evaluatePassFail({ kind: 'equation', equation: 'ref5 * 2' }, { nominal: 0, reading: 1 })).toEqual({
         pass: false,
         toleranceUsed: 0,
         explanation: "Equation error: Variable 'ref5' not provided",
      });
      expect(evaluatePassFail({ kind: 'equation', equation: 'lambda x: x' }, { nominal: 0, reading: 1 }).explanation).toBe(
         "Equation error: 'lambda' is not allowed in formulas",
      );
   });

   it('fixed: inclusive band, zero means exact', () => {
      expect(evaluatePassFail({ kind: 'fixed', tolerance: 0.5 }, { nominal: 10, reading: 10.25 })).toEqual({
         pass: true,
         toleranceUsed: 0.5,
         explanation: 'Tolerance = 0.5; diff = 0.25 → PASS',
      });
      expect(evaluatePassFail({ kind: 'fixed', tolerance: 0 }, { nominal: 10, reading: 10 }).pass).toBe(true);
      expect(evaluatePassFail({ kind: 'fixed', tolerance: 0 }, { nominal: 10, reading: 10.001 }).pass).toBe(false);
   });

   it('lookup: band comes from the range table', () => {
      expect(evaluatePassFail({ kind: 'lookup', table: LOOKUP }, { nominal: 10, reading: 10.05 })).toMatchObject({
         pass: true,
         toleranceUsed: 0.1,
      });
      expect(evaluatePassFail({ kind: 'lookup', table: LOOKUP }, { nominal: 10, reading: 10.5 })).toEqual({
         pass: false,
         toleranceUsed: 0.1,
         explanation: 'Tolerance (from lookup) = 0.1; |reading − nominal| = 0.5 → FAIL',
      });
   });

   it('bool: passes when the reading matches the configured state', () => {
      const passWhenTrue = toleranceSpecFrom('bool', { equation: 'true' });
      const passWhenFalse = toleranceSpecFrom('bool', { equation: 'false' });
      if (!passWhenTrue || !passWhenFalse) throw new Error('bool spec expected');

      expect(evaluatePassFail(passWhenTrue, { nominal: 0, reading: 1 })).toEqual({
         pass: true,
         toleranceUsed: 0,
         explanation: 'Pass when value is True; value is True → PASS',
      });
      expect(evaluatePassFail(passWhenTrue, { nominal: 0, reading: 0 }).pass).toBe(false);
      expect(evaluatePassFail(passWhenFalse, { nominal: 0, reading: 1 }).pass).toBe(false);
      expect(evaluatePassFail(passWhenFalse, { nominal: 0, reading: 0 })).toEqual({
         pass: true,
         toleranceUsed: 0,
         explanation: 'Pass when value is False; value is False → PASS',
      });
   });
});

describe('evaluateCondition', () => {
   it('uses the 0.5 threshold whatever the formula shape', () => {
      expect(evaluateCondition('ref1 * 2', { ref1: 0.2 })).toEqual({
         pass: false,
         toleranceUsed: 0.4,
         explanation: 'Equation (condition) = 0.4 (1=pass, 0=fail) → FAIL',
      });
      expect(evaluateCondition('val1 - 0.5', { ref1: 1 }).pass).toBe(true);
   });
});

describe('toleranceSpecFrom', () => {
   it('maps each tolerance type', () => {
      expect(toleranceSpecFrom('bool', {})).toEqual({ kind: 'bool', passWhen: true });
      expect(toleranceSpecFrom('bool', { equation: ' FALSE ' })).toEqual({ kind: 'bool', passWhen: false });
      expect(toleranceSpecFrom('percent', {})).toEqual({ kind: 'percent', percent: 0 });
      expect(toleranceSpecFrom('equation', { equation: ' x < 1 ' })).toEqual({ kind: 'equation', equation: 'x < 1' });
      expect(toleranceSpecFrom('lookup', { lookup: LOOKUP })).toEqual({ kind: 'lookup', table: LOOKUP });
      expect(toleranceSpecFrom('fixed', { fixed: 0.2 })).toEqual({ kind: 'fixed', tolerance: 0.2 });
      expect(toleranceSpecFrom(null, { fixed: 0.2 })).toEqual({ kind: 'fixed', tolerance: 0.2 });
   });

   it('falls back to the fixed band when the payload is blank', () => {
      expect(toleranceSpecFrom('equation', { equation: '  ', fixed: 1 })).toEqual({ kind: 'fixed', tolerance: 1 });
      expect(toleranceSpecFrom('lookup', { lookup: '' })).toEqual({ kind: 'fixed', tolerance: 0 });
   });

   it('defaults a missing band to exact match', () => {
      const exact = { kind: 'fixed', tolerance: 0 };
      expect(toleranceSpecFrom('fixed', { fixed: null })).toEqual(exact);
      expect(toleranceSpecFrom('fixed')).toEqual(exact);
      expect(toleranceSpecFrom('none', {})).toEqual(exact);
      expect(toleranceSpecFrom(null, {})).toEqual(exact);
      expect(evaluatePassFail({ kind: 'fixed', tolerance: 0 }, { nominal: 5, reading: 5 }).pass).toBe(true);
      expect(evaluatePassFail({ kind: 'fixed', tolerance: 0 }, { nominal: 5, reading: 5.001 }).pass).toBe(false);
   });

   it('is null for a bool pass value other than true/false', () => {
      expect(toleranceSpecFrom('bool', { equation: 'maybe' })).toBeNull();
      expect(toleranceSpecFrom('bool', { equation: '1' })).toBeNull();
   });

   it('reads the tolerance columns of a field', () => {
      const field: TemplateField = {
         id: 1,
         name: 'v',
         label: 'Voltage',
         dataType: 'number',
         toleranceType: 'percent',
         toleranceFixed: 1.5,
      };
      expect(toleranceSpecOf(field)).toEqual({ kind: 'percent', percent: 1.5 });
   });
});
