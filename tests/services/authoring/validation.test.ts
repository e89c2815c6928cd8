import { describe, expect, it } from 'vitest';

import { validateFieldFormula } from '@/services/authoring/validation';
import type { DataType, TemplateField } from '@/types/templateTypes';



const field = (dataType: DataType, extra: Partial<TemplateField> = {}): TemplateField => ({
   id: 1,
   name: 'f',
   label: 'F',
   dataType,
   ...extra,
});

describe('validateFieldFormula', () => {
   it('stat needs a formula over allowed variables', () => {
      expect(validateFieldFormula(field('stat'))).toEqual({
         ok: false,
         error: 'Stat equation is required for Stat type fields (e.g. LINEST([val1,val2],[ref1,ref2]) or STDEV([val1,val2,val3])).',
      });
      expect(validateFieldFormula(field('stat', { toleranceEquation: 'LINEST([val1,val2],[ref1,ref2])' }))).toEqual({
         ok: true,
         data: { variables: ['val1', 'val2', 'ref1', 'ref2'] },
      });
      expect(validateFieldFormula(field('stat', { toleranceEquation: 'foo * 2' }))).toEqual({
         ok: false,
         error: 'Equation uses unknown variables: foo. Allowed: nominal, reading, val1..val12.',
      });
   });

   it('convert needs a formula that parses', () => {
      expect(validateFieldFormula(field('convert'))).toEqual({
         ok: false,
         error: 'Conversion equation is required for Convert type fields.',
      });
      expect(validateFieldFormula(field('convert', { toleranceEquation: 'ref1 +' }))).toEqual({
         ok: false,
         error: 'Invalid equation: Unexpected end of formula',
      });
      expect(validateFieldFormula(field('convert', { toleranceEquation: 'lambda x: x' }))).toEqual({
         ok: false,
         error: "Invalid equation: 'lambda' is not allowed in formulas",
      });
      expect(validateFieldFormula(field('convert', { toleranceEquation: '(ref1 - 32) * 5 / 9' })).ok).toBe(true);
   });

   it('plot needs a valid PLOT call', () => {
      expect(validateFieldFormula(field('plot'))).toEqual({
         ok: false,
         error: 'Plot data is required (e.g. PLOT([val1, val2], [val3, val4])).',
      });
      expect(validateFieldFormula(field('plot', { toleranceEquation: 'PLOT([val1], [val2, val3])' }))).toEqual({
         ok: false,
         error: 'Invalid plot: PLOT X and Y lists must have the same length',
      });
      expect(validateFieldFormula(field('plot', { toleranceEquation: 'PLOT([val1], [val1])' }))).toEqual({
         ok: true,
         data: { variables: ['val1'] },
      });
   });

   it('tolerance fields and equation tolerances need a pass/fail condition', () => {
      const noCondition = { ok: false, error: 'Equation must contain a pass/fail condition (<, >, <=, >=, or ==).' };
      expect(validateFieldFormula(field('tolerance'))).toEqual({
         ok: false,
         error: 'Tolerance equation is required for Equation tolerance and for Tolerance type fields.',
      });
      expect(validateFieldFormula(field('tolerance', { toleranceEquation: 'reading * 2' }))).toEqual(noCondition);
      expect(validateFieldFormula(field('tolerance', { toleranceEquation: 'reading <= 2*nominal' }))).toEqual({
         ok: true,
         data: { variables: ['reading', 'nominal'] },
      });
      expect(
         validateFieldFormula(field('number', { toleranceType: 'equation', toleranceEquation: '0.02*abs(nominal)' })),
      ).toEqual(noCondition);
      expect(validateFieldFormula(field('number', { toleranceType: 'equation' })).ok).toBe(false);
   });

   it('reference_cal_date needs the instrument ref', () => {
      expect(validateFieldFormula(field('reference_cal_date'))).toEqual({
         ok: false,
         error: "Instrument reference is required. Select the field that contains the reference instrument's ID or tag number.",
      });
      expect(validateFieldFormula(field('reference_cal_date', { calcRefs: ['inst'] }))).toEqual({
         ok: true,
         data: { variables: [] },
      });
   });

   it('leaves every other field alone', () => {
      expect(validateFieldFormula(field('number', { toleranceType: 'fixed', toleranceFixed: 0.5 }))).toEqual({
         ok: true,
         data: { variables: [] },
      });
      expect(validateFieldFormula(field('text')).ok).toBe(true);
   });
});
