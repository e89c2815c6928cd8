import type {
   CalibrationValue,
   FieldVerdict,
   InstrumentLookup,
   RecordEvaluation,
   ToleranceResult,
   Verdict,
   VerdictSource,
} from '@/types/calibrationTypes';
import type { DataType, TemplateField, ToleranceType } from '@/types/templateTypes';
import { AGGREGATE_CALC_TYPES } from '@/types/templateTypes';
import { logger } from '@/lib/logger';
import { errorMessage } from '@/services/formula';
import { computeFieldValue, decimalsFor, formatComparison } from '@utils/computedFields';
import { equationToleranceDisplay } from '@utils/comparison';
import { nowIso } from '@utils/generalUtils';
import { parseNominal, toBool, toNumberStrippingUnit } from '@utils/measurement';
import { evaluateCondition, evaluatePassFail, toleranceSpecOf } from '@utils/tolerances';
import { createSiblingLookup, isComputable, resolveVariables, valuesById } from '@utils/variables';



export type EvaluateRecordOptions = {
   instruments?: InstrumentLookup;
};

const COMPUTED_TYPES: ReadonlySet<DataType> = new Set<DataType>(['convert', 'stat', 'reference_cal_date']);
const NOT_MEASURED: ReadonlySet<DataType> = new Set<DataType>([
   'bool', 'tolerance', 'convert', 'stat', 'reference_cal_date', 'plot', 'field_header',
]);

const SELF_CONFIGURED: ReadonlySet<ToleranceType> = new Set<ToleranceType>(['equation', 'percent', 'lookup']);

const isAggregate = (f: TemplateField) => (f.calcType ? AGGREGATE_CALC_TYPES.includes(f.calcType) : false);

// a band or an equation filled in; without either the field is not checked
const hasBandOrEquation = (f: TemplateField) =>
   (f.toleranceFixed !== null && f.toleranceFixed !== undefined) || Boolean((f.toleranceEquation ?? '').trim());

const isToleranced = (f: TemplateField) =>
   hasBandOrEquation(f) || (f.toleranceType ? SELF_CONFIGURED.has(f.toleranceType) : false);

const bySortOrder = (a: TemplateField, b: TemplateField) =>
   (a.sortOrder ?? 0) - (b.sortOrder ?? 0) || a.id - b.id;


/**
 * Computes a record's derived values and checks every tolerance-bearing field,
 * in the order the calibration form does. Never throws: a field that cannot be
 * evaluated fails with the reason as explanation.
 */
export function evaluateRecord(
   templateFields: readonly TemplateField[],
   values: readonly CalibrationValue[],
   options: EvaluateRecordOptions = {},
): RecordEvaluation {
   const fields = [...templateFields].sort(bySortOrder);
   const working = valuesById(values);
   const lookupFor = (f: TemplateField) => createSiblingLookup(f, fields, working);
   const computed: CalibrationValue[] = [];
   const verdicts: FieldVerdict[] = [];

   const check = (f: TemplateField, source: VerdictSource, run: () => ToleranceResult | null) => {
      let result: ToleranceResult | null;
      try {
         result = run();
      } catch (e) {
         logger.warn('RECORD', `${f.name} (#${f.id}) could not be evaluated:`, errorMessage(e));
         result = { pass: false, toleranceUsed: 0, explanation: `Evaluation error: ${errorMessage(e)}` };
      }
      if (result) verdicts.push({ ...result, fieldId: f.id, name: f.name, label: f.label, source });
   };

   /* ───────────── 1. derived values, fed forward in form order ───────────── */
   for (const f of fields) {
      if (!f.calcType && !COMPUTED_TYPES.has(f.dataType)) continue;
      try {
         const value = computeFieldValue(f, { lookup: lookupFor(f), instruments: options.instruments });
         if (value === null) continue;
         working.set(f.id, value);
         computed.push({ fieldId: f.id, valueText: value });
      } catch (e) {
         logger.warn('RECORD', `${f.name} (#${f.id}) not computed:`, errorMessage(e));
      }
   }

   /* ───────────── 2. diff/aggregate results against their tolerance ───────────── */
   for (const f of fields.filter(isAggregate)) {
      if (!hasBandOrEquation(f)) continue;
      const spec = toleranceSpecOf(f);
      if (!spec) continue;
      check(f, 'computed', () => {
         const value = toNumberStrippingUnit(working.get(f.id), null);
         if (value === null) return null;
         const reading = Math.abs(value);
         const vars = resolveVariables(f, lookupFor(f), { reading, nominal: 0 });
         return evaluatePassFail(spec, { nominal: 0, reading, vars: vars.toBindings() });
      });
   }

   /* ───────────── 3. custom equations ───────────── */
   for (const f of fields) {
      const equation = (f.toleranceEquation ?? '').trim();
      if (f.calcType !== 'CUSTOM_EQUATION' || !equation) continue;
      check(f, 'custom', () => {
         const vars = resolveVariables(f, lookupFor(f));
         return isComputable(equation, vars) ? evaluateCondition(equation, vars.toBindings()) : null;
      });
   }

   /* ───────────── 4. pass/fail checkboxes ───────────── */
   for (const f of fields) {
      if (f.dataType !== 'bool' || f.toleranceType !== 'bool') continue;
      const text = working.get(f.id);
      const spec = toleranceSpecOf(f);
      if (!spec || text === undefined) continue;
      check(f, 'bool', () => evaluatePassFail(spec, { nominal: 0, reading: toBool(text) }));
   }

   /* ───────────── 5. measured points ───────────── */
   for (const f of fields) {
      if (f.calcType || NOT_MEASURED.has(f.dataType) || !isToleranced(f)) continue;
      const spec = toleranceSpecOf(f);
      if (!spec) continue;
      check(f, 'measured', () => {
         const reading = toNumberStrippingUnit(working.get(f.id), f.unit);
         if (reading === null) return null;
         const nominal = parseNominal(f.nominalValue);
         const vars = resolveVariables(f, lookupFor(f), { reading, nominal });
         return evaluatePassFail(spec, { nominal, reading, vars: vars.toBindings() });
      });
   }

   /* ───────────── 6. tolerance displays ───────────── */
   for (const f of fields) {
      const equation = (f.toleranceEquation ?? '').trim();
      if (f.dataType !== 'tolerance' || !equation) continue;
      check(f, 'tolerance', () => {
         const vars = resolveVariables(f, lookupFor(f));
         if (!isComputable(equation, vars)) return null;
         const parts = equationToleranceDisplay(equation, vars.toBindings());
         if (parts) {
            return { pass: parts.pass, toleranceUsed: parts.rhs, explanation: formatComparison(parts, decimalsFor(f)) };
         }
         return evaluatePassFail(
            { kind: 'equation', equation },
            { nominal: vars.get('nominal') ?? 0, reading: vars.get('reading') ?? 0, vars: vars.toBindings() },
         );
      });
   }

   const finalVerdict: Verdict = verdicts.some((v) => !v.pass) ? 'fail' : 'pass';
   logger.info('RECORD', `${verdicts.length} checks, ${computed.length} computed → ${finalVerdict}`);
   return { computed, verdicts, finalVerdict, generatedAt: nowIso() };
}
