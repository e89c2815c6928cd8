import type { TemplateField } from '@/types/templateTypes';
import type { ApiResponse } from '@/types/generalTypes';
import {
   FormulaError,
   equationHasPassFailCondition,
   errorMessage,
   listVariables,
   parseEquation,
   parsePlotEquation,
   validateEquationVariables,
} from '@/services/formula';
import { refNameAt } from '@utils/variables';



export type FormulaCheck = ApiResponse<{ variables: string[] }>;

const MSG = {
   statRequired:
      'Stat equation is required for Stat type fields (e.g. LINEST([val1,val2],[ref1,ref2]) or STDEV([val1,val2,val3])).',
   convertRequired: 'Conversion equation is required for Convert type fields.',
   plotRequired: 'Plot data is required (e.g. PLOT([val1, val2], [val3, val4])).',
   toleranceRequired: 'Tolerance equation is required for Equation tolerance and for Tolerance type fields.',
   noCondition: 'Equation must contain a pass/fail condition (<, >, <=, >=, or ==).',
   instrumentRequired:
      "Instrument reference is required. Select the field that contains the reference instrument's ID or tag number.",
} as const;

const ok = (variables: string[] = []): FormulaCheck => ({ ok: true, data: { variables } });
const err = (error: string): FormulaCheck => ({ ok: false, error });


// parses, then checks every name against the allowed set
function checkNumericFormula(equation: string, requireCondition: boolean): FormulaCheck {
   try {
      parseEquation(equation);
   } catch (e) {
      if (e instanceof FormulaError) return err(`Invalid equation: ${e.message}`);
      throw e;
   }
   const { ok: known, unknown } = validateEquationVariables(equation);
   if (!known) {
      return err(`Equation uses unknown variables: ${unknown.join(', ')}. Allowed: nominal, reading, val1..val12.`);
   }
   if (requireCondition && !equationHasPassFailCondition(equation)) return err(MSG.noCondition);
   return ok(listVariables(equation));
}


/**
 * Save rules of the field editor. `ok: false` carries the message shown to the
 * template author; the field must not be saved.
 */
export function validateFieldFormula(field: TemplateField): FormulaCheck {
   const equation = (field.toleranceEquation ?? '').trim();

   switch (field.dataType) {
      case 'stat':
         return equation ? checkNumericFormula(equation, false) : err(MSG.statRequired);
      case 'convert':
         return equation ? checkNumericFormula(equation, false) : err(MSG.convertRequired);
      case 'plot': {
         if (!equation) return err(MSG.plotRequired);
         try {
            const { x, y } = parsePlotEquation(equation);
            return ok([...new Set([...x, ...y])]);
         } catch (e) {
            return err(`Invalid plot: ${errorMessage(e)}`);
         }
      }
      case 'reference_cal_date':
         return refNameAt(field, 1) ? ok() : err(MSG.instrumentRequired);
      case 'tolerance':
         return equation ? checkNumericFormula(equation, true) : err(MSG.toleranceRequired);
      default:
         if (field.toleranceType !== 'equation') return ok();
         return equation ? checkNumericFormula(equation, true) : err(MSG.toleranceRequired);
   }
}
