export * from '@/types/templateTypes';
export * from '@/types/calibrationTypes';
export type { ApiOk, ApiErr, ApiResponse, ToleranceSpec, TolFixed, TolPercent, TolEquation, TolLookup, TolBool } from '@/types/generalTypes';
export type * from '@/types/formulaTypes';

export {
   parseEquation,
   evaluate,
   evaluateToleranceEquation,
   listVariables,
   validateEquationVariables,
   equationHasPassFailCondition,
   parsePlotEquation,
   evaluatePlotEquation,
   ALLOWED_VARIABLES,
   VariableMap,
   FormulaError,
   FormulaSyntaxError,
   FormulaValueError,
} from '@/services/formula';

export { evaluatePassFail, evaluateCondition, toleranceSpecOf, toleranceSpecFrom } from '@utils/tolerances';
export { parseLookupRanges, resolveLookupTolerance } from '@utils/lookup';
export { equationToleranceDisplay } from '@utils/comparison';
export { computeFieldValue, customEquationVerdict, decimalsFor } from '@utils/computedFields';
export { createSiblingLookup, resolveVariables, missingVariables, isComputable, valuesById } from '@utils/variables';
export { toNumberStrippingUnit, toBool } from '@utils/measurement';
export { formatCalculationDisplay, toIsoDate } from '@utils/generalUtils';
export { validateFieldFormula } from '@/services/authoring/validation';
export { formulaEditorMachine, previewFormula } from '@/services/authoring/formulaEditorMachine';
export { evaluateRecord } from '@/services/report';
