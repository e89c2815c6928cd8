import type { CalcType, TemplateField } from "@/types/templateTypes";
import type { ComparisonParts, InstrumentLookup } from "@/types/calibrationTypes";
import { ENGINE } from "@/lib/config";
import { logger } from "@/lib/logger";
import { type VariableMap, errorMessage, evaluateToleranceEquation } from "@/services/formula";
import { equationToleranceDisplay } from "./comparison";
import { clamp, formatCalculationDisplay, toIsoDate } from "./generalUtils";
import { type SiblingLookup, isComputable, refNameAt, resolveVariables } from "./variables";



export type ComputeContext = {
   lookup: SiblingLookup;
   instruments?: InstrumentLookup;
};

const PAIR_FORMULAS: Partial<Record<CalcType, string>> = {
   ABS_DIFF: "abs(ref1 - ref2)",
   PCT_ERROR: "abs(ref1 - ref2) / abs(ref2) * 100",          // ref2 is the reference value
   PCT_DIFF: "200 * abs(ref1 - ref2) / (ref1 + ref2)",
};

const SIG_FIG_TYPES = new Set(["convert", "stat", "tolerance"]);

/** Display decimals: sig_figs (0..4) where the field may override them, 3 otherwise. */
export function decimalsFor(field: TemplateField): number {
   const overridable = SIG_FIG_TYPES.has(field.dataType) || field.calcType === "CUSTOM_EQUATION";
   if (!overridable || field.sigFigs === null || field.sigFigs === undefined) return ENGINE.DEFAULT_DECIMALS;
   return clamp(Math.trunc(field.sigFigs), ENGINE.MIN_SIG_FIGS, ENGINE.MAX_SIG_FIGS);
}

export const formatComparison = (parts: ComparisonParts, decimals: number): string => {
   const lhs = formatCalculationDisplay(parts.lhs, { decimals });
   const rhs = formatCalculationDisplay(parts.rhs, { decimals });
   return `${lhs} ${parts.operator} ${rhs}, ${parts.pass ? "PASS" : "FAIL"}`;
};

// "" when the formula cannot run on these values
const evaluateOrBlank = (field: TemplateField, formula: string, vars: VariableMap): string => {
   try {
      return formatCalculationDisplay(evaluateToleranceEquation(formula, vars.toBindings()), { decimals: decimalsFor(field) });
   } catch (e) {
      logger.debug("CALC", `${field.name}: ${formula} →`, errorMessage(e));
      return "";
   }
};

function aggregateFormula(calcType: CalcType, vars: VariableMap): string | null {
   const pair = PAIR_FORMULAS[calcType];
   if (pair) return vars.has("ref1") && vars.has("ref2") ? pair : null;

   const refs = vars.filledSlots().map((n) => `ref${n}`);
   if (refs.length < 2) return null;
   const list = refs.join(", ");
   switch (calcType) {
      case "MIN_OF": return `min(${list})`;
      case "MAX_OF": return `max(${list})`;
      case "RANGE_OF": return `max(${list}) - min(${list})`;
      default: return null;
   }
}

/**
 * CUSTOM_EQUATION value: "lhs op rhs, PASS|FAIL" for a single comparison, else
 * "Pass"/"Fail" by the 0.5 threshold. Incomplete inputs → "".
 */
export function customEquationVerdict(field: TemplateField, vars: VariableMap): string {
   const equation = (field.toleranceEquation ?? "").trim();
   if (!equation || !isComputable(equation, vars)) return "";
   const parts = equationToleranceDisplay(equation, vars.toBindings());
   if (parts) return formatComparison(parts, decimalsFor(field));
   try {
      return evaluateToleranceEquation(equation, vars.toBindings()) >= ENGINE.CONDITION_THRESHOLD ? "Pass" : "Fail";
   } catch (e) {
      logger.debug("CALC", `${field.name}: custom equation failed:`, errorMessage(e));
      return "Fail";
   }
}

function referenceCalDate(field: TemplateField, ctx: ComputeContext): string {
   const idOrTag = ctx.lookup.find(refNameAt(field, 1))?.text.trim() ?? "";
   if (!idOrTag || !ctx.instruments) return "";
   try {
      return toIsoDate(ctx.instruments.lastCalDate(idOrTag));
   } catch (e) {
      logger.warn("CALC", `instrument lookup failed for "${idOrTag}":`, errorMessage(e));
      return "";
   }
}

/**
 * Stored text for a computed field; "" means blank. `null` when the field is not
 * computed at all (its value comes from the operator).
 */
export function computeFieldValue(field: TemplateField, ctx: ComputeContext): string | null {
   if (field.calcType) {
      const vars = resolveVariables(field, ctx.lookup);
      if (field.calcType === "CUSTOM_EQUATION") return customEquationVerdict(field, vars);
      const formula = aggregateFormula(field.calcType, vars);
      return formula ? evaluateOrBlank(field, formula, vars) : "";
   }

   switch (field.dataType) {
      case "convert":
      case "stat": {
         const formula = (field.toleranceEquation ?? "").trim();
         return formula ? evaluateOrBlank(field, formula, resolveVariables(field, ctx.lookup)) : "";
      }
      case "tolerance": {
         const equation = (field.toleranceEquation ?? "").trim();
         const vars = resolveVariables(field, ctx.lookup);
         if (!equation || !isComputable(equation, vars)) return "";
         const parts = equationToleranceDisplay(equation, vars.toBindings());
         return parts ? formatComparison(parts, decimalsFor(field)) : "";
      }
      case "reference_cal_date":
         return referenceCalDate(field, ctx);
      default:
         return null;
   }
}
