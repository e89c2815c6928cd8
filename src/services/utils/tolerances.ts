import type { Bindings } from "@/types/formulaTypes";
import type { LookupPayload, ToleranceResult } from "@/types/calibrationTypes";
import type { TemplateField, ToleranceType } from "@/types/templateTypes";
import type { ToleranceSpec } from "@/types/generalTypes";
import { containsComparison } from "@/services/formula/ast";
import { withValAliases } from "@/services/formula/bindings";
import { errorMessage } from "@/services/formula/errors";
import { evaluate } from "@/services/formula/evaluator";
import { parseEquation } from "@/services/formula/parser";
import { ENGINE } from "@/lib/config";
import { logger } from "@/lib/logger";
import { resolveLookupTolerance } from "./lookup";
import { toBool, withinTolerance } from "./measurement";



export type ToleranceConfig = {
   fixed?: number | null;
   equation?: string | null;
   lookup?: LookupPayload;
};

const isBlank = (payload: LookupPayload): boolean =>
   payload === null || payload === undefined || (typeof payload === "string" && !payload.trim());

/**
 * Tolerance columns → dispatch spec. A blank equation or lookup falls back to the
 * fixed band, and a missing band is 0 (exact match). `null` only for a bool
 * tolerance whose pass value is neither "true" nor "false".
 */
export function toleranceSpecFrom(type: ToleranceType | null | undefined, cfg: ToleranceConfig = {}): ToleranceSpec | null {
   const equation = (cfg.equation ?? "").trim();
   switch (type) {
      case "bool": {
         const passWhen = (equation || "true").toLowerCase();
         if (passWhen !== "true" && passWhen !== "false") return null;
         return { kind: "bool", passWhen: passWhen === "true" };
      }
      case "percent":
         return { kind: "percent", percent: cfg.fixed ?? 0 };
      case "equation":
         return equation ? { kind: "equation", equation } : { kind: "fixed", tolerance: cfg.fixed ?? 0 };
      case "lookup":
         return isBlank(cfg.lookup) ? { kind: "fixed", tolerance: cfg.fixed ?? 0 } : { kind: "lookup", table: cfg.lookup };
      default:
         return { kind: "fixed", tolerance: cfg.fixed ?? 0 };
   }
}

export const toleranceSpecOf = (field: TemplateField): ToleranceSpec | null =>
   toleranceSpecFrom(field.toleranceType, {
      fixed: field.toleranceFixed,
      equation: field.toleranceEquation,
      lookup: field.toleranceLookup,
   });



export type PointInput = {
   nominal: number;
   reading: number | boolean;
   vars?: Bindings;
};

const verdictWord = (pass: boolean) => (pass ? "PASS" : "FAIL");

function bandResult(label: string, tolerance: number, reading: number, nominal: number): ToleranceResult {
   const diff = Math.abs(reading - nominal);
   const pass = withinTolerance(reading, nominal, tolerance);
   return {
      pass,
      toleranceUsed: tolerance,
      explanation: `${label} = ${tolerance}; |reading − nominal| = ${diff} → ${verdictWord(pass)}`,
   };
}

const conditionResult = (value: number): ToleranceResult => {
   const pass = value >= ENGINE.CONDITION_THRESHOLD;
   return {
      pass,
      toleranceUsed: value,
      explanation: `Equation (condition) = ${value} (1=pass, 0=fail) → ${verdictWord(pass)}`,
   };
};

const equationError = (equation: string, e: unknown): ToleranceResult => {
   const msg = errorMessage(e);
   logger.debug("TOL", `equation "${equation}" failed:`, msg);
   return {
      pass: false,
      toleranceUsed: 0,
      explanation: msg.includes("Division by zero") ? "Division by zero in equation → FAIL" : `Equation error: ${msg}`,
   };
};

/** Result ≥ 0.5 passes, whatever the shape of the formula. */
export function evaluateCondition(equation: string, vars: Bindings): ToleranceResult {
   try {
      return conditionResult(evaluate(parseEquation(equation), withValAliases(vars)));
   } catch (e) {
      return equationError(equation, e);
   }
}

function equationResult(equation: string, nominal: number, reading: number, vars: Bindings): ToleranceResult {
   // caller's bindings win over the point's nominal/reading
   const bindings = withValAliases({ nominal, reading, ...vars });
   try {
      const body = parseEquation(equation);
      const value = evaluate(body, bindings);
      if (containsComparison(body)) return conditionResult(value);
      return bandResult("Tolerance (from equation)", value, reading, nominal);
   } catch (e) {
      return equationError(equation, e);
   }
}

/**
 * Pass/fail for one point. Never throws: an equation that cannot be evaluated
 * is a FAIL with the error as explanation.
 */
export function evaluatePassFail(spec: ToleranceSpec, { nominal, reading, vars = {} }: PointInput): ToleranceResult {
   if (spec.kind === "bool") {
      const value = toBool(reading);
      const pass = value === spec.passWhen;
      return {
         pass,
         toleranceUsed: 0,
         explanation: `Pass when value is ${spec.passWhen ? "True" : "False"}; value is ${value ? "True" : "False"} → ${verdictWord(pass)}`,
      };
   }

   const r = Number(reading);
   const diff = Math.abs(r - nominal);
   switch (spec.kind) {
      case "fixed": {
         const pass = withinTolerance(r, nominal, spec.tolerance);
         return {
            pass,
            toleranceUsed: spec.tolerance,
            explanation: `Tolerance = ${spec.tolerance}; diff = ${diff} → ${verdictWord(pass)}`,
         };
      }
      case "percent": {
         // zero nominal → zero band: only an exact reading passes
         const tolerance = nominal ? Math.abs(nominal) * (spec.percent / 100) : 0;
         const pass = withinTolerance(r, nominal, tolerance);
         return {
            pass,
            toleranceUsed: tolerance,
            explanation: `Tolerance = ${spec.percent}% of |nominal| = ${tolerance}; |reading − nominal| = ${diff} → ${verdictWord(pass)}`,
         };
      }
      case "equation":
         return equationResult(spec.equation, nominal, r, vars);
      case "lookup":
         return bandResult("Tolerance (from lookup)", resolveLookupTolerance(spec.table, nominal), r, nominal);
      default: {
         const unreachable: never = spec;
         return unreachable;
      }
   }
}
